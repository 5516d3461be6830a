import { randomInt } from 'crypto';

export const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Random credential drawn uniformly from `alphabet` with a CSPRNG
 */
export function generatePassword(length = 8, alphabet = ALPHANUMERIC): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Password length must be a positive integer, got ${length}`);
  }
  if (alphabet.length === 0) {
    throw new RangeError('Password alphabet must not be empty');
  }

  let password = '';
  for (let i = 0; i < length; i++) {
    password += alphabet[randomInt(alphabet.length)];
  }
  return password;
}
