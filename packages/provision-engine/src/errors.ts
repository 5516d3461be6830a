/**
 * Error taxonomy for provisioning runs
 *
 * Every fatal condition is a ProvisioningError. The CLI turns it into
 * exit code 1 and a single `Error: <message>!` line.
 */

/**
 * Category of a fatal provisioning error
 */
export type ProvisioningErrorKind =
  /** The sandbox already exists, or is missing/not running when a step needs it */
  | 'precondition'
  /** A sandbox provider operation reported failure */
  | 'provider'
  /** The sandbox did not report an address in time */
  | 'timeout'
  /** A step exited non-zero, or its host-side process could not be launched */
  | 'step'
  /** Configuration or recipe definition is invalid */
  | 'config'
  /** The run was interrupted between steps */
  | 'interrupted';

export class ProvisioningError extends Error {
  readonly kind: ProvisioningErrorKind;

  constructor(kind: ProvisioningErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProvisioningError';
    this.kind = kind;
  }
}

/**
 * Abort the current run
 */
export function fail(kind: ProvisioningErrorKind, message: string, cause?: unknown): never {
  throw new ProvisioningError(kind, message, cause === undefined ? undefined : { cause });
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}

/**
 * Best-effort message for anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
