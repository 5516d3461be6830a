/**
 * Provisioner configuration
 *
 * Sources, lowest precedence first: built-in defaults, an optional YAML
 * file, then SANDBOX_PROVISION_* environment variables.
 */

import { readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ProvisioningError, errorMessage } from './errors.js';
import { DEFAULT_RELEASE_URL } from './release.js';

export const CONFIG_FILE_ENV = 'SANDBOX_PROVISION_CONFIG';

/**
 * Environment variables and the config keys they override
 */
export const ENV_OVERRIDES = {
  SANDBOX_PROVISION_FALLBACK_RELEASE: 'fallbackRelease',
  SANDBOX_PROVISION_RELEASE_URL: 'releaseUrl',
  SANDBOX_PROVISION_ADDRESS_TIMEOUT: 'addressTimeoutSeconds',
  SANDBOX_PROVISION_LXC_PATH: 'lxcPath',
  SANDBOX_PROVISION_ARCH: 'arch',
} as const;

export const ProvisionerConfigSchema = z.strictObject({
  /** Release used when the codename lookup fails */
  fallbackRelease: z.string().regex(/^[a-z][a-z0-9-]*$/).default('bookworm'),
  releaseUrl: z.url().default(DEFAULT_RELEASE_URL),
  releaseTimeoutMs: z.coerce.number().int().positive().default(10_000),
  addressTimeoutSeconds: z.coerce.number().int().positive().default(120),
  pollIntervalMs: z.coerce.number().int().positive().default(1000),
  lxcPath: z.string().min(1).optional(),
  distribution: z.string().min(1).default('debian'),
  arch: z.string().min(1).default('amd64'),
});

export type ProvisionerConfigInput = z.input<typeof ProvisionerConfigSchema>;

export type ProvisionerConfig = z.output<typeof ProvisionerConfigSchema> & {
  lxcPath: string;
};

export interface LoadConfigOptions {
  /** YAML file to read (falls back to $SANDBOX_PROVISION_CONFIG) */
  file?: string;
  env?: NodeJS.ProcessEnv;
  readFile?: (path: string) => string;
  /** Effective user id, used to pick the default container store */
  uid?: number;
  home?: string;
}

/**
 * System containers live under /var/lib/lxc, unprivileged ones in the
 * user's data directory.
 */
export function defaultLxcPath(uid: number, home: string): string {
  return uid === 0 ? '/var/lib/lxc' : join(home, '.local', 'share', 'lxc');
}

function readConfigFile(file: string, readFile: (path: string) => string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.load(readFile(file));
  } catch (error) {
    throw new ProvisioningError('config', `Failed to read configuration file ${file}: ${errorMessage(error)}`, { cause: error });
  }

  if (parsed === undefined || parsed === null) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ProvisioningError('config', `Configuration file ${file} must contain a mapping`);
  }
  return { ...parsed };
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value !== '') overrides[key] = value;
  }
  return overrides;
}

export function loadConfig(options: LoadConfigOptions = {}): ProvisionerConfig {
  const env = options.env ?? process.env;
  const readFile = options.readFile ?? (path => readFileSync(path, 'utf-8'));
  const file = options.file ?? env[CONFIG_FILE_ENV];

  const fromFile = file ? readConfigFile(file, readFile) : {};
  const result = ProvisionerConfigSchema.safeParse({ ...fromFile, ...envOverrides(env) });

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ProvisioningError('config', `Invalid configuration: ${issues}`);
  }

  const uid = options.uid ?? (typeof process.getuid === 'function' ? process.getuid() : 1000);
  return {
    ...result.data,
    lxcPath: result.data.lxcPath ?? defaultLxcPath(uid, options.home ?? homedir()),
  };
}
