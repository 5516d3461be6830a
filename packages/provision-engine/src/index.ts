/**
 * Sandbox provisioning engine
 *
 * Creates a sandbox, runs a recipe's steps against it and either keeps it
 * or rolls it back.
 */

export * from './config.js';
export * from './dsl/index.js';
export * from './errors.js';
export * from './executor/index.js';
export * from './logger.js';
export * from './password.js';
export * from './release.js';
export * from './sandbox/index.js';
export * from './sandbox/lifecycle.js';
