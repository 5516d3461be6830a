/**
 * Provisioning recipes and the sandbox-provision command line
 */

export * from './cli.js';
export * from './recipes/index.js';
export * from './templates/index.js';
