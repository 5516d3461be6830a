/**
 * Sandbox provider abstraction
 *
 * The orchestrator only talks to a SandboxProvider, so the container
 * runtime can be swapped (or faked in tests) without touching the
 * provisioning logic.
 */

import type { Readable } from 'stream';
import type { DistroParams } from '../dsl/index.js';

/**
 * Where an attached command's stdin comes from
 */
export type StdinSource = 'ignore' | 'inherit' | Readable;

/**
 * Where an attached command's output goes. `ignore` is the null sink.
 */
export type OutputSink = 'ignore' | 'inherit';

/**
 * Environment handed to an attached command
 */
export interface EnvPolicy {
  /** Start from an empty environment instead of the sandbox's default one */
  clear: boolean;
  /** Variables set on top */
  set: Record<string, string>;
}

export interface AttachOptions {
  stdin: StdinSource;
  stdout: OutputSink;
  stderr: OutputSink;
  env: EnvPolicy;
}

/**
 * Container runtime operations used by the orchestrator.
 *
 * Boolean results follow the runtime's own success signal: `false` means
 * the operation failed, never that it threw.
 */
export interface SandboxProvider {
  /** Backend identifier, e.g. `lxc` */
  readonly backend: string;

  /** Whether a sandbox with this name is defined */
  exists(name: string): Promise<boolean>;

  /** Whether the sandbox is running */
  isRunning(name: string): Promise<boolean>;

  /** Build the sandbox filesystem */
  create(name: string, distro: DistroParams): Promise<boolean>;

  start(name: string): Promise<boolean>;

  stop(name: string): Promise<boolean>;

  destroy(name: string): Promise<boolean>;

  /**
   * Wait for the sandbox's first network address
   * @returns The address, or undefined once `timeoutSeconds` passed without one
   */
  getAddress(name: string, timeoutSeconds: number): Promise<string | undefined>;

  /**
   * Run a command inside the sandbox and wait for it
   * @returns The command's exit status
   */
  attachRun(name: string, argv: string[], options: AttachOptions): Promise<number>;

  clearConfigItem(name: string, key: string): Promise<boolean>;

  appendConfigItem(name: string, key: string, value: string): Promise<boolean>;

  setConfigItem(name: string, key: string, value: string): Promise<boolean>;

  /** Persist configuration edits made since creation */
  saveConfig(name: string): Promise<boolean>;

  /** Host directory holding the sandbox's configuration */
  sandboxPath(name: string): string;
}

export * from './exec.js';
export * from './lxc.js';
export * from './lxcConfig.js';
