/**
 * Child process helpers
 *
 * Commands are always spawned with an argument vector, never through a shell.
 */

import { spawn, type SpawnOptions, type StdioOptions } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable } from 'stream';

/**
 * Result of a command whose output was captured
 */
export interface CommandResult {
  /** Exit code (127 when the program could not be found) */
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * The parts of a ChildProcess the provisioner relies on
 */
export interface ChildHandle extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildHandle;

export interface CaptureOptions {
  /** Kill the command and report exit code 124 after this many milliseconds */
  timeoutMs?: number;
}

export type CaptureFn = (command: string, args: string[], options?: CaptureOptions) => Promise<CommandResult>;

export type RunFn = (command: string, args: string[], stdio: StdioOptions) => Promise<number>;

/**
 * Run a command, capturing stdout and stderr. Never rejects.
 */
export function captureCommand(
  command: string,
  args: string[],
  spawnProc: SpawnFn = spawn,
  options: CaptureOptions = {}
): Promise<CommandResult> {
  return new Promise(resolve => {
    const child = spawnProc(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (exitCode: number) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ exitCode, stdout, stderr });
    };

    const { timeoutMs } = options;
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        child.kill('SIGKILL');
        if (!stderr) stderr = `${command} timed out after ${timeoutMs} ms`;
        finish(124);
      }, Math.max(timeoutMs, 0));
    }

    child.stdout?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });

    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (!stderr) stderr = error.message;
      finish(error.code === 'ENOENT' ? 127 : 1);
    });

    child.on('close', code => {
      finish(typeof code === 'number' ? code : 1);
    });
  });
}

/**
 * Run a command with the given stdio wiring and resolve with its exit code.
 * Never rejects.
 */
export function runCommand(
  command: string,
  args: string[],
  stdio: StdioOptions,
  spawnProc: SpawnFn = spawn
): Promise<number> {
  return new Promise(resolve => {
    const child = spawnProc(command, args, { stdio });
    let settled = false;

    const finish = (exitCode: number) => {
      if (settled) return;
      settled = true;
      resolve(exitCode);
    };

    child.on('error', (error: NodeJS.ErrnoException) => {
      finish(error.code === 'ENOENT' ? 127 : 1);
    });

    child.on('close', code => {
      finish(typeof code === 'number' ? code : 1);
    });
  });
}
