/**
 * LXC sandbox provider
 *
 * Drives containers through the lxc-* command line tools. Every call
 * passes `-P <lxcPath>` so unprivileged and system container stores behave
 * the same way.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { setTimeout as delay } from 'timers/promises';
import type { DistroParams } from '../dsl/index.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { AttachOptions, SandboxProvider } from './index.js';
import {
  captureCommand,
  runCommand,
  type CaptureFn,
  type CaptureOptions,
  type CommandResult,
  type RunFn,
} from './exec.js';
import { LxcConfig } from './lxcConfig.js';

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export interface LxcProviderOptions {
  /** Container store, e.g. ~/.local/share/lxc */
  lxcPath: string;
  /** Delay between address lookups (default: 1000) */
  pollIntervalMs?: number;
  logger?: Logger;
}

export interface LxcProviderDeps {
  capture?: CaptureFn;
  run?: RunFn;
  readFile?: (path: string) => Promise<string>;
  writeFile?: (path: string, contents: string) => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * First IPv4 address in `lxc-info -i` output
 */
export function firstIpv4(output: string): string | undefined {
  for (const line of output.split('\n')) {
    const candidate = line.trim();
    const match = candidate.match(IPV4_PATTERN);
    if (match && match.slice(1).every(octet => Number(octet) <= 255)) {
      return candidate;
    }
  }
  return undefined;
}

export class LxcProvider implements SandboxProvider {
  readonly backend = 'lxc';
  private readonly lxcPath: string;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private readonly capture: CaptureFn;
  private readonly run: RunFn;
  private readonly readFile: (path: string) => Promise<string>;
  private readonly writeFile: (path: string, contents: string) => Promise<void>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly configs = new Map<string, LxcConfig>();

  constructor(options: LxcProviderOptions, deps: LxcProviderDeps = {}) {
    this.lxcPath = options.lxcPath;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.logger = options.logger ?? silentLogger;
    this.capture = deps.capture ?? ((command, args, options) => captureCommand(command, args, undefined, options));
    this.run = deps.run ?? ((command, args, stdio) => runCommand(command, args, stdio));
    this.readFile = deps.readFile ?? (path => fs.readFile(path, 'utf-8'));
    this.writeFile = deps.writeFile ?? ((path, contents) => fs.writeFile(path, contents, 'utf-8'));
    this.sleep = deps.sleep ?? (ms => delay(ms));
    this.now = deps.now ?? Date.now;
  }

  sandboxPath(name: string): string {
    return join(this.lxcPath, name);
  }

  async exists(name: string): Promise<boolean> {
    const result = await this.invoke('lxc-ls', ['-1']);
    if (result.exitCode !== 0) return false;
    return result.stdout.split('\n').some(line => line.trim() === name);
  }

  async isRunning(name: string): Promise<boolean> {
    const result = await this.invoke('lxc-info', ['-n', name, '-s', '-H']);
    return result.exitCode === 0 && result.stdout.trim() === 'RUNNING';
  }

  async create(name: string, distro: DistroParams): Promise<boolean> {
    const result = await this.invoke('lxc-create', [
      '-n', name,
      '-t', 'download',
      '-q',
      '--',
      '--dist', distro.dist,
      '--release', distro.release,
      '--arch', distro.arch,
    ]);
    return result.exitCode === 0;
  }

  async start(name: string): Promise<boolean> {
    // The daemonized monitor outlives lxc-start, so its stdio is not captured.
    const args = ['-P', this.lxcPath, '-n', name, '-d'];
    const exitCode = await this.run('lxc-start', args, ['ignore', 'ignore', 'ignore']);
    if (exitCode !== 0) this.logger.debug(`lxc-start ${args.join(' ')} failed: exit code ${exitCode}`);
    return exitCode === 0;
  }

  async stop(name: string): Promise<boolean> {
    return (await this.invoke('lxc-stop', ['-n', name])).exitCode === 0;
  }

  async destroy(name: string): Promise<boolean> {
    this.configs.delete(name);
    return (await this.invoke('lxc-destroy', ['-n', name])).exitCode === 0;
  }

  async getAddress(name: string, timeoutSeconds: number): Promise<string | undefined> {
    const deadline = this.now() + timeoutSeconds * 1000;
    let remaining = timeoutSeconds * 1000;

    // Each lookup only gets the time left before the deadline.
    while (remaining > 0) {
      const result = await this.invoke('lxc-info', ['-n', name, '-i', '-H'], { timeoutMs: remaining });
      if (result.exitCode === 0) {
        const address = firstIpv4(result.stdout);
        if (address) return address;
      }

      remaining = deadline - this.now();
      if (remaining <= 0) break;
      await this.sleep(Math.min(this.pollIntervalMs, remaining));
      remaining = deadline - this.now();
    }
    return undefined;
  }

  async attachRun(name: string, argv: string[], options: AttachOptions): Promise<number> {
    const envArgs = Object.entries(options.env.set).flatMap(([key, value]) => ['-v', `${key}=${value}`]);
    const args = [
      '-P', this.lxcPath,
      '-n', name,
      options.env.clear ? '--clear-env' : '--keep-env',
      ...envArgs,
      '--',
      ...argv,
    ];
    this.logger.debug(`lxc-attach ${args.join(' ')}`);
    return this.run('lxc-attach', args, [options.stdin, options.stdout, options.stderr]);
  }

  async clearConfigItem(name: string, key: string): Promise<boolean> {
    const config = await this.loadConfig(name);
    if (!config) return false;
    config.clear(key);
    return true;
  }

  async appendConfigItem(name: string, key: string, value: string): Promise<boolean> {
    const config = await this.loadConfig(name);
    if (!config) return false;
    config.append(key, value);
    return true;
  }

  async setConfigItem(name: string, key: string, value: string): Promise<boolean> {
    const config = await this.loadConfig(name);
    if (!config) return false;
    config.set(key, value);
    return true;
  }

  async saveConfig(name: string): Promise<boolean> {
    const config = await this.loadConfig(name);
    if (!config) return false;
    try {
      await this.writeFile(this.configPath(name), config.toString());
      return true;
    } catch (error) {
      this.logger.debug(`Failed to write ${this.configPath(name)}: ${error}`);
      return false;
    }
  }

  private configPath(name: string): string {
    return join(this.sandboxPath(name), 'config');
  }

  private async loadConfig(name: string): Promise<LxcConfig | undefined> {
    const cached = this.configs.get(name);
    if (cached) return cached;

    try {
      const config = LxcConfig.parse(await this.readFile(this.configPath(name)));
      this.configs.set(name, config);
      return config;
    } catch (error) {
      this.logger.debug(`Failed to read ${this.configPath(name)}: ${error}`);
      return undefined;
    }
  }

  private async invoke(tool: string, args: string[], options?: CaptureOptions): Promise<CommandResult> {
    const fullArgs = ['-P', this.lxcPath, ...args];
    const result = await this.capture(tool, fullArgs, options);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      this.logger.debug(`${tool} ${fullArgs.join(' ')} failed: ${detail}`);
    }
    return result;
  }
}
