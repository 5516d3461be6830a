/**
 * Provisioning orchestration
 *
 * Owns the sandbox for one run: creates it, configures and starts it,
 * runs the recipe's steps in order and either keeps it (returning the
 * result record) or stops and destroys it.
 */

import { promises as fs } from 'fs';
import type { z } from 'zod';
import type {
  ConfigMutation,
  DistroParams,
  HostFile,
  ProvisioningResult,
  Recipe,
  SandboxContext,
  Step,
} from '../dsl/index.js';
import {
  ConfigMutationSchema,
  HostFileSchema,
  ProvisioningResultSchema,
  SandboxNameSchema,
  StepListSchema,
} from '../dsl/schemas.js';
import { fail, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ReleaseResolver } from '../release.js';
import type { SpawnFn } from '../sandbox/exec.js';
import type { SandboxProvider } from '../sandbox/index.js';
import { SandboxLifecycle } from '../sandbox/lifecycle.js';
import { RollbackGuard } from './rollback.js';
import { StepRunner } from './stepRunner.js';

export interface OrchestratorSettings {
  /** Release used when no release was given and the lookup failed */
  fallbackRelease: string;
  /** Upper bound for waiting on the sandbox address */
  addressTimeoutSeconds: number;
  distribution: string;
  arch: string;
}

export interface OrchestratorOptions {
  provider: SandboxProvider;
  settings: OrchestratorSettings;
  /** Name of the machine running the provisioner */
  hostName: string;
  releaseResolver?: ReleaseResolver;
  /** Use this release instead of looking one up */
  release?: string;
  logger?: Logger;
  /** Show the output of every step */
  debug?: boolean;
  /** Checked between steps; once aborted the run fails and rolls back */
  signal?: AbortSignal;
  writeHostFile?: (file: HostFile) => Promise<void>;
  spawnProc?: SpawnFn;
}

const ConfigMutationListSchema = ConfigMutationSchema.array();
const HostFileListSchema = HostFileSchema.array();

/**
 * Sandbox name for a run
 */
export function sandboxName(prefix: string, role: string, release: string): string {
  return `${prefix}_${role}_${release}`;
}

async function writeHostFile(file: HostFile): Promise<void> {
  await fs.writeFile(file.path, file.contents, { encoding: 'utf-8', mode: file.mode });
  await fs.chmod(file.path, file.mode);
}

function parseDefinition<S extends z.ZodType>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    fail('config', `Invalid ${what}: ${issues}`);
  }
  return result.data;
}

function describeMutation(mutation: ConfigMutation): string {
  switch (mutation.type) {
    case 'clear':
      return `Clearing ${mutation.key}`;
    case 'append':
      return `Appending ${mutation.key}`;
    case 'set':
      return `Setting ${mutation.key}`;
  }
}

export class ProvisioningOrchestrator {
  private readonly provider: SandboxProvider;
  private readonly settings: OrchestratorSettings;
  private readonly logger: Logger;
  private lifecycle: SandboxLifecycle | undefined;

  constructor(private readonly options: OrchestratorOptions) {
    this.provider = options.provider;
    this.settings = options.settings;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Lifecycle of the sandbox handled by the latest run
   */
  get sandbox(): SandboxLifecycle | undefined {
    return this.lifecycle;
  }

  /**
   * Explicit release, else the looked-up one, else the fallback
   */
  async resolveRelease(): Promise<string> {
    if (this.options.release) return this.options.release;

    const resolved = await this.options.releaseResolver?.resolve();
    if (resolved) {
      this.logger.debug(`Resolved release ${resolved}`);
      return resolved;
    }
    this.logger.debug(`Release lookup failed, using ${this.settings.fallbackRelease}`);
    return this.settings.fallbackRelease;
  }

  /**
   * Provision a sandbox with the given recipe
   * @returns The result record; only returned when every step succeeded
   */
  async provision(recipe: Recipe, prefix: string): Promise<ProvisioningResult> {
    if (recipe.backends && !recipe.backends.includes(this.provider.backend)) {
      fail('config', `Recipe ${recipe.role} does not support the ${this.provider.backend} backend`);
    }

    const release = await this.resolveRelease();
    const name = parseDefinition(SandboxNameSchema, sandboxName(prefix, recipe.role, release), 'sandbox name');
    const plan = recipe.plan(prefix);
    const configuration: ConfigMutation[] = parseDefinition(
      ConfigMutationListSchema,
      plan.configuration ?? [],
      'configuration'
    );

    if (await this.provider.exists(name)) {
      fail('precondition', `Container ${name} already exists`);
    }
    this.throwIfAborted();

    const lifecycle = new SandboxLifecycle(name);
    this.lifecycle = lifecycle;

    const distro: DistroParams = {
      dist: this.settings.distribution,
      release,
      arch: this.settings.arch,
    };
    this.logger.progress('Creating filesystem');
    if (!(await this.provider.create(name, distro))) {
      fail('provider', 'Creating filesystem');
    }
    lifecycle.transition('created');

    const guard = new RollbackGuard(
      () => this.rollback(lifecycle),
      error => this.logger.warn(`Rollback of ${name} failed: ${errorMessage(error)}`)
    );

    try {
      await this.configure(name, configuration);
      lifecycle.transition('configured');

      this.logger.progress('Starting container');
      if (!(await this.provider.start(name))) {
        fail('provider', 'Starting container');
      }
      lifecycle.transition('running');

      this.logger.progress('Getting IP address');
      const address = await this.provider.getAddress(name, this.settings.addressTimeoutSeconds);
      if (!address) {
        fail('timeout', 'Getting IP address');
      }

      const context: SandboxContext = {
        prefix,
        name,
        release,
        address,
        hostName: this.options.hostName,
        sandboxPath: this.provider.sandboxPath(name),
      };

      await this.runSteps(name, parseDefinition(StepListSchema, plan.steps(context), 'steps'));
      await this.writeHostFiles(parseDefinition(HostFileListSchema, plan.hostFiles?.(context) ?? [], 'host files'));
      lifecycle.transition('provisioned');

      if (plan.finalState === 'stopped') {
        this.logger.progress('Stopping container');
        if (!(await this.provider.stop(name))) {
          fail('provider', 'Stopping container');
        }
      }

      const result = parseDefinition(ProvisioningResultSchema, plan.result(context), 'result');
      guard.disarm();
      lifecycle.transition('kept');
      this.logger.info('Success!');
      return result;
    } finally {
      await guard.release();
    }
  }

  private async configure(name: string, configuration: ConfigMutation[]): Promise<void> {
    if (configuration.length === 0) return;

    for (const mutation of configuration) {
      const description = describeMutation(mutation);
      this.logger.progress(description);

      let applied: boolean;
      if (mutation.type === 'clear') {
        applied = await this.provider.clearConfigItem(name, mutation.key);
      } else if (mutation.type === 'append') {
        applied = await this.provider.appendConfigItem(name, mutation.key, mutation.value);
      } else {
        applied = await this.provider.setConfigItem(name, mutation.key, mutation.value);
      }
      if (!applied) fail('provider', description);
    }

    this.logger.progress('Saving configuration');
    if (!(await this.provider.saveConfig(name))) {
      fail('provider', 'Saving configuration');
    }
  }

  private async runSteps(name: string, steps: Step[]): Promise<void> {
    const runner = new StepRunner(this.provider, name, {
      debug: this.options.debug,
      logger: this.logger,
      spawnProc: this.options.spawnProc,
    });

    for (const step of steps) {
      this.throwIfAborted();
      await runner.execute(step);
    }
  }

  private async writeHostFiles(files: HostFile[]): Promise<void> {
    const write = this.options.writeHostFile ?? writeHostFile;
    for (const file of files) {
      this.logger.progress(`Writing ${file.path}`);
      try {
        await write(file);
      } catch (error) {
        fail('provider', `Writing ${file.path}`, error);
      }
    }
  }

  private async rollback(lifecycle: SandboxLifecycle): Promise<void> {
    this.logger.progress('Removing container');
    // The sandbox may never have started, so a failed stop is expected.
    await this.provider.stop(lifecycle.name);
    if (!(await this.provider.destroy(lifecycle.name))) {
      this.logger.warn(`Failed to destroy container ${lifecycle.name}`);
      return;
    }
    lifecycle.transition('destroyed');
  }

  private throwIfAborted(): void {
    if (this.options.signal?.aborted) {
      fail('interrupted', 'Provisioning interrupted');
    }
  }
}

export * from './rollback.js';
export * from './stepRunner.js';
