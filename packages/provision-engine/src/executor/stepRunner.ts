/**
 * Runs single steps inside a running sandbox
 */

import { spawn } from 'child_process';
import type { ExecutionOutcome, Step } from '../dsl/index.js';
import { fail } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ChildHandle, SpawnFn } from '../sandbox/exec.js';
import type { AttachOptions, EnvPolicy, OutputSink, SandboxProvider, StdinSource } from '../sandbox/index.js';

/**
 * Environment for attached commands: nothing from the host, plus a terminal type
 */
export const ATTACH_ENV: EnvPolicy = {
  clear: true,
  set: { TERM: 'xterm' },
};

export interface StepRunnerOptions {
  /** Show output of every step */
  debug?: boolean;
  logger?: Logger;
  env?: EnvPolicy;
  spawnProc?: SpawnFn;
}

export interface StepOptions {
  /** Show this step's output */
  debug?: boolean;
}

function launched(child: ChildHandle): Promise<void> {
  return new Promise((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', reject);
  });
}

// 'close' never fires for a host whose stdout became another child's stdin
function exited(child: ChildHandle): Promise<number> {
  return new Promise(resolve => {
    child.once('exit', code => resolve(typeof code === 'number' ? code : 1));
    child.once('error', () => resolve(127));
  });
}

export class StepRunner {
  private readonly debug: boolean;
  private readonly logger: Logger;
  private readonly env: EnvPolicy;
  private readonly spawnProc: SpawnFn;

  constructor(
    private readonly provider: SandboxProvider,
    private readonly sandbox: string,
    options: StepRunnerOptions = {}
  ) {
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? silentLogger;
    this.env = options.env ?? ATTACH_ENV;
    this.spawnProc = options.spawnProc ?? spawn;
  }

  /**
   * Execute a step definition
   */
  async execute(step: Step): Promise<ExecutionOutcome> {
    if (step.type === 'pipe') {
      return this.pipe(step.description, step.hostCommand, step.command, { debug: step.debug });
    }
    return this.run(step.description, step.command, { debug: step.debug });
  }

  /**
   * Run a command inside the sandbox
   */
  async run(description: string, command: string[], options: StepOptions = {}): Promise<ExecutionOutcome> {
    await this.ensureRunning();
    this.logger.progress(description);

    const exitStatus = await this.provider.attachRun(
      this.sandbox,
      command,
      this.attachOptions('ignore', options)
    );
    return this.check({ exitStatus, description });
  }

  /**
   * Run `hostCommand` on the host and pipe its stdout into `command`
   * inside the sandbox
   */
  async pipe(
    description: string,
    hostCommand: string[],
    command: string[],
    options: StepOptions = {}
  ): Promise<ExecutionOutcome> {
    await this.ensureRunning();
    this.logger.progress(description);

    const [program, ...args] = hostCommand;
    const host = this.spawnProc(program, args, {
      stdio: ['ignore', 'pipe', this.showOutput(options)],
    });
    const hostExit = exited(host);

    try {
      await launched(host);
    } catch (error) {
      fail('step', description, error);
    }

    if (!host.stdout) {
      host.kill();
      await hostExit;
      fail('step', description);
    }

    let exitStatus: number;
    try {
      exitStatus = await this.provider.attachRun(
        this.sandbox,
        command,
        this.attachOptions(host.stdout, options)
      );
    } finally {
      if (host.exitCode === null && host.signalCode === null) {
        host.kill();
      }
    }

    const hostStatus = await hostExit;
    this.logger.debug(`${program} exited with ${hostStatus}`);
    return this.check({ exitStatus, description });
  }

  private async ensureRunning(): Promise<void> {
    const ready = (await this.provider.exists(this.sandbox)) && (await this.provider.isRunning(this.sandbox));
    if (!ready) {
      fail('precondition', 'Container does not exist or is not running');
    }
  }

  private showOutput(options: StepOptions): OutputSink {
    return this.debug || options.debug ? 'inherit' : 'ignore';
  }

  private attachOptions(stdin: StdinSource, options: StepOptions): AttachOptions {
    const sink = this.showOutput(options);
    return { stdin, stdout: sink, stderr: sink, env: this.env };
  }

  private check(outcome: ExecutionOutcome): ExecutionOutcome {
    this.logger.debug(`${outcome.description} exited with ${outcome.exitStatus}`);
    if (outcome.exitStatus !== 0) {
      fail('step', outcome.description);
    }
    return outcome;
  }
}
