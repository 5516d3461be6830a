/**
 * DSL types for provisioning recipes
 *
 * A recipe describes what a sandbox needs: pre-start configuration edits,
 * an ordered list of steps to run inside it, host-side files and the
 * fields of the result record.
 */

/**
 * Base properties shared by all steps
 */
interface BaseStep {
  /** Human-readable description, printed before the step and used as the error message */
  description: string;
  /** Command to run inside the sandbox, as an argument vector */
  command: string[];
  /** Show the step's output even when the run is not in debug mode */
  debug?: boolean;
}

/**
 * Step that runs a command directly inside the sandbox
 */
export interface RunStep extends BaseStep {
  type: 'run';
}

/**
 * Step that runs `hostCommand` on the host and feeds its stdout to
 * `command` inside the sandbox
 */
export interface PipeStep extends BaseStep {
  type: 'pipe';
  hostCommand: string[];
}

export type Step = RunStep | PipeStep;

/**
 * Outcome of a single attached command. Only zero vs non-zero matters.
 */
export interface ExecutionOutcome {
  exitStatus: number;
  description: string;
}

/**
 * Configuration edits applied to the sandbox before it starts
 */
export interface ClearConfigItem {
  type: 'clear';
  key: string;
}

export interface AppendConfigItem {
  type: 'append';
  key: string;
  value: string;
}

export interface SetConfigItem {
  type: 'set';
  key: string;
  value: string;
}

export type ConfigMutation = ClearConfigItem | AppendConfigItem | SetConfigItem;

/**
 * File written on the host once all steps succeeded
 */
export interface HostFile {
  path: string;
  contents: string;
  /** Permission bits, e.g. 0o744 */
  mode: number;
}

/**
 * Parameters for building the sandbox filesystem
 */
export interface DistroParams {
  dist: string;
  release: string;
  arch: string;
}

/**
 * Values known once the sandbox is running
 */
export interface SandboxContext {
  prefix: string;
  /** Sandbox name, `<prefix>_<role>_<release>` */
  name: string;
  release: string;
  /** First IPv4 address reported by the sandbox */
  address: string;
  /** Name of the host running the provisioner */
  hostName: string;
  /** Directory holding the sandbox's configuration on the host */
  sandboxPath: string;
}

/**
 * State the sandbox is left in after a successful run
 */
export type FinalState = 'running' | 'stopped';

/**
 * Flat record printed on success
 */
export type ProvisioningResult = Record<string, string>;

/**
 * Everything a recipe decided for one run. Credentials are generated once,
 * when the plan is made.
 */
export interface RecipePlan {
  configuration?: ConfigMutation[];
  steps(context: SandboxContext): Step[];
  hostFiles?(context: SandboxContext): HostFile[];
  finalState?: FinalState;
  result(context: SandboxContext): ProvisioningResult;
}

/**
 * A provisioning recipe
 */
export interface Recipe {
  /** Role tag used in the sandbox name, e.g. `postgresql` */
  role: string;
  /** One-line summary for the CLI help */
  summary: string;
  /** Provider backends the recipe works with (default: any) */
  backends?: string[];
  plan(prefix: string): RecipePlan;
}

export * from './schemas.js';
