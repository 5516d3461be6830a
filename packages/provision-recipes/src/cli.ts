/**
 * sandbox-provision command line
 *
 * Usage: sandbox-provision <recipe> [prefix] [options]
 */

import { hostname } from 'os';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
  DebianReleaseResolver,
  LxcProvider,
  ProvisioningOrchestrator,
  createConsoleLogger,
  errorMessage,
  fail,
  loadConfig,
} from '@sandbox-provision/engine';
import type {
  HostFile,
  LogSink,
  Logger,
  ProvisionerConfig,
  ProvisioningResult,
  ReleaseResolver,
  SandboxProvider,
  SpawnFn,
} from '@sandbox-provision/engine';
import { RECIPES, RECIPE_NAMES, isRecipeName } from './recipes/index.js';

export const DEFAULT_PREFIX = 'test';

export const USAGE = `Usage: sandbox-provision <recipe> [prefix] [options]

Recipes:
${RECIPE_NAMES.map(name => `  ${name.padEnd(12)}${RECIPES[name].summary}`).join('\n')}

Prefix defaults to "${DEFAULT_PREFIX}".

Options:
  -v, --verbose           Print each step as it runs
  -d, --debug             Show the output of every command (implies --verbose)
  --release <codename>    Use this release instead of looking up Debian stable
  --config <file>         Read settings from a YAML file
  --format <json|yaml>    Result format (default: json)
  -h, --help              Show this help`;

export const CliOptionsSchema = z.strictObject({
  recipe: z.enum(RECIPE_NAMES),
  prefix: z
    .string()
    .regex(/^[a-z][a-z0-9_]{0,31}$/, 'must be a lowercase letter followed by at most 31 lowercase letters, digits or underscores')
    .default(DEFAULT_PREFIX),
  verbose: z.boolean().default(false),
  debug: z.boolean().default(false),
  release: z.string().regex(/^[a-z][a-z0-9-]*$/, 'must be a release codename').optional(),
  config: z.string().min(1).optional(),
  format: z.enum(['json', 'yaml']).default('json'),
});

export type CliOptions = z.output<typeof CliOptionsSchema>;

export type OutputFormat = CliOptions['format'];

export interface CliDeps {
  sink?: LogSink;
  env?: NodeJS.ProcessEnv;
  readFile?: (path: string) => string;
  createProvider?: (config: ProvisionerConfig, logger: Logger) => SandboxProvider;
  releaseResolver?: ReleaseResolver;
  hostName?: string;
  /** Aborting stops the run before the next step and rolls back */
  signal?: AbortSignal;
  spawnProc?: SpawnFn;
  writeHostFile?: (file: HostFile) => Promise<void>;
}

const consoleSink: LogSink = {
  out: line => console.log(line),
  err: line => console.error(line),
};

const VALUE_OPTIONS = {
  '--release': 'release',
  '--config': 'config',
  '--format': 'format',
} as const;

function isValueOption(arg: string): arg is keyof typeof VALUE_OPTIONS {
  return Object.prototype.hasOwnProperty.call(VALUE_OPTIONS, arg);
}

/**
 * Parse command line arguments
 * @returns The validated options, or 'help' when help was requested
 */
export function parseArgs(argv: string[]): CliOptions | 'help' {
  if (argv.includes('-h') || argv.includes('--help')) return 'help';

  const positionals: string[] = [];
  const values: Partial<Record<(typeof VALUE_OPTIONS)[keyof typeof VALUE_OPTIONS], string>> = {};
  let verbose = false;
  let debug = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-v' || arg === '--verbose') {
      verbose = true;
    } else if (arg === '-d' || arg === '--debug') {
      debug = true;
    } else if (isValueOption(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        fail('config', `Option ${arg} needs a value`);
      }
      values[VALUE_OPTIONS[arg]] = value;
      i++;
    } else if (arg.startsWith('-')) {
      fail('config', `Unknown option ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  const [recipe, prefix, ...extra] = positionals;
  if (recipe === undefined) {
    fail('config', 'Missing recipe name');
  }
  if (!isRecipeName(recipe)) {
    fail('config', `Unknown recipe ${recipe}`);
  }
  if (extra.length > 0) {
    fail('config', `Unexpected argument ${extra[0]}`);
  }

  const result = CliOptionsSchema.safeParse({ recipe, prefix, verbose, debug, ...values });
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'} ${issue.message}`)
      .join('; ');
    fail('config', `Invalid arguments: ${issues}`);
  }
  return result.data;
}

/**
 * Render a result with sorted keys
 */
export function formatResult(result: ProvisioningResult, format: OutputFormat): string {
  if (format === 'yaml') {
    return yaml.dump(result, { sortKeys: true, lineWidth: -1 }).trimEnd();
  }
  const sorted = Object.fromEntries(
    Object.entries(result).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );
  return JSON.stringify(sorted, null, 4);
}

/**
 * Run the command line
 * @returns The process exit code
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const sink = deps.sink ?? consoleSink;

  try {
    const options = parseArgs(argv);
    if (options === 'help') {
      sink.out(USAGE);
      return 0;
    }

    const logger = createConsoleLogger({ verbose: options.verbose, debug: options.debug, sink });
    const config = loadConfig({ file: options.config, env: deps.env, readFile: deps.readFile });
    logger.debug(`Configuration: ${JSON.stringify(config)}`);

    const provider = deps.createProvider
      ? deps.createProvider(config, logger)
      : new LxcProvider({ lxcPath: config.lxcPath, pollIntervalMs: config.pollIntervalMs, logger });

    const orchestrator = new ProvisioningOrchestrator({
      provider,
      settings: {
        fallbackRelease: config.fallbackRelease,
        addressTimeoutSeconds: config.addressTimeoutSeconds,
        distribution: config.distribution,
        arch: config.arch,
      },
      hostName: deps.hostName ?? hostname(),
      releaseResolver:
        deps.releaseResolver ?? new DebianReleaseResolver({ url: config.releaseUrl, timeoutMs: config.releaseTimeoutMs }),
      release: options.release,
      logger,
      debug: options.debug,
      signal: deps.signal,
      spawnProc: deps.spawnProc,
      writeHostFile: deps.writeHostFile,
    });

    const result = await orchestrator.provision(RECIPES[options.recipe], options.prefix);
    sink.out(formatResult(result, options.format));
    return 0;
  } catch (error) {
    sink.err(`Error: ${errorMessage(error)}!`);
    return 1;
  }
}
