import { z } from 'zod';

const ArgvSchema = z.array(z.string()).min(1, { abort: true }).refine(argv => argv[0].length > 0, {
  message: 'Command must start with a program name',
});

// Step schemas
const BaseStepSchema = z.object({
  description: z.string().min(1),
  command: ArgvSchema,
  debug: z.boolean().optional(),
});

const RunStepSchema = BaseStepSchema.extend({
  type: z.literal('run'),
});

const PipeStepSchema = BaseStepSchema.extend({
  type: z.literal('pipe'),
  hostCommand: ArgvSchema,
});

export const StepSchema = z.discriminatedUnion('type', [
  RunStepSchema,
  PipeStepSchema,
]);

export const StepListSchema = z.array(StepSchema);

// Configuration mutation schemas
const ConfigKeySchema = z.string().regex(/^[a-z][a-z0-9_.]*$/, 'Invalid configuration key');

export const ConfigMutationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('clear'), key: ConfigKeySchema }),
  z.object({ type: z.literal('append'), key: ConfigKeySchema, value: z.string().min(1) }),
  z.object({ type: z.literal('set'), key: ConfigKeySchema, value: z.string().min(1) }),
]);

export const HostFileSchema = z.object({
  path: z.string().startsWith('/'),
  contents: z.string(),
  mode: z.number().int().min(0).max(0o7777),
});

export const ProvisioningResultSchema = z.record(z.string(), z.string());

/**
 * Sandbox name: prefix, role and release joined by underscores
 */
export const SandboxNameSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, 'Invalid sandbox name');
