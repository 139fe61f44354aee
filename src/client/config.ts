import { z } from 'zod';
import { ConfigError } from '../common/errors';
import { SERIALIZER_NAMES } from '../serializer/registry';

export const engineConfigSchema = z
  .object({
    workerCount: z.number().int().positive().optional(),
    showProgress: z.boolean().default(false),
    localDir: z.string().min(1).optional(),
  })
  .strict();

export const contextConfigSchema = z
  .object({
    // Prefix of the context temp dir, so no path separators.
    appName: z
      .string()
      .regex(/^[\w.-]+$/, 'may only contain letters, digits, _, . and -')
      .default('partition-bridge'),
    serializer: z
      .enum(SERIALIZER_NAMES)
      .refine(v => v !== 'pair', {
        message: 'pair needs key and value serializers, it cannot be the default',
      })
      .default('marshal'),
    batchSize: z.number().int().positive().default(1024),
    staging: z.enum(['file', 'direct']).default('file'),
    parallelizeStrategy: z.enum(['inplace', 'deep_copy']).default('inplace'),
    callSite: z.string().min(1).default('TypeScript'),
    engine: engineConfigSchema.default({}),
  })
  .strict();

export type ContextConfig = z.input<typeof contextConfigSchema>;
export type EngineConfig = Readonly<z.output<typeof engineConfigSchema>>;
export type ResolvedConfig = Readonly<
  Omit<z.output<typeof contextConfigSchema>, 'engine'> & {
    engine: EngineConfig;
  }
>;

export function validateConfig(input: unknown = {}): ResolvedConfig {
  const result = contextConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }
  return Object.freeze({
    ...result.data,
    engine: Object.freeze({ ...result.data.engine }),
  });
}
