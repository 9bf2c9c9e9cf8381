import { z } from 'zod';

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v ?? String(defaultValue)).trim().toLowerCase())
    .pipe(z.enum(['true', 'false']))
    .transform((v) => v === 'true');

const EnvSchema = z.object({
  POLICY_COMPILER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  // Safety bounds against pathological control-link graphs.
  TRAVERSAL_MAX_DEPTH: z.coerce.number().int().positive().max(10_000).default(32),
  TRAVERSAL_MAX_NODES: z.coerce.number().int().positive().max(1_000_000).default(5000),
  TRAVERSAL_CONCURRENCY: z.coerce.number().int().positive().max(64).default(4),
  EXTRACT_SPLIT_COMPOUND: booleanFlag(true),
  SAMPLE_RECORDS: z.coerce.number().int().min(1).max(10).default(3),
});

export type Env = z.infer<typeof EnvSchema>;

export interface CompilerConfig {
  readonly logLevel: Env['POLICY_COMPILER_LOG_LEVEL'];
  readonly traversal: {
    readonly maxDepth: number;
    readonly maxNodes: number;
    readonly concurrency: number;
  };
  readonly extraction: {
    readonly splitCompound: boolean;
  };
  readonly sampleRecords: number;
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid environment:\n${msg}`);
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CompilerConfig {
  const parsed = loadEnv(env);
  return {
    logLevel: parsed.POLICY_COMPILER_LOG_LEVEL,
    traversal: {
      maxDepth: parsed.TRAVERSAL_MAX_DEPTH,
      maxNodes: parsed.TRAVERSAL_MAX_NODES,
      concurrency: parsed.TRAVERSAL_CONCURRENCY,
    },
    extraction: {
      splitCompound: parsed.EXTRACT_SPLIT_COMPOUND,
    },
    sampleRecords: parsed.SAMPLE_RECORDS,
  };
}

export const DEFAULT_CONFIG: CompilerConfig = loadConfig({});
