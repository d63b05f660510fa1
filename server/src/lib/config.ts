import { z } from 'zod';

const boolFromEnv = z
  .enum(['1', '0', 'true', 'false', 'TRUE', 'FALSE'])
  .transform((v) => v === '1' || v.toLowerCase() === 'true');

const EnvSchema = z.object({
  MESH_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(4),
  MESH_ACTIVATION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  MESH_MAX_ACTIVATION_ATTEMPTS: z.coerce.number().int().positive().default(3),
  MESH_CACHE_CAPACITY: z.coerce.number().int().positive().default(200),
  MESH_CACHE_DEDUP: boolFromEnv.default('false'),
  MESH_AUTO_SYNC: boolFromEnv.default('true'),
  MESH_STATE_DIR: z.string().min(1).default('.mesh-state'),
  MESH_CHECKPOINT_DIR: z.string().min(1).default('checkpoints'),
  PORT: z.coerce.number().int().positive().default(3030),
  ANTHROPIC_MODEL: z.string().min(1).default('claude-sonnet-4-5-20250929'),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  REDIS_URL: z.string().url().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export type LogLevel = NonNullable<z.infer<typeof EnvSchema>['LOG_LEVEL']>;

export interface MeshConfig {
  workerConcurrency: number;
  activationTimeoutMs: number;
  maxActivationAttempts: number;
  cacheCapacity: number;
  cacheDedup: boolean;
  autoSync: boolean;
  stateDir: string;
  checkpointDir: string;
  port: number;
  model: string;
  maxTokens: number;
  /** Unset means the shared client reads ANTHROPIC_API_KEY when first used */
  anthropicApiKey?: string;
  redisUrl?: string;
  logLevel?: LogLevel;
}

/**
 * Reads mesh settings from the environment. Unset keys take their defaults;
 * a key that is set but invalid is an error, reported with every offending key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MeshConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid mesh configuration: ${keys}`);
  }
  const e = result.data;
  return {
    workerConcurrency: e.MESH_WORKER_CONCURRENCY,
    activationTimeoutMs: e.MESH_ACTIVATION_TIMEOUT_MS,
    maxActivationAttempts: e.MESH_MAX_ACTIVATION_ATTEMPTS,
    cacheCapacity: e.MESH_CACHE_CAPACITY,
    cacheDedup: e.MESH_CACHE_DEDUP,
    autoSync: e.MESH_AUTO_SYNC,
    stateDir: e.MESH_STATE_DIR,
    checkpointDir: e.MESH_CHECKPOINT_DIR,
    port: e.PORT,
    model: e.ANTHROPIC_MODEL,
    maxTokens: e.ANTHROPIC_MAX_TOKENS,
    ...(e.ANTHROPIC_API_KEY !== undefined ? { anthropicApiKey: e.ANTHROPIC_API_KEY } : {}),
    ...(e.REDIS_URL !== undefined ? { redisUrl: e.REDIS_URL } : {}),
    ...(e.LOG_LEVEL !== undefined ? { logLevel: e.LOG_LEVEL } : {}),
  };
}
