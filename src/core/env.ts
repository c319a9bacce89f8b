import { z } from 'zod';

const envSchema = z.object({
  SYNC_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  SUPABASE_URL: z.url().optional(),
  SUPABASE_ANON_KEY: z.string().min(1).optional(),
  SYNC_DB_PATH: z.string().min(1).default('driftsync.db'),
  SYNC_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  SYNC_DIRECTION: z.enum(['UPLOAD', 'DOWNLOAD', 'BIDIRECTIONAL']).default('BIDIRECTIONAL'),
  SYNC_CONFLICT_STRATEGY: z.enum(['SERVER_WINS', 'LOCAL_WINS', 'LWW', 'MANUAL']).default('SERVER_WINS'),
  SYNC_INTERVAL_MS: z.coerce.number().int().positive().default(10 * 60_000),
  SYNC_VERBOSE: z.enum(['0', '1']).optional()
});

export type SyncEnv = z.infer<typeof envSchema>;

function normalize(value: string | undefined) {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

const fallbackEnv: SyncEnv = {
  SYNC_ENV: 'development',
  SUPABASE_URL: undefined,
  SUPABASE_ANON_KEY: undefined,
  SYNC_DB_PATH: 'driftsync.db',
  SYNC_BATCH_SIZE: 50,
  SYNC_DIRECTION: 'BIDIRECTIONAL',
  SYNC_CONFLICT_STRATEGY: 'SERVER_WINS',
  SYNC_INTERVAL_MS: 10 * 60_000,
  SYNC_VERBOSE: undefined
};

export function parseEnv(source: NodeJS.ProcessEnv = process.env): SyncEnv {
  const parsed = envSchema.safeParse({
    SYNC_ENV: normalize(source.SYNC_ENV),
    SUPABASE_URL: normalize(source.SUPABASE_URL),
    SUPABASE_ANON_KEY: normalize(source.SUPABASE_ANON_KEY),
    SYNC_DB_PATH: normalize(source.SYNC_DB_PATH),
    SYNC_BATCH_SIZE: normalize(source.SYNC_BATCH_SIZE),
    SYNC_DIRECTION: normalize(source.SYNC_DIRECTION),
    SYNC_CONFLICT_STRATEGY: normalize(source.SYNC_CONFLICT_STRATEGY),
    SYNC_INTERVAL_MS: normalize(source.SYNC_INTERVAL_MS),
    SYNC_VERBOSE: normalize(source.SYNC_VERBOSE)
  });

  if (parsed.success) {
    return parsed.data;
  }

  if (normalize(source.SYNC_ENV) !== 'test') {
    console.warn('Invalid SYNC_* environment variables:', z.flattenError(parsed.error).fieldErrors);
  }

  return fallbackEnv;
}

export function toAppEnv(env: SyncEnv) {
  return {
    environment: env.SYNC_ENV,
    supabaseUrl: env.SUPABASE_URL,
    supabaseAnonKey: env.SUPABASE_ANON_KEY,
    dbPath: env.SYNC_DB_PATH,
    batchSize: env.SYNC_BATCH_SIZE,
    direction: env.SYNC_DIRECTION,
    conflictStrategy: env.SYNC_CONFLICT_STRATEGY,
    intervalMs: env.SYNC_INTERVAL_MS,
    verboseLogging:
      env.SYNC_VERBOSE !== undefined ? env.SYNC_VERBOSE === '1' : env.SYNC_ENV === 'development',
    isSupabaseConfigured: Boolean(env.SUPABASE_URL && env.SUPABASE_ANON_KEY)
  };
}

export type AppEnv = ReturnType<typeof toAppEnv>;

export const appEnv: AppEnv = toAppEnv(parseEnv());
