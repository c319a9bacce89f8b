import { z } from 'zod';
import type { SyncEngineConfig } from './types';

export const syncPolicies = {
  defaultBatchSize: 50,
  maxSyncAttempts: 3,
  baseBackoffMs: 500,
  defaultEntityType: 'entity'
} as const;

const configSchema = z.object({
  direction: z.enum(['UPLOAD', 'DOWNLOAD', 'BIDIRECTIONAL']).default('BIDIRECTIONAL'),
  conflictStrategy: z.enum(['SERVER_WINS', 'LOCAL_WINS', 'LWW', 'MANUAL']).default('SERVER_WINS'),
  batchSize: z
    .number()
    .int()
    .default(syncPolicies.defaultBatchSize)
    .transform((value) => (value > 0 ? value : syncPolicies.defaultBatchSize)),
  maxAttempts: z.number().int().min(1).default(syncPolicies.maxSyncAttempts),
  baseDelayMs: z.number().min(0).default(syncPolicies.baseBackoffMs),
  batchPush: z.boolean().default(false),
  entityType: z.string().trim().min(1).default(syncPolicies.defaultEntityType)
});

export type SyncEngineOptions = Partial<SyncEngineConfig>;

export function resolveSyncEngineConfig(options: SyncEngineOptions = {}): Readonly<SyncEngineConfig> {
  const parsed = configSchema.safeParse(options);

  if (!parsed.success) {
    throw new Error(`Invalid sync engine config: ${z.prettifyError(parsed.error)}`);
  }

  return Object.freeze(parsed.data);
}
