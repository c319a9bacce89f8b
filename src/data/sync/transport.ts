import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { appEnv } from '../../core/env';
import { requireSupabaseClient } from '../../core/supabase/client';
import type { SyncAction, SyncableEntity, SyncRecord, SyncRemoteClient } from '../../core/sync/types';
import { nowIso, toErrorMessage, withTimeout } from '../../core/sync/utils';

const RPC_TIMEOUT_MS = 15_000;

export type RpcResponse = {
  data: unknown;
  error: { message: string } | null;
};

export type RpcInvoker = (
  fn: string,
  args?: Record<string, unknown>,
  signal?: AbortSignal
) => PromiseLike<RpcResponse>;

export type SupabaseSyncTransportOptions<T extends SyncableEntity> = {
  entityType: string;
  schema: z.ZodType<T>;
  rpc?: RpcInvoker;
  timeoutMs?: number;
};

const pushResponseSchema = z.object({
  status: z.enum(['OK', 'DUPLICATE', 'REJECTED']),
  reason: z.string().optional()
});

const pushBatchResponseSchema = z.object({
  applied: z.number().int().min(0)
});

const versionSchema = z.union([
  z.number().int().min(0),
  z.string().regex(/^\d+$/).transform(Number)
]);

export function createSupabaseRpc(client: SupabaseClient): RpcInvoker {
  return async (fn, args, signal) => {
    const query = client.rpc(fn, args);
    const { data, error } = (await (signal ? query.abortSignal(signal) : query)) as RpcResponse;

    return {
      data,
      error: error ? { message: error.message || `${fn} failed` } : null
    };
  };
}

export function resolveSyncAction(entity: SyncableEntity): SyncAction {
  if (entity.isDeleted) return 'DELETE';
  if (entity.createdAt && (!entity.modifiedAt || entity.modifiedAt === entity.createdAt)) return 'CREATE';
  return 'UPDATE';
}

export class SupabaseSyncTransport<T extends SyncableEntity> implements SyncRemoteClient<T> {
  private readonly entityType: string;
  private readonly schema: z.ZodType<T>;
  private readonly rpc: RpcInvoker;
  private readonly timeoutMs: number;

  private lastKnownVersion = 0;

  constructor(options: SupabaseSyncTransportOptions<T>) {
    this.entityType = options.entityType;
    this.schema = options.schema;
    this.rpc = options.rpc ?? createSupabaseRpc(requireSupabaseClient());
    this.timeoutMs = options.timeoutMs ?? RPC_TIMEOUT_MS;
  }

  async isOnline(signal?: AbortSignal): Promise<boolean> {
    try {
      const { error } = await this.call('sync_ping', {}, signal);
      return error === null;
    } catch (error) {
      if (appEnv.verboseLogging) {
        console.info('[sync-transport] ping failed', { error: toErrorMessage(error) });
      }
      return false;
    }
  }

  async push(entity: T, signal?: AbortSignal): Promise<boolean> {
    const data = await this.callOrThrow(
      'sync_push',
      { p_entity: this.entityType, p_record: this.toRecord(entity) },
      signal
    );

    const parsed = pushResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error('Invalid sync_push response');
    }

    if (parsed.data.status === 'REJECTED' && appEnv.verboseLogging) {
      console.warn('[sync-transport] push rejected', {
        entityId: entity.id,
        reason: parsed.data.reason ?? 'Operation rejected by server'
      });
    }

    return parsed.data.status !== 'REJECTED';
  }

  async pushBatch(entities: T[], signal?: AbortSignal): Promise<number> {
    if (entities.length === 0) {
      return 0;
    }

    const data = await this.callOrThrow(
      'sync_push_batch',
      { p_entity: this.entityType, p_records: entities.map((entity) => this.toRecord(entity)) },
      signal
    );

    const parsed = pushBatchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error('Invalid sync_push_batch response');
    }

    return parsed.data.applied;
  }

  async pull(sinceVersion: number, signal?: AbortSignal): Promise<T[]> {
    const data = await this.callOrThrow(
      'sync_pull',
      { p_entity: this.entityType, p_since_version: sinceVersion },
      signal
    );

    if (!Array.isArray(data)) {
      throw new Error('Invalid sync_pull response');
    }

    const entities: T[] = [];
    let dropped = 0;

    for (const row of data) {
      const parsed = this.schema.safeParse(row);
      if (parsed.success) {
        entities.push(parsed.data);
      } else {
        dropped += 1;
      }
    }

    // Skipping a row here would let the checkpoint move past it.
    if (dropped > 0) {
      throw new Error(`Invalid sync_pull response: ${dropped} row(s) failed validation`);
    }

    return entities;
  }

  async getServerVersion(signal?: AbortSignal): Promise<number> {
    const data = await this.callOrThrow('sync_server_version', { p_entity: this.entityType }, signal);

    const parsed = versionSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error('Invalid sync_server_version response');
    }

    this.lastKnownVersion = parsed.data;
    return parsed.data;
  }

  toRecord(entity: T): SyncRecord<T> {
    return {
      entityId: entity.id,
      operation: resolveSyncAction(entity),
      payload: entity,
      syncVersion: this.lastKnownVersion,
      localTimestamp: entity.modifiedAt ?? entity.createdAt ?? nowIso()
    };
  }

  private call(fn: string, args: Record<string, unknown>, signal?: AbortSignal) {
    return withTimeout(this.rpc(fn, args, signal), this.timeoutMs, fn);
  }

  private async callOrThrow(fn: string, args: Record<string, unknown>, signal?: AbortSignal) {
    const { data, error } = await this.call(fn, args, signal);

    if (error) {
      throw new Error(error.message || `${fn} failed`);
    }

    return data;
  }
}
