import type { SyncableEntity, SyncConflict, SyncRepository } from './types';
import { nowIso } from './utils';

export type EntitySyncMeta = {
  status: 'PENDING' | 'SYNCED' | 'FAILED';
  retryCount: number;
  lastError?: string;
  syncedAt?: string;
};

export type ConflictAuditEntry<T extends SyncableEntity> = {
  entityId: string;
  entityType: string;
  localEntity: T;
  remoteEntity: T;
  resolvedEntity?: T;
  isResolved: boolean;
  detectedAt: string;
};

const MAX_CONFLICT_LOG = 200;
const DEFAULT_MAX_ATTEMPTS = 5;

export type InMemorySyncRepositoryOptions = {
  maxAttempts?: number;
};

export class InMemorySyncRepository<T extends SyncableEntity> implements SyncRepository<T> {
  private readonly entities = new Map<string, T>();
  private readonly meta = new Map<string, EntitySyncMeta>();
  private readonly conflictLog: ConflictAuditEntry<T>[] = [];
  private readonly maxAttempts: number;

  constructor(seed: T[] = [], options: InMemorySyncRepositoryOptions = {}) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));

    for (const entity of seed) {
      this.write(entity);
    }
  }

  async save(entity: T): Promise<T> {
    const row: T = { ...entity, hasPendingChanges: true, modifiedAt: entity.modifiedAt ?? nowIso() };
    this.meta.delete(row.id);
    this.write(row);
    return { ...row };
  }

  async getPending(): Promise<T[]> {
    const pending: T[] = [];
    for (const entity of this.entities.values()) {
      if (entity.hasPendingChanges && !this.isParked(entity.id)) {
        pending.push({ ...entity });
      }
    }
    return pending;
  }

  async getAll(): Promise<T[]> {
    return [...this.entities.values()].map((entity) => ({ ...entity }));
  }

  async getById(id: string): Promise<T | null> {
    const entity = this.entities.get(id);
    return entity ? { ...entity } : null;
  }

  async add(entity: T): Promise<void> {
    if (this.entities.has(entity.id)) {
      throw new Error(`Entity ${entity.id} already exists.`);
    }
    this.write(entity);
  }

  async update(entity: T): Promise<void> {
    this.write(entity);
  }

  async markSynced(id: string, syncedAt: string): Promise<void> {
    const entity = this.entities.get(id);
    if (!entity) return;

    this.entities.set(id, { ...entity, hasPendingChanges: false });
    this.meta.set(id, { status: 'SYNCED', retryCount: 0, syncedAt });
  }

  async markFailed(id: string, reason: string): Promise<void> {
    const entity = this.entities.get(id);
    if (!entity) return;

    const previous = this.meta.get(id);
    this.meta.set(id, {
      status: 'FAILED',
      retryCount: (previous?.retryCount ?? 0) + 1,
      lastError: reason,
      syncedAt: previous?.syncedAt
    });
  }

  async recordConflict(conflict: SyncConflict<T>): Promise<void> {
    this.conflictLog.unshift({
      entityId: conflict.entityId,
      entityType: conflict.entityType,
      localEntity: { ...conflict.localEntity },
      remoteEntity: { ...conflict.remoteEntity },
      resolvedEntity: conflict.resolvedEntity ? { ...conflict.resolvedEntity } : undefined,
      isResolved: conflict.isResolved,
      detectedAt: conflict.detectedAt
    });

    if (this.conflictLog.length > MAX_CONFLICT_LOG) {
      this.conflictLog.length = MAX_CONFLICT_LOG;
    }
  }

  async resetFailed(): Promise<number> {
    let count = 0;
    for (const [id, meta] of this.meta) {
      if (meta.status === 'FAILED') {
        this.meta.set(id, { status: 'PENDING', retryCount: 0, syncedAt: meta.syncedAt });
        count += 1;
      }
    }
    return count;
  }

  getSyncMeta(id: string): EntitySyncMeta | undefined {
    const meta = this.meta.get(id);
    return meta ? { ...meta } : undefined;
  }

  listConflicts(): ConflictAuditEntry<T>[] {
    return this.conflictLog.map((entry) => ({ ...entry }));
  }

  countPending(): number {
    let count = 0;
    for (const entity of this.entities.values()) {
      if (entity.hasPendingChanges) {
        count += 1;
      }
    }
    return count;
  }

  private isParked(id: string) {
    const meta = this.meta.get(id);
    return meta?.status === 'FAILED' && meta.retryCount >= this.maxAttempts;
  }

  private write(entity: T) {
    this.entities.set(entity.id, { ...entity });
    if (entity.hasPendingChanges) {
      const previous = this.meta.get(entity.id);
      this.meta.set(entity.id, {
        status: previous?.status === 'FAILED' ? 'FAILED' : 'PENDING',
        retryCount: previous?.retryCount ?? 0,
        lastError: previous?.lastError,
        syncedAt: previous?.syncedAt
      });
    }
  }
}
