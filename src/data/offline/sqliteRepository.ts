import Database from 'better-sqlite3';
import type { z } from 'zod';
import { appEnv } from '../../core/env';
import type { SyncableEntity, SyncConflict, SyncRepository } from '../../core/sync/types';
import { nowIso } from '../../core/sync/utils';

const LOCAL_ENTITIES_TABLE = 'local_entities';
const CONFLICTS_TABLE = 'sync_conflicts';
const DEFAULT_CONFLICT_LIMIT = 100;
const MAX_CONFLICT_LIMIT = 500;
const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_PRIORITY = 100;

export type EntitySyncStatus = 'PENDING' | 'SYNCED' | 'FAILED' | 'CANCELLED';

type LocalEntityRow = {
  entity: string;
  id: string;
  data: string;
  pending: number;
  sync_status: EntitySyncStatus;
  retry_count: number;
  last_error: string | null;
  synced_at: string | null;
  priority: number;
  created_at: string;
  updated_at: string;
};

type ConflictRow = {
  id: number;
  entity: string;
  entity_id: string;
  local_payload: string;
  remote_payload: string;
  resolved_payload: string | null;
  is_resolved: number;
  detected_at: string;
};

export type LocalSyncStatistics = {
  total: number;
  pending: number;
  failed: number;
  exhausted: number;
  synced: number;
  cancelled: number;
  oldestPendingAt?: string;
};

export type SaveOptions = {
  /** Lower values are uploaded first. */
  priority?: number;
};

export type StoredConflict<T extends SyncableEntity> = {
  id: number;
  entityType: string;
  entityId: string;
  localEntity: T | null;
  remoteEntity: T | null;
  resolvedEntity: T | null;
  isResolved: boolean;
  detectedAt: string;
};

type StatisticsRow = {
  total: number;
  pending: number | null;
  failed: number | null;
  exhausted: number | null;
  synced: number | null;
  cancelled: number | null;
  oldest: string | null;
};

export type SqliteSyncRepositoryOptions<T extends SyncableEntity> = {
  entityType: string;
  schema: z.ZodType<T>;
  db?: Database.Database;
  path?: string;
  /** Failed uploads after which an entity is parked until `resetFailed`. */
  maxAttempts?: number;
};

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}

function assertNonEmpty(value: string, label: string) {
  if (value.trim().length === 0) {
    throw new Error(`${label} is required.`);
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function setupSchema(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${LOCAL_ENTITIES_TABLE} (
      entity TEXT NOT NULL,
      id TEXT NOT NULL,
      data TEXT NOT NULL,
      pending INTEGER NOT NULL DEFAULT 0,
      sync_status TEXT NOT NULL CHECK (sync_status IN ('PENDING', 'SYNCED', 'FAILED', 'CANCELLED')),
      retry_count INTEGER NOT NULL DEFAULT 0,
      last_error TEXT,
      synced_at TEXT,
      priority INTEGER NOT NULL DEFAULT ${DEFAULT_PRIORITY},
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (entity, id)
    );

    CREATE INDEX IF NOT EXISTS idx_local_entities_pending
      ON ${LOCAL_ENTITIES_TABLE}(entity, pending, priority ASC, updated_at ASC);

    CREATE TABLE IF NOT EXISTS ${CONFLICTS_TABLE} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      entity TEXT NOT NULL,
      entity_id TEXT NOT NULL,
      local_payload TEXT NOT NULL,
      remote_payload TEXT NOT NULL,
      resolved_payload TEXT,
      is_resolved INTEGER NOT NULL DEFAULT 0,
      detected_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_sync_conflicts_entity
      ON ${CONFLICTS_TABLE}(entity, entity_id, detected_at DESC);
  `);
}

export class SqliteSyncRepository<T extends SyncableEntity> implements SyncRepository<T> {
  readonly entityType: string;

  private readonly db: Database.Database;
  private readonly schema: z.ZodType<T>;
  private readonly maxAttempts: number;

  constructor(options: SqliteSyncRepositoryOptions<T>) {
    assertNonEmpty(options.entityType, 'entityType');

    this.entityType = options.entityType;
    this.schema = options.schema;
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
    this.db = options.db ?? new Database(options.path ?? appEnv.dbPath);

    if (!options.db) {
      this.db.pragma('journal_mode = WAL');
    }

    setupSchema(this.db);
  }

  async save(entity: T, options: SaveOptions = {}): Promise<T> {
    assertNonEmpty(entity.id, 'entity.id');

    const timestamp = nowIso();
    const row: T = { ...entity, hasPendingChanges: true, modifiedAt: entity.modifiedAt ?? timestamp };
    const existing = this.getRow(entity.id);
    const priority = options.priority ?? existing?.priority ?? DEFAULT_PRIORITY;

    this.db
      .prepare(
        `
          INSERT INTO ${LOCAL_ENTITIES_TABLE}
          (entity, id, data, pending, sync_status, retry_count, last_error, synced_at, priority, created_at, updated_at)
          VALUES (?, ?, ?, 1, 'PENDING', 0, NULL, NULL, ?, ?, ?)
          ON CONFLICT (entity, id) DO UPDATE SET
            data = excluded.data,
            pending = 1,
            sync_status = 'PENDING',
            retry_count = 0,
            last_error = NULL,
            priority = excluded.priority,
            updated_at = excluded.updated_at
        `
      )
      .run(this.entityType, row.id, JSON.stringify(row), priority, existing?.created_at ?? timestamp, timestamp);

    return row;
  }

  async getPending(): Promise<T[]> {
    const rows = this.db
      .prepare<[string, number], LocalEntityRow>(
        `
          SELECT *
          FROM ${LOCAL_ENTITIES_TABLE}
          WHERE entity = ?
            AND pending = 1
            AND NOT (sync_status = 'FAILED' AND retry_count >= ?)
          ORDER BY priority ASC, updated_at ASC
        `
      )
      .all(this.entityType, this.maxAttempts);

    return this.mapRows(rows);
  }

  async getAll(): Promise<T[]> {
    const rows = this.db
      .prepare<[string], LocalEntityRow>(
        `
          SELECT *
          FROM ${LOCAL_ENTITIES_TABLE}
          WHERE entity = ?
          ORDER BY updated_at ASC
        `
      )
      .all(this.entityType);

    return this.mapRows(rows);
  }

  async getById(id: string): Promise<T | null> {
    const row = this.getRow(id);
    return row ? this.mapRow(row) : null;
  }

  async add(entity: T): Promise<void> {
    assertNonEmpty(entity.id, 'entity.id');

    const timestamp = nowIso();
    const pending = entity.hasPendingChanges ? 1 : 0;

    // Rows the schema can no longer read are absent from getAll, so remote copies land here.
    this.db
      .prepare(
        `
          INSERT INTO ${LOCAL_ENTITIES_TABLE}
          (entity, id, data, pending, sync_status, retry_count, last_error, synced_at, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, 0, NULL, NULL, ?, ?)
          ON CONFLICT (entity, id) DO UPDATE SET
            data = excluded.data,
            pending = excluded.pending,
            sync_status = excluded.sync_status,
            retry_count = 0,
            last_error = NULL,
            updated_at = excluded.updated_at
        `
      )
      .run(
        this.entityType,
        entity.id,
        JSON.stringify(entity),
        pending,
        pending ? 'PENDING' : 'SYNCED',
        entity.createdAt ?? timestamp,
        timestamp
      );
  }

  async update(entity: T): Promise<void> {
    const result = this.db
      .prepare(
        `
          UPDATE ${LOCAL_ENTITIES_TABLE}
          SET data = ?,
              pending = ?,
              updated_at = ?
          WHERE entity = ?
            AND id = ?
        `
      )
      .run(JSON.stringify(entity), entity.hasPendingChanges ? 1 : 0, nowIso(), this.entityType, entity.id);

    if (result.changes === 0) {
      throw new Error(`Entity ${this.entityType}/${entity.id} not found.`);
    }
  }

  async remove(id: string): Promise<boolean> {
    const result = this.db
      .prepare(`DELETE FROM ${LOCAL_ENTITIES_TABLE} WHERE entity = ? AND id = ?`)
      .run(this.entityType, id);

    return result.changes > 0;
  }

  async markSynced(id: string, syncedAt: string): Promise<void> {
    const row = this.getRow(id);
    if (!row) return;

    const entity = this.mapRow(row);
    const data = entity ? JSON.stringify({ ...entity, hasPendingChanges: false }) : row.data;

    this.db
      .prepare(
        `
          UPDATE ${LOCAL_ENTITIES_TABLE}
          SET data = ?,
              pending = 0,
              sync_status = 'SYNCED',
              retry_count = 0,
              last_error = NULL,
              synced_at = ?,
              updated_at = ?
          WHERE entity = ?
            AND id = ?
        `
      )
      .run(data, syncedAt, nowIso(), this.entityType, id);
  }

  async markFailed(id: string, reason: string): Promise<void> {
    this.db
      .prepare(
        `
          UPDATE ${LOCAL_ENTITIES_TABLE}
          SET sync_status = 'FAILED',
              retry_count = retry_count + 1,
              last_error = ?,
              updated_at = ?
          WHERE entity = ?
            AND id = ?
        `
      )
      .run(reason, nowIso(), this.entityType, id);

    if (appEnv.verboseLogging) {
      const retryCount = this.getRow(id)?.retry_count ?? 0;
      console.warn('[sqlite-repository] entity marked as failed', {
        entity: this.entityType,
        id,
        reason,
        retryCount,
        parked: retryCount >= this.maxAttempts
      });
    }
  }

  async cancelPending(id: string): Promise<boolean> {
    const result = this.db
      .prepare(
        `
          UPDATE ${LOCAL_ENTITIES_TABLE}
          SET pending = 0,
              sync_status = 'CANCELLED',
              last_error = NULL,
              updated_at = ?
          WHERE entity = ?
            AND id = ?
            AND pending = 1
        `
      )
      .run(nowIso(), this.entityType, id);

    return result.changes > 0;
  }

  async purgeSynced(syncedBefore: string): Promise<number> {
    const result = this.db
      .prepare(
        `
          DELETE FROM ${LOCAL_ENTITIES_TABLE}
          WHERE entity = ?
            AND pending = 0
            AND sync_status = 'SYNCED'
            AND synced_at < ?
        `
      )
      .run(this.entityType, syncedBefore);

    return result.changes;
  }

  async recordConflict(conflict: SyncConflict<T>): Promise<void> {
    this.db
      .prepare(
        `
          INSERT INTO ${CONFLICTS_TABLE}
          (entity, entity_id, local_payload, remote_payload, resolved_payload, is_resolved, detected_at)
          VALUES (?, ?, ?, ?, ?, ?, ?)
        `
      )
      .run(
        conflict.entityType,
        conflict.entityId,
        JSON.stringify(conflict.localEntity),
        JSON.stringify(conflict.remoteEntity),
        conflict.resolvedEntity ? JSON.stringify(conflict.resolvedEntity) : null,
        conflict.isResolved ? 1 : 0,
        conflict.detectedAt
      );
  }

  async listConflicts(limit = DEFAULT_CONFLICT_LIMIT): Promise<StoredConflict<T>[]> {
    const safeLimit = clamp(Math.floor(limit), 1, MAX_CONFLICT_LIMIT);

    const rows = this.db
      .prepare<[string, number], ConflictRow>(
        `
          SELECT *
          FROM ${CONFLICTS_TABLE}
          WHERE entity = ?
          ORDER BY id DESC
          LIMIT ?
        `
      )
      .all(this.entityType, safeLimit);

    return rows.map((row) => ({
      id: row.id,
      entityType: row.entity,
      entityId: row.entity_id,
      localEntity: this.parseEntity(row.local_payload),
      remoteEntity: this.parseEntity(row.remote_payload),
      resolvedEntity: row.resolved_payload ? this.parseEntity(row.resolved_payload) : null,
      isResolved: row.is_resolved === 1,
      detectedAt: row.detected_at
    }));
  }

  async getStatistics(): Promise<LocalSyncStatistics> {
    const row = this.db
      .prepare<[number, string], StatisticsRow>(
        `
          SELECT
            COUNT(*) AS total,
            SUM(CASE WHEN pending = 1 THEN 1 ELSE 0 END) AS pending,
            SUM(CASE WHEN sync_status = 'FAILED' THEN 1 ELSE 0 END) AS failed,
            SUM(CASE WHEN sync_status = 'FAILED' AND retry_count >= ? THEN 1 ELSE 0 END) AS exhausted,
            SUM(CASE WHEN sync_status = 'SYNCED' THEN 1 ELSE 0 END) AS synced,
            SUM(CASE WHEN sync_status = 'CANCELLED' THEN 1 ELSE 0 END) AS cancelled,
            MIN(CASE WHEN pending = 1 THEN updated_at END) AS oldest
          FROM ${LOCAL_ENTITIES_TABLE}
          WHERE entity = ?
        `
      )
      .get(this.maxAttempts, this.entityType);

    return {
      total: row?.total ?? 0,
      pending: row?.pending ?? 0,
      failed: row?.failed ?? 0,
      exhausted: row?.exhausted ?? 0,
      synced: row?.synced ?? 0,
      cancelled: row?.cancelled ?? 0,
      ...(row?.oldest ? { oldestPendingAt: row.oldest } : {})
    };
  }

  async resetFailed(): Promise<number> {
    const result = this.db
      .prepare(
        `
          UPDATE ${LOCAL_ENTITIES_TABLE}
          SET sync_status = 'PENDING',
              retry_count = 0,
              last_error = NULL
          WHERE entity = ?
            AND sync_status = 'FAILED'
        `
      )
      .run(this.entityType);

    return result.changes;
  }

  async getSyncMeta(
    id: string
  ): Promise<{ status: EntitySyncStatus; retryCount: number; lastError?: string; syncedAt?: string } | null> {
    const row = this.getRow(id);
    if (!row) {
      return null;
    }

    return {
      status: row.sync_status,
      retryCount: row.retry_count,
      ...(row.last_error ? { lastError: row.last_error } : {}),
      ...(row.synced_at ? { syncedAt: row.synced_at } : {})
    };
  }

  close() {
    this.db.close();
  }

  private getRow(id: string) {
    return this.db
      .prepare<[string, string], LocalEntityRow>(
        `
          SELECT *
          FROM ${LOCAL_ENTITIES_TABLE}
          WHERE entity = ?
            AND id = ?
          LIMIT 1
        `
      )
      .get(this.entityType, id);
  }

  private mapRows(rows: LocalEntityRow[]) {
    const entities: T[] = [];
    for (const row of rows) {
      const entity = this.mapRow(row);
      if (entity) {
        entities.push(entity);
      }
    }
    return entities;
  }

  private mapRow(row: LocalEntityRow): T | null {
    const parsed = this.schema.safeParse(parseJson(row.data));

    if (!parsed.success) {
      if (appEnv.verboseLogging) {
        console.warn('[sqlite-repository] dropping unreadable row', { entity: row.entity, id: row.id });
      }
      return null;
    }

    return { ...parsed.data, hasPendingChanges: row.pending === 1 };
  }

  private parseEntity(raw: string): T | null {
    const parsed = this.schema.safeParse(parseJson(raw));
    return parsed.success ? parsed.data : null;
  }
}
