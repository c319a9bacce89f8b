import { appEnv } from '../env';
import { ConflictResolver, createConflict } from './conflictResolver';
import { resolveSyncEngineConfig, type SyncEngineOptions } from './policies';
import type {
  ManualConflictHandler,
  SyncableEntity,
  SyncCompleteListener,
  SyncConflict,
  SyncEngineConfig,
  SyncEngineState,
  SyncEngineStatus,
  SyncOutcome,
  SyncProgress,
  SyncProgressListener,
  SyncRemoteClient,
  SyncRepository,
  SyncResult,
  SyncStatusListener
} from './types';
import {
  backoffDelay,
  chunk,
  isCancellation,
  nowIso,
  sleep,
  SyncCancelledError,
  throwIfCancelled,
  toErrorMessage,
  toPercentage
} from './utils';

const UPLOAD_FAILED_REASON = 'Upload failed after retries';

type PassCounters = {
  uploaded: number;
  downloaded: number;
  conflicts: number;
  conflictsResolved: number;
  errors: number;
  phaseError?: string;
};

type LogLevel = 'info' | 'warn' | 'error';

type ApplyOutcome = 'APPLIED' | 'DEFERRED' | 'FAILED';

function createCounters(): PassCounters {
  return { uploaded: 0, downloaded: 0, conflicts: 0, conflictsResolved: 0, errors: 0 };
}

function buildResult(
  outcome: SyncOutcome,
  counters: PassCounters,
  startedAtMs: number,
  errorMessage?: string
): SyncResult {
  const completedAtMs = Date.now();

  return Object.freeze({
    success: outcome === 'COMPLETED',
    outcome,
    uploaded: counters.uploaded,
    downloaded: counters.downloaded,
    conflicts: counters.conflicts,
    conflictsResolved: counters.conflictsResolved,
    errors: counters.errors,
    durationMs: completedAtMs - startedAtMs,
    startedAt: new Date(startedAtMs).toISOString(),
    completedAt: new Date(completedAtMs).toISOString(),
    ...(errorMessage ? { errorMessage } : {})
  });
}

function latestPerEntity<T extends SyncableEntity>(records: T[]): T[] {
  const byId = new Map<string, T>();
  for (const record of records) {
    byId.delete(record.id);
    byId.set(record.id, record);
  }
  return [...byId.values()];
}

function rethrowIfCancelled(error: unknown, signal?: AbortSignal) {
  if (isCancellation(error, signal)) {
    throw error instanceof SyncCancelledError ? error : new SyncCancelledError();
  }
}

export class SyncEngine<T extends SyncableEntity> {
  readonly config: Readonly<SyncEngineConfig>;

  private readonly resolver: ConflictResolver<T>;

  private state: SyncEngineState = {
    status: 'IDLE',
    lastSyncVersion: 0
  };

  private isSyncing = false;
  private paused = false;

  private readonly statusListeners = new Set<SyncStatusListener>();
  private readonly progressListeners = new Set<SyncProgressListener>();
  private readonly completeListeners = new Set<SyncCompleteListener>();

  constructor(
    private readonly repository: SyncRepository<T>,
    private readonly remote: SyncRemoteClient<T>,
    options: SyncEngineOptions = {}
  ) {
    this.config = resolveSyncEngineConfig(options);
    this.resolver = new ConflictResolver<T>(this.config.conflictStrategy);
  }

  get status(): SyncEngineStatus {
    return this.state.status;
  }

  get lastSyncAt(): string | undefined {
    return this.state.lastSyncAt;
  }

  getState(): SyncEngineState {
    return { ...this.state };
  }

  onStatusChange(listener: SyncStatusListener) {
    this.statusListeners.add(listener);
    listener(this.getState());

    return () => {
      this.statusListeners.delete(listener);
    };
  }

  onProgress(listener: SyncProgressListener) {
    this.progressListeners.add(listener);

    return () => {
      this.progressListeners.delete(listener);
    };
  }

  onSyncComplete(listener: SyncCompleteListener) {
    this.completeListeners.add(listener);

    return () => {
      this.completeListeners.delete(listener);
    };
  }

  onConflict(handler: ManualConflictHandler<T>) {
    return this.resolver.onConflict(handler);
  }

  async sync(signal?: AbortSignal): Promise<SyncResult> {
    const startedAtMs = Date.now();

    if (this.isSyncing) {
      this.log('warn', 'sync already in progress, skipping');
      return buildResult('BUSY', createCounters(), startedAtMs, 'Sync already in progress');
    }

    if (this.paused) {
      return buildResult('PAUSED', createCounters(), startedAtMs, 'Sync is paused');
    }

    this.isSyncing = true;
    const counters = createCounters();
    let result: SyncResult;

    try {
      result = await this.runPass(counters, startedAtMs, signal);
    } catch (error) {
      if (isCancellation(error, signal)) {
        this.settle('CANCELLED', 'Sync was cancelled');
        this.log('warn', 'sync cancelled', { ...counters });
        result = buildResult('CANCELLED', counters, startedAtMs, 'Sync was cancelled');
      } else {
        const message = toErrorMessage(error);
        this.settle('FAILED', message);
        this.log('error', 'sync failed', { error: message });
        result = buildResult('FAILED', counters, startedAtMs, message);
      }
    } finally {
      this.isSyncing = false;
    }

    this.notifyComplete(result);
    return result;
  }

  async forceSync(signal?: AbortSignal): Promise<SyncResult> {
    if (!this.isSyncing) {
      this.patchState({ lastSyncAt: undefined, lastSyncVersion: 0 });
    }

    return this.sync(signal);
  }

  pause() {
    this.paused = true;
    this.patchState({ status: 'PAUSED' });
  }

  resume() {
    this.paused = false;
    if (this.state.status === 'PAUSED') {
      this.patchState({ status: 'IDLE' });
    }
  }

  private async runPass(
    counters: PassCounters,
    startedAtMs: number,
    signal?: AbortSignal
  ): Promise<SyncResult> {
    throwIfCancelled(signal);

    this.patchState({ status: 'SYNCING', lastError: undefined });
    this.emitProgress({ status: 'SYNCING', totalItems: 0, completedItems: 0, message: 'Starting sync...' });

    const online = await this.checkConnectivity(signal);
    throwIfCancelled(signal);

    if (!online) {
      this.settle('OFFLINE', 'Server is offline');
      this.emitProgress({ status: 'OFFLINE', totalItems: 0, completedItems: 0, message: 'Server is offline' });
      return buildResult('OFFLINE', counters, startedAtMs, 'Server is offline');
    }

    const { direction } = this.config;

    if (direction === 'UPLOAD' || direction === 'BIDIRECTIONAL') {
      await this.uploadChanges(counters, signal);
    }

    let nextVersion: number | null = null;
    if (direction === 'DOWNLOAD' || direction === 'BIDIRECTIONAL') {
      nextVersion = await this.downloadChanges(counters, signal);
    }

    this.patchState({
      lastSyncAt: nowIso(),
      lastSyncVersion: nextVersion ?? this.state.lastSyncVersion
    });
    this.settle('COMPLETED', counters.phaseError);

    const summary = `Sync completed. Uploaded: ${counters.uploaded}, Downloaded: ${counters.downloaded}`;
    this.emitProgress({ status: 'COMPLETED', totalItems: 0, completedItems: 0, message: summary });
    this.log('info', 'sync completed', { ...counters });

    return buildResult('COMPLETED', counters, startedAtMs, counters.phaseError);
  }

  private async checkConnectivity(signal?: AbortSignal) {
    try {
      return await this.remote.isOnline(signal);
    } catch (error) {
      this.log('warn', 'connectivity check failed', { error: toErrorMessage(error) });
      return false;
    }
  }

  private async uploadChanges(counters: PassCounters, signal?: AbortSignal) {
    const pending = await this.repository.getPending();
    if (pending.length === 0) {
      return;
    }

    this.log('info', `uploading ${pending.length} pending item(s)`);

    const totalItems = pending.length;
    let completedItems = 0;

    for (const batch of chunk(pending, this.config.batchSize)) {
      throwIfCancelled(signal);

      const pushedAsBatch = this.config.batchPush ? await this.tryPushBatch(batch, signal) : false;

      for (const entity of batch) {
        const pushed = pushedAsBatch || (await this.pushWithRetry(entity, signal));
        await this.settleUpload(entity, pushed, counters);

        completedItems += 1;
        this.emitProgress({
          status: 'SYNCING',
          totalItems,
          completedItems,
          currentItemId: entity.id,
          message: `Uploading ${completedItems}/${totalItems}...`
        });
      }
    }
  }

  private async tryPushBatch(batch: T[], signal?: AbortSignal) {
    try {
      const applied = await this.remote.pushBatch(batch, signal);
      if (applied === batch.length) {
        return true;
      }

      this.log('warn', 'batch push partially applied, falling back to per-item push', {
        applied,
        size: batch.length
      });
      return false;
    } catch (error) {
      rethrowIfCancelled(error, signal);
      this.log('warn', 'batch push failed, falling back to per-item push', { error: toErrorMessage(error) });
      return false;
    }
  }

  private async pushWithRetry(entity: T, signal?: AbortSignal) {
    const { maxAttempts, baseDelayMs } = this.config;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      let reason: string;

      try {
        if (await this.remote.push(entity, signal)) {
          return true;
        }
        reason = 'push rejected by server';
      } catch (error) {
        rethrowIfCancelled(error, signal);
        reason = toErrorMessage(error);
      }

      this.log('warn', `upload attempt ${attempt}/${maxAttempts} failed`, { entityId: entity.id, reason });

      if (attempt < maxAttempts) {
        await sleep(backoffDelay(attempt, baseDelayMs), signal);
      }
    }

    return false;
  }

  private async settleUpload(entity: T, pushed: boolean, counters: PassCounters) {
    if (!pushed) {
      counters.errors += 1;
    }

    try {
      if (pushed) {
        await this.repository.markSynced(entity.id, nowIso());
        counters.uploaded += 1;
      } else {
        await this.repository.markFailed(entity.id, UPLOAD_FAILED_REASON);
      }
    } catch (error) {
      if (pushed) {
        counters.errors += 1;
      }
      this.log('error', 'repository bookkeeping failed after upload', {
        entityId: entity.id,
        error: toErrorMessage(error)
      });
    }
  }

  private async downloadChanges(counters: PassCounters, signal?: AbortSignal): Promise<number | null> {
    const sinceVersion = this.state.lastSyncVersion;

    let serverVersion: number;
    let remoteChanges: T[];

    try {
      serverVersion = await this.remote.getServerVersion(signal);
      if (!Number.isInteger(serverVersion) || serverVersion < 0) {
        throw new Error(`invalid server version ${String(serverVersion)}`);
      }
      remoteChanges = await this.remote.pull(sinceVersion, signal);
    } catch (error) {
      rethrowIfCancelled(error, signal);
      const message = `Pull failed: ${toErrorMessage(error)}`;
      counters.errors += 1;
      counters.phaseError = message;
      this.log('error', 'failed to pull changes from server', { sinceVersion, error: message });
      return null;
    }

    const nextVersion = Math.max(sinceVersion, serverVersion);
    const changes = latestPerEntity(remoteChanges);
    if (changes.length === 0) {
      return nextVersion;
    }

    this.log('info', `applying ${changes.length} remote change(s)`, { sinceVersion });

    const locals = await this.repository.getAll();
    const localById = new Map(locals.map((entity) => [entity.id, entity]));

    const totalItems = changes.length;
    let completedItems = 0;
    let heldBack = 0;

    for (const remoteEntity of changes) {
      throwIfCancelled(signal);

      const outcome = await this.applyRemote(remoteEntity, localById.get(remoteEntity.id), counters);
      if (outcome !== 'APPLIED') {
        heldBack += 1;
      }

      completedItems += 1;
      this.emitProgress({
        status: 'SYNCING',
        totalItems,
        completedItems,
        currentItemId: remoteEntity.id,
        message: `Downloading ${completedItems}/${totalItems}...`
      });
    }

    // Failed and deferred records must come back in the next pull.
    return heldBack > 0 ? sinceVersion : nextVersion;
  }

  private async applyRemote(
    remoteEntity: T,
    localEntity: T | undefined,
    counters: PassCounters
  ): Promise<ApplyOutcome> {
    const entityId = remoteEntity.id;

    try {
      if (!localEntity) {
        await this.repository.add(remoteEntity);
        await this.repository.markSynced(entityId, nowIso());
        counters.downloaded += 1;
        return 'APPLIED';
      }

      if (!localEntity.hasPendingChanges) {
        await this.repository.update(remoteEntity);
        await this.repository.markSynced(entityId, nowIso());
        counters.downloaded += 1;
        return 'APPLIED';
      }

      counters.conflicts += 1;
      const conflict = createConflict(this.config.entityType, localEntity, remoteEntity);
      const resolved = await this.resolver.resolve(conflict);
      await this.auditConflict(conflict);

      if (!resolved) {
        this.log('warn', 'conflict was not resolved, entity left pending', { entityId });
        return 'DEFERRED';
      }

      await this.repository.update(resolved);
      await this.repository.markSynced(entityId, nowIso());
      counters.conflictsResolved += 1;
      counters.downloaded += 1;
      return 'APPLIED';
    } catch (error) {
      counters.errors += 1;
      this.log('error', 'failed to apply remote change', { entityId, error: toErrorMessage(error) });
      return 'FAILED';
    }
  }

  private async auditConflict(conflict: SyncConflict<T>) {
    if (!this.repository.recordConflict) {
      return;
    }

    try {
      await this.repository.recordConflict(conflict);
    } catch (error) {
      this.log('warn', 'conflict audit failed', { entityId: conflict.entityId, error: toErrorMessage(error) });
    }
  }

  private settle(status: SyncEngineStatus, lastError?: string) {
    this.patchState({ status: this.paused ? 'PAUSED' : status, lastError });
  }

  private emitProgress(progress: Omit<SyncProgress, 'percentage'>) {
    const event: SyncProgress = {
      ...progress,
      percentage: toPercentage(progress.completedItems, progress.totalItems)
    };

    for (const listener of this.progressListeners) {
      this.safeNotify(() => listener(event));
    }
  }

  private notifyComplete(result: SyncResult) {
    for (const listener of this.completeListeners) {
      this.safeNotify(() => listener(result));
    }
  }

  private patchState(next: Partial<SyncEngineState>) {
    this.state = { ...this.state, ...next };
    const snapshot = this.getState();

    for (const listener of this.statusListeners) {
      this.safeNotify(() => listener(snapshot));
    }
  }

  private safeNotify(notify: () => void) {
    try {
      notify();
    } catch (error) {
      this.log('warn', 'listener threw', { error: toErrorMessage(error) });
    }
  }

  private log(level: LogLevel, message: string, context: Record<string, unknown> = {}) {
    if (!appEnv.verboseLogging) {
      return;
    }

    console[level](`[sync-engine:${this.config.entityType}] ${message}`, context);
  }
}

export function createUploadOnlyEngine<T extends SyncableEntity>(
  repository: SyncRepository<T>,
  remote: SyncRemoteClient<T>,
  options: Omit<SyncEngineOptions, 'direction'> = {}
) {
  return new SyncEngine(repository, remote, { ...options, direction: 'UPLOAD' });
}

export function createDownloadOnlyEngine<T extends SyncableEntity>(
  repository: SyncRepository<T>,
  remote: SyncRemoteClient<T>,
  options: Omit<SyncEngineOptions, 'direction'> = {}
) {
  return new SyncEngine(repository, remote, { ...options, direction: 'DOWNLOAD' });
}

/**
 * Engine whose direction, strategy and batch size default to the `SYNC_*` environment.
 */
export function createConfiguredEngine<T extends SyncableEntity>(
  repository: SyncRepository<T>,
  remote: SyncRemoteClient<T>,
  options: SyncEngineOptions = {}
) {
  return new SyncEngine(repository, remote, {
    direction: appEnv.direction,
    conflictStrategy: appEnv.conflictStrategy,
    batchSize: appEnv.batchSize,
    ...options
  });
}
