export type SyncDirection = 'UPLOAD' | 'DOWNLOAD' | 'BIDIRECTIONAL';

export type ConflictStrategy = 'SERVER_WINS' | 'LOCAL_WINS' | 'LWW' | 'MANUAL';

export type SyncEngineStatus =
  | 'IDLE'
  | 'SYNCING'
  | 'COMPLETED'
  | 'FAILED'
  | 'CANCELLED'
  | 'PAUSED'
  | 'OFFLINE';

export type SyncOutcome = 'COMPLETED' | 'FAILED' | 'CANCELLED' | 'OFFLINE' | 'BUSY' | 'PAUSED';

export type SyncAction = 'CREATE' | 'UPDATE' | 'DELETE';

export interface SyncableEntity {
  readonly id: string;
  hasPendingChanges: boolean;
  createdAt?: string;
  modifiedAt?: string;
  isDeleted?: boolean;
}

export interface SyncRecord<T extends SyncableEntity = SyncableEntity> {
  entityId: string;
  operation: SyncAction;
  payload: T;
  syncVersion: number;
  localTimestamp: string;
}

export interface SyncResult {
  readonly success: boolean;
  readonly outcome: SyncOutcome;
  readonly uploaded: number;
  readonly downloaded: number;
  readonly conflicts: number;
  readonly conflictsResolved: number;
  readonly errors: number;
  readonly durationMs: number;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly errorMessage?: string;
}

export interface SyncConflict<T extends SyncableEntity> {
  readonly entityId: string;
  readonly entityType: string;
  readonly localEntity: T;
  readonly remoteEntity: T;
  readonly detectedAt: string;
  resolvedEntity?: T;
  isResolved: boolean;
  resolve(entity: T): void;
}

export interface SyncProgress {
  status: SyncEngineStatus;
  totalItems: number;
  completedItems: number;
  currentItemId?: string;
  message: string;
  percentage: number;
}

export interface SyncEngineState {
  status: SyncEngineStatus;
  lastSyncAt?: string;
  lastSyncVersion: number;
  lastError?: string;
}

export interface SyncEngineConfig {
  direction: SyncDirection;
  conflictStrategy: ConflictStrategy;
  batchSize: number;
  maxAttempts: number;
  baseDelayMs: number;
  batchPush: boolean;
  entityType: string;
}

export interface SyncRepository<T extends SyncableEntity> {
  getPending(): Promise<T[]>;
  getAll(): Promise<T[]>;
  add(entity: T): Promise<void>;
  update(entity: T): Promise<void>;
  markSynced(id: string, syncedAt: string): Promise<void>;
  markFailed(id: string, reason: string): Promise<void>;
  recordConflict?(conflict: SyncConflict<T>): Promise<void>;
}

export interface SyncRemoteClient<T extends SyncableEntity> {
  isOnline(signal?: AbortSignal): Promise<boolean>;
  push(entity: T, signal?: AbortSignal): Promise<boolean>;
  pushBatch(entities: T[], signal?: AbortSignal): Promise<number>;
  pull(sinceVersion: number, signal?: AbortSignal): Promise<T[]>;
  getServerVersion(signal?: AbortSignal): Promise<number>;
}

export type ManualConflictHandler<T extends SyncableEntity> = (
  conflict: SyncConflict<T>
) => void | Promise<void>;

export type SyncProgressListener = (progress: SyncProgress) => void;

export type SyncStatusListener = (state: SyncEngineState) => void;

export type SyncCompleteListener = (result: SyncResult) => void;
