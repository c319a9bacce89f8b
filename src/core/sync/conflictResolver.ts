import type { ConflictStrategy, ManualConflictHandler, SyncableEntity, SyncConflict } from './types';
import { appEnv } from '../env';
import { nowIso, parseTimestamp, toErrorMessage } from './utils';

function lastWriteAt(entity: SyncableEntity) {
  return parseTimestamp(entity.modifiedAt) ?? parseTimestamp(entity.createdAt);
}

export function createConflict<T extends SyncableEntity>(
  entityType: string,
  localEntity: T,
  remoteEntity: T
): SyncConflict<T> {
  const conflict: SyncConflict<T> = {
    entityId: localEntity.id,
    entityType,
    localEntity,
    remoteEntity,
    detectedAt: nowIso(),
    resolvedEntity: undefined,
    isResolved: false,
    resolve(entity: T) {
      conflict.resolvedEntity = entity;
      conflict.isResolved = true;
    }
  };

  return conflict;
}

/**
 * Automatic strategies only. Returns `undefined` for `MANUAL`, which needs a human round-trip.
 */
export function resolveConflict<T extends SyncableEntity>(
  local: T,
  remote: T,
  strategy: ConflictStrategy
): T | undefined {
  switch (strategy) {
    case 'SERVER_WINS':
      return remote;
    case 'LOCAL_WINS':
      return local;
    case 'LWW': {
      const localTime = lastWriteAt(local);
      const remoteTime = lastWriteAt(remote);

      if (localTime === null || remoteTime === null) {
        return remote;
      }

      return localTime > remoteTime ? local : remote;
    }
    case 'MANUAL':
    default:
      return undefined;
  }
}

export class ConflictResolver<T extends SyncableEntity> {
  private readonly handlers = new Set<ManualConflictHandler<T>>();

  constructor(readonly strategy: ConflictStrategy) {}

  onConflict(handler: ManualConflictHandler<T>): () => void {
    this.handlers.add(handler);

    return () => {
      this.handlers.delete(handler);
    };
  }

  async resolve(conflict: SyncConflict<T>): Promise<T | null> {
    if (this.strategy !== 'MANUAL') {
      const winner = resolveConflict(conflict.localEntity, conflict.remoteEntity, this.strategy);
      if (winner) {
        conflict.resolve(winner);
      }
      return winner ?? null;
    }

    for (const handler of this.handlers) {
      try {
        await handler(conflict);
      } catch (error) {
        if (appEnv.verboseLogging) {
          console.warn('[conflict-resolver] handler failed', {
            entityId: conflict.entityId,
            error: toErrorMessage(error)
          });
        }
        continue;
      }

      if (conflict.isResolved) {
        break;
      }
    }

    if (conflict.isResolved && conflict.resolvedEntity) {
      return conflict.resolvedEntity;
    }

    return null;
  }
}
