import type { SyncableEntity, SyncRemoteClient } from './types';

type PushOutcome = boolean | Error;

/**
 * Scripted in-process remote used by tests and local demos.
 */
export class MockRemoteClient<T extends SyncableEntity> implements SyncRemoteClient<T> {
  online: boolean | Error = true;
  serverVersion = 0;
  remoteChanges: T[] = [];
  // Changes listed here are only returned to pulls from an older version.
  readonly changeVersions = new Map<string, number>();
  pullError: Error | null = null;

  pushImpl: ((entity: T) => Promise<boolean>) | null = null;
  pushBatchImpl: ((entities: T[]) => Promise<number>) | null = null;

  readonly pushScript = new Map<string, PushOutcome[]>();
  readonly pushCalls: Array<{ entityId: string; at: number }> = [];
  readonly pushBatchCalls: string[][] = [];
  readonly pullCalls: number[] = [];
  readonly accepted: T[] = [];

  async isOnline(): Promise<boolean> {
    if (this.online instanceof Error) {
      throw this.online;
    }
    return this.online;
  }

  async push(entity: T): Promise<boolean> {
    this.pushCalls.push({ entityId: entity.id, at: Date.now() });

    if (this.pushImpl) {
      return this.pushImpl(entity);
    }

    const outcome = this.pushScript.get(entity.id)?.shift() ?? true;
    if (outcome instanceof Error) {
      throw outcome;
    }

    if (outcome) {
      this.accepted.push({ ...entity });
    }
    return outcome;
  }

  async pushBatch(entities: T[]): Promise<number> {
    this.pushBatchCalls.push(entities.map((entity) => entity.id));

    if (this.pushBatchImpl) {
      return this.pushBatchImpl(entities);
    }

    this.accepted.push(...entities.map((entity) => ({ ...entity })));
    return entities.length;
  }

  async pull(sinceVersion: number): Promise<T[]> {
    this.pullCalls.push(sinceVersion);

    if (this.pullError) {
      throw this.pullError;
    }

    return this.remoteChanges
      .filter((entity) => (this.changeVersions.get(entity.id) ?? Number.POSITIVE_INFINITY) > sinceVersion)
      .map((entity) => ({ ...entity }));
  }

  async getServerVersion(): Promise<number> {
    return this.serverVersion;
  }
}
