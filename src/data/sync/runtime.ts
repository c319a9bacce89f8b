import { appEnv } from '../../core/env';
import type { SyncEngine } from '../../core/sync/syncEngine';
import type { SyncableEntity, SyncEngineState, SyncResult } from '../../core/sync/types';
import { toErrorMessage } from '../../core/sync/utils';

export type SyncTriggerReason = 'MANUAL' | 'TIMER' | 'APP_START';

type SyncPhase = 'idle' | 'syncing' | 'offline' | 'error' | 'paused';

export type SyncRuntimeStatus = {
  phase: SyncPhase;
  lastSyncedAt: number | null;
  lastError: string | null;
  lastResult: SyncResult | null;
  lastTriggerReason: SyncTriggerReason | null;
};

export type SyncRuntimeOptions = {
  intervalMs?: number;
  syncOnStart?: boolean;
};

type SyncRuntimeListener = (status: SyncRuntimeStatus) => void;

function mapPhase(status: SyncEngineState['status']): SyncPhase {
  if (status === 'SYNCING') return 'syncing';
  if (status === 'OFFLINE') return 'offline';
  if (status === 'FAILED') return 'error';
  if (status === 'PAUSED') return 'paused';
  return 'idle';
}

export class SyncRuntime<T extends SyncableEntity> {
  private status: SyncRuntimeStatus = {
    phase: 'idle',
    lastSyncedAt: null,
    lastError: null,
    lastResult: null,
    lastTriggerReason: null
  };

  private readonly listeners = new Set<SyncRuntimeListener>();
  private readonly intervalMs: number;
  private readonly syncOnStart: boolean;

  private intervalId: ReturnType<typeof setInterval> | null = null;
  private unsubscribeEngine: (() => void) | null = null;
  private abortController: AbortController | null = null;
  private inFlight = false;

  constructor(
    private readonly engine: SyncEngine<T>,
    options: SyncRuntimeOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? appEnv.intervalMs;
    this.syncOnStart = options.syncOnStart ?? true;
  }

  subscribe(listener: SyncRuntimeListener) {
    this.listeners.add(listener);
    this.notify(listener);

    return () => {
      this.listeners.delete(listener);
    };
  }

  start() {
    if (this.unsubscribeEngine) {
      return;
    }

    this.abortController = new AbortController();
    this.unsubscribeEngine = this.engine.onStatusChange((engineState) => {
      this.patchFromEngine(engineState);
    });

    this.intervalId = setInterval(() => {
      void this.trigger('TIMER');
    }, this.intervalMs);

    if (this.syncOnStart) {
      void this.trigger('APP_START');
    }
  }

  stop() {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }

    if (this.unsubscribeEngine) {
      this.unsubscribeEngine();
      this.unsubscribeEngine = null;
    }

    this.abortController?.abort();
    this.abortController = null;
  }

  isRunning() {
    return this.unsubscribeEngine !== null;
  }

  async trigger(reason: SyncTriggerReason = 'MANUAL'): Promise<SyncResult | null> {
    if (reason === 'TIMER' && this.inFlight) {
      return null;
    }

    const ownsFlight = !this.inFlight;
    this.inFlight = true;
    this.patchStatus({ lastTriggerReason: reason });

    try {
      const result = await this.engine.sync(this.abortController?.signal);

      if (result.outcome !== 'BUSY') {
        this.patchStatus({ lastResult: result });
      }

      if (appEnv.verboseLogging) {
        console.info('[sync-runtime] cycle done', { reason, outcome: result.outcome });
      }

      return result;
    } finally {
      if (ownsFlight) {
        this.inFlight = false;
      }
    }
  }

  getStatus() {
    return this.status;
  }

  private patchFromEngine(engineState: SyncEngineState) {
    this.patchStatus({
      phase: mapPhase(engineState.status),
      lastSyncedAt: engineState.lastSyncAt ? Date.parse(engineState.lastSyncAt) : null,
      lastError: engineState.lastError ?? null
    });
  }

  private patchStatus(next: Partial<SyncRuntimeStatus>) {
    this.status = { ...this.status, ...next };

    for (const listener of this.listeners) {
      this.notify(listener);
    }
  }

  private notify(listener: SyncRuntimeListener) {
    try {
      listener(this.status);
    } catch (error) {
      if (appEnv.verboseLogging) {
        console.warn('[sync-runtime] listener threw', { error: toErrorMessage(error) });
      }
    }
  }
}
