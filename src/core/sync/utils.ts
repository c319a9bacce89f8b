export class SyncCancelledError extends Error {
  constructor(message = 'Sync was cancelled') {
    super(message);
    this.name = 'SyncCancelledError';
  }
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === 'string' && error.trim().length > 0) {
    return error;
  }

  return 'Unknown sync error';
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new SyncCancelledError();
  }
}

export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  return error instanceof SyncCancelledError || signal?.aborted === true;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const batches: T[][] = [];

  for (let index = 0; index < items.length; index += step) {
    batches.push(items.slice(index, index + step));
  }

  return batches;
}

export function backoffDelay(attempt: number, baseMs: number): number {
  return baseMs * 2 ** Math.max(0, attempt - 1);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SyncCancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(new SyncCancelledError());
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function withTimeout<T>(task: PromiseLike<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new Error(`${label} timeout after ${timeoutMs}ms`));
    }, timeoutMs);

    task.then(
      (value) => {
        clearTimeout(timeoutId);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      }
    );
  });
}

export function parseTimestamp(value: string | undefined): number | null {
  if (typeof value !== 'string') {
    return null;
  }

  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

export function toPercentage(completed: number, total: number): number {
  if (total <= 0) {
    return 0;
  }

  return Math.floor((completed / total) * 100);
}
