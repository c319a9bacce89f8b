import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { InMemorySyncRepository } from '../../core/sync/memoryRepository';
import { SyncEngine } from '../../core/sync/syncEngine';
import { resolveSyncAction, SupabaseSyncTransport, type RpcInvoker, type RpcResponse } from './transport';

const noteSchema = z.object({
  id: z.string(),
  title: z.string(),
  hasPendingChanges: z.boolean(),
  createdAt: z.string().optional(),
  modifiedAt: z.string().optional(),
  isDeleted: z.boolean().optional()
});

type Note = z.infer<typeof noteSchema>;

function ok(data: unknown): RpcResponse {
  return { data, error: null };
}

function createTransport(rpc: RpcInvoker, timeoutMs?: number) {
  return new SupabaseSyncTransport<Note>({ entityType: 'note', schema: noteSchema, rpc, timeoutMs });
}

const draft: Note = {
  id: 'n1',
  title: 'draft',
  hasPendingChanges: true,
  createdAt: '2024-02-01T09:00:00.000Z',
  modifiedAt: '2024-02-02T09:00:00.000Z'
};

describe('resolveSyncAction', () => {
  it('derives the operation from the entity timestamps', () => {
    expect(resolveSyncAction({ id: 'a', hasPendingChanges: true, createdAt: '2024-01-01' })).toBe('CREATE');
    expect(
      resolveSyncAction({ id: 'a', hasPendingChanges: true, createdAt: '2024-01-01', modifiedAt: '2024-01-01' })
    ).toBe('CREATE');
    expect(resolveSyncAction(draft)).toBe('UPDATE');
    expect(resolveSyncAction({ ...draft, isDeleted: true })).toBe('DELETE');
  });
});

describe('SupabaseSyncTransport', () => {
  it('reports online when the ping succeeds', async () => {
    const rpc = vi.fn<RpcInvoker>(async () => ok(true));

    await expect(createTransport(rpc).isOnline()).resolves.toBe(true);
    expect(rpc).toHaveBeenCalledWith('sync_ping', {}, undefined);
  });

  it('reports offline when the ping errors or throws', async () => {
    const failing = vi.fn<RpcInvoker>(async () => ({ data: null, error: { message: 'unavailable' } }));
    const throwing = vi.fn<RpcInvoker>(async () => {
      throw new Error('fetch failed');
    });

    await expect(createTransport(failing).isOnline()).resolves.toBe(false);
    await expect(createTransport(throwing).isOnline()).resolves.toBe(false);
  });

  it('pushes a sync record and accepts duplicates', async () => {
    const rpc = vi.fn<RpcInvoker>(async () => ok({ status: 'DUPLICATE' }));

    await expect(createTransport(rpc).push(draft)).resolves.toBe(true);
    expect(rpc).toHaveBeenCalledWith(
      'sync_push',
      {
        p_entity: 'note',
        p_record: {
          entityId: 'n1',
          operation: 'UPDATE',
          payload: draft,
          syncVersion: 0,
          localTimestamp: '2024-02-02T09:00:00.000Z'
        }
      },
      undefined
    );
  });

  it('returns false for a rejected push', async () => {
    const rpc = vi.fn<RpcInvoker>(async () => ok({ status: 'REJECTED', reason: 'stale' }));

    await expect(createTransport(rpc).push(draft)).resolves.toBe(false);
  });

  it('throws on rpc errors and malformed push responses', async () => {
    const failing = vi.fn<RpcInvoker>(async () => ({ data: null, error: { message: 'permission denied' } }));
    const malformed = vi.fn<RpcInvoker>(async () => ok({ status: 'MAYBE' }));

    await expect(createTransport(failing).push(draft)).rejects.toThrow('permission denied');
    await expect(createTransport(malformed).push(draft)).rejects.toThrow('Invalid sync_push response');
  });

  it('sends batches and reads the applied count', async () => {
    const rpc = vi.fn<RpcInvoker>(async () => ok({ applied: 2 }));
    const transport = createTransport(rpc);

    await expect(transport.pushBatch([draft, { ...draft, id: 'n2' }])).resolves.toBe(2);
    await expect(transport.pushBatch([])).resolves.toBe(0);
    expect(rpc).toHaveBeenCalledTimes(1);
    expect(rpc.mock.calls[0]?.[0]).toBe('sync_push_batch');
  });

  it('pulls changes since a version', async () => {
    const rpc = vi.fn<RpcInvoker>(async () => ok([{ id: 'r1', title: 'remote', hasPendingChanges: false }]));

    const changes = await createTransport(rpc).pull(12);

    expect(changes).toEqual([{ id: 'r1', title: 'remote', hasPendingChanges: false }]);
    expect(rpc).toHaveBeenCalledWith('sync_pull', { p_entity: 'note', p_since_version: 12 }, undefined);
  });

  it('fails the pull when a row does not match the schema', async () => {
    const rpc = vi.fn<RpcInvoker>(async () =>
      ok([{ id: 'r1', title: 'remote', hasPendingChanges: false }, { id: 'r2' }])
    );

    await expect(createTransport(rpc).pull(0)).rejects.toThrow(
      'Invalid sync_pull response: 1 row(s) failed validation'
    );
  });

  it('keeps the engine checkpoint when a pulled row is invalid', async () => {
    const rpc = vi.fn<RpcInvoker>(async (fn, args) => {
      if (fn === 'sync_server_version') return ok(3);
      if (fn === 'sync_pull') {
        return ok(args?.p_since_version === 0 ? [{ id: 'r1', title: 42, hasPendingChanges: false }] : []);
      }
      return ok(true);
    });
    const repository = new InMemorySyncRepository<Note>();
    const engine = new SyncEngine(repository, createTransport(rpc));

    const result = await engine.sync();

    expect(result).toMatchObject({
      success: true,
      errors: 1,
      downloaded: 0,
      errorMessage: 'Pull failed: Invalid sync_pull response: 1 row(s) failed validation'
    });
    expect(engine.getState().lastSyncVersion).toBe(0);
    expect(await repository.getAll()).toEqual([]);
  });

  it('rejects a pull response that is not a list', async () => {
    const rpc = vi.fn<RpcInvoker>(async () => ok({ rows: [] }));

    await expect(createTransport(rpc).pull(0)).rejects.toThrow('Invalid sync_pull response');
  });

  it('reads the server version and stamps it on later records', async () => {
    const rpc = vi.fn<RpcInvoker>(async () => ok('42'));
    const transport = createTransport(rpc);

    await expect(transport.getServerVersion()).resolves.toBe(42);
    expect(transport.toRecord(draft).syncVersion).toBe(42);
  });

  it('rejects a negative server version', async () => {
    const rpc = vi.fn<RpcInvoker>(async () => ok(-1));

    await expect(createTransport(rpc).getServerVersion()).rejects.toThrow('Invalid sync_server_version response');
  });

  it('forwards the abort signal to the rpc', async () => {
    const rpc = vi.fn<RpcInvoker>(async () => ok([]));
    const controller = new AbortController();

    await createTransport(rpc).pull(0, controller.signal);

    expect(rpc.mock.calls[0]?.[2]).toBe(controller.signal);
  });

  it('times out slow calls', async () => {
    vi.useFakeTimers();
    try {
      const rpc = vi.fn<RpcInvoker>(() => new Promise<RpcResponse>(() => undefined));
      const pending = createTransport(rpc, 1000).pull(0);
      const assertion = expect(pending).rejects.toThrow('sync_pull timeout after 1000ms');

      await vi.advanceTimersByTimeAsync(1000);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });
});
