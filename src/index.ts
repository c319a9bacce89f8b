export * from './core/sync/types';
export * from './core/sync/conflictResolver';
export * from './core/sync/syncEngine';
export * from './core/sync/policies';
export * from './core/sync/memoryRepository';
export { SyncCancelledError, toErrorMessage } from './core/sync/utils';
export { appEnv, parseEnv } from './core/env';
export type { AppEnv, SyncEnv } from './core/env';

export * from './data/offline/sqliteRepository';
export * from './data/sync/transport';
export * from './data/sync/runtime';
