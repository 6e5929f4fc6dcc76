/**
 * @session-service/persistence
 *
 * Session record storage with memory and Redis backends.
 *
 * ```typescript
 * import { SessionStoreFactory, setLogger } from '@session-service/persistence';
 *
 * setLogger(myLogger);
 * const store = SessionStoreFactory.create(); // Redis when REDIS_URL is set
 * ```
 */

export type { SessionRecord } from './types.js';
export { isSessionRecord } from './types.js';
export { SessionConflictError, SessionStorageError } from './errors.js';
export type { SessionRecordStore } from './interfaces/session-record-store.js';

export { MemorySessionRecordStore, type MemorySessionRecordStoreOptions } from './stores/memory/memory-session-record-store.js';
export { RedisSessionRecordStore } from './stores/redis/redis-session-record-store.js';
export { maskRedisUrl, normalizeKeyPrefix, createRedisClient } from './stores/redis/redis-utils.js';

export {
  SessionStoreFactory,
  createSessionStore,
  type SessionStoreType,
  type SessionStoreFactoryOptions,
} from './factories/session-store-factory.js';

export { setLogger, getLogger, type PersistenceLogger } from './logger.js';
