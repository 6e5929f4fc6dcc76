/**
 * Session Record Store Factory
 *
 * Auto-detects the store implementation from the environment:
 * - REDIS_URL set: RedisSessionRecordStore (multi-instance)
 * - otherwise: MemorySessionRecordStore (single instance, ephemeral)
 */

import type { SessionRecordStore } from '../interfaces/session-record-store.js';
import { MemorySessionRecordStore } from '../stores/memory/memory-session-record-store.js';
import { RedisSessionRecordStore } from '../stores/redis/redis-session-record-store.js';
import { logger } from '../logger.js';

export type SessionStoreType = 'memory' | 'redis' | 'auto';

export interface SessionStoreFactoryOptions {
  /**
   * Store type to create
   * - 'auto': Redis when a URL is available, memory otherwise (default)
   * - 'memory': In-memory store (not shared across instances)
   * - 'redis': Redis store (multi-instance deployments)
   */
  type?: SessionStoreType;
  /** Redis connection URL (default: REDIS_URL) */
  redisUrl?: string;
  /** Key prefix for deployments sharing one Redis instance */
  keyPrefix?: string;
}

export class SessionStoreFactory {
  /**
   * Create a session record store based on configuration
   */
  static create(options: SessionStoreFactoryOptions = {}): SessionRecordStore {
    const storeType = options.type ?? 'auto';
    const redisUrl = options.redisUrl ?? process.env.REDIS_URL;

    switch (storeType) {
      case 'auto':
        if (redisUrl) {
          logger.info('Creating Redis session store', { detected: true });
          return new RedisSessionRecordStore(redisUrl, options.keyPrefix);
        }
        logger.info('Creating in-memory session store', { detected: true });
        logger.warn('Memory session store does not persist across server instances', {
          recommendation: 'Configure REDIS_URL for multi-instance deployments'
        });
        return new MemorySessionRecordStore();

      case 'memory':
        return new MemorySessionRecordStore();

      case 'redis':
        if (!redisUrl) {
          throw new Error('Redis URL not configured. Set REDIS_URL environment variable.');
        }
        return new RedisSessionRecordStore(redisUrl, options.keyPrefix);

      default:
        throw new Error(`Unknown session store type: ${String(storeType)}`);
    }
  }

  /**
   * Validate environment for session store creation
   */
  static validateEnvironment(type: SessionStoreType = 'auto', redisUrl: string | undefined = process.env.REDIS_URL): {
    valid: boolean;
    storeType: Exclude<SessionStoreType, 'auto'>;
    warnings: string[];
  } {
    const storeType: Exclude<SessionStoreType, 'auto'> =
      type === 'auto' ? (redisUrl ? 'redis' : 'memory') : type;

    if (storeType === 'redis' && !redisUrl) {
      return {
        valid: false,
        storeType,
        warnings: ['REDIS_URL environment variable not configured'],
      };
    }

    const warnings = storeType === 'memory'
      ? ['Memory store not suitable for multi-instance deployments']
      : [];

    return { valid: true, storeType, warnings };
  }
}

/**
 * Convenience function to create a session store with auto-detection
 */
export function createSessionStore(options?: SessionStoreFactoryOptions): SessionRecordStore {
  return SessionStoreFactory.create(options);
}
