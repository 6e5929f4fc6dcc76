/**
 * Redis Session Record Store
 *
 * Shared session storage for multi-instance deployments.
 *
 * Key layout (after the optional deployment prefix):
 * - session:{identifier}      record JSON, PX TTL matching expiresAt
 * - session-csrf:{csrfToken}  identifier owning the token, same TTL
 *
 * Atomicity comes from single commands: SET NX claims keys, SET XX updates
 * only existing records, and DEL reports whether this caller removed the key.
 */

import type { Redis } from 'ioredis';
import type { SessionRecordStore } from '../../interfaces/session-record-store.js';
import { isSessionRecord, type SessionRecord } from '../../types.js';
import { SessionConflictError, SessionStorageError } from '../../errors.js';
import { logger, preview } from '../../logger.js';
import { createRedisClient, maskRedisUrl, normalizeKeyPrefix } from './redis-utils.js';

export class RedisSessionRecordStore implements SessionRecordStore {
  private readonly redis: Redis;
  private readonly ownsClient: boolean;
  private readonly sessionPrefix: string;
  private readonly csrfPrefix: string;

  /**
   * @param connection - Redis URL, or an existing client the caller keeps ownership of
   */
  constructor(connection?: string | Redis, keyPrefix: string = '') {
    if (connection === undefined || typeof connection === 'string') {
      this.redis = createRedisClient(connection, 'sessions');
      this.ownsClient = true;
    } else {
      this.redis = connection;
      this.ownsClient = false;
    }

    const normalized = normalizeKeyPrefix(keyPrefix);
    this.sessionPrefix = `${normalized}session:`;
    this.csrfPrefix = `${normalized}session-csrf:`;

    const url = typeof connection === 'string' ? connection : process.env.REDIS_URL;
    logger.info('RedisSessionRecordStore initialized', {
      url: url ? maskRedisUrl(url) : 'injected client',
      keyPrefix: this.sessionPrefix
    });
  }

  private sessionKey(identifier: string): string {
    return `${this.sessionPrefix}${identifier}`;
  }

  private csrfKey(csrfToken: string): string {
    return `${this.csrfPrefix}${csrfToken}`;
  }

  async insert(record: SessionRecord): Promise<void> {
    const ttl = record.expiresAt - Date.now();
    if (ttl <= 0) {
      throw new RangeError('Cannot store a session that has already expired');
    }

    const csrfKey = this.csrfKey(record.csrfToken);
    const claimed = await this.run('insert', () =>
      this.redis.set(csrfKey, record.identifier, 'PX', ttl, 'NX')
    );
    if (claimed !== 'OK') {
      throw new SessionConflictError('csrfToken');
    }

    const stored = await this.run('insert', () =>
      this.redis.set(this.sessionKey(record.identifier), JSON.stringify(record), 'PX', ttl, 'NX')
    );
    if (stored !== 'OK') {
      await this.run('insert', () => this.redis.del(csrfKey));
      throw new SessionConflictError('identifier');
    }

    logger.debug('Session stored', {
      identifier: preview(record.identifier),
      expiresIn: ttl
    });
  }

  async get(identifier: string): Promise<SessionRecord | null> {
    const data = await this.run('get', () => this.redis.get(this.sessionKey(identifier)));
    if (data === null) {
      return null;
    }

    let parsed: unknown = null;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      logger.debug('Session record is not valid JSON', { identifier: preview(identifier), error });
    }
    if (!isSessionRecord(parsed)) {
      logger.warn('Discarding malformed session record', { identifier: preview(identifier) });
      await this.run('get', () => this.redis.del(this.sessionKey(identifier)));
      return null;
    }

    // TTL should have removed it already; clocks between nodes may differ
    if (parsed.expiresAt <= Date.now()) {
      await this.removeRecord(parsed);
      return null;
    }

    return parsed;
  }

  async touch(identifier: string, lastRefreshedAt: number, expiresAt: number): Promise<SessionRecord | null> {
    const current = await this.get(identifier);
    if (!current) {
      return null;
    }

    const ttl = expiresAt - Date.now();
    if (ttl <= 0) {
      await this.removeRecord(current);
      return null;
    }

    const updated: SessionRecord = { ...current, lastRefreshedAt, expiresAt };
    // XX: a concurrent delete between get and set leaves the record deleted
    const result = await this.run('touch', () =>
      this.redis.set(this.sessionKey(identifier), JSON.stringify(updated), 'PX', ttl, 'XX')
    );
    if (result !== 'OK') {
      return null;
    }

    await this.run('touch', () => this.redis.pexpire(this.csrfKey(current.csrfToken), ttl));
    return updated;
  }

  async delete(identifier: string): Promise<boolean> {
    const current = await this.get(identifier);
    if (!current) {
      return false;
    }

    const removed = await this.removeRecord(current);
    if (removed) {
      logger.debug('Session deleted', { identifier: preview(identifier) });
    }
    return removed;
  }

  async count(): Promise<number> {
    const keys = await this.run('count', () => this.redis.keys(`${this.sessionPrefix}*`));
    return keys.length;
  }

  async cleanup(): Promise<number> {
    // Redis TTL expires records without a sweep
    logger.debug('Session cleanup skipped (TTL-based)');
    return 0;
  }

  async dispose(): Promise<void> {
    if (this.ownsClient) {
      this.redis.disconnect();
    }
    logger.info('RedisSessionRecordStore disposed');
  }

  /**
   * @returns True when this call deleted the record key
   */
  private async removeRecord(record: SessionRecord): Promise<boolean> {
    const removed = await this.run('delete', () => this.redis.del(this.sessionKey(record.identifier)));
    if (removed === 1) {
      await this.run('delete', () => this.redis.del(this.csrfKey(record.csrfToken)));
    }
    return removed === 1;
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      logger.error('Redis session command failed', { operation, error });
      throw new SessionStorageError(operation, { cause: error });
    }
  }
}
