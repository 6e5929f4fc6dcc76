/**
 * In-Memory Session Record Store
 *
 * Map-based storage for single-node deployments, development and tests.
 *
 * WARNING: All sessions are lost on server restart!
 * WARNING: Does NOT work across multiple server instances!
 */

import type { SessionRecordStore } from '../../interfaces/session-record-store.js';
import type { SessionRecord } from '../../types.js';
import { SessionConflictError } from '../../errors.js';
import { logger, preview } from '../../logger.js';

export interface MemorySessionRecordStoreOptions {
  /** Interval between expired-record sweeps (default: 1 hour) */
  cleanupIntervalMs?: number;
}

export class MemorySessionRecordStore implements SessionRecordStore {
  private readonly records = new Map<string, SessionRecord>();
  private readonly csrfIndex = new Map<string, string>();
  private cleanupInterval?: NodeJS.Timeout;

  constructor(options: MemorySessionRecordStoreOptions = {}) {
    this.cleanupInterval = setInterval(() => {
      this.cleanup().catch((error: unknown) => {
        logger.error('Session cleanup error', { error });
      });
    }, options.cleanupIntervalMs ?? 60 * 60 * 1000);

    // Let the process exit while the sweep is pending
    this.cleanupInterval.unref();

    logger.info('MemorySessionRecordStore initialized');
  }

  async insert(record: SessionRecord): Promise<void> {
    this.purgeIfExpired(record.identifier);
    const csrfOwner = this.csrfIndex.get(record.csrfToken);
    if (csrfOwner !== undefined) {
      this.purgeIfExpired(csrfOwner);
    }

    if (this.records.has(record.identifier)) {
      throw new SessionConflictError('identifier');
    }
    if (this.csrfIndex.has(record.csrfToken)) {
      throw new SessionConflictError('csrfToken');
    }

    this.records.set(record.identifier, { ...record });
    this.csrfIndex.set(record.csrfToken, record.identifier);

    logger.debug('Session stored', {
      identifier: preview(record.identifier),
      expiresAt: new Date(record.expiresAt).toISOString()
    });
  }

  async get(identifier: string): Promise<SessionRecord | null> {
    const record = this.liveRecord(identifier);
    return record ? { ...record } : null;
  }

  async touch(identifier: string, lastRefreshedAt: number, expiresAt: number): Promise<SessionRecord | null> {
    const record = this.liveRecord(identifier);
    if (!record) {
      return null;
    }

    const updated: SessionRecord = { ...record, lastRefreshedAt, expiresAt };
    this.records.set(identifier, updated);
    return { ...updated };
  }

  async delete(identifier: string): Promise<boolean> {
    const record = this.liveRecord(identifier);
    if (!record) {
      return false;
    }

    this.remove(record);
    logger.debug('Session deleted', { identifier: preview(identifier) });
    return true;
  }

  async count(): Promise<number> {
    const now = Date.now();
    let live = 0;
    for (const record of this.records.values()) {
      if (record.expiresAt > now) {
        live++;
      }
    }
    return live;
  }

  async cleanup(): Promise<number> {
    const now = Date.now();
    const expired: SessionRecord[] = [];

    for (const record of this.records.values()) {
      if (record.expiresAt <= now) {
        expired.push(record);
      }
    }

    for (const record of expired) {
      this.remove(record);
    }

    if (expired.length > 0) {
      logger.info('Expired sessions cleanup completed', {
        cleanedCount: expired.length,
        remainingCount: this.records.size
      });
    }

    return expired.length;
  }

  /**
   * Clear all records (testing only)
   */
  clear(): void {
    this.records.clear();
    this.csrfIndex.clear();
  }

  async dispose(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.clear();
    logger.info('MemorySessionRecordStore disposed');
  }

  private liveRecord(identifier: string): SessionRecord | undefined {
    this.purgeIfExpired(identifier);
    return this.records.get(identifier);
  }

  private purgeIfExpired(identifier: string): void {
    const record = this.records.get(identifier);
    if (record && record.expiresAt <= Date.now()) {
      this.remove(record);
      logger.debug('Session expired', {
        identifier: preview(identifier),
        expiredAt: new Date(record.expiresAt).toISOString()
      });
    }
  }

  private remove(record: SessionRecord): void {
    this.records.delete(record.identifier);
    if (this.csrfIndex.get(record.csrfToken) === record.identifier) {
      this.csrfIndex.delete(record.csrfToken);
    }
  }
}
