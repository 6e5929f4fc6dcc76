/**
 * Session Record Store Interface
 *
 * Keyed storage for login sessions. Every operation is atomic on its own;
 * callers needing read-modify-write sequences serialize them per identifier.
 */

import type { SessionRecord } from '../types.js';

export interface SessionRecordStore {
  /**
   * Store a new record
   *
   * @throws SessionConflictError when the identifier or CSRF token belongs to a live record
   */
  insert(record: SessionRecord): Promise<void>;

  /**
   * Retrieve a live record; expired records are purged and reported as null
   */
  get(identifier: string): Promise<SessionRecord | null>;

  /**
   * Update refresh and expiry timestamps of a live record
   *
   * Never recreates a record that was deleted or has expired.
   *
   * @returns The updated record, or null when no live record exists
   */
  touch(identifier: string, lastRefreshedAt: number, expiresAt: number): Promise<SessionRecord | null>;

  /**
   * Remove a live record
   *
   * @returns True only for the call that actually removed it
   */
  delete(identifier: string): Promise<boolean>;

  /**
   * Number of live records (for monitoring)
   */
  count(): Promise<number>;

  /**
   * Purge expired records
   * @returns Number of records removed
   */
  cleanup(): Promise<number>;

  /**
   * Dispose of resources (cleanup timers, connections, etc.)
   */
  dispose(): Promise<void>;
}
