/**
 * Unit tests for the Redis session record store using ioredis-mock
 */

import RedisMock from 'ioredis-mock';
import type { Redis } from 'ioredis';

import { RedisSessionRecordStore, SessionConflictError, SessionStorageError } from '../../src/index.js';
import { createRecord } from '../helpers/session-fixtures.js';

describe('RedisSessionRecordStore', () => {
  let redis: Redis;
  let store: RedisSessionRecordStore;

  beforeEach(async () => {
    redis = new RedisMock();
    await redis.flushall();
    store = new RedisSessionRecordStore(redis, 'cms');
  });

  afterEach(async () => {
    await store.dispose();
    redis.disconnect();
  });

  it('stores the record and its CSRF index under the key prefix', async () => {
    const record = createRecord();
    await store.insert(record);

    expect(await redis.get(`cms:session:${record.identifier}`)).toBe(JSON.stringify(record));
    expect(await redis.get(`cms:session-csrf:${record.csrfToken}`)).toBe(record.identifier);
    expect(await store.get(record.identifier)).toEqual(record);
  });

  it('sets a TTL matching the record expiry', async () => {
    const record = createRecord({}, 60_000);
    await store.insert(record);

    const ttl = await redis.pttl(`cms:session:${record.identifier}`);
    expect(ttl).toBeGreaterThan(0);
    expect(ttl).toBeLessThanOrEqual(60_000);
  });

  it('refuses to store an already expired record', async () => {
    await expect(store.insert(createRecord({}, -1))).rejects.toThrow(RangeError);
  });

  it('rejects a duplicate identifier and releases the claimed token', async () => {
    const record = createRecord();
    await store.insert(record);
    const duplicate = createRecord({ identifier: record.identifier });

    await expect(store.insert(duplicate)).rejects.toBeInstanceOf(SessionConflictError);
    expect(await redis.get(`cms:session-csrf:${duplicate.csrfToken}`)).toBeNull();
    expect(await store.get(record.identifier)).toEqual(record);
  });

  it('rejects a duplicate CSRF token', async () => {
    const record = createRecord();
    await store.insert(record);

    await expect(store.insert(createRecord({ csrfToken: record.csrfToken }))).rejects.toMatchObject({
      field: 'csrfToken',
    });
  });

  it('touches a live record', async () => {
    const record = createRecord();
    await store.insert(record);

    const later = Date.now() + 1_000;
    const touched = await store.touch(record.identifier, later, later + 120_000);

    expect(touched).toEqual({ ...record, lastRefreshedAt: later, expiresAt: later + 120_000 });
    expect(await store.get(record.identifier)).toEqual(touched);
  });

  it('does not resurrect deleted records on touch', async () => {
    const record = createRecord();
    await store.insert(record);
    await store.delete(record.identifier);

    expect(await store.touch(record.identifier, Date.now(), Date.now() + 60_000)).toBeNull();
    expect(await redis.exists(`cms:session:${record.identifier}`)).toBe(0);
  });

  it('deletes the record and its CSRF index exactly once', async () => {
    const record = createRecord();
    await store.insert(record);

    expect(await store.delete(record.identifier)).toBe(true);
    expect(await store.delete(record.identifier)).toBe(false);
    expect(await redis.get(`cms:session-csrf:${record.csrfToken}`)).toBeNull();
  });

  it('treats a record past its expiry as missing', async () => {
    const record = createRecord({ expiresAt: Date.now() - 1 });
    await redis.set(`cms:session:${record.identifier}`, JSON.stringify(record));

    expect(await store.get(record.identifier)).toBeNull();
    expect(await redis.exists(`cms:session:${record.identifier}`)).toBe(0);
  });

  it('discards malformed records', async () => {
    await redis.set('cms:session:broken', '{"identifier":42}');
    await redis.set('cms:session:garbage', 'not json');

    expect(await store.get('broken')).toBeNull();
    expect(await store.get('garbage')).toBeNull();
    expect(await redis.exists('cms:session:broken')).toBe(0);
  });

  it('counts session records without the CSRF index keys', async () => {
    await store.insert(createRecord());
    await store.insert(createRecord());

    expect(await store.count()).toBe(2);
    expect(await store.cleanup()).toBe(0);
  });

  it('wraps backend failures in SessionStorageError', async () => {
    const failing = {
      get: () => Promise.reject(new Error('connection lost')),
      disconnect: () => undefined,
    };
    const brokenStore = new RedisSessionRecordStore(failing as unknown as Redis);

    await expect(brokenStore.get('any')).rejects.toBeInstanceOf(SessionStorageError);
  });

  it('leaves an injected client connected on dispose', async () => {
    const record = createRecord();
    await store.insert(record);

    await store.dispose();

    expect(await redis.get(`cms:session:${record.identifier}`)).toBe(JSON.stringify(record));
  });
});
