/**
 * Tests for the Redis session store, against an in-process Redis stand-in.
 */

import { createHash } from 'node:crypto';

import { describe, expect, it } from 'vitest';

import { makeRedisSessionStore } from '@/modules/auth/index.js';

import { makeSession } from '../../fixtures/builders.js';
import { makeFakeClock, makeFakeRedis } from '../../fixtures/fakes.js';

// ─────────────────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────────────────

const ONE_HOUR_MS = 60 * 60 * 1000;

const keyOf = (token: string, prefix = 'session:'): string =>
  prefix + createHash('sha256').update(token).digest('hex');

const setup = () => {
  const clock = makeFakeClock();
  const redis = makeFakeRedis(clock.now);
  const store = makeRedisSessionStore({ redis: redis.client, clock: clock.now });
  return { clock, redis, store };
};

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe('makeRedisSessionStore', () => {
  describe('create', () => {
    it('stores the record under the token hash with the remaining TTL', async () => {
      const { redis, store } = setup();

      const created = await store.create(makeSession());

      expect(created.isOk()).toBe(true);
      const entry = redis.entries.get(keyOf('test-token-1'));
      expect(entry?.expiresAt).toBe(new Date('2026-01-01T01:00:00.000Z').getTime());
      expect(JSON.parse(entry?.value ?? 'null')).toEqual({
        identity: { userId: 'user-1', username: 'alice', isAdmin: false },
        createdAt: '2026-01-01T00:00:00.000Z',
        expiresAt: '2026-01-01T01:00:00.000Z',
        transport: 'cookie',
      });
    });

    it('never stores the raw token', async () => {
      const { redis, store } = setup();

      await store.create(makeSession());

      expect([...redis.entries.keys()]).toEqual([keyOf('test-token-1')]);
      expect(redis.entries.get(keyOf('test-token-1'))?.value).not.toContain('test-token-1');
    });

    it('honours a custom key prefix', async () => {
      const clock = makeFakeClock();
      const redis = makeFakeRedis(clock.now);
      const store = makeRedisSessionStore({
        redis: redis.client,
        keyPrefix: 'gate:sess:',
        clock: clock.now,
      });

      await store.create(makeSession());

      expect([...redis.entries.keys()]).toEqual([keyOf('test-token-1', 'gate:sess:')]);
    });

    it('reports a collision when the key is taken', async () => {
      const { store } = setup();
      await store.create(makeSession());

      const second = await store.create(makeSession());

      expect(second._unsafeUnwrapErr().type).toBe('TokenCollisionError');
    });

    it('refuses a session that is already expired', async () => {
      const { clock, redis, store } = setup();
      clock.advance(ONE_HOUR_MS);

      const created = await store.create(makeSession());

      expect(created._unsafeUnwrapErr()).toMatchObject({
        type: 'SessionStoreError',
        message: 'Refusing to store a session that is already expired',
      });
      expect(redis.entries.size).toBe(0);
    });

    it('wraps client failures', async () => {
      const { redis, store } = setup();
      redis.failWith(new Error('connection reset'));

      const created = await store.create(makeSession());

      expect(created._unsafeUnwrapErr()).toMatchObject({
        type: 'SessionStoreError',
        message: 'Failed to store session',
        retryable: true,
      });
    });
  });

  describe('lookup', () => {
    it('round-trips the session with dates and branded id', async () => {
      const { store } = setup();
      const session = makeSession({ transport: 'bearer' });
      await store.create(session);

      const lookup = await store.lookup('test-token-1');

      expect(lookup._unsafeUnwrap()).toEqual({ status: 'active', session });
    });

    it('returns not_found for an unknown token', async () => {
      const { store } = setup();

      expect((await store.lookup('unknown-token'))._unsafeUnwrap()).toEqual({
        status: 'not_found',
      });
    });

    it('returns not_found once Redis has expired the key', async () => {
      const { clock, store } = setup();
      await store.create(makeSession());
      clock.advance(ONE_HOUR_MS);

      expect((await store.lookup('test-token-1'))._unsafeUnwrap()).toEqual({
        status: 'not_found',
      });
    });

    it('reports expired and deletes a record past its deadline that Redis still holds', async () => {
      const { clock, redis, store } = setup();
      await store.create(makeSession());
      // Redis keeps the key a little longer than the record's own deadline
      const key = keyOf('test-token-1');
      const entry = redis.entries.get(key);
      if (entry !== undefined) {
        redis.entries.set(key, { ...entry, expiresAt: null });
      }
      clock.advance(ONE_HOUR_MS);

      const lookup = await store.lookup('test-token-1');

      expect(lookup._unsafeUnwrap()).toEqual({
        status: 'expired',
        expiresAt: new Date('2026-01-01T01:00:00.000Z'),
      });
      expect(redis.entries.has(key)).toBe(false);
    });

    it('rejects a corrupt record', async () => {
      const { redis, store } = setup();
      redis.entries.set(keyOf('test-token-1'), { value: '{"identity":{}}', expiresAt: null });

      const lookup = await store.lookup('test-token-1');

      expect(lookup._unsafeUnwrapErr()).toMatchObject({
        type: 'SessionStoreError',
        message: 'Stored session record is corrupt',
      });
    });

    it('rejects a record that is not JSON', async () => {
      const { redis, store } = setup();
      redis.entries.set(keyOf('test-token-1'), { value: 'not-json', expiresAt: null });

      const lookup = await store.lookup('test-token-1');

      expect(lookup._unsafeUnwrapErr().message).toBe('Stored session record is corrupt');
    });

    it('rejects a record with an unparseable date', async () => {
      const { redis, store } = setup();
      redis.entries.set(keyOf('test-token-1'), {
        value: JSON.stringify({
          identity: { userId: 'user-1', username: 'alice', isAdmin: false },
          createdAt: 'yesterday',
          expiresAt: '2026-01-01T01:00:00.000Z',
          transport: 'cookie',
        }),
        expiresAt: null,
      });

      const lookup = await store.lookup('test-token-1');

      expect(lookup._unsafeUnwrapErr().message).toBe('Stored session record is corrupt');
    });

    it('wraps client failures', async () => {
      const { redis, store } = setup();
      redis.failWith(new Error('connection reset'));

      const lookup = await store.lookup('test-token-1');

      expect(lookup._unsafeUnwrapErr()).toMatchObject({
        type: 'SessionStoreError',
        message: 'Failed to read session',
      });
    });
  });

  describe('invalidate', () => {
    it('deletes the record and is idempotent', async () => {
      const { redis, store } = setup();
      await store.create(makeSession());

      expect((await store.invalidate('test-token-1')).isOk()).toBe(true);
      expect((await store.invalidate('test-token-1')).isOk()).toBe(true);
      expect(redis.entries.size).toBe(0);
    });

    it('wraps client failures', async () => {
      const { redis, store } = setup();
      redis.failWith(new Error('connection reset'));

      const result = await store.invalidate('test-token-1');

      expect(result._unsafeUnwrapErr().message).toBe('Failed to invalidate session');
    });
  });

  describe('ping', () => {
    it('succeeds when Redis answers', async () => {
      const { store } = setup();

      expect((await store.ping()).isOk()).toBe(true);
    });

    it('reports an unreachable store', async () => {
      const { redis, store } = setup();
      redis.failWith(new Error('connection refused'));

      expect((await store.ping())._unsafeUnwrapErr().message).toBe(
        'Session store is unreachable'
      );
    });
  });
});
