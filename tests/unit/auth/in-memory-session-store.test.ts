/**
 * Tests for the in-memory session store.
 */

import { describe, expect, it } from 'vitest';

import { makeInMemorySessionStore } from '@/modules/auth/index.js';

import { makeSession } from '../../fixtures/builders.js';
import { makeFakeClock } from '../../fixtures/fakes.js';

const ONE_HOUR_MS = 60 * 60 * 1000;

describe('makeInMemorySessionStore', () => {
  describe('create', () => {
    it('stores a session that lookup returns as active', async () => {
      const clock = makeFakeClock();
      const store = makeInMemorySessionStore({ clock: clock.now });
      const session = makeSession();

      const created = await store.create(session);
      const lookup = await store.lookup('test-token-1');

      expect(created._unsafeUnwrap()).toEqual(session);
      expect(lookup._unsafeUnwrap()).toEqual({ status: 'active', session });
      expect(store.size).toBe(1);
    });

    it('reports a collision for a live session under the same token', async () => {
      const store = makeInMemorySessionStore({ clock: makeFakeClock().now });
      await store.create(makeSession());

      const second = await store.create(makeSession({ transport: 'bearer' }));

      expect(second._unsafeUnwrapErr()).toEqual({
        type: 'TokenCollisionError',
        message: 'A session already exists for the generated token',
      });
    });

    it('replaces an expired session under the same token', async () => {
      const clock = makeFakeClock();
      const store = makeInMemorySessionStore({ clock: clock.now });
      await store.create(makeSession());
      clock.advance(ONE_HOUR_MS);

      const replacement = makeSession({
        createdAt: clock.now(),
        expiresAt: new Date(clock.now().getTime() + ONE_HOUR_MS),
      });
      const created = await store.create(replacement);

      expect(created.isOk()).toBe(true);
      expect((await store.lookup('test-token-1'))._unsafeUnwrap()).toEqual({
        status: 'active',
        session: replacement,
      });
    });
  });

  describe('lookup', () => {
    it('returns not_found for an unknown token', async () => {
      const store = makeInMemorySessionStore();

      expect((await store.lookup('unknown-token'))._unsafeUnwrap()).toEqual({
        status: 'not_found',
      });
    });

    it('reports expiry once, then forgets the session', async () => {
      const clock = makeFakeClock();
      const store = makeInMemorySessionStore({ clock: clock.now });
      const session = makeSession();
      await store.create(session);
      clock.advance(ONE_HOUR_MS);

      const first = await store.lookup('test-token-1');
      const second = await store.lookup('test-token-1');

      expect(first._unsafeUnwrap()).toEqual({ status: 'expired', expiresAt: session.expiresAt });
      expect(second._unsafeUnwrap()).toEqual({ status: 'not_found' });
      expect(store.size).toBe(0);
    });
  });

  describe('invalidate', () => {
    it('removes the session and is idempotent', async () => {
      const store = makeInMemorySessionStore({ clock: makeFakeClock().now });
      await store.create(makeSession());

      expect((await store.invalidate('test-token-1')).isOk()).toBe(true);
      expect((await store.invalidate('test-token-1')).isOk()).toBe(true);
      expect((await store.lookup('test-token-1'))._unsafeUnwrap()).toEqual({
        status: 'not_found',
      });
    });

    it('leaves other sessions alone', async () => {
      const store = makeInMemorySessionStore({ clock: makeFakeClock().now });
      await store.create(makeSession({ token: 'test-token-1' }));
      await store.create(makeSession({ token: 'test-token-2' }));

      await store.invalidate('test-token-1');

      expect((await store.lookup('test-token-2'))._unsafeUnwrap().status).toBe('active');
      expect(store.size).toBe(1);
    });
  });

  it('answers ping', async () => {
    expect((await makeInMemorySessionStore().ping()).isOk()).toBe(true);
  });
});
