/**
 * In-Memory Session Store
 *
 * Implements SessionStore on a Map, for tests and single-process deployments.
 * Every operation runs to completion within one tick, so operations on the
 * same token are linearizable without locking.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createTokenCollisionError,
  type SessionCreateError,
  type SessionStoreError,
} from '../../core/errors.js';
import { systemClock, type Clock, type SessionStore } from '../../core/ports.js';
import { hashToken } from '../crypto/token-hash.js';

import type { CreateSessionInput, Session, SessionLookup } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeInMemorySessionStoreOptions {
  /** Time source for expiry checks. Default: system clock */
  clock?: Clock;
}

export interface InMemorySessionStore extends SessionStore {
  /** Number of records held, expired ones included until looked up. Visible for testing. */
  readonly size: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates an in-memory session store.
 *
 * @example
 * const store = makeInMemorySessionStore();
 *
 * await store.create({ token, identity, createdAt, expiresAt, transport: 'cookie' });
 * const lookup = await store.lookup(token);
 * // lookup.value.status === 'active'
 */
export const makeInMemorySessionStore = (
  options: MakeInMemorySessionStoreOptions = {}
): InMemorySessionStore => {
  const clock = options.clock ?? systemClock;
  const sessions = new Map<string, Session>();

  const isExpired = (session: Session): boolean =>
    clock().getTime() >= session.expiresAt.getTime();

  return {
    create(input: CreateSessionInput): Promise<Result<Session, SessionCreateError>> {
      const key = hashToken(input.token);
      const existing = sessions.get(key);

      if (existing !== undefined && !isExpired(existing)) {
        return Promise.resolve(err(createTokenCollisionError()));
      }

      const session: Session = { ...input };
      sessions.set(key, session);

      return Promise.resolve(ok(session));
    },

    lookup(token: string): Promise<Result<SessionLookup, SessionStoreError>> {
      const key = hashToken(token);
      const session = sessions.get(key);

      if (session === undefined) {
        return Promise.resolve(ok({ status: 'not_found' }));
      }

      if (isExpired(session)) {
        sessions.delete(key);
        return Promise.resolve(ok({ status: 'expired', expiresAt: session.expiresAt }));
      }

      return Promise.resolve(ok({ status: 'active', session }));
    },

    invalidate(token: string): Promise<Result<void, SessionStoreError>> {
      sessions.delete(hashToken(token));
      return Promise.resolve(ok(undefined));
    },

    ping(): Promise<Result<void, SessionStoreError>> {
      return Promise.resolve(ok(undefined));
    },

    get size(): number {
      return sessions.size;
    },
  };
};
