/**
 * Redis Session Store
 *
 * Keeps session records in Redis so sessions survive restarts and are shared
 * between instances. Records are keyed by the token hash and expire through
 * Redis PX, so a session past its deadline usually reads as `not_found`.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ok, err, type Result } from 'neverthrow';

import {
  createSessionStoreError,
  createTokenCollisionError,
  type SessionCreateError,
  type SessionStoreError,
} from '../../core/errors.js';
import { systemClock, type Clock, type SessionStore } from '../../core/ports.js';
import { toUserId } from '../../core/types.js';
import { hashToken } from '../crypto/token-hash.js';

import type { CreateSessionInput, Session, SessionLookup } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Subset of the Redis client the store needs.
 * Compatible with ioredis.
 */
export interface SessionRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ...args: unknown[]): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  ping(): Promise<unknown>;
}

export interface RedisSessionStoreOptions {
  /** Redis client instance */
  redis: SessionRedisClient;
  /** Key prefix. Default: 'session:' */
  keyPrefix?: string;
  /** Time source for expiry checks. Default: system clock */
  clock?: Clock;
}

// ─────────────────────────────────────────────────────────────────────────────
// Stored Record
// ─────────────────────────────────────────────────────────────────────────────

const StoredSessionSchema = Type.Object({
  identity: Type.Object({
    userId: Type.String({ minLength: 1 }),
    username: Type.String(),
    isAdmin: Type.Boolean(),
  }),
  createdAt: Type.String(),
  expiresAt: Type.String(),
  transport: Type.Union([Type.Literal('cookie'), Type.Literal('bearer')]),
});

type StoredSession = Static<typeof StoredSessionSchema>;

const toStoredSession = (session: Session): StoredSession => ({
  identity: {
    userId: session.identity.userId,
    username: session.identity.username,
    isAdmin: session.identity.isAdmin,
  },
  createdAt: session.createdAt.toISOString(),
  expiresAt: session.expiresAt.toISOString(),
  transport: session.transport,
});

const fromStoredSession = (token: string, stored: StoredSession): Session => ({
  token,
  identity: {
    userId: toUserId(stored.identity.userId),
    username: stored.identity.username,
    isAdmin: stored.identity.isAdmin,
  },
  createdAt: new Date(stored.createdAt),
  expiresAt: new Date(stored.expiresAt),
  transport: stored.transport,
});

const parseStoredSession = (raw: string): StoredSession | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (!Value.Check(StoredSessionSchema, parsed)) {
    return null;
  }

  if (Number.isNaN(Date.parse(parsed.createdAt)) || Number.isNaN(Date.parse(parsed.expiresAt))) {
    return null;
  }

  return parsed;
};

// ─────────────────────────────────────────────────────────────────────────────
// Store Implementation
// ─────────────────────────────────────────────────────────────────────────────

class RedisSessionStore implements SessionStore {
  private readonly redis: SessionRedisClient;
  private readonly keyPrefix: string;
  private readonly clock: Clock;

  constructor(options: RedisSessionStoreOptions) {
    this.redis = options.redis;
    this.keyPrefix = options.keyPrefix ?? 'session:';
    this.clock = options.clock ?? systemClock;
  }

  private keyFor(token: string): string {
    return this.keyPrefix + hashToken(token);
  }

  async create(input: CreateSessionInput): Promise<Result<Session, SessionCreateError>> {
    const ttlMs = input.expiresAt.getTime() - this.clock().getTime();
    if (ttlMs <= 0) {
      return err(createSessionStoreError('Refusing to store a session that is already expired'));
    }

    try {
      // NX: a live record under the same key is a collision
      const reply = await this.redis.set(
        this.keyFor(input.token),
        JSON.stringify(toStoredSession(input)),
        'PX',
        ttlMs,
        'NX'
      );

      if (reply === null) {
        return err(createTokenCollisionError());
      }

      return ok({ ...input });
    } catch (error) {
      return err(createSessionStoreError('Failed to store session', error));
    }
  }

  async lookup(token: string): Promise<Result<SessionLookup, SessionStoreError>> {
    const key = this.keyFor(token);

    let raw: string | null;
    try {
      raw = await this.redis.get(key);
    } catch (error) {
      return err(createSessionStoreError('Failed to read session', error));
    }

    if (raw === null) {
      return ok({ status: 'not_found' });
    }

    const stored = parseStoredSession(raw);
    if (stored === null) {
      return err(createSessionStoreError('Stored session record is corrupt'));
    }

    const session = fromStoredSession(token, stored);

    // Redis expiry and the local clock can disagree by a few milliseconds
    if (this.clock().getTime() >= session.expiresAt.getTime()) {
      try {
        await this.redis.del(key);
      } catch (error) {
        return err(createSessionStoreError('Failed to remove expired session', error));
      }
      return ok({ status: 'expired', expiresAt: session.expiresAt });
    }

    return ok({ status: 'active', session });
  }

  async invalidate(token: string): Promise<Result<void, SessionStoreError>> {
    try {
      await this.redis.del(this.keyFor(token));
      return ok(undefined);
    } catch (error) {
      return err(createSessionStoreError('Failed to invalidate session', error));
    }
  }

  async ping(): Promise<Result<void, SessionStoreError>> {
    try {
      await this.redis.ping();
      return ok(undefined);
    } catch (error) {
      return err(createSessionStoreError('Session store is unreachable', error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a Redis-backed session store.
 *
 * @example
 * const store = makeRedisSessionStore({ redis: new Redis(config.redis.url) });
 */
export const makeRedisSessionStore = (options: RedisSessionStoreOptions): SessionStore => {
  return new RedisSessionStore(options);
};
