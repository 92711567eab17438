/**
 * Authentication Module - Port Interfaces
 *
 * Defines the abstract contracts that shell layer must implement.
 * Core depends ONLY on these interfaces, never on concrete implementations.
 */

import type {
  SessionCreateError,
  SessionStoreError,
  VerificationError,
} from './errors.js';
import type {
  CreateSessionInput,
  Credentials,
  Session,
  SessionLookup,
  UserIdentity,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Credential Verifier Port
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for a single verification call.
 */
export interface VerifyOptions {
  /** Aborted when the enclosing request is cancelled or the call times out */
  signal?: AbortSignal | undefined;
}

/**
 * Checks a username/password pair against a user directory.
 *
 * @example
 * // PostgreSQL user directory
 * const verifier: CredentialVerifier = makeUserDirectoryVerifier({ db, logger });
 *
 * // Fixed users for tests
 * const verifier: CredentialVerifier = makeInMemoryCredentialVerifier({ users });
 */
export interface CredentialVerifier {
  /**
   * Verify credentials and resolve the canonical identity.
   *
   * MUST:
   * - Return InvalidCredentialsError for both unknown users and wrong passwords
   * - Honour `options.signal` where the underlying I/O allows it
   *
   * MUST NOT:
   * - Throw exceptions (return Result.err instead)
   * - Reveal whether the username exists
   */
  verify(
    credentials: Credentials,
    options?: VerifyOptions
  ): Promise<Result<UserIdentity, VerificationError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Session Store Port
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Durable mapping from session token to session record.
 *
 * Concurrency: create/lookup/invalidate on the same token must be linearizable.
 * A lookup sees either a complete record or none, never a partial write.
 */
export interface SessionStore {
  /**
   * Store a new session.
   * Returns TokenCollisionError if a live session already holds the token.
   */
  create(input: CreateSessionInput): Promise<Result<Session, SessionCreateError>>;

  /**
   * Resolve a token.
   * Expired records are removed lazily and reported as `expired`; afterwards `not_found`.
   */
  lookup(token: string): Promise<Result<SessionLookup, SessionStoreError>>;

  /**
   * Remove a session. Idempotent.
   */
  invalidate(token: string): Promise<Result<void, SessionStoreError>>;

  /**
   * Check that the backing storage is reachable.
   */
  ping(): Promise<Result<void, SessionStoreError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Small Ports
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Source of the current time. Injected so expiry can be tested.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Produces fresh, unguessable session tokens.
 */
export type TokenGenerator = () => string;

// ─────────────────────────────────────────────────────────────────────────────
// Session Extractor Port
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Extracts a session token from a transport-specific request.
 *
 * @template T - Transport-specific request type
 */
export interface SessionExtractor<T> {
  /**
   * Extract the session token from a request.
   *
   * MUST:
   * - Return null for a missing or malformed token (not an error)
   * - Prefer a well-formed bearer header over a cookie
   *
   * MUST NOT:
   * - Validate the token (that's the session store's job)
   * - Mutate the request
   */
  extractToken(request: T): string | null;
}
