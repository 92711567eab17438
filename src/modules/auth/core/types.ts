/**
 * Authentication Module - Domain Types
 *
 * Transport-agnostic types for sessions, identities and gate decisions.
 * These types define WHAT the gate works with, not HOW it is stored or carried.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Branded Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Branded type for user identifiers.
 * The user ID comes from the credential verifier (e.g. the `users.id` column).
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- __brand is the standard pattern for branded types in TypeScript
export type UserId = string & { readonly __brand: unique symbol };

/**
 * Type-safe constructor for UserId.
 */
export const toUserId = (id: string): UserId => id as UserId;

// ─────────────────────────────────────────────────────────────────────────────
// Identity & Session
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Canonical identity record returned by a credential verifier and
 * handed to protected handlers.
 */
export interface UserIdentity {
  readonly userId: UserId;
  readonly username: string;
  readonly isAdmin: boolean;
}

/**
 * How a session token travels between client and server.
 */
export type TransportKind = 'cookie' | 'bearer';

/**
 * Server-side session record.
 * Valid iff `now < expiresAt` and the session store still holds it.
 */
export interface Session {
  /** Opaque, unguessable token identifying the session */
  readonly token: string;
  readonly identity: UserIdentity;
  readonly createdAt: Date;
  readonly expiresAt: Date;
  /** Transport the token was issued on */
  readonly transport: TransportKind;
}

/**
 * Input for creating a session in a store.
 */
export type CreateSessionInput = Session;

/**
 * Answer of a session store lookup.
 * Only `active` carries an identity.
 */
export type SessionLookup =
  | { readonly status: 'active'; readonly session: Session }
  | { readonly status: 'expired'; readonly expiresAt: Date }
  | { readonly status: 'not_found' };

// ─────────────────────────────────────────────────────────────────────────────
// Credential Submission
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Which flow a login POST arrived through.
 * - form: browser submitting the login page (x-www-form-urlencoded)
 * - json: API client (application/json)
 */
export type LoginFlow = 'form' | 'json';

/**
 * Parsed login POST. Ephemeral: lives for one request, never persisted.
 */
export interface CredentialSubmission {
  readonly flow: LoginFlow;
  readonly username: string;
  readonly password: string;
  /** Sanitised relative path to continue to after login */
  readonly proceed: string;
}

/**
 * Username/password pair handed to a credential verifier.
 */
export interface Credentials {
  readonly username: string;
  readonly password: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Gate Decision
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Why a request was challenged. `expired` is kept apart from the
 * unauthenticated reasons for observability only; the response is the same.
 */
export type ChallengeReason = 'missing_token' | 'unknown_token' | 'expired';

export interface AllowedDecision {
  readonly kind: 'allowed';
  readonly identity: UserIdentity;
  readonly session: Session;
}

export interface ChallengeDecision {
  readonly kind: 'challenge';
  /** Originally requested path, threaded through the login flow */
  readonly proceed: string;
  readonly reason: ChallengeReason;
}

/**
 * Result of the authentication gate for one request. Computed fresh per request.
 */
export type AuthDecision = AllowedDecision | ChallengeDecision;

export const isAllowed = (decision: AuthDecision): decision is AllowedDecision => {
  return decision.kind === 'allowed';
};

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Gate configuration, owned by the surrounding application and read-only here.
 */
export interface AuthGateConfig {
  /** Cookie carrying the token. Absent = bearer-only transport. */
  readonly cookieName?: string | undefined;
  /** Whether the cookie is marked Secure */
  readonly cookieSecure: boolean;
  /** Login page template file. Absent = built-in page. */
  readonly loginPagePath?: string | undefined;
  /** Prefix of the pre-installed routes ('' or '/something') */
  readonly routePrefix: string;
  /** Name under which protected handlers receive the identity */
  readonly injectedParamName: string;
  /** Session lifetime in milliseconds */
  readonly sessionTtlMs: number;
  /** Random bytes per token */
  readonly tokenBytes: number;
  /** Upper bound for one credential verification */
  readonly verifierTimeoutMs: number;
}

/**
 * Transport the gate issues tokens on, derived from configuration.
 */
export const transportFor = (config: Pick<AuthGateConfig, 'cookieName'>): TransportKind => {
  return config.cookieName !== undefined && config.cookieName !== '' ? 'cookie' : 'bearer';
};

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Authorization header name (lowercase for HTTP headers) */
export const AUTH_HEADER = 'authorization' as const;

/** Bearer token prefix */
export const BEARER_PREFIX = 'Bearer ' as const;

/** Where a successful login continues when no proceed path was given */
export const DEFAULT_PROCEED = '/' as const;

/** Lower bound on token entropy: 128 bits */
export const MIN_TOKEN_BYTES = 16;

/** Default token entropy: 256 bits */
export const DEFAULT_TOKEN_BYTES = 32;

/** Default session lifetime: 24 hours */
export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

/** Default bound on one credential verification: 5 seconds */
export const DEFAULT_VERIFIER_TIMEOUT_MS = 5_000;

/** Default name of the injected identity parameter */
export const DEFAULT_INJECTED_PARAM = 'user' as const;

/** Placeholder substituted with the proceed path in login page templates */
export const PROCEED_PLACEHOLDER = '{0}' as const;
