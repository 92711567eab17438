/**
 * Authenticate Request Use Case
 *
 * The gate's decision for one protected request: Allowed or Challenge.
 * Pure function - all I/O through injected dependencies.
 */

import { ok, err, type Result } from 'neverthrow';

import type { SessionStoreError } from '../errors.js';
import type { Clock, SessionStore } from '../ports.js';
import type { AuthDecision, ChallengeReason } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Dependencies
// ─────────────────────────────────────────────────────────────────────────────

export interface AuthenticateRequestDeps {
  sessionStore: SessionStore;
  clock: Clock;
}

// ─────────────────────────────────────────────────────────────────────────────
// Input
// ─────────────────────────────────────────────────────────────────────────────

export interface AuthenticateRequestInput {
  /** Token extracted from the request. Null when none was sent. */
  token: string | null;
  /** Originally requested path, used as proceed path on challenge */
  path: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

const challenge = (proceed: string, reason: ChallengeReason): AuthDecision => ({
  kind: 'challenge',
  proceed,
  reason,
});

/**
 * Decides whether a request is authenticated.
 *
 * States:
 * - Unauthenticated: no token, or the store does not hold it
 * - Expired: the store holds it but `now >= expiresAt`
 * - Authenticated: the store holds it and it is still valid
 *
 * Unauthenticated and Expired both produce a challenge. A store failure is
 * returned as an error and never treated as Allowed.
 *
 * @example
 * const result = await authenticateRequest(
 *   { sessionStore, clock: systemClock },
 *   { token: codec.extract(request), path: request.url }
 * );
 *
 * if (result.isOk() && isAllowed(result.value)) {
 *   console.log('User:', result.value.identity.username);
 * }
 */
export async function authenticateRequest(
  deps: AuthenticateRequestDeps,
  input: AuthenticateRequestInput
): Promise<Result<AuthDecision, SessionStoreError>> {
  const { sessionStore, clock } = deps;
  const { token, path } = input;

  if (token === null || token === '') {
    return ok(challenge(path, 'missing_token'));
  }

  const lookupResult = await sessionStore.lookup(token);

  if (lookupResult.isErr()) {
    return err(lookupResult.error);
  }

  const lookup = lookupResult.value;

  switch (lookup.status) {
    case 'not_found':
      return ok(challenge(path, 'unknown_token'));
    case 'expired':
      return ok(challenge(path, 'expired'));
    case 'active': {
      const { session } = lookup;

      // The store answered just before the expiry boundary
      if (clock().getTime() >= session.expiresAt.getTime()) {
        const invalidated = await sessionStore.invalidate(token);
        if (invalidated.isErr()) {
          return err(invalidated.error);
        }
        return ok(challenge(path, 'expired'));
      }

      return ok({ kind: 'allowed', identity: session.identity, session });
    }
  }
}
