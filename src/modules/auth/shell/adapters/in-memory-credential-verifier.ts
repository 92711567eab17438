/**
 * In-Memory Credential Verifier
 *
 * Implements CredentialVerifier over a fixed list of users.
 * For tests and local development.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

import { ok, err, type Result } from 'neverthrow';

import { createInvalidCredentialsError, type VerificationError } from '../../core/errors.js';
import { toUserId, type Credentials, type UserIdentity } from '../../core/types.js';

import type { CredentialVerifier } from '../../core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface InMemoryUser {
  userId: string;
  username: string;
  password: string;
  isAdmin?: boolean;
}

export interface MakeInMemoryCredentialVerifierOptions {
  users: readonly InMemoryUser[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const digest = (value: string): Buffer => createHash('sha256').update(value).digest();

// Fixed-length digests keep the comparison constant-time regardless of input length
const safeEquals = (a: string, b: string): boolean => timingSafeEqual(digest(a), digest(b));

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates an in-memory credential verifier.
 *
 * @example
 * const verifier = makeInMemoryCredentialVerifier({
 *   users: [{ userId: 'user-1', username: 'alice', password: 'test-password' }],
 * });
 *
 * const result = await verifier.verify({ username: 'alice', password: 'test-password' });
 * // result.value.userId === 'user-1'
 */
export const makeInMemoryCredentialVerifier = (
  options: MakeInMemoryCredentialVerifierOptions
): CredentialVerifier => {
  const byUsername = new Map<string, InMemoryUser>();
  for (const user of options.users) {
    byUsername.set(user.username, user);
  }

  return {
    verify(credentials: Credentials): Promise<Result<UserIdentity, VerificationError>> {
      const user = byUsername.get(credentials.username);

      // Compare against something even for unknown users
      const expected = user?.password ?? '';
      const matches = safeEquals(credentials.password, expected);

      if (user === undefined || !matches) {
        return Promise.resolve(err(createInvalidCredentialsError()));
      }

      return Promise.resolve(
        ok({
          userId: toUserId(user.userId),
          username: user.username,
          isAdmin: user.isAdmin ?? false,
        })
      );
    },
  };
};
