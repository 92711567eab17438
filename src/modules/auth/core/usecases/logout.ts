/**
 * Logout Use Case
 *
 * Invalidates the session behind a token. Idempotent: no token, or a token the
 * store no longer holds, is still a successful logout.
 */

import { ok, type Result } from 'neverthrow';

import type { SessionStoreError } from '../errors.js';
import type { SessionStore } from '../ports.js';

export interface LogoutDeps {
  sessionStore: SessionStore;
}

export interface LogoutInput {
  token: string | null;
}

export async function logout(
  deps: LogoutDeps,
  input: LogoutInput
): Promise<Result<void, SessionStoreError>> {
  if (input.token === null || input.token === '') {
    return ok(undefined);
  }

  return deps.sessionStore.invalidate(input.token);
}
