/**
 * Login Use Case
 *
 * Verifies a credential submission and creates a session for it.
 * Pure function - all I/O through injected dependencies.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createRequestAbortedError,
  createTokenCollisionError,
  type AuthError,
  type SessionCreateError,
} from '../errors.js';

import type { Clock, CredentialVerifier, SessionStore, TokenGenerator } from '../ports.js';
import type { CredentialSubmission, Session, TransportKind } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Dependencies
// ─────────────────────────────────────────────────────────────────────────────

export interface LoginDeps {
  credentialVerifier: CredentialVerifier;
  sessionStore: SessionStore;
  generateToken: TokenGenerator;
  clock: Clock;
  /** Session lifetime in milliseconds */
  sessionTtlMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Input
// ─────────────────────────────────────────────────────────────────────────────

export interface LoginInput {
  submission: CredentialSubmission;
  /** Transport the new token will be issued on */
  transport: TransportKind;
  /** Aborted when the client goes away */
  signal?: AbortSignal | undefined;
}

/** Attempts at minting a token before a collision is reported */
export const MAX_TOKEN_ATTEMPTS = 3;

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Logs a user in.
 *
 * Returns:
 * - the new Session on success (exactly one session is created)
 * - InvalidCredentialsError / VerifierTimeoutError on verification failure
 *   (no session is created)
 * - CredentialVerifierError / SessionStoreError on collaborator failure
 * - TokenCollisionError if every attempt collided
 * - RequestAbortedError if the client went away before the session was created
 *
 * @example
 * const result = await login(
 *   { credentialVerifier, sessionStore, generateToken: codec.generate, clock, sessionTtlMs },
 *   { submission, transport: 'cookie' }
 * );
 */
export async function login(deps: LoginDeps, input: LoginInput): Promise<Result<Session, AuthError>> {
  const { credentialVerifier, sessionStore, generateToken, clock, sessionTtlMs } = deps;
  const { submission, transport, signal } = input;

  const verification = await credentialVerifier.verify(
    { username: submission.username, password: submission.password },
    { signal }
  );

  if (verification.isErr()) {
    // A verifier cut short by the abort reports a failure of its own.
    if (signal?.aborted === true) {
      return err(createRequestAbortedError());
    }
    return err(verification.error);
  }

  const identity = verification.value;

  let lastError: SessionCreateError = createTokenCollisionError();

  for (let attempt = 0; attempt < MAX_TOKEN_ATTEMPTS; attempt++) {
    if (signal?.aborted === true) {
      return err(createRequestAbortedError());
    }

    const createdAt = clock();
    const created = await sessionStore.create({
      token: generateToken(),
      identity,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + sessionTtlMs),
      transport,
    });

    if (created.isOk()) {
      return ok(created.value);
    }

    lastError = created.error;

    if (created.error.type !== 'TokenCollisionError') {
      break;
    }
  }

  return err(lastError);
}
