/**
 * Tests for the user directory verifier, on Kysely over an in-process driver.
 */

import { beforeAll, describe, expect, it } from 'vitest';

import { hashPassword, makeUserDirectoryVerifier, toUserId } from '@/modules/auth/index.js';

import { makeTestLogger } from '../../fixtures/builders.js';
import { makeFakeUserDb, type FakeUserRow } from '../../fixtures/fakes.js';

// ─────────────────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────────────────

let users: FakeUserRow[] = [];

beforeAll(async () => {
  users = [
    {
      id: 'user-1',
      username: 'alice',
      password_hash: await hashPassword('test-password'),
      is_admin: false,
      is_active: true,
    },
    {
      id: 'user-2',
      username: 'root',
      password_hash: await hashPassword('test-admin-password'),
      is_admin: true,
      is_active: true,
    },
    {
      id: 'user-3',
      username: 'bob',
      password_hash: await hashPassword('test-password'),
      is_admin: false,
      is_active: false,
    },
  ];
});

const makeVerifier = (options: { failWithError?: Error } = {}) => {
  const fake = makeFakeUserDb({ users, ...options });
  const verifier = makeUserDirectoryVerifier({ db: fake.db, logger: makeTestLogger() });
  return { verifier, queries: fake.queries };
};

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe('makeUserDirectoryVerifier', () => {
  it('returns the identity for matching credentials', async () => {
    const { verifier } = makeVerifier();

    const result = await verifier.verify({ username: 'alice', password: 'test-password' });

    expect(result._unsafeUnwrap()).toEqual({
      userId: toUserId('user-1'),
      username: 'alice',
      isAdmin: false,
    });
  });

  it('reads the admin flag from the directory', async () => {
    const { verifier } = makeVerifier();

    const result = await verifier.verify({ username: 'root', password: 'test-admin-password' });

    expect(result._unsafeUnwrap().isAdmin).toBe(true);
  });

  it('looks the user up by username with a bound parameter', async () => {
    const { verifier, queries } = makeVerifier();

    await verifier.verify({ username: 'alice', password: 'test-password' });

    expect(queries).toHaveLength(1);
    expect(queries[0]?.sql).toBe(
      'select "id", "username", "password_hash", "is_admin", "is_active" from "users" where "username" = $1'
    );
    expect(queries[0]?.parameters).toEqual(['alice']);
  });

  it('rejects a wrong password', async () => {
    const { verifier } = makeVerifier();

    const result = await verifier.verify({ username: 'alice', password: 'wrong-password' });

    expect(result._unsafeUnwrapErr().type).toBe('InvalidCredentialsError');
  });

  it('rejects an unknown user', async () => {
    const { verifier } = makeVerifier();

    const result = await verifier.verify({ username: 'mallory', password: 'test-password' });

    expect(result._unsafeUnwrapErr().type).toBe('InvalidCredentialsError');
  });

  it('rejects an inactive user with the right password', async () => {
    const { verifier } = makeVerifier();

    const result = await verifier.verify({ username: 'bob', password: 'test-password' });

    expect(result._unsafeUnwrapErr().type).toBe('InvalidCredentialsError');
  });

  it('reports a directory failure', async () => {
    const cause = new Error('connection refused');
    const { verifier } = makeVerifier({ failWithError: cause });

    const result = await verifier.verify({ username: 'alice', password: 'test-password' });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'CredentialVerifierError',
      message: 'Failed to query user directory',
      retryable: true,
      cause,
    });
  });

  it('does not query once the signal has aborted', async () => {
    const { verifier, queries } = makeVerifier();
    const controller = new AbortController();
    controller.abort();

    const result = await verifier.verify(
      { username: 'alice', password: 'test-password' },
      { signal: controller.signal }
    );

    expect(result._unsafeUnwrapErr().message).toBe('Credential verification was cancelled');
    expect(queries).toEqual([]);
  });
});
