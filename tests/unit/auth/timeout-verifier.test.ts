/**
 * Tests for bounding credential verification time.
 */

import { err } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import {
  createInvalidCredentialsError,
  withVerifierTimeout,
  type CredentialVerifier,
} from '@/modules/auth/index.js';

import { makeIdentity } from '../../fixtures/builders.js';
import {
  makeFakeCredentialVerifier,
  makeHangingCredentialVerifier,
} from '../../fixtures/fakes.js';

const credentials = { username: 'alice', password: 'test-password' };

describe('withVerifierTimeout', () => {
  it('passes a timely answer through', async () => {
    const verifier = withVerifierTimeout(makeFakeCredentialVerifier(), { timeoutMs: 1000 });

    const result = await verifier.verify(credentials);

    expect(result._unsafeUnwrap()).toEqual(makeIdentity());
  });

  it('passes a timely rejection through', async () => {
    const verifier = withVerifierTimeout(
      makeFakeCredentialVerifier(() => err(createInvalidCredentialsError())),
      { timeoutMs: 1000 }
    );

    const result = await verifier.verify(credentials);

    expect(result._unsafeUnwrapErr().type).toBe('InvalidCredentialsError');
  });

  it('fails with VerifierTimeoutError and aborts the inner call', async () => {
    const inner = makeHangingCredentialVerifier();
    const verifier = withVerifierTimeout(inner, { timeoutMs: 20 });

    const result = await verifier.verify(credentials);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'VerifierTimeoutError',
      message: 'Credential verification timed out after 20ms',
      timeoutMs: 20,
    });
    expect(inner.aborted()).toBe(true);
  });

  it('forwards an outer abort to the inner call', async () => {
    const inner = makeHangingCredentialVerifier();
    const verifier = withVerifierTimeout(inner, { timeoutMs: 1000 });
    const controller = new AbortController();

    const pending = verifier.verify(credentials, { signal: controller.signal });
    controller.abort();
    const result = await pending;

    expect(inner.aborted()).toBe(true);
    expect(result._unsafeUnwrapErr().type).toBe('InvalidCredentialsError');
  });

  it('reports a verifier that rejects', async () => {
    const cause = new Error('directory exploded');
    const throwing: CredentialVerifier = {
      verify: () => Promise.reject(cause),
    };

    const result = await withVerifierTimeout(throwing, { timeoutMs: 1000 }).verify(credentials);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'CredentialVerifierError',
      message: 'Credential verifier failed',
      retryable: true,
      cause,
    });
  });

  it('reports a verifier that throws synchronously', async () => {
    const throwing: CredentialVerifier = {
      verify: () => {
        throw new Error('not implemented');
      },
    };

    const result = await withVerifierTimeout(throwing, { timeoutMs: 1000 }).verify(credentials);

    expect(result._unsafeUnwrapErr().message).toBe('Credential verifier failed');
  });
});
