/**
 * Timeout Credential Verifier
 *
 * Wraps a CredentialVerifier so that one verification never outlasts a fixed
 * bound. On timeout the inner call's signal is aborted and the login fails
 * with VerifierTimeoutError. A verifier that throws is reported as
 * CredentialVerifierError.
 */

import { err, type Result } from 'neverthrow';

import {
  createCredentialVerifierError,
  createVerifierTimeoutError,
  type VerificationError,
} from '../../core/errors.js';

import type { CredentialVerifier, VerifyOptions } from '../../core/ports.js';
import type { Credentials, UserIdentity } from '../../core/types.js';

export interface WithVerifierTimeoutOptions {
  timeoutMs: number;
}

/**
 * Bounds every `verify` call of `inner` by `timeoutMs`.
 *
 * @example
 * const verifier = withVerifierTimeout(makeUserDirectoryVerifier({ db, logger }), {
 *   timeoutMs: 5000,
 * });
 */
export const withVerifierTimeout = (
  inner: CredentialVerifier,
  options: WithVerifierTimeoutOptions
): CredentialVerifier => {
  const { timeoutMs } = options;

  return {
    async verify(
      credentials: Credentials,
      verifyOptions: VerifyOptions = {}
    ): Promise<Result<UserIdentity, VerificationError>> {
      const controller = new AbortController();
      const outer = verifyOptions.signal;

      const forwardAbort = (): void => {
        controller.abort();
      };
      if (outer !== undefined) {
        if (outer.aborted) {
          controller.abort();
        } else {
          outer.addEventListener('abort', forwardAbort, { once: true });
        }
      }

      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<Result<UserIdentity, VerificationError>>((resolve) => {
        timer = setTimeout(() => {
          controller.abort();
          resolve(err(createVerifierTimeoutError(timeoutMs)));
        }, timeoutMs);
      });

      const verification = Promise.resolve()
        .then(() => inner.verify(credentials, { signal: controller.signal }))
        .catch((error: unknown) =>
          err<UserIdentity, VerificationError>(
            createCredentialVerifierError('Credential verifier failed', error)
          )
        );

      try {
        return await Promise.race([verification, timeout]);
      } finally {
        clearTimeout(timer);
        outer?.removeEventListener('abort', forwardAbort);
      }
    },
  };
};
