/**
 * User Directory Credential Verifier
 *
 * Kysely-based implementation for the users table in UserDatabase.
 * Passwords are checked against scrypt hashes; inactive users cannot log in.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createCredentialVerifierError,
  createInvalidCredentialsError,
  type VerificationError,
} from '../../core/errors.js';
import { toUserId, type Credentials, type UserIdentity } from '../../core/types.js';
import { verifyPassword } from '../crypto/password-hasher.js';

import type { UserDbClient } from '../../../../infra/database/client.js';
import type { CredentialVerifier, VerifyOptions } from '../../core/ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface UserDirectoryVerifierOptions {
  db: UserDbClient;
  logger: Logger;
}

/**
 * Row type from database query.
 */
interface UserRow {
  id: string;
  username: string;
  password_hash: string;
  is_admin: boolean;
  is_active: boolean;
}

/**
 * Stand-in hash checked for unknown usernames, so that unknown and known
 * users cost the same scrypt run.
 */
const DUMMY_PASSWORD_HASH = `scrypt$${'A'.repeat(22)}$${'A'.repeat(86)}`;

// ─────────────────────────────────────────────────────────────────────────────
// Verifier Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyUserDirectoryVerifier implements CredentialVerifier {
  private readonly db: UserDbClient;
  private readonly log: Logger;

  constructor(options: UserDirectoryVerifierOptions) {
    this.db = options.db;
    this.log = options.logger.child({ verifier: 'UserDirectoryVerifier' });
  }

  async verify(
    credentials: Credentials,
    options: VerifyOptions = {}
  ): Promise<Result<UserIdentity, VerificationError>> {
    const { signal } = options;

    if (signal?.aborted === true) {
      return err(createCredentialVerifierError('Credential verification was cancelled'));
    }

    let row: UserRow | undefined;
    try {
      row = await this.db
        .selectFrom('users')
        .select(['id', 'username', 'password_hash', 'is_admin', 'is_active'])
        .where('username', '=', credentials.username)
        .executeTakeFirst();
    } catch (error) {
      this.log.error({ err: error }, 'Failed to query user directory');
      return err(createCredentialVerifierError('Failed to query user directory', error));
    }

    if (signal?.aborted) {
      return err(createCredentialVerifierError('Credential verification was cancelled'));
    }

    let matches: boolean;
    try {
      matches = await verifyPassword(
        credentials.password,
        row?.password_hash ?? DUMMY_PASSWORD_HASH
      );
    } catch (error) {
      this.log.error({ err: error }, 'Password hash check failed');
      return err(createCredentialVerifierError('Password hash check failed', error));
    }

    if (row === undefined || !matches || !row.is_active) {
      this.log.debug('Credentials rejected');
      return err(createInvalidCredentialsError());
    }

    return ok({
      userId: toUserId(row.id),
      username: row.username,
      isAdmin: row.is_admin,
    });
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a credential verifier backed by the users table.
 *
 * @example
 * const verifier = makeUserDirectoryVerifier({ db: userDb, logger });
 */
export const makeUserDirectoryVerifier = (
  options: UserDirectoryVerifierOptions
): CredentialVerifier => {
  return new KyselyUserDirectoryVerifier(options);
};
