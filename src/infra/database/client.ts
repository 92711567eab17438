import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { UserDatabase } from './user/types.js';

const { Pool: PG_POOL } = pg;

export type UserDbClient = Kysely<UserDatabase>;

/**
 * Create the Kysely instance for the user directory.
 */
export const createUserDbClient = (connectionString: string): UserDbClient => {
  return new Kysely<UserDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};
