import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Users Table
// password_hash holds `scrypt$<salt>$<key>` as written by hashPassword
export interface Users {
  id: string;
  username: string;
  password_hash: string;
  is_admin: Generated<boolean>;
  is_active: Generated<boolean>;
  created_at: Generated<Timestamp>;
}

// Database Schema Interface
// Note: Keys must be lowercase to match PostgreSQL's default identifier handling.
export interface UserDatabase {
  users: Users;
}
