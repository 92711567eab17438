/**
 * Password Hasher
 *
 * scrypt password hashes stored as `scrypt$<salt>$<key>` (both base64url).
 */

import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const SCHEME = 'scrypt';
const SALT_BYTES = 16;
const KEY_BYTES = 64;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const deriveKey = (password: string, salt: Buffer, keyLength: number): Promise<Buffer> => {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, (error, key) => {
      if (error !== null) {
        reject(error);
        return;
      }
      resolve(key);
    });
  });
};

const parseHash = (stored: string): { salt: Buffer; key: Buffer } | null => {
  const parts = stored.split('$');
  if (parts.length !== 3) {
    return null;
  }

  const [scheme, salt, key] = parts;
  if (scheme !== SCHEME || salt === undefined || key === undefined || salt === '' || key === '') {
    return null;
  }

  return {
    salt: Buffer.from(salt, 'base64url'),
    key: Buffer.from(key, 'base64url'),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Hashes a password with a fresh random salt.
 *
 * @example
 * const hash = await hashPassword('test-password');
 * // 'scrypt$...$...'
 */
export const hashPassword = async (password: string): Promise<string> => {
  const salt = randomBytes(SALT_BYTES);
  const key = await deriveKey(password, salt, KEY_BYTES);
  return `${SCHEME}$${salt.toString('base64url')}$${key.toString('base64url')}`;
};

/**
 * Checks a password against a stored hash in constant time.
 * A malformed stored hash never matches.
 */
export const verifyPassword = async (password: string, stored: string): Promise<boolean> => {
  const parsed = parseHash(stored);
  if (parsed === null || parsed.key.length === 0) {
    return false;
  }

  const candidate = await deriveKey(password, parsed.salt, parsed.key.length);
  return timingSafeEqual(candidate, parsed.key);
};
