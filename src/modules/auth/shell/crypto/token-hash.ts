/**
 * Token hashing for storage keys.
 *
 * Stores key sessions by SHA-256 of the token so a dump of the store does not
 * hand out usable tokens.
 */

import { createHash } from 'node:crypto';

export const hashToken = (token: string): string => {
  return createHash('sha256').update(token).digest('hex');
};
