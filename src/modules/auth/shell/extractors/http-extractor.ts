/**
 * HTTP Session Extractor
 *
 * Reads the session token from a Fastify request: the Authorization bearer
 * header first, the session cookie second.
 */

import { AUTH_HEADER, BEARER_PREFIX } from '../../core/types.js';

import type { SessionExtractor } from '../../core/ports.js';
import type { FastifyRequest } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Returns the token of a well-formed "Bearer <token>" header, or null.
 */
export const parseBearerHeader = (header: string | string[] | undefined): string | null => {
  if (typeof header !== 'string' || !header.startsWith(BEARER_PREFIX)) {
    return null;
  }

  const token = header.slice(BEARER_PREFIX.length).trim();

  // A bearer value is a single token
  if (token === '' || /\s/.test(token)) {
    return null;
  }

  return token;
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeHttpSessionExtractorOptions {
  /** Session cookie name. Absent = bearer header only. */
  cookieName?: string | undefined;
}

/**
 * Creates the HTTP extractor.
 *
 * Cookies are read from `request.cookies`, populated by @fastify/cookie.
 *
 * @example
 * // Request with header: Authorization: Bearer 3q2-7wEAAAA...
 * extractor.extractToken(request); // '3q2-7wEAAAA...'
 *
 * // Request with cookie: sid=3q2-7wEAAAA...
 * makeHttpSessionExtractor({ cookieName: 'sid' }).extractToken(request); // '3q2-7wEAAAA...'
 */
export const makeHttpSessionExtractor = (
  options: MakeHttpSessionExtractorOptions = {}
): SessionExtractor<FastifyRequest> => {
  const { cookieName } = options;

  return {
    extractToken(request: FastifyRequest): string | null {
      const bearer = parseBearerHeader(request.headers[AUTH_HEADER]);
      if (bearer !== null) {
        return bearer;
      }

      if (cookieName === undefined || cookieName === '') {
        return null;
      }

      const cookie = request.cookies[cookieName];
      return cookie !== undefined && cookie !== '' ? cookie : null;
    },
  };
};
