/**
 * Token Codec
 *
 * Generates session tokens and moves them over HTTP:
 * - cookie transport: HttpOnly cookie scoped to the route prefix
 * - bearer transport: token returned in the JSON body, sent back in
 *   `Authorization: Bearer <token>`
 */

import { randomBytes } from 'node:crypto';

import { MIN_TOKEN_BYTES, type TransportKind } from '../../core/types.js';
import { makeHttpSessionExtractor } from '../extractors/http-extractor.js';

import type { FastifyReply, FastifyRequest } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Body fields produced by attaching a token. Empty for cookie transport.
 */
export type TokenBodyFields =
  | Record<string, never>
  | { readonly tokenType: 'Bearer'; readonly token: string };

export interface TokenCodec {
  /** Fresh token from a cryptographically secure source */
  generate(): string;
  /** Puts the token on the response; returns fields to merge into a JSON body */
  attach(reply: FastifyReply, token: string, transport: TransportKind): TokenBodyFields;
  /** Reads the token from a request: bearer header first, cookie second */
  extract(request: FastifyRequest): string | null;
  /** Expires the session cookie, if cookie transport is configured */
  clear(reply: FastifyReply): void;
}

export interface MakeTokenCodecOptions {
  /** Session cookie name. Absent = bearer-only. */
  cookieName?: string | undefined;
  /** Mark the cookie Secure */
  cookieSecure: boolean;
  /** Route prefix the cookie is scoped to ('' = whole app) */
  routePrefix: string;
  /** Cookie Max-Age in seconds */
  maxAgeSeconds: number;
  /** Random bytes per token (>= 16) */
  tokenBytes: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a token codec.
 *
 * @throws Error if `tokenBytes` gives less than 128 bits of entropy
 *
 * @example
 * const codec = makeTokenCodec({
 *   cookieName: 'sid',
 *   cookieSecure: true,
 *   routePrefix: '',
 *   maxAgeSeconds: 86400,
 *   tokenBytes: 32,
 * });
 *
 * const token = codec.generate(); // 43 base64url characters
 */
export const makeTokenCodec = (options: MakeTokenCodecOptions): TokenCodec => {
  const { cookieName, cookieSecure, routePrefix, maxAgeSeconds, tokenBytes } = options;

  if (!Number.isInteger(tokenBytes) || tokenBytes < MIN_TOKEN_BYTES) {
    throw new Error(
      `Token size must be an integer of at least ${String(MIN_TOKEN_BYTES)} bytes, got: ${String(tokenBytes)}`
    );
  }

  const extractor = makeHttpSessionExtractor({ cookieName });
  const cookiePath = routePrefix === '' ? '/' : routePrefix;
  const sessionCookie = cookieName !== undefined && cookieName !== '' ? cookieName : null;

  return {
    generate(): string {
      return randomBytes(tokenBytes).toString('base64url');
    },

    attach(reply: FastifyReply, token: string, transport: TransportKind): TokenBodyFields {
      if (transport === 'cookie' && sessionCookie !== null) {
        void reply.setCookie(sessionCookie, token, {
          httpOnly: true,
          sameSite: 'lax',
          secure: cookieSecure,
          path: cookiePath,
          maxAge: maxAgeSeconds,
        });
        return {};
      }

      return { tokenType: 'Bearer', token };
    },

    extract(request: FastifyRequest): string | null {
      return extractor.extractToken(request);
    },

    clear(reply: FastifyReply): void {
      if (sessionCookie !== null) {
        void reply.clearCookie(sessionCookie, { path: cookiePath });
      }
    },
  };
};
