/**
 * Auth Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Login page query string.
 */
export const LoginPageQuerySchema = Type.Object({
  proceed: Type.Optional(
    Type.String({ description: 'Relative path to continue to after login. Default: /' })
  ),
});

export type LoginPageQuery = Static<typeof LoginPageQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Successful login. Bearer transport adds the token fields.
 */
export const LoginResponseSchema = Type.Object({
  status: Type.Literal('ok'),
  proceed: Type.String(),
  tokenType: Type.Optional(Type.Literal('Bearer')),
  token: Type.Optional(Type.String()),
});

export type LoginResponse = Static<typeof LoginResponseSchema>;

export const LogoutResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

/**
 * Current session.
 */
export const SessionInfoResponseSchema = Type.Object({
  userId: Type.String(),
  username: Type.String(),
  isAdmin: Type.Boolean(),
  createdAt: Type.String({ format: 'date-time' }),
  expiresAt: Type.String({ format: 'date-time' }),
});

export type SessionInfoResponse = Static<typeof SessionInfoResponseSchema>;

/**
 * Error response.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
