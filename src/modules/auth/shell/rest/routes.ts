/**
 * Auth Module REST Routes
 *
 * Pre-installed routes, mounted under the configured route prefix:
 * - GET  {prefix}/login: Login page (public)
 * - POST {prefix}/login: Verify credentials and open a session (public)
 * - POST {prefix}/logout: Close the current session (public, idempotent)
 * - GET  {prefix}/me: Current identity (protected)
 */

import {
  ErrorResponseSchema,
  LoginPageQuerySchema,
  LoginResponseSchema,
  LogoutResponseSchema,
  SessionInfoResponseSchema,
  type LoginPageQuery,
  type LoginResponse,
  type SessionInfoResponse,
} from './schemas.js';
import { parseCredentialSubmission } from '../../core/credentials.js';
import {
  AUTH_ERROR_HTTP_STATUS,
  isAuthenticationFailure,
  toErrorBody,
  type AuthError,
} from '../../core/errors.js';
import { sanitizeProceed } from '../../core/proceed.js';
import { transportFor } from '../../core/types.js';
import { login } from '../../core/usecases/login.js';
import { logout } from '../../core/usecases/logout.js';
import { watchClientAbort, type AuthGate } from '../middleware/fastify-auth.js';

import type { TokenCodec } from '../codec/token-codec.js';
import type { Clock, CredentialVerifier, SessionStore } from '../../core/ports.js';
import type { AuthGateConfig } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for auth routes.
 */
export interface MakeAuthRoutesDeps {
  config: AuthGateConfig;
  gate: AuthGate;
  codec: TokenCodec;
  credentialVerifier: CredentialVerifier;
  sessionStore: SessionStore;
  clock: Clock;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sends an auth error with its mapped status.
 */
function sendAuthError(reply: FastifyReply, error: AuthError) {
  return reply.status(AUTH_ERROR_HTTP_STATUS[error.type]).send(toErrorBody(error));
}

/**
 * Path of a pre-installed route under the prefix.
 */
export const authRoutePath = (routePrefix: string, route: string): string =>
  `${routePrefix}${route}`;

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the auth REST routes.
 *
 * Registers its own body parsers, scoped to these routes: url-encoded forms
 * are decoded into plain objects; any other content type is passed through
 * untouched so the login handler can reject it with 400.
 */
export const makeAuthRoutes = (deps: MakeAuthRoutesDeps): FastifyPluginAsync => {
  const { config, gate, codec, credentialVerifier, sessionStore, clock } = deps;
  const log = deps.logger.child({ routes: 'auth' });

  const loginPath = authRoutePath(config.routePrefix, '/login');
  const logoutPath = authRoutePath(config.routePrefix, '/logout');
  const mePath = authRoutePath(config.routePrefix, '/me');
  const transport = transportFor(config);

  return async (fastify) => {
    fastify.addContentTypeParser<string>(
      'application/x-www-form-urlencoded',
      { parseAs: 'string' },
      (_request, body, done) => {
        done(null, Object.fromEntries(new URLSearchParams(body)));
      }
    );

    fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
      done(null, body);
    });

    // ─────────────────────────────────────────────────────────────────────────
    // GET {prefix}/login - Login page
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: LoginPageQuery }>(
      loginPath,
      {
        schema: {
          querystring: LoginPageQuerySchema,
        },
      },
      async (request, reply) => {
        return gate.sendChallenge(reply, sanitizeProceed(request.query.proceed));
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST {prefix}/login - Credential submission
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post(
      loginPath,
      {
        schema: {
          response: {
            200: LoginResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            499: ErrorResponseSchema,
            500: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const parsed = parseCredentialSubmission(request.headers['content-type'], request.body);

        if (parsed.isErr()) {
          return sendAuthError(reply, parsed.error);
        }

        const submission = parsed.value;
        const clientAbort = watchClientAbort(reply);

        const result = await login(
          {
            credentialVerifier,
            sessionStore,
            generateToken: codec.generate,
            clock,
            sessionTtlMs: config.sessionTtlMs,
          },
          { submission, transport, signal: clientAbort.signal }
        );
        clientAbort.dispose();

        if (result.isErr()) {
          const error = result.error;

          if (isAuthenticationFailure(error)) {
            log.info({ username: submission.username, reason: error.type }, 'Login rejected');
          } else if (error.type === 'RequestAbortedError') {
            log.info({ username: submission.username }, 'Login abandoned by client');
          } else {
            log.error({ err: error, username: submission.username }, 'Login failed');
          }

          return sendAuthError(reply, error);
        }

        const session = result.value;
        log.info(
          { userId: session.identity.userId, transport: session.transport },
          'Session created'
        );

        const tokenFields = codec.attach(reply, session.token, session.transport);

        if (submission.flow === 'form' && session.transport === 'cookie') {
          return reply.redirect(submission.proceed, 302);
        }

        const body: LoginResponse = { status: 'ok', proceed: submission.proceed, ...tokenFields };
        return reply.status(200).send(body);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST {prefix}/logout - Close session
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post(
      logoutPath,
      {
        schema: {
          response: {
            200: LogoutResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await logout({ sessionStore }, { token: codec.extract(request) });

        if (result.isErr()) {
          log.error({ err: result.error }, 'Logout failed');
          return sendAuthError(reply, result.error);
        }

        codec.clear(reply);
        return reply.status(200).send({ status: 'ok' });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET {prefix}/me - Current identity
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      mePath,
      {
        schema: {
          response: {
            200: SessionInfoResponseSchema,
          },
        },
      },
      gate.protect(async (_request, reply, _injected, session) => {
        const body: SessionInfoResponse = {
          userId: session.identity.userId,
          username: session.identity.username,
          isAdmin: session.identity.isAdmin,
          createdAt: session.createdAt.toISOString(),
          expiresAt: session.expiresAt.toISOString(),
        };
        return reply.header('cache-control', 'no-store').send(body);
      })
    );
  };
};
