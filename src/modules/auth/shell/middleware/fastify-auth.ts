/**
 * Fastify Authentication Gate
 *
 * Wraps route handlers so they run only for requests carrying a live session.
 * Unauthenticated and expired requests receive the login page; a session store
 * failure is answered with 503 and never lets the request through.
 */

import { AUTH_ERROR_HTTP_STATUS, toErrorBody, type SessionStoreError } from '../../core/errors.js';
import { renderLoginPage, type LoginTemplate } from '../../core/login-page.js';
import { sanitizeProceed } from '../../core/proceed.js';
import { authenticateRequest } from '../../core/usecases/authenticate-request.js';

import type { TokenCodec } from '../codec/token-codec.js';
import type { Clock, SessionStore } from '../../core/ports.js';
import type { AuthDecision, AuthGateConfig, Session, UserIdentity } from '../../core/types.js';
import type { FastifyReply, FastifyRequest, RouteGenericInterface } from 'fastify';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Identity handed to a protected handler, keyed by the configured parameter
 * name (`user` unless configured otherwise).
 */
export type InjectedIdentity = Readonly<Record<string, UserIdentity>>;

/**
 * A route handler that needs an authenticated caller.
 */
export type ProtectedHandler<RouteGeneric extends RouteGenericInterface = RouteGenericInterface> = (
  request: FastifyRequest<RouteGeneric>,
  reply: FastifyReply,
  injected: InjectedIdentity,
  session: Session
) => unknown;

/**
 * Fastify handler produced by wrapping a ProtectedHandler.
 */
export type GatedRouteHandler<RouteGeneric extends RouteGenericInterface = RouteGenericInterface> = (
  request: FastifyRequest<RouteGeneric>,
  reply: FastifyReply
) => Promise<unknown>;

/**
 * Dependencies for creating the auth gate.
 */
export interface MakeAuthGateDeps {
  config: AuthGateConfig;
  sessionStore: SessionStore;
  codec: TokenCodec;
  loginTemplate: LoginTemplate;
  clock: Clock;
  logger: Logger;
}

export interface AuthGate {
  /** Gate decision for one request */
  decide(request: FastifyRequest): Promise<Result<AuthDecision, SessionStoreError>>;
  /** Sends the login page carrying `proceed` */
  sendChallenge(reply: FastifyReply, proceed: string): FastifyReply;
  /** Wraps a handler so it only runs for authenticated requests */
  protect<RouteGeneric extends RouteGenericInterface = RouteGenericInterface>(
    handler: ProtectedHandler<RouteGeneric>
  ): GatedRouteHandler<RouteGeneric>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the authentication gate.
 *
 * @example
 * const gate = makeAuthGate({ config, sessionStore, codec, loginTemplate, clock, logger });
 *
 * app.get(
 *   '/hello/:name',
 *   gate.protect<{ Params: { name: string } }>(async (request, _reply, injected) => {
 *     const user = injected['user'];
 *     return `Hello ${request.params.name}, you are ${user.username}`;
 *   })
 * );
 */
export const makeAuthGate = (deps: MakeAuthGateDeps): AuthGate => {
  const { config, sessionStore, codec, loginTemplate, clock } = deps;
  const log = deps.logger.child({ component: 'AuthGate' });

  const decide = (request: FastifyRequest): Promise<Result<AuthDecision, SessionStoreError>> => {
    return authenticateRequest(
      { sessionStore, clock },
      { token: codec.extract(request), path: sanitizeProceed(request.url) }
    );
  };

  const sendChallenge = (reply: FastifyReply, proceed: string): FastifyReply => {
    const rendered = renderLoginPage(loginTemplate, proceed);

    if (rendered.isErr()) {
      log.error({ source: rendered.error.source }, rendered.error.message);
      return reply
        .status(AUTH_ERROR_HTTP_STATUS[rendered.error.type])
        .send(toErrorBody(rendered.error));
    }

    return reply
      .status(200)
      .header('cache-control', 'no-store')
      .type('text/html; charset=utf-8')
      .send(rendered.value);
  };

  return {
    decide,
    sendChallenge,

    protect<RouteGeneric extends RouteGenericInterface = RouteGenericInterface>(
      handler: ProtectedHandler<RouteGeneric>
    ): GatedRouteHandler<RouteGeneric> {
      return async (
        request: FastifyRequest<RouteGeneric>,
        reply: FastifyReply
      ): Promise<unknown> => {
        const decision = await decide(request);

        if (decision.isErr()) {
          log.error({ err: decision.error.cause, url: request.url }, decision.error.message);
          return reply
            .status(AUTH_ERROR_HTTP_STATUS[decision.error.type])
            .send(toErrorBody(decision.error));
        }

        const outcome = decision.value;

        if (outcome.kind === 'challenge') {
          log.debug({ reason: outcome.reason, proceed: outcome.proceed }, 'Challenging request');
          return sendChallenge(reply, outcome.proceed);
        }

        const injected: InjectedIdentity = { [config.injectedParamName]: outcome.identity };
        return handler(request, reply, injected, outcome.session);
      };
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Client Abort
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Signal aborted when the client closes the connection before the response
 * is written. Call `dispose` once the work it guards is done.
 */
export const watchClientAbort = (
  reply: Pick<FastifyReply, 'raw'>
): { signal: AbortSignal; dispose: () => void } => {
  const controller = new AbortController();

  const onClose = (): void => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  };

  // The client may already be gone by the time the handler runs.
  if (reply.raw.destroyed) {
    controller.abort();
  } else {
    reply.raw.once('close', onClose);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      reply.raw.off('close', onClose);
    },
  };
};
