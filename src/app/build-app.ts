/**
 * Fastify application factory
 * Creates and configures the Fastify instance with the auth gate and routes
 */

import fastifyCookie from '@fastify/cookie';
import fastifyLib, {
  type FastifyError,
  type FastifyInstance,
  type FastifyPluginAsync,
  type FastifyServerOptions,
} from 'fastify';

import { makeSampleRoutes } from './sample-routes.js';
import {
  systemClock,
  type Clock,
  type CredentialVerifier,
  type SessionStore,
} from '../modules/auth/core/ports.js';
import { makeTokenCodec } from '../modules/auth/shell/codec/token-codec.js';
import { makeAuthGate, type AuthGate } from '../modules/auth/shell/middleware/fastify-auth.js';
import { authRoutePath, makeAuthRoutes } from '../modules/auth/shell/rest/routes.js';
import { loadLoginTemplate } from '../modules/auth/shell/templates/login-page-loader.js';

import type { AppConfig } from '../infra/config/env.js';
import type { LoginTemplate } from '../modules/auth/core/login-page.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  credentialVerifier: CredentialVerifier;
  sessionStore: SessionStore;
  /** Time source. Default: system clock */
  clock?: Clock;
  /** Login page template. Default: loaded from `config.auth.loginPagePath` */
  loginTemplate?: LoginTemplate;
  /** Application routes, given the gate to protect them with. Default: sample routes */
  routes?: (gate: AuthGate) => FastifyPluginAsync;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where the auth module is wired together
 *
 * @throws Error when the configured login page cannot be used
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps } = options;
  const { config, logger, credentialVerifier, sessionStore } = deps;
  const clock = deps.clock ?? systemClock;
  const authConfig = config.auth;

  // ─────────────────────────────────────────────────────────────────────────────
  // Login Page (fails startup when unusable)
  // ─────────────────────────────────────────────────────────────────────────────
  let loginTemplate = deps.loginTemplate;
  if (loginTemplate === undefined) {
    const loaded = await loadLoginTemplate({
      loginPagePath: authConfig.loginPagePath,
      loginPath: authRoutePath(authConfig.routePrefix, '/login'),
    });

    if (loaded.isErr()) {
      throw new Error(loaded.error.message);
    }
    loginTemplate = loaded.value;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Auth Gate
  // ─────────────────────────────────────────────────────────────────────────────
  const codec = makeTokenCodec({
    cookieName: authConfig.cookieName,
    cookieSecure: authConfig.cookieSecure,
    routePrefix: authConfig.routePrefix,
    maxAgeSeconds: Math.floor(authConfig.sessionTtlMs / 1000),
    tokenBytes: authConfig.tokenBytes,
  });

  const gate = makeAuthGate({
    config: authConfig,
    sessionStore,
    codec,
    loginTemplate,
    clock,
    logger,
  });

  // Create Fastify instance
  const app = fastifyLib({
    ...fastifyOptions,
  });

  await app.register(fastifyCookie);

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: 'Request validation failed',
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    request.log.error({ err: error }, 'Request error');
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await app.register(
    makeAuthRoutes({
      config: authConfig,
      gate,
      codec,
      credentialVerifier,
      sessionStore,
      clock,
      logger,
    })
  );

  const routes =
    deps.routes ??
    ((authGate: AuthGate) =>
      makeSampleRoutes({ gate: authGate, injectedParamName: authConfig.injectedParamName }));
  // The route prefix scopes the whole application, as it scopes the session cookie.
  await app.register(routes(gate), { prefix: authConfig.routePrefix });

  return app;
};
