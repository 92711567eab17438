/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import {
  DEFAULT_INJECTED_PARAM,
  DEFAULT_SESSION_TTL_MS,
  DEFAULT_TOKEN_BYTES,
  DEFAULT_VERIFIER_TIMEOUT_MS,
  MIN_TOKEN_BYTES,
  type AuthGateConfig,
} from '../../modules/auth/core/types.js';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Persistence
  USER_DATABASE_URL: Type.Optional(Type.String({ minLength: 1 })),
  REDIS_URL: Type.Optional(Type.String({ minLength: 1 })),

  // Auth gate
  AUTH_COOKIE_NAME: Type.Optional(Type.String({ pattern: "^[!#$%&'*+.^_`|~0-9A-Za-z-]+$" })),
  AUTH_COOKIE_SECURE: Type.Boolean(),
  AUTH_LOGIN_PAGE: Type.Optional(Type.String({ minLength: 1 })),
  AUTH_ROUTE_PREFIX: Type.String({ pattern: '^(/[A-Za-z0-9._~-]+)*$', default: '' }),
  AUTH_INJECTED_PARAM: Type.String({
    pattern: '^[A-Za-z_][A-Za-z0-9_]*$',
    default: DEFAULT_INJECTED_PARAM,
  }),
  AUTH_SESSION_TTL_SECONDS: Type.Integer({ minimum: 1, default: DEFAULT_SESSION_TTL_MS / 1000 }),
  AUTH_TOKEN_BYTES: Type.Integer({ minimum: MIN_TOKEN_BYTES, default: DEFAULT_TOKEN_BYTES }),
  AUTH_VERIFIER_TIMEOUT_MS: Type.Integer({ minimum: 1, default: DEFAULT_VERIFIER_TIMEOUT_MS }),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

const nonEmpty = (value: string | undefined): string | undefined =>
  value != null && value !== '' ? value : undefined;

const parseBoolean = (value: string | undefined, fallback: boolean): boolean | string => {
  if (value == null || value === '') {
    return fallback;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  // Left as a string so validation reports it
  return value;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const nodeEnv = env['NODE_ENV'] ?? 'development';

  const rawEnv = {
    NODE_ENV: nodeEnv,
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    USER_DATABASE_URL: nonEmpty(env['USER_DATABASE_URL']),
    REDIS_URL: nonEmpty(env['REDIS_URL']),
    AUTH_COOKIE_NAME: nonEmpty(env['AUTH_COOKIE_NAME']),
    AUTH_COOKIE_SECURE: parseBoolean(env['AUTH_COOKIE_SECURE'], nodeEnv === 'production'),
    AUTH_LOGIN_PAGE: nonEmpty(env['AUTH_LOGIN_PAGE']),
    AUTH_ROUTE_PREFIX: env['AUTH_ROUTE_PREFIX'] ?? '',
    AUTH_INJECTED_PARAM: nonEmpty(env['AUTH_INJECTED_PARAM']) ?? DEFAULT_INJECTED_PARAM,
    AUTH_SESSION_TTL_SECONDS: parseInteger(
      env['AUTH_SESSION_TTL_SECONDS'],
      DEFAULT_SESSION_TTL_MS / 1000
    ),
    AUTH_TOKEN_BYTES: parseInteger(env['AUTH_TOKEN_BYTES'], DEFAULT_TOKEN_BYTES),
    AUTH_VERIFIER_TIMEOUT_MS: parseInteger(
      env['AUTH_VERIFIER_TIMEOUT_MS'],
      DEFAULT_VERIFIER_TIMEOUT_MS
    ),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => {
  const auth: AuthGateConfig = {
    cookieName: env.AUTH_COOKIE_NAME,
    cookieSecure: env.AUTH_COOKIE_SECURE,
    loginPagePath: env.AUTH_LOGIN_PAGE,
    routePrefix: env.AUTH_ROUTE_PREFIX,
    injectedParamName: env.AUTH_INJECTED_PARAM,
    sessionTtlMs: env.AUTH_SESSION_TTL_SECONDS * 1000,
    tokenBytes: env.AUTH_TOKEN_BYTES,
    verifierTimeoutMs: env.AUTH_VERIFIER_TIMEOUT_MS,
  };

  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
    },
    logger: {
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV !== 'production',
    },
    database: {
      userUrl: env.USER_DATABASE_URL,
    },
    redis: {
      url: env.REDIS_URL,
    },
    auth,
  };
};

export type AppConfig = ReturnType<typeof createConfig>;
