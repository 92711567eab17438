/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.PORT).toBe(3000);
      expect(env.HOST).toBe('0.0.0.0');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.AUTH_COOKIE_NAME).toBeUndefined();
      expect(env.AUTH_COOKIE_SECURE).toBe(false);
      expect(env.AUTH_LOGIN_PAGE).toBeUndefined();
      expect(env.AUTH_ROUTE_PREFIX).toBe('');
      expect(env.AUTH_INJECTED_PARAM).toBe('user');
      expect(env.AUTH_SESSION_TTL_SECONDS).toBe(86400);
      expect(env.AUTH_TOKEN_BYTES).toBe(32);
      expect(env.AUTH_VERIFIER_TIMEOUT_MS).toBe(5000);
    });

    it('parses PORT as number', () => {
      const env = parseEnv({ PORT: '8080' });

      expect(env.PORT).toBe(8080);
      expect(typeof env.PORT).toBe('number');
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        const env = parseEnv({ LOG_LEVEL: level });
        expect(env.LOG_LEVEL).toBe(level);
      }
    });

    it('accepts optional USER_DATABASE_URL and REDIS_URL', () => {
      const env = parseEnv({
        USER_DATABASE_URL: 'postgres://localhost/users',
        REDIS_URL: 'redis://localhost:6379',
      });
      expect(env.USER_DATABASE_URL).toBe('postgres://localhost/users');
      expect(env.REDIS_URL).toBe('redis://localhost:6379');

      const empty = parseEnv({ USER_DATABASE_URL: '', REDIS_URL: '' });
      expect(empty.USER_DATABASE_URL).toBeUndefined();
      expect(empty.REDIS_URL).toBeUndefined();
    });

    it('throws on invalid PORT (non-numeric)', () => {
      expect(() => parseEnv({ PORT: 'invalid' })).toThrow('Invalid environment configuration');
    });

    describe('auth settings', () => {
      it('marks cookies Secure by default in production only', () => {
        expect(parseEnv({ NODE_ENV: 'production' }).AUTH_COOKIE_SECURE).toBe(true);
        expect(parseEnv({ NODE_ENV: 'test' }).AUTH_COOKIE_SECURE).toBe(false);
      });

      it('parses boolean flags', () => {
        expect(parseEnv({ AUTH_COOKIE_SECURE: 'true' }).AUTH_COOKIE_SECURE).toBe(true);
        expect(parseEnv({ AUTH_COOKIE_SECURE: '1' }).AUTH_COOKIE_SECURE).toBe(true);
        expect(
          parseEnv({ NODE_ENV: 'production', AUTH_COOKIE_SECURE: 'FALSE' }).AUTH_COOKIE_SECURE
        ).toBe(false);
        expect(parseEnv({ AUTH_COOKIE_SECURE: '0' }).AUTH_COOKIE_SECURE).toBe(false);
      });

      it('rejects a non-boolean flag', () => {
        expect(() => parseEnv({ AUTH_COOKIE_SECURE: 'maybe' })).toThrow(
          'Invalid environment configuration'
        );
      });

      it('accepts route prefixes of whole path segments', () => {
        expect(parseEnv({ AUTH_ROUTE_PREFIX: '/auth' }).AUTH_ROUTE_PREFIX).toBe('/auth');
        expect(parseEnv({ AUTH_ROUTE_PREFIX: '/api/v1' }).AUTH_ROUTE_PREFIX).toBe('/api/v1');
      });

      it('rejects malformed route prefixes', () => {
        expect(() => parseEnv({ AUTH_ROUTE_PREFIX: '/' })).toThrow();
        expect(() => parseEnv({ AUTH_ROUTE_PREFIX: 'auth' })).toThrow();
        expect(() => parseEnv({ AUTH_ROUTE_PREFIX: '/auth/' })).toThrow();
      });

      it('requires the injected parameter to be an identifier', () => {
        expect(parseEnv({ AUTH_INJECTED_PARAM: 'currentUser' }).AUTH_INJECTED_PARAM).toBe(
          'currentUser'
        );
        expect(() => parseEnv({ AUTH_INJECTED_PARAM: 'current-user' })).toThrow();
      });

      it('rejects cookie names that are not HTTP tokens', () => {
        expect(parseEnv({ AUTH_COOKIE_NAME: 'sid' }).AUTH_COOKIE_NAME).toBe('sid');
        expect(() => parseEnv({ AUTH_COOKIE_NAME: 'my cookie' })).toThrow();
        expect(() => parseEnv({ AUTH_COOKIE_NAME: 'a;b' })).toThrow();
      });

      it('enforces a minimum token size', () => {
        expect(parseEnv({ AUTH_TOKEN_BYTES: '16' }).AUTH_TOKEN_BYTES).toBe(16);
        expect(() => parseEnv({ AUTH_TOKEN_BYTES: '8' })).toThrow();
      });

      it('rejects a zero or fractional TTL', () => {
        expect(() => parseEnv({ AUTH_SESSION_TTL_SECONDS: '0' })).toThrow();
        expect(() => parseEnv({ AUTH_SESSION_TTL_SECONDS: '1.5' })).toThrow();
      });
    });
  });

  describe('createConfig', () => {
    it('creates server config with correct flags', () => {
      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.server.isDevelopment).toBe(true);
      expect(devConfig.server.isProduction).toBe(false);
      expect(devConfig.server.isTest).toBe(false);

      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.server.isDevelopment).toBe(false);
      expect(prodConfig.server.isProduction).toBe(true);
      expect(prodConfig.server.isTest).toBe(false);
    });

    it('sets pretty logging for non-production', () => {
      expect(createConfig(parseEnv({ NODE_ENV: 'development' })).logger.pretty).toBe(true);
      expect(createConfig(parseEnv({ NODE_ENV: 'production' })).logger.pretty).toBe(false);
    });

    it('builds the auth gate config with the TTL in milliseconds', () => {
      const config = createConfig(
        parseEnv({
          AUTH_COOKIE_NAME: 'sid',
          AUTH_COOKIE_SECURE: 'true',
          AUTH_LOGIN_PAGE: '/etc/gate/login.html',
          AUTH_ROUTE_PREFIX: '/auth',
          AUTH_INJECTED_PARAM: 'account',
          AUTH_SESSION_TTL_SECONDS: '900',
          AUTH_TOKEN_BYTES: '24',
          AUTH_VERIFIER_TIMEOUT_MS: '2500',
        })
      );

      expect(config.auth).toEqual({
        cookieName: 'sid',
        cookieSecure: true,
        loginPagePath: '/etc/gate/login.html',
        routePrefix: '/auth',
        injectedParamName: 'account',
        sessionTtlMs: 900_000,
        tokenBytes: 24,
        verifierTimeoutMs: 2500,
      });
    });

    it('passes through persistence URLs', () => {
      const config = createConfig(
        parseEnv({
          USER_DATABASE_URL: 'postgres://localhost/users',
          REDIS_URL: 'redis://localhost:6379',
        })
      );

      expect(config.database.userUrl).toBe('postgres://localhost/users');
      expect(config.redis.url).toBe('redis://localhost:6379');
    });
  });
});
