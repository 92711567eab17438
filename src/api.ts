/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/index.js';
import { createUserDbClient, type UserDbClient } from './infra/database/client.js';
import { createLogger } from './infra/logger/index.js';
import { createRedisClient } from './infra/redis/client.js';
import { transportFor } from './modules/auth/core/types.js';
import { makeInMemorySessionStore } from './modules/auth/shell/adapters/in-memory-session-store.js';
import { makeRedisSessionStore } from './modules/auth/shell/adapters/redis-session-store.js';
import { withVerifierTimeout } from './modules/auth/shell/adapters/timeout-verifier.js';
import { makeUserDirectoryVerifier } from './modules/auth/shell/adapters/user-directory-verifier.js';

import type { SessionStore } from './modules/auth/core/ports.js';
import type { Redis } from 'ioredis';
import type { Logger } from 'pino';

interface SessionBackend {
  sessionStore: SessionStore;
  redis?: Redis;
}

/**
 * Redis when REDIS_URL is set, process memory otherwise.
 */
const createSessionBackend = async (
  config: AppConfig,
  logger: Logger
): Promise<SessionBackend> => {
  if (config.redis.url === undefined) {
    logger.warn('REDIS_URL not configured - sessions are kept in process memory');
    return { sessionStore: makeInMemorySessionStore() };
  }

  const redis = createRedisClient({ url: config.redis.url });
  await redis.connect();

  const sessionStore = makeRedisSessionStore({ redis });
  const ping = await sessionStore.ping();
  if (ping.isErr()) {
    throw new Error(ping.error.message);
  }

  logger.info('Using Redis session store');
  return { sessionStore, redis };
};

const requireUserDb = (config: AppConfig): UserDbClient => {
  if (config.database.userUrl === undefined) {
    throw new Error('Missing configuration for User Database (USER_DATABASE_URL)');
  }
  return createUserDbClient(config.database.userUrl);
};

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  // Create logger
  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info(
    {
      config: {
        server: config.server,
        auth: {
          transport: transportFor(config.auth),
          routePrefix: config.auth.routePrefix,
          loginPage: config.auth.loginPagePath ?? 'built-in',
        },
      },
    },
    'Starting API server'
  );

  // Initialize dependencies
  const userDb = requireUserDb(config);
  const { sessionStore, redis } = await createSessionBackend(config, logger);

  const credentialVerifier = withVerifierTimeout(
    makeUserDirectoryVerifier({ db: userDb, logger }),
    { timeoutMs: config.auth.verifierTimeoutMs }
  );

  // Build application
  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      disableRequestLogging: false,
    },
    deps: {
      config,
      logger,
      credentialVerifier,
      sessionStore,
    },
  });

  app.addHook('onClose', async () => {
    await userDb.destroy();
    if (redis !== undefined) {
      await redis.quit();
    }
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
