/**
 * Redis client factory for the session store.
 */

import { Redis } from 'ioredis';

export interface RedisClientOptions {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in milliseconds. Default: 5000 */
  connectTimeoutMs?: number;
  /** Command timeout in milliseconds. Default: 1000 */
  commandTimeoutMs?: number;
}

/**
 * Create an ioredis client. Call `connect()` before use: commands fail
 * instead of queueing while disconnected.
 */
export const createRedisClient = (options: RedisClientOptions): Redis => {
  return new Redis(options.url, {
    connectTimeout: options.connectTimeoutMs ?? 5000,
    commandTimeout: options.commandTimeoutMs ?? 1000,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    retryStrategy: (times: number) => Math.min(times * 100, 30000),
    lazyConnect: true,
  });
};
