/**
 * Redis Connection Management Utility
 *
 * Builds the ioredis client used by the word store. The client connects
 * lazily on its first command, keeps reconnecting with a capped backoff and applies
 * a per-command timeout and retry limit so a stalled Redis surfaces as an error
 * instead of a hung Slack request.
 *
 * Redis Key Schema:
 * - health:check → Temporary test key (60s TTL) used for connectivity validation
 */

import Redis from 'ioredis';

const MAX_RETRIES_PER_REQUEST = 3;
const RECONNECT_STEP_MS = 100;
const MAX_RECONNECT_DELAY_MS = 2000;

export interface RedisClientOptions {
  url: string;
  commandTimeoutMs: number;
}

/**
 * Creates an ioredis client for the given connection string.
 *
 * @example
 * ```typescript
 * const client = createRedisClient({ url: 'redis://localhost:6379', commandTimeoutMs: 5000 });
 * await client.lrange('insult:words', 0, -1);
 * ```
 */
export function createRedisClient(options: RedisClientOptions): Redis {
  const client = new Redis(options.url, {
    lazyConnect: true,
    maxRetriesPerRequest: MAX_RETRIES_PER_REQUEST,
    commandTimeout: options.commandTimeoutMs,
    // Never gives up: a client that ends stays closed for the life of the process
    retryStrategy: times => Math.min(times * RECONNECT_STEP_MS, MAX_RECONNECT_DELAY_MS),
  });

  client.on('error', error => {
    console.error('Redis client error:', error.message);
  });

  return client;
}

/**
 * Validates Redis connectivity by performing a simple set/get operation.
 *
 * @returns Promise resolving to true if Redis is available, false otherwise
 */
export async function redisHealthCheck(
  client: Pick<Redis, 'set' | 'get'>
): Promise<boolean> {
  try {
    const testKey = 'health:check';
    const testValue = Date.now().toString();

    await client.set(testKey, testValue, 'EX', 60);
    const retrieved = await client.get(testKey);

    return retrieved === testValue;
  } catch (error) {
    console.error('Redis health check failed:', error);
    return false;
  }
}
