/**
 * Word Store Service - Durable Word List in Redis
 *
 * Holds every known word as one JSON record in a Redis list. The in-memory
 * WordCache is loaded from here once per process and appended to as users add
 * words; the store itself performs no deduplication.
 *
 * Redis Key Schema:
 * - {WORD_STORE_KEY} → List (element: JSON StoredWordRecord)
 *
 * The client is created on first use. A missing REDIS_URL therefore fails the
 * first scan or put with a ConfigurationError rather than server startup.
 */

import type Redis from 'ioredis';
import { ConfigurationError, RemoteStoreError } from '../utils/errors';
import { createRedisClient, redisHealthCheck } from '../utils/redis';
import type { StoredWordRecord, WordCategory } from '../types/word.types';

/**
 * Durable backing store of all known words.
 */
export interface WordStore {
  /** Lists every record; records are loosely typed and validated by the caller */
  scan(): Promise<unknown[]>;
  /** Appends one record; not idempotent */
  put(word: string, category: WordCategory, addedBy?: string): Promise<void>;
}

export type WordListClient = Pick<Redis, 'lrange' | 'rpush' | 'set' | 'get'>;

export interface RedisWordStoreOptions {
  redisUrl?: string;
  key: string;
  commandTimeoutMs: number;
  /** Overrides client construction (tests) */
  clientFactory?: (url: string) => WordListClient;
}

export type StoreHealth = 'ok' | 'unavailable' | 'unconfigured';

/**
 * RedisWordStore keeps word records in a single Redis list.
 *
 * @example
 * ```typescript
 * const store = new RedisWordStore({
 *   redisUrl: 'redis://localhost:6379',
 *   key: 'insult:words',
 *   commandTimeoutMs: 5000,
 * });
 *
 * await store.put('slimy', 'descriptor', 'U123');
 * const records = await store.scan();
 * // [{ word: 'slimy', category: 'descriptor', addedBy: 'U123', createdAt: 1728950400000 }]
 * ```
 */
export class RedisWordStore implements WordStore {
  private client: WordListClient | null = null;

  constructor(private readonly options: RedisWordStoreOptions) {}

  /**
   * Reads the whole list. Elements that are not valid JSON are returned as
   * null so the cache loader counts them as malformed.
   *
   * @throws {ConfigurationError} If REDIS_URL is not set
   * @throws {RemoteStoreError} If the Redis command fails
   */
  async scan(): Promise<unknown[]> {
    const client = this.getClient();

    let raw: string[];
    try {
      raw = await client.lrange(this.options.key, 0, -1);
    } catch (error) {
      throw new RemoteStoreError('scan', error);
    }

    return raw.map(parseElement);
  }

  /**
   * Appends a record for the word to the list.
   *
   * @throws {ConfigurationError} If REDIS_URL is not set
   * @throws {RemoteStoreError} If the Redis command fails
   */
  async put(word: string, category: WordCategory, addedBy?: string): Promise<void> {
    const client = this.getClient();
    const record: StoredWordRecord = {
      word,
      category,
      ...(addedBy ? { addedBy } : {}),
      createdAt: Date.now(),
    };

    try {
      await client.rpush(this.options.key, JSON.stringify(record));
    } catch (error) {
      throw new RemoteStoreError('put', error);
    }
  }

  /**
   * Reports whether Redis answers. Never throws.
   */
  async health(): Promise<StoreHealth> {
    if (!this.options.redisUrl) {
      return 'unconfigured';
    }
    return (await redisHealthCheck(this.getClient())) ? 'ok' : 'unavailable';
  }

  private getClient(): WordListClient {
    if (this.client) {
      return this.client;
    }

    const url = this.options.redisUrl;
    if (!url) {
      throw new ConfigurationError(
        'REDIS_URL environment variable is required to load the word list. ' +
          'Set it to the Redis instance holding the words (e.g. redis://localhost:6379).'
      );
    }

    const factory =
      this.options.clientFactory ??
      ((redisUrl: string) =>
        createRedisClient({
          url: redisUrl,
          commandTimeoutMs: this.options.commandTimeoutMs,
        }));
    this.client = factory(url);
    return this.client;
  }
}

function parseElement(element: string): unknown {
  try {
    return JSON.parse(element);
  } catch {
    return null;
  }
}
