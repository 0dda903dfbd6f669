/**
 * Redis Persisted Store
 *
 * Shares the ConfigCache persisted tier between processes. Each entry is a
 * single SET with an expiry, so readers observe either the previous state or
 * the complete entry.
 *
 * Redis Key Schema:
 * - config:{contentHash} → String (JSON serialized configuration), 7-day TTL
 */

import type { RedisClientOptions } from 'redis';
import type { PersistedStore } from './persisted-store.service';

const TTL_SECONDS = 7 * 24 * 60 * 60; // 7 days
const KEY_PREFIX = 'config:';

/**
 * The subset of a Redis client this store needs. The `redis` package client is
 * adapted to it in index.ts; tests use an in-process Map.
 */
export interface RedisKeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<unknown>;
}

/**
 * Options for the `redis` client behind the store. Commands issued while the
 * client is reconnecting reject at once instead of waiting in the offline
 * queue, so a Redis outage reads as a persisted-tier failure.
 */
export function redisClientOptions(url: string): RedisClientOptions {
  return { url, disableOfflineQueue: true };
}

/**
 * @example
 * ```typescript
 * const store = new RedisPersistedStore({
 *   get: key => client.get(key),
 *   set: (key, value, ttl) => client.set(key, value, { EX: ttl }),
 * });
 * ```
 */
export class RedisPersistedStore implements PersistedStore {
  constructor(
    private readonly redis: RedisKeyValueClient,
    private readonly ttlSeconds: number = TTL_SECONDS
  ) {}

  keyFor(contentHash: string): string {
    return `${KEY_PREFIX}${contentHash}`;
  }

  async read(contentHash: string): Promise<string | null> {
    try {
      return await this.redis.get(this.keyFor(contentHash));
    } catch (error) {
      throw new Error(
        `Failed to get config entry ${contentHash}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  async write(contentHash: string, serialized: string): Promise<void> {
    try {
      await this.redis.set(this.keyFor(contentHash), serialized, this.ttlSeconds);
    } catch (error) {
      throw new Error(
        `Failed to set config entry ${contentHash}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
