/**
 * Redis KeyValueClient adapter
 *
 * Wraps an ioredis client. GET/SET/DEL map one to one; TTLs become
 * `SET key value EX seconds`.
 */

import type { Logger } from "@fsm-dispatch/core";
import { Redis, type RedisOptions } from "ioredis";
import type { KeyValueClient, KeyValueSetOptions } from "../key-value-client.js";
import { KvStateStore } from "../kv-state-store.js";

export class RedisKeyValueClient implements KeyValueClient {
  constructor(readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, options?: KeyValueSetOptions): Promise<void> {
    if (options?.ttlSeconds !== undefined) {
      await this.redis.set(key, value, "EX", options.ttlSeconds);
    } else {
      await this.redis.set(key, value);
    }
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

/**
 * Options for createRedisStateStore.
 */
export interface RedisStateStoreOptions {
  /** Connection URL, e.g. "redis://localhost:6379/0" */
  url?: string;
  /** ioredis connection options, merged over what the URL specifies */
  redis?: RedisOptions;
  /** Prefix prepended to every key. Default: "fsm:" */
  prefix?: string;
  /** Expire stored states after this many seconds */
  ttlSeconds?: number;
  /**
   * Optional logger for debugging.
   */
  logger?: Logger;
}

/**
 * Creates a KvStateStore backed by a new Redis connection.
 *
 * The connection belongs to the store: closing the store quits it.
 *
 * @example
 * ```ts
 * const store = createRedisStateStore({ url: "redis://localhost:6379" });
 * const engine = new IntegratedStateEngine({ store });
 * // ...
 * await engine.close();
 * ```
 */
export function createRedisStateStore(options: RedisStateStoreOptions = {}): KvStateStore {
  const redisOptions = options.redis ?? {};
  const redis = options.url ? new Redis(options.url, redisOptions) : new Redis(redisOptions);

  redis.on("error", (error: unknown) => {
    options.logger?.error?.("Redis connection error:", error);
  });

  return new KvStateStore({
    client: new RedisKeyValueClient(redis),
    prefix: options.prefix,
    ttlSeconds: options.ttlSeconds,
    logger: options.logger,
  });
}
