/**
 * Key-Value Client Interface
 *
 * The three operations a remote key-value service must offer to back a
 * KvStateStore. Implementations:
 * - Redis (RedisKeyValueClient, via ioredis)
 * - HTTP key-value service (HttpKeyValueClient)
 * - In-memory Map (MemoryKeyValueClient, for testing)
 */

/**
 * Extra write options.
 */
export interface KeyValueSetOptions {
  /** Expire the entry after this many seconds */
  ttlSeconds?: number;
}

/**
 * Keys and values are strings. Implementations report transport and
 * protocol failures by throwing; KvStateStore normalizes them.
 */
export interface KeyValueClient {
  /**
   * Get a value by key
   *
   * @returns The value, or null/undefined if not found
   */
  get(key: string): Promise<string | null | undefined>;

  /**
   * Set a value, overwriting any previous one
   */
  set(key: string, value: string, options?: KeyValueSetOptions): Promise<void>;

  /**
   * Delete a key. Deleting a missing key is not an error.
   */
  del(key: string): Promise<void>;

  /**
   * Close the connection and release resources
   *
   * Optional - some clients don't need explicit cleanup.
   */
  close?(): Promise<void>;
}
