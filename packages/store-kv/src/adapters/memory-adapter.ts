/**
 * In-memory KeyValueClient adapter
 *
 * Simple Map-based implementation for testing and development.
 * No persistence - data is lost when the instance is garbage collected.
 * TTLs are recorded but never expire entries.
 */

import type { KeyValueClient, KeyValueSetOptions } from "../key-value-client.js";

export class MemoryKeyValueClient implements KeyValueClient {
  private store = new Map<string, string>();
  private ttls = new Map<string, number>();
  private closed = false;

  async get(key: string): Promise<string | undefined> {
    this.ensureOpen();
    return this.store.get(key);
  }

  async set(key: string, value: string, options?: KeyValueSetOptions): Promise<void> {
    this.ensureOpen();
    this.store.set(key, value);
    if (options?.ttlSeconds !== undefined) {
      this.ttls.set(key, options.ttlSeconds);
    } else {
      this.ttls.delete(key);
    }
  }

  async del(key: string): Promise<void> {
    this.ensureOpen();
    this.store.delete(key);
    this.ttls.delete(key);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * TTL given with the last write of `key` (for testing)
   */
  ttlOf(key: string): number | undefined {
    return this.ttls.get(key);
  }

  /**
   * Snapshot of all stored keys (for testing)
   */
  keys(): string[] {
    return [...this.store.keys()];
  }

  /**
   * Get the number of entries in the store (for testing)
   */
  get size(): number {
    return this.store.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Clear all entries (for testing)
   */
  clear(): void {
    this.store.clear();
    this.ttls.clear();
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error("Connection is closed");
    }
  }
}
