/**
 * KV-based StateStore implementation
 *
 * Stores machine states in a remote key-value service with JSON
 * serialization. Both ids and states are JSON-encoded, so the string "1"
 * and the number 1 stay distinct on the wire.
 */

import {
  assertMachineId,
  assertState,
  isState,
  type Logger,
  type MachineId,
  type State,
  type StateStore,
  type StoreOperation,
  StoreUnavailableError,
} from "@fsm-dispatch/core";
import type { KeyValueClient } from "./key-value-client.js";

/**
 * Key prefix for machine states
 */
export const DEFAULT_KEY_PREFIX = "fsm:";

/**
 * Options for KvStateStore.
 */
export interface KvStateStoreOptions {
  /** Client of the key-value service */
  client: KeyValueClient;
  /** Prefix prepended to every key. Default: "fsm:" */
  prefix?: string;
  /** Expire stored states after this many seconds */
  ttlSeconds?: number;
  /**
   * Optional logger for debugging.
   */
  logger?: Logger;
}

export class KvStateStore implements StateStore {
  private readonly client: KeyValueClient;
  private readonly prefix: string;
  private readonly ttlSeconds?: number;
  private readonly logger?: Logger;

  constructor(options: KvStateStoreOptions) {
    this.client = options.client;
    this.prefix = options.prefix ?? DEFAULT_KEY_PREFIX;
    this.ttlSeconds = options.ttlSeconds;
    this.logger = options.logger;
  }

  /**
   * Key under which the state of `id` is kept.
   *
   * @throws InvalidIdentifierKindError if `id` is not a string or number
   */
  keyOf(id: MachineId): string {
    assertMachineId(id);
    return `${this.prefix}${JSON.stringify(id)}`;
  }

  async get(id: MachineId): Promise<State | undefined> {
    const key = this.keyOf(id);

    let raw: string | null | undefined;
    try {
      raw = await this.client.get(key);
    } catch (error) {
      throw this.unavailable("get", key, error);
    }

    if (raw === null || raw === undefined) {
      return undefined;
    }
    return this.decode(key, raw);
  }

  async set(id: MachineId, state: State): Promise<void> {
    const key = this.keyOf(id);
    assertState(state);

    const options = this.ttlSeconds !== undefined ? { ttlSeconds: this.ttlSeconds } : undefined;
    try {
      await this.client.set(key, JSON.stringify(state), options);
    } catch (error) {
      throw this.unavailable("set", key, error);
    }
  }

  async delete(id: MachineId): Promise<void> {
    const key = this.keyOf(id);
    try {
      await this.client.del(key);
    } catch (error) {
      throw this.unavailable("delete", key, error);
    }
  }

  async close(): Promise<void> {
    await this.client.close?.();
  }

  private decode(key: string, raw: string): State {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw this.unavailable("get", key, error);
    }
    if (!isState(value)) {
      throw this.unavailable("get", key, new Error(`Stored value is not a state: ${raw}`));
    }
    return value;
  }

  private unavailable(operation: StoreOperation, key: string, cause: unknown): StoreUnavailableError {
    const error = new StoreUnavailableError(operation, key, cause);
    this.logger?.error?.(error.message);
    return error;
  }
}
