/**
 * In-memory StateStore
 *
 * Map-based; lives as long as the owning engine.
 */

import { assertMachineId, assertState } from "./state-kind.js";
import type { StateStore } from "./state-store.js";
import type { MachineId, State } from "./types.js";

export class MemoryStateStore implements StateStore {
  private store = new Map<MachineId, State>();

  async get(id: MachineId): Promise<State | undefined> {
    return this.store.get(id);
  }

  async set(id: MachineId, state: State): Promise<void> {
    assertMachineId(id);
    assertState(state);
    this.store.set(id, state);
  }

  async delete(id: MachineId): Promise<void> {
    this.store.delete(id);
  }

  async has(id: MachineId): Promise<boolean> {
    return this.store.has(id);
  }

  /**
   * Get the number of stored machines (for testing)
   */
  get size(): number {
    return this.store.size;
  }

  /**
   * Clear all entries (for testing)
   */
  clear(): void {
    this.store.clear();
  }
}
