/**
 * State Store Interface
 *
 * Maps machine ids to the last state they reached. Implementations are
 * passed to IntegratedStateEngine at construction:
 * - In-memory Map (MemoryStateStore, this package)
 * - Remote key-value service (KvStateStore, @fsm-dispatch/store-kv)
 */

import type { MachineId, State } from "./types.js";

/**
 * All operations are async so that remote backends fit the same contract.
 */
export interface StateStore {
  /**
   * Get the stored state of a machine
   *
   * @returns The state, or undefined if none is stored
   */
  get(id: MachineId): Promise<State | undefined>;

  /**
   * Store a machine's state, overwriting any previous one
   *
   * @throws InvalidIdentifierKindError if `id` is not a string or number
   */
  set(id: MachineId, state: State): Promise<void>;

  /**
   * Remove a machine's state. No-op if none is stored.
   */
  delete(id: MachineId): Promise<void>;

  /**
   * Release resources held by the store
   *
   * Optional - the in-memory store has nothing to release.
   */
  close?(): Promise<void>;
}
