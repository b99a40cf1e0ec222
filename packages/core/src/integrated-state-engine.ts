import { describeValue } from "./errors.js";
import { MemoryStateStore } from "./memory-state-store.js";
import { StateEngine } from "./state-engine.js";
import { assertMachineId } from "./state-kind.js";
import type { StateStore } from "./state-store.js";
import type { HandlerBinder, Logger, MachineId, State, StateHandler } from "./types.js";

/**
 * Options for IntegratedStateEngine.
 */
export interface IntegratedStateEngineOptions {
  /**
   * Where machine states are kept. Defaults to a new MemoryStateStore.
   */
  store?: StateStore;

  /**
   * Optional logger for debugging.
   */
  logger?: Logger;
}

/**
 * State machine dispatcher that keeps each machine's state in a StateStore.
 *
 * Callers pass a machine id instead of a state: the stored state is looked
 * up, the handler runs, and the result is written back. Machines that
 * return to the entry point (absent or default state) are removed from the
 * store, so it only holds machines that are away from rest.
 *
 * There is no locking between the read and the write: two concurrent
 * executions for the same id can interleave and lose one update.
 *
 * @example
 * ```ts
 * const engine = new IntegratedStateEngine<[string]>({
 *   store: createRedisStateStore({ url: "redis://localhost:6379" }),
 * });
 * engine.register("asleep")((input) => (input === "wake" ? "awake" : "asleep"));
 * engine.register("awake", true)((input) => (input === "sleep" ? "asleep" : "awake"));
 *
 * await engine.execute("user-42", "sleep");
 * await engine.stateOf("user-42"); // "asleep"
 * ```
 */
export class IntegratedStateEngine<TInput extends unknown[] = unknown[]> {
  readonly store: StateStore;
  private readonly engine: StateEngine<TInput>;
  private readonly logger?: Logger;

  constructor(options: IntegratedStateEngineOptions = {}) {
    this.store = options.store ?? new MemoryStateStore();
    this.logger = options.logger;
    this.engine = new StateEngine<TInput>({ logger: options.logger });
  }

  /**
   * Returns a binder that registers a handler for `state`.
   *
   * @see StateEngine.register
   */
  register(state: State, isDefault = false): HandlerBinder<TInput> {
    return this.engine.register(state, isDefault);
  }

  /**
   * Advances the machine identified by `id` with `input`.
   *
   * Errors from the handler or from dispatching propagate as they are and
   * leave the stored state untouched. A store failure after the handler
   * ran leaves the store behind the machine.
   *
   * The next state is checked by the store when it is written, after the
   * handler has run: a handler returning something that is not a state
   * (a boolean, NaN, Infinity) fails here with InvalidStateKindError and
   * the previously stored state is kept.
   *
   * @throws InvalidIdentifierKindError if `id` is not a string or number
   * @throws InvalidStateKindError if the handler returns an invalid state
   */
  async execute(id: MachineId, ...input: TInput): Promise<void> {
    assertMachineId(id);

    const current = await this.store.get(id);
    const next = await this.engine.execute(current, ...input);

    // isResting is not a type guard; the undefined check narrows `next` for set()
    if (next === undefined || this.engine.isResting(next)) {
      this.logger?.debug?.(`Machine ${describeValue(id)} is back at rest`);
      await this.store.delete(id);
    } else {
      await this.store.set(id, next);
    }
  }

  /**
   * Stored state of a machine, undefined when it is at rest.
   *
   * @throws InvalidIdentifierKindError if `id` is not a string or number
   */
  async stateOf(id: MachineId): Promise<State | undefined> {
    assertMachineId(id);
    return this.store.get(id);
  }

  /**
   * Puts a machine back at rest by dropping its stored state.
   *
   * @throws InvalidIdentifierKindError if `id` is not a string or number
   */
  async reset(id: MachineId): Promise<void> {
    assertMachineId(id);
    await this.store.delete(id);
  }

  /**
   * @throws OutsideHandlerContextError when read outside a handler
   */
  get currentState(): State {
    return this.engine.currentState;
  }

  /**
   * @throws OutsideHandlerContextError when read outside a handler
   */
  get currentHandler(): StateHandler<TInput> {
    return this.engine.currentHandler;
  }

  get defaultState(): State | undefined {
    return this.engine.defaultState;
  }

  hasHandler(state: State): boolean {
    return this.engine.hasHandler(state);
  }

  states(): State[] {
    return this.engine.states();
  }

  /**
   * Closes the underlying store, if it holds resources.
   */
  async close(): Promise<void> {
    await this.store.close?.();
  }
}
