import {
  DefaultAlreadyRegisteredError,
  NoDefaultRegisteredError,
  NoHandlerForStateError,
  StateAlreadyBoundError,
} from "./errors.js";
import { assertState, isAbsentState } from "./state-kind.js";
import type { ExecutionContext, State, StateHandler } from "./types.js";

/**
 * State-to-handler bindings plus the single default (entry) handler.
 *
 * The default handler lives outside the regular table; its state key is
 * what absent states resolve to and what managed machines reset to.
 */
export class HandlerTable<TInput extends unknown[] = unknown[]> {
  private readonly handlers = new Map<State, StateHandler<TInput>>();
  private entry: ExecutionContext<TInput> | undefined;

  /**
   * Binds `handler` to `state`.
   *
   * @throws InvalidStateKindError if `state` is not a string or number
   * @throws DefaultAlreadyRegisteredError on a second default binding
   * @throws StateAlreadyBoundError on a second binding for `state`
   */
  bind(state: unknown, handler: StateHandler<TInput>, isDefault: boolean): void {
    assertState(state);

    if (isDefault) {
      if (this.entry) {
        throw new DefaultAlreadyRegisteredError(this.entry.state);
      }
      this.entry = { state, handler };
      return;
    }

    if (this.handlers.has(state)) {
      throw new StateAlreadyBoundError(state);
    }
    this.handlers.set(state, handler);
  }

  /**
   * Picks the handler to run for `state`.
   *
   * Absent states and the default key go to the default handler; any
   * other state must have been bound.
   */
  resolve(state: unknown): ExecutionContext<TInput> {
    const entry = this.entry;
    if (!entry) {
      throw new NoDefaultRegisteredError();
    }
    if (isAbsentState(state) || state === entry.state) {
      return entry;
    }

    assertState(state);
    const handler = this.handlers.get(state);
    if (!handler) {
      throw new NoHandlerForStateError(state);
    }
    return { state, handler };
  }

  /**
   * Whether `state` puts a machine at rest: absent, or the default key.
   */
  isResting(state: unknown): boolean {
    return isAbsentState(state) || (this.entry !== undefined && state === this.entry.state);
  }

  get defaultState(): State | undefined {
    return this.entry?.state;
  }

  has(state: State): boolean {
    return this.entry?.state === state || this.handlers.has(state);
  }

  /**
   * Every bound state, default first.
   */
  states(): State[] {
    const result: State[] = [];
    if (this.entry) result.push(this.entry.state);
    for (const state of this.handlers.keys()) {
      if (state !== this.entry?.state) result.push(state);
    }
    return result;
  }
}
