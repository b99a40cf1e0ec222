import { describeValue } from "./errors.js";
import { ExecutionScope } from "./execution-context.js";
import { HandlerTable } from "./handler-table.js";
import type { HandlerBinder, Logger, State, StateHandler } from "./types.js";

/**
 * Options for StateEngine.
 */
export interface StateEngineOptions {
  /**
   * Optional logger for debugging.
   */
  logger?: Logger;
}

/**
 * Finite state machine dispatcher.
 *
 * Handlers are registered per state; `execute` takes the state the machine
 * is in plus the input, runs the matching handler and returns the next
 * state. The caller keeps track of the state between calls. Use
 * IntegratedStateEngine to have it stored by machine id instead.
 *
 * @template TInput - Tuple of input arguments passed to every handler
 *
 * @example
 * ```ts
 * const engine = new StateEngine<[string]>();
 *
 * engine.register("asleep")((input) => (input === "wake" ? "awake" : "asleep"));
 * engine.register("awake", true)((input) => (input === "sleep" ? "asleep" : "awake"));
 *
 * let state = await engine.execute(undefined, "sleep"); // "asleep"
 * state = await engine.execute(state, "wake"); // "awake"
 * ```
 */
export class StateEngine<TInput extends unknown[] = unknown[]> {
  private readonly table = new HandlerTable<TInput>();
  private readonly scope = new ExecutionScope<TInput>();
  private readonly logger?: Logger;

  constructor(options: StateEngineOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Returns a binder that registers a handler for `state`.
   *
   * With `isDefault` the handler becomes the entry point: it runs for
   * absent states, and its state is the one machines reset to.
   *
   * The binder throws InvalidStateKindError, DefaultAlreadyRegisteredError
   * or StateAlreadyBoundError, and otherwise returns the handler as given.
   */
  register(state: State, isDefault = false): HandlerBinder<TInput> {
    return (handler) => {
      this.table.bind(state, handler, isDefault);
      this.logger?.debug?.(
        `Registered ${isDefault ? "default " : ""}handler for state ${describeValue(state)}`,
      );
      return handler;
    };
  }

  /**
   * Runs the handler for `state` with `input` and returns its result.
   *
   * The returned state is not checked; a state without a handler fails on
   * the next call with NoHandlerForStateError.
   *
   * @param state - Current state, or undefined/null to start from the entry point
   * @throws NoDefaultRegisteredError if no default handler is registered
   * @throws InvalidStateKindError if `state` is not a string or number
   * @throws NoHandlerForStateError if `state` has no handler
   */
  async execute(state: State | undefined | null, ...input: TInput): Promise<State | undefined> {
    const context = this.table.resolve(state);
    this.logger?.debug?.(`Executing handler for state ${describeValue(context.state)}`);

    const next = await this.scope.run(context, () => context.handler(...input));

    this.logger?.debug?.(
      `Transition ${describeValue(context.state)} -> ${describeValue(next)}`,
    );
    return next;
  }

  /**
   * State of the running handler.
   *
   * @throws OutsideHandlerContextError when read outside a handler
   */
  get currentState(): State {
    return this.scope.currentState;
  }

  /**
   * The running handler itself.
   *
   * @throws OutsideHandlerContextError when read outside a handler
   */
  get currentHandler(): StateHandler<TInput> {
    return this.scope.currentHandler;
  }

  /**
   * Whether a handler of this engine is running in the current call chain.
   */
  get inHandler(): boolean {
    return this.scope.active;
  }

  /**
   * State key of the default handler, if one is registered.
   */
  get defaultState(): State | undefined {
    return this.table.defaultState;
  }

  /**
   * Whether `state` is absent or the default state.
   */
  isResting(state: State | undefined | null): boolean {
    return this.table.isResting(state);
  }

  hasHandler(state: State): boolean {
    return this.table.has(state);
  }

  /**
   * All states with a handler, default first.
   */
  states(): State[] {
    return this.table.states();
  }
}
