/**
 * State value identifying a node of the machine.
 *
 * Strings and numbers only. `undefined` is reserved for "no state yet" and
 * always resolves to the default (entry) handler, so it can never be bound
 * as a regular state.
 */
export type State = string | number;

/**
 * Identifier correlating a logical machine instance with its stored state.
 */
export type MachineId = string | number;

/**
 * Handler function bound to a single state.
 *
 * Receives the caller's input and returns the next state. Returning
 * `undefined` sends the machine back to its entry point. Can be async.
 *
 * @template TInput - Tuple of input arguments accepted by the machine
 *
 * @example
 * ```ts
 * const asleep: StateHandler<[string]> = (input) =>
 *   input === "wake" ? "awake" : "asleep";
 * ```
 */
export type StateHandler<TInput extends unknown[] = unknown[]> = (
  ...input: TInput
) => State | undefined | Promise<State | undefined>;

/**
 * Registration acceptor returned by `register()`.
 *
 * Binds the handler and hands it back unchanged, so it can wrap a
 * function expression at its definition site.
 */
export type HandlerBinder<TInput extends unknown[] = unknown[]> = <
  H extends StateHandler<TInput>,
>(
  handler: H,
) => H;

/**
 * State and handler of the invocation in progress.
 */
export interface ExecutionContext<TInput extends unknown[] = unknown[]> {
  readonly state: State;
  readonly handler: StateHandler<TInput>;
}

/**
 * Optional logger accepted by engines and stores.
 */
export interface Logger {
  debug?: (...args: unknown[]) => void;
  info?: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}
