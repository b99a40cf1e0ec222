/**
 * Error classes raised by state engines and state stores.
 */

/**
 * Formats a state or identifier for error messages.
 */
export function describeValue(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

/**
 * Base error for all state engine operations.
 */
export class StateEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StateEngineError";
  }
}

/**
 * A state is not a string or a finite number (booleans included).
 */
export class InvalidStateKindError extends StateEngineError {
  readonly value: unknown;

  constructor(value: unknown) {
    super(
      `Invalid state ${describeValue(value)}: a state can only be a string or a finite number. ` +
        "Use register(state, true) to set the handler for the entry state.",
    );
    this.name = "InvalidStateKindError";
    this.value = value;
  }
}

/**
 * A machine identifier is not a string or a finite number.
 */
export class InvalidIdentifierKindError extends StateEngineError {
  readonly value: unknown;

  constructor(value: unknown) {
    super(`Invalid machine id ${describeValue(value)}: an id can only be a string or a finite number`);
    this.name = "InvalidIdentifierKindError";
    this.value = value;
  }
}

/**
 * A second default (entry) handler was registered.
 */
export class DefaultAlreadyRegisteredError extends StateEngineError {
  /** State the existing default handler is bound to */
  readonly defaultState: unknown;

  constructor(defaultState: unknown) {
    super(
      `An entry point handler is already registered for state ${describeValue(defaultState)}`,
    );
    this.name = "DefaultAlreadyRegisteredError";
    this.defaultState = defaultState;
  }
}

/**
 * A second handler was registered for the same state.
 */
export class StateAlreadyBoundError extends StateEngineError {
  readonly state: unknown;

  constructor(state: unknown) {
    super(`State ${describeValue(state)} is already bound to a handler`);
    this.name = "StateAlreadyBoundError";
    this.state = state;
  }
}

/**
 * Execution was attempted before any default handler was registered.
 */
export class NoDefaultRegisteredError extends StateEngineError {
  constructor() {
    super(
      "No handler is registered for the entry point. " +
        "Register one with register(state, true) before executing.",
    );
    this.name = "NoDefaultRegisteredError";
  }
}

/**
 * The resolved state has no handler bound to it.
 */
export class NoHandlerForStateError extends StateEngineError {
  readonly state: unknown;

  constructor(state: unknown) {
    super(
      `State ${describeValue(state)} does not have a handler bound to it. ` +
        "Handlers must only return states that have a handler.",
    );
    this.name = "NoHandlerForStateError";
    this.state = state;
  }
}

/**
 * A context accessor was read while no handler was running.
 */
export class OutsideHandlerContextError extends StateEngineError {
  /** Name of the accessor that was read */
  readonly accessor: string;

  constructor(accessor: string) {
    super(`"${accessor}" can only be read while a state handler is running`);
    this.name = "OutsideHandlerContextError";
    this.accessor = accessor;
  }
}

/**
 * Operation performed on a state store.
 */
export type StoreOperation = "get" | "set" | "delete";

/**
 * The backing service of a remote state store failed.
 *
 * Wraps whatever the transport threw, so callers never depend on the
 * client library in use. The library does not retry.
 */
export class StoreUnavailableError extends StateEngineError {
  readonly operation: StoreOperation;
  /** Backend key the operation targeted */
  readonly key: string;
  /** Stack (or string form) of the underlying failure */
  readonly trace: string;

  constructor(operation: StoreOperation, key: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`State store unavailable during ${operation} of "${key}": ${reason}`, { cause });
    this.name = "StoreUnavailableError";
    this.operation = operation;
    this.key = key;
    this.trace = cause instanceof Error ? (cause.stack ?? cause.message) : String(cause);
  }
}

/**
 * Checks whether a value is one of the errors above.
 */
export function isStateEngineError(error: unknown): error is StateEngineError {
  return error instanceof StateEngineError;
}
