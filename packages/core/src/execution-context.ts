/**
 * Call-scoped record of the handler being executed.
 *
 * Backed by AsyncLocalStorage: the context follows the asynchronous call
 * chain of one invocation, so concurrent executions on the same dispatcher
 * never see each other's state, and leaving the invocation (by return,
 * throw or rejection) drops the context with it.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { OutsideHandlerContextError } from "./errors.js";
import type { ExecutionContext, State, StateHandler } from "./types.js";

export class ExecutionScope<TInput extends unknown[] = unknown[]> {
  private readonly storage = new AsyncLocalStorage<ExecutionContext<TInput>>();

  /**
   * Runs `fn` with `context` active for everything it calls.
   */
  run<R>(context: ExecutionContext<TInput>, fn: () => R): R {
    return this.storage.run(context, fn);
  }

  /**
   * Context of the innermost running invocation, if any.
   */
  peek(): ExecutionContext<TInput> | undefined {
    return this.storage.getStore();
  }

  get active(): boolean {
    return this.storage.getStore() !== undefined;
  }

  /**
   * @throws OutsideHandlerContextError when no handler is running
   */
  get currentState(): State {
    return this.require("currentState").state;
  }

  /**
   * @throws OutsideHandlerContextError when no handler is running
   */
  get currentHandler(): StateHandler<TInput> {
    return this.require("currentHandler").handler;
  }

  private require(accessor: string): ExecutionContext<TInput> {
    const context = this.storage.getStore();
    if (!context) {
      throw new OutsideHandlerContextError(accessor);
    }
    return context;
  }
}
