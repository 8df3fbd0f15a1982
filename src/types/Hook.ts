import type { DataContext } from "./DataContext";

/**
 * Handler notified at a commit boundary.
 *
 * @since 1.0.0
 */
export type HookHandler = (args: { context: DataContext }) => void;

/**
 * An ordered, synchronous notification point.
 *
 * @remarks
 * Handlers run in subscription order, one after the other, on the caller's
 * stack. An exception thrown by a handler stops the remaining handlers and
 * propagates to whoever invoked the hook. Subscribing a handler that is
 * already subscribed keeps its original position.
 *
 * @example
 * ```typescript
 * const unsubscribe = context.preSave.subscribe(({ context }) => {
 *   stampAuditColumns(context);
 * });
 *
 * // later
 * unsubscribe();
 * ```
 *
 * @since 1.0.0
 */
export type Hook = {
  /**
   * Appends a handler and returns a function that removes it again.
   */
  subscribe: (handler: HookHandler) => () => void;

  /**
   * Removes a handler.
   *
   * @returns `true` when the handler was subscribed
   */
  unsubscribe: (handler: HookHandler) => boolean;

  /**
   * Calls every handler in subscription order.
   */
  invoke: (args: { context: DataContext }) => void;

  /**
   * Number of subscribed handlers.
   */
  readonly size: number;
};
