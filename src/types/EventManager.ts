import type { DataContext } from "./DataContext";

/**
 * Commit boundary an interceptor listens to.
 *
 * @since 1.0.0
 */
export type InterceptorEvent = "preSave" | "postSave";

/**
 * Outcome of an interceptor.
 *
 * @remarks
 * Returning `{ continueExecution: false }` stops the interceptors that would
 * run after this one for the same event. It never stops the commit itself.
 *
 * @since 1.0.0
 */
export type InterceptorResult = {
  continueExecution: boolean;
  message?: string;
};

/**
 * A prioritised handler run by an event manager at a commit boundary.
 *
 * @example
 * ```typescript
 * const auditInterceptor: Interceptor = {
 *   name: "audit",
 *   event: "postSave",
 *   priority: 10,
 *   apply({ context }) {
 *     context.executeSqlCommand(
 *       "INSERT INTO audit (at) VALUES (@at)",
 *       { name: "@at", value: new Date().toISOString() },
 *     );
 *   },
 * };
 * ```
 *
 * @since 1.0.0
 */
export type Interceptor = {
  name: string;
  event: InterceptorEvent;

  /**
   * Lower priorities run first.
   */
  priority: number;

  apply: (args: {
    context: DataContext;
    event: InterceptorEvent;
  }) => InterceptorResult | void;
};

/**
 * Runs registered interceptors, in priority order, around the commits of the
 * data context it is registered with.
 *
 * @since 1.0.0
 */
export type EventManager = {
  /**
   * The data context this manager is registered with.
   */
  readonly context: DataContext | null;

  /**
   * Registered interceptors, in registration order.
   */
  readonly interceptors: readonly Interceptor[];

  register: (interceptor: Interceptor) => void;

  /**
   * @returns `true` when the interceptor was registered
   */
  unregister: (interceptor: Interceptor) => boolean;

  /**
   * Subscribes the manager to a data context, leaving the previous one.
   * @internal Use `registerEventManager()`.
   */
  " $$attach": (context: DataContext | null) => void;
};
