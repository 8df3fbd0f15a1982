import type { DataContext, EventManager } from "./types";

/**
 * Registers an event manager with a data context.
 *
 * @param context - The data context whose commits the manager observes
 * @param eventManager - The event manager to register
 *
 * @remarks
 * Both sides are updated: `context.eventManager` becomes `eventManager` and
 * `eventManager.context` becomes `context`. A manager previously registered
 * with the context is released, and a context the manager was previously
 * registered with stops notifying it.
 *
 * @example
 * ```typescript
 * const eventManager = createEventManager({ interceptors });
 * registerEventManager(context, eventManager);
 *
 * eventManager.context === context; // true
 * ```
 *
 * @since 1.0.0
 */
export function registerEventManager(
  context: DataContext,
  eventManager: EventManager,
): void {
  const previousManager = context.eventManager;
  if (previousManager && previousManager !== eventManager) {
    previousManager[" $$attach"](null);
  }

  const previousContext = eventManager.context;
  if (previousContext && previousContext !== context) {
    previousContext[" $$setEventManager"](null);
  }

  eventManager[" $$attach"](context);
  context[" $$setEventManager"](eventManager);
}
