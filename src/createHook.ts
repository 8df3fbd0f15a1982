import type { Hook, HookHandler } from "./types";

/**
 * Creates an ordered notification point.
 *
 * @returns A hook with no handlers
 *
 * @remarks
 * Handlers are kept in a list and invoked synchronously in the order they were
 * subscribed. A handler that subscribes or unsubscribes while the hook is
 * being invoked only affects the next invocation.
 *
 * @since 1.0.0
 */
export function createHook(): Hook {
  let handlers: HookHandler[] = [];

  const unsubscribe = (handler: HookHandler) => {
    const index = handlers.indexOf(handler);

    if (index === -1) {
      return false;
    }

    handlers = [...handlers.slice(0, index), ...handlers.slice(index + 1)];
    return true;
  };

  return {
    subscribe(handler) {
      if (!handlers.includes(handler)) {
        handlers = [...handlers, handler];
      }

      return () => {
        unsubscribe(handler);
      };
    },
    unsubscribe,
    invoke(args) {
      for (const handler of handlers) {
        handler(args);
      }
    },
    get size() {
      return handlers.length;
    },
  };
}
