import sortBy from "just-sort-by";
import { createLogger, type Logger } from "./createLogger";
import type {
  DataContext,
  EventManager,
  HookHandler,
  Interceptor,
  InterceptorEvent,
} from "./types";

/**
 * Creates an event manager that runs interceptors around commits.
 *
 * @param args - Event manager configuration
 * @param args.interceptors - Interceptors registered up front
 * @param args.logger - Logger for interceptor execution
 *
 * @returns An event manager, not yet registered with any data context
 *
 * @remarks
 * Once registered with `registerEventManager()`, the manager subscribes to the
 * context's `preSave` and `postSave` hooks and, on each of them, runs the
 * interceptors registered for that event:
 *
 * - sorted by ascending `priority`, ties keeping registration order;
 * - synchronously, one after the other;
 * - until one returns `{ continueExecution: false }`, which skips the rest.
 *
 * An interceptor that throws stops the chain and the error reaches the caller
 * of `commit()`. Thrown from a `preSave` interceptor, it prevents the commit.
 *
 * @example
 * ```typescript
 * const eventManager = createEventManager({
 *   interceptors: [
 *     { name: "validate", event: "preSave", priority: 0, apply: validateAll },
 *     { name: "audit", event: "postSave", priority: 10, apply: writeAudit },
 *   ],
 * });
 *
 * registerEventManager(context, eventManager);
 * ```
 *
 * @since 1.0.0
 */
export function createEventManager(
  args: { interceptors?: Interceptor[]; logger?: Logger } = {},
): EventManager {
  const logger = args.logger ?? createLogger();
  let interceptors: Interceptor[] = [...(args.interceptors ?? [])];
  let context: DataContext | null = null;
  let detach: (() => void) | null = null;

  const run = (event: InterceptorEvent, target: DataContext) => {
    const ordered = sortBy(
      interceptors.filter((interceptor) => interceptor.event === event),
      (interceptor: Interceptor) => interceptor.priority,
    );

    for (const interceptor of ordered) {
      logger.trace(
        { interceptor: interceptor.name, event, priority: interceptor.priority },
        "Applying interceptor",
      );

      const result = interceptor.apply({ context: target, event });

      if (result && !result.continueExecution) {
        logger.debug(
          { interceptor: interceptor.name, event, message: result.message },
          "Interceptor stopped execution",
        );
        return;
      }
    }
  };

  const handlePreSave: HookHandler = ({ context: target }) => {
    run("preSave", target);
  };
  const handlePostSave: HookHandler = ({ context: target }) => {
    run("postSave", target);
  };

  return {
    get context() {
      return context;
    },
    get interceptors() {
      return interceptors;
    },
    register(interceptor) {
      interceptors = [...interceptors, interceptor];
    },
    unregister(interceptor) {
      const index = interceptors.indexOf(interceptor);

      if (index === -1) {
        return false;
      }

      interceptors = interceptors.filter((_, i) => i !== index);
      return true;
    },
    " $$attach"(next) {
      if (next === context) {
        return;
      }

      detach?.();
      detach = null;
      context = next;

      if (next) {
        const unsubscribePreSave = next.preSave.subscribe(handlePreSave);
        const unsubscribePostSave = next.postSave.subscribe(handlePostSave);

        detach = () => {
          unsubscribePreSave();
          unsubscribePostSave();
        };
      }
    },
  };
}
