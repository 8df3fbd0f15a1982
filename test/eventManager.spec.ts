import { describe, expect, test, vi } from "vitest";
import {
  createDataContext,
  createEventManager,
  type DataContext,
  type Interceptor,
  registerEventManager,
} from "../src";
import { createCapturingLogger, silentLogger } from "./logs";
import { createRecordingSession } from "./sessions";

const createContext = (onCommit?: () => void): DataContext =>
  createDataContext(createRecordingSession({ onCommit }), {
    logger: silentLogger,
  });

const interceptor = (
  name: string,
  event: Interceptor["event"],
  priority: number,
  calls: string[],
): Interceptor => ({
  name,
  event,
  priority,
  apply() {
    calls.push(name);
  },
});

describe("EventManager", () => {
  /**
   * Section 1: Registration
   */
  describe("1. Registration", () => {
    test("should link the context and the event manager both ways", () => {
      const context = createContext();
      const eventManager = createEventManager({ logger: silentLogger });

      registerEventManager(context, eventManager);

      expect(eventManager.context).toBe(context);
      expect(context.eventManager).toBe(eventManager);
      expect(context.preSave.size).toBe(1);
      expect(context.postSave.size).toBe(1);
    });

    test("should move an event manager to its new context", () => {
      const first = createContext();
      const second = createContext();
      const eventManager = createEventManager({ logger: silentLogger });

      registerEventManager(first, eventManager);
      registerEventManager(second, eventManager);

      expect(eventManager.context).toBe(second);
      expect(first.eventManager).toBeNull();
      expect(first.preSave.size).toBe(0);
      expect(first.postSave.size).toBe(0);
      expect(second.preSave.size).toBe(1);
    });

    test("should release the previous event manager of a context", () => {
      const context = createContext();
      const previous = createEventManager({ logger: silentLogger });
      const next = createEventManager({ logger: silentLogger });

      registerEventManager(context, previous);
      registerEventManager(context, next);

      expect(previous.context).toBeNull();
      expect(context.eventManager).toBe(next);
      expect(context.preSave.size).toBe(1);
    });

    test("should not subscribe twice when registered again with the same context", () => {
      const context = createContext();
      const eventManager = createEventManager({ logger: silentLogger });

      registerEventManager(context, eventManager);
      registerEventManager(context, eventManager);

      expect(context.preSave.size).toBe(1);
      expect(context.postSave.size).toBe(1);
    });
  });

  /**
   * Section 2: Interceptor Execution
   */
  describe("2. Interceptor Execution", () => {
    test("should run interceptors by ascending priority around the commit", () => {
      const calls: string[] = [];
      const context = createContext(() => calls.push("commit"));
      const eventManager = createEventManager({
        logger: silentLogger,
        interceptors: [
          interceptor("audit", "postSave", 5, calls),
          interceptor("stamp", "preSave", 10, calls),
          interceptor("validate", "preSave", 0, calls),
        ],
      });

      registerEventManager(context, eventManager);
      context.commit();

      expect(calls).toEqual(["validate", "stamp", "commit", "audit"]);
    });

    test("should keep registration order for equal priorities", () => {
      const calls: string[] = [];
      const context = createContext();
      const eventManager = createEventManager({ logger: silentLogger });

      eventManager.register(interceptor("first", "preSave", 1, calls));
      eventManager.register(interceptor("second", "preSave", 1, calls));
      eventManager.register(interceptor("third", "preSave", 1, calls));
      registerEventManager(context, eventManager);
      context.commit();

      expect(calls).toEqual(["first", "second", "third"]);
    });

    test("should pass the context and the event to interceptors", () => {
      const apply = vi.fn();
      const context = createContext();
      const eventManager = createEventManager({
        logger: silentLogger,
        interceptors: [{ name: "spy", event: "postSave", priority: 0, apply }],
      });

      registerEventManager(context, eventManager);
      context.commit();

      expect(apply).toHaveBeenCalledWith({ context, event: "postSave" });
    });

    test("should skip the remaining interceptors when one stops execution", () => {
      const calls: string[] = [];
      const { logger, records } = createCapturingLogger();
      const context = createContext(() => calls.push("commit"));
      const eventManager = createEventManager({
        logger,
        interceptors: [
          {
            name: "gate",
            event: "preSave",
            priority: 0,
            apply() {
              calls.push("gate");
              return { continueExecution: false, message: "nothing to stamp" };
            },
          },
          interceptor("stamp", "preSave", 1, calls),
        ],
      });

      registerEventManager(context, eventManager);
      context.commit();

      expect(calls).toEqual(["gate", "commit"]);
      expect(records).toContainEqual(
        expect.objectContaining({
          level: "debug",
          msg: "Interceptor stopped execution",
          interceptor: "gate",
          event: "preSave",
          message: "nothing to stamp",
        }),
      );
    });

    test("should continue when an interceptor allows it", () => {
      const calls: string[] = [];
      const context = createContext();
      const eventManager = createEventManager({
        logger: silentLogger,
        interceptors: [
          {
            name: "pass",
            event: "preSave",
            priority: 0,
            apply() {
              calls.push("pass");
              return { continueExecution: true };
            },
          },
          interceptor("next", "preSave", 1, calls),
        ],
      });

      registerEventManager(context, eventManager);
      context.commit();

      expect(calls).toEqual(["pass", "next"]);
    });

    test("should not run unregistered interceptors", () => {
      const calls: string[] = [];
      const context = createContext();
      const removed = interceptor("removed", "preSave", 0, calls);
      const eventManager = createEventManager({
        logger: silentLogger,
        interceptors: [removed, interceptor("kept", "preSave", 1, calls)],
      });

      expect(eventManager.unregister(removed)).toBe(true);
      expect(eventManager.unregister(removed)).toBe(false);

      registerEventManager(context, eventManager);
      context.commit();

      expect(calls).toEqual(["kept"]);
      expect(eventManager.interceptors.map(({ name }) => name)).toEqual([
        "kept",
      ]);
    });

    test("should prevent the commit when a preSave interceptor throws", () => {
      const session = createRecordingSession();
      const context = createDataContext(session, { logger: silentLogger });
      const eventManager = createEventManager({
        logger: silentLogger,
        interceptors: [
          {
            name: "reject",
            event: "preSave",
            priority: 0,
            apply() {
              throw new Error("order total must be positive");
            },
          },
        ],
      });

      registerEventManager(context, eventManager);

      expect(() => context.commit()).toThrow("order total must be positive");
      expect(session.calls).toEqual([]);
    });
  });
});
