import { describe, expect, test } from "vitest";
import { createDataContext } from "./createDataContext";
import { createHook } from "./createHook";
import { createLogger } from "./createLogger";
import type { DataContext, Session } from "./types";

const context: DataContext = createDataContext(
  {
    save() {},
    delete() {},
    update() {},
    persist() {},
    evict() {},
    refresh() {},
    query() {
      throw new Error("not queried in hook tests");
    },
    transaction: {
      commit: () => 0,
      rollback() {},
    },
    sqlQuery: () => [],
    sqlCommand: () => 0,
    callFunction: () => [],
    close() {},
  } satisfies Session,
  { logger: createLogger({ level: "silent" }) },
);

describe("createHook", () => {
  test("should invoke handlers in subscription order", () => {
    const hook = createHook();
    const calls: string[] = [];

    hook.subscribe(() => calls.push("first"));
    hook.subscribe(() => calls.push("second"));
    hook.subscribe(() => calls.push("third"));
    hook.invoke({ context });

    expect(calls).toEqual(["first", "second", "third"]);
  });

  test("should keep the original position of a handler subscribed twice", () => {
    const hook = createHook();
    const calls: string[] = [];
    const a = () => {
      calls.push("a");
    };
    const b = () => {
      calls.push("b");
    };

    hook.subscribe(a);
    hook.subscribe(b);
    hook.subscribe(a);
    hook.invoke({ context });

    expect(hook.size).toBe(2);
    expect(calls).toEqual(["a", "b"]);
  });

  test("unsubscribe() reports whether the handler was subscribed", () => {
    const hook = createHook();
    const handler = () => {};

    hook.subscribe(handler);

    expect(hook.unsubscribe(handler)).toBe(true);
    expect(hook.unsubscribe(handler)).toBe(false);
    expect(hook.size).toBe(0);
  });

  test("should apply subscriptions made during an invocation to the next one", () => {
    const hook = createHook();
    const calls: string[] = [];
    const late = () => {
      calls.push("late");
    };

    hook.subscribe(() => {
      calls.push("early");
      hook.subscribe(late);
    });

    hook.invoke({ context });
    hook.invoke({ context });

    expect(calls).toEqual(["early", "early", "late"]);
  });

  test("should stop at the first handler that throws", () => {
    const hook = createHook();
    const calls: string[] = [];

    hook.subscribe(() => {
      throw new Error("boom");
    });
    hook.subscribe(() => calls.push("after"));

    expect(() => hook.invoke({ context })).toThrow("boom");
    expect(calls).toEqual([]);
  });
});
