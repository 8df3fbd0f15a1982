import { describe, expect, test } from "vitest";

describe("Package Exports", () => {
  test("should export all public APIs from main index", async () => {
    const mainExports = await import("../src/index");

    expect(mainExports.createDataContext).toBeDefined();
    expect(mainExports.createSQLiteSession).toBeDefined();
    expect(mainExports.createEventManager).toBeDefined();
    expect(mainExports.registerEventManager).toBeDefined();
    expect(mainExports.createHook).toBeDefined();
    expect(mainExports.createLogger).toBeDefined();
    expect(mainExports.defineMapping).toBeDefined();
    expect(mainExports.Query).toBeDefined();
  });

  test("should load the types module", async () => {
    const types = await import("../src/types/index");

    expect(types).toBeDefined();
  });
});
