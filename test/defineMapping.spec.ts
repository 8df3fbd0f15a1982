import { describe, expect, test } from "vitest";
import { ZodError } from "zod";
import { defineMapping } from "../src";
import { entityMappingSchema } from "../src/defineMapping";
import { Customer, customerMapping } from "./entities";

describe("defineMapping", () => {
  test("should return the mapping it was given", () => {
    const mapping = {
      entity: Customer,
      table: "customers",
      id: "id",
      columns: ["id", "name"],
    } as const;

    expect(defineMapping(mapping)).toBe(mapping);
  });

  test("should accept the test mappings", () => {
    expect(entityMappingSchema.safeParse(customerMapping).success).toBe(true);
  });

  test("should require the identifier to be a mapped column", () => {
    const result = entityMappingSchema.safeParse({
      entity: Customer,
      table: "customers",
      id: "id",
      columns: ["name", "email"],
    });

    expect(result.error?.issues.map((issue) => issue.message)).toEqual([
      '"id" must be one of the mapped columns',
    ]);
  });

  test("should reject names that are not plain identifiers", () => {
    const result = entityMappingSchema.safeParse({
      entity: Customer,
      table: "customers; DROP TABLE customers",
      id: "id",
      columns: ["id"],
    });

    expect(result.error?.issues).toEqual([
      expect.objectContaining({
        path: ["table"],
        message: "must be a plain SQL identifier",
      }),
    ]);
  });

  test("should reject repeated columns", () => {
    expect(() =>
      defineMapping({
        entity: Customer,
        table: "customers",
        id: "id",
        columns: ["id", "name", "name"],
      }),
    ).toThrow(ZodError);
  });
});
