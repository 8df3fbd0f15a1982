import { z } from "zod";
import type { EntityConstructor, EntityMapping } from "./types";

const identifier = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain SQL identifier");

/**
 * Shape every entity mapping must satisfy.
 * @internal
 */
export const entityMappingSchema = z
  .object({
    entity: z.custom<EntityConstructor>(
      (value) => typeof value === "function",
      "must be a class",
    ),
    table: identifier,
    id: identifier,
    columns: z.array(identifier).min(1),
  })
  .superRefine((mapping, ctx) => {
    if (!mapping.columns.includes(mapping.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["id"],
        message: `"${mapping.id}" must be one of the mapped columns`,
      });
    }
    if (new Set(mapping.columns).size !== mapping.columns.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["columns"],
        message: "columns must not repeat",
      });
    }
  });

/**
 * Defines how an entity class is stored in a table.
 *
 * @param mapping - The mapping
 * @param mapping.entity - The entity class; it must have a zero-argument constructor
 * @param mapping.table - The table name
 * @param mapping.id - The identifier property
 * @param mapping.columns - Every persisted property, including `id`
 *
 * @returns The same mapping
 *
 * @throws `ZodError` when a name is not a plain SQL identifier, `id` is not a
 * mapped column, or a column is listed twice
 *
 * @example
 * ```typescript
 * class Customer {
 *   id: number | null = null;
 *   name = "";
 *   tier = "standard";
 * }
 *
 * const customerMapping = defineMapping({
 *   entity: Customer,
 *   table: "customers",
 *   id: "id",
 *   columns: ["id", "name", "tier"],
 * });
 * ```
 *
 * @since 1.0.0
 */
export function defineMapping<$$Entity extends object>(
  mapping: EntityMapping<$$Entity>,
): EntityMapping<$$Entity> {
  entityMappingSchema.parse(mapping);
  return mapping;
}
