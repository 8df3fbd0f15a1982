/**
 * A value SQLite can store and bind.
 *
 * @since 1.0.0
 */
export type SqlValue = string | number | bigint | Buffer | null;

/**
 * A named parameter of a raw SQL statement or function call.
 *
 * @remarks
 * `name` may be written with its SQL prefix (`@id`, `:id`, `$id`) or without
 * it (`id`). When `type` is omitted it is inferred from `value` for logging
 * purposes (`null`, `integer`, `real`, `text`, `bigint` or `blob`).
 *
 * @example
 * ```typescript
 * const params: SqlParameter[] = [
 *   { name: "@status", value: "open" },
 *   { name: "@limit", value: 10, type: "integer" },
 * ];
 * ```
 *
 * @since 1.0.0
 */
export type SqlParameter = {
  name: string;
  value: SqlValue;
  type?: string;
};
