import type { SqlParameter, SqlValue } from "./types";

/**
 * Converts an entity or filter value to a value SQLite can bind.
 *
 * @throws When the value has no SQL representation
 * @internal
 */
export function toSqlValue(value: unknown, label: string): SqlValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint"
  ) {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return value;
  }

  throw new Error(`Cannot store a value of type ${typeof value} in "${label}"`);
}

/**
 * Compares two SQL values, byte by byte for blobs.
 * @internal
 */
export function isSameSqlValue(a: SqlValue, b: SqlValue): boolean {
  if (Buffer.isBuffer(a) && Buffer.isBuffer(b)) {
    return a.equals(b);
  }
  return Object.is(a, b);
}

/**
 * Strips the `@`, `:` or `$` prefix of a parameter name.
 * @internal
 */
export function parameterKey(name: string): string {
  return name.replace(/^[@:$]/, "");
}

/**
 * Builds the named bindings of a statement from its parameters.
 * @internal
 */
export function toBindings(
  parameters: readonly SqlParameter[],
): Record<string, SqlValue> {
  return Object.fromEntries(
    parameters.map((parameter) => [
      parameterKey(parameter.name),
      parameter.value,
    ]),
  );
}
