import type { SqlParameter, SqlValue } from "./types";

/**
 * SQLite storage class of a value.
 * @internal
 */
export function inferSqlType(value: SqlValue): string {
  if (value === null) return "null";
  if (typeof value === "string") return "text";
  if (typeof value === "bigint") return "bigint";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "real";
  }
  return "blob";
}

/**
 * Renders a parameter as `name : value : type` for logs.
 * @internal
 */
export function formatParameter(parameter: SqlParameter): string {
  const type = parameter.type ?? inferSqlType(parameter.value);
  const value =
    parameter.value instanceof Buffer
      ? `<${parameter.value.length} bytes>`
      : String(parameter.value);

  return `${parameter.name} : ${value} : ${type}`;
}
