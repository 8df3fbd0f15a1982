import { toSqlValue } from "./sqlValue";
import type { AnyEntityMapping, QueryFilter, QueryPlan, SqlValue } from "./types";

export type CompiledQuery = {
  sql: string;
  values: SqlValue[];
};

/**
 * Quotes an identifier validated by `defineMapping()`.
 * @internal
 */
export function quote(identifier: string): string {
  return `"${identifier}"`;
}

function column(mapping: AnyEntityMapping, property: string): string {
  if (!mapping.columns.includes(property)) {
    throw new Error(
      `"${property}" is not a mapped column of ${mapping.entity.name}`,
    );
  }
  return quote(property);
}

function compileFilter(
  mapping: AnyEntityMapping,
  filter: QueryFilter,
): CompiledQuery {
  const target = column(mapping, filter.property);

  if (filter.operator === "in") {
    if (filter.value.length === 0) {
      return { sql: "0 = 1", values: [] };
    }

    const placeholders = filter.value.map(() => "?").join(", ");
    return {
      sql: `${target} IN (${placeholders})`,
      values: filter.value.map((value) => toSqlValue(value, filter.property)),
    };
  }

  const value = toSqlValue(filter.value, filter.property);

  if (value === null && filter.operator === "=") {
    return { sql: `${target} IS NULL`, values: [] };
  }
  if (value === null && filter.operator === "!=") {
    return { sql: `${target} IS NOT NULL`, values: [] };
  }

  const operator = filter.operator === "like" ? "LIKE" : filter.operator;
  return { sql: `${target} ${operator} ?`, values: [value] };
}

function compileFilters(
  mapping: AnyEntityMapping,
  plan: QueryPlan,
): CompiledQuery {
  const compiled = plan.filters.map((filter) => compileFilter(mapping, filter));

  if (compiled.length === 0) {
    return { sql: "", values: [] };
  }

  return {
    sql: ` WHERE ${compiled.map((part) => part.sql).join(" AND ")}`,
    values: compiled.flatMap((part) => part.values),
  };
}

function compilePage(plan: QueryPlan): CompiledQuery {
  if (plan.limit === null && plan.offset === null) {
    return { sql: "", values: [] };
  }

  // SQLite only accepts OFFSET after a LIMIT; -1 means no limit
  return {
    sql: " LIMIT ? OFFSET ?",
    values: [plan.limit ?? -1, plan.offset ?? 0],
  };
}

/**
 * Compiles a plan to a `SELECT` of the mapped columns.
 * @internal
 */
export function compileSelect(
  mapping: AnyEntityMapping,
  plan: QueryPlan,
): CompiledQuery {
  const where = compileFilters(mapping, plan);
  const page = compilePage(plan);
  const orderBy =
    plan.orderings.length > 0
      ? ` ORDER BY ${plan.orderings
          .map(
            ({ property, direction }) =>
              `${column(mapping, property)} ${direction === "desc" ? "DESC" : "ASC"}`,
          )
          .join(", ")}`
      : "";

  return {
    sql: `SELECT ${mapping.columns.map(quote).join(", ")} FROM ${quote(mapping.table)}${where.sql}${orderBy}${page.sql}`,
    values: [...where.values, ...page.values],
  };
}

/**
 * Compiles a plan to a `SELECT COUNT(*)` honouring filters and paging.
 * @internal
 */
export function compileCount(
  mapping: AnyEntityMapping,
  plan: QueryPlan,
): CompiledQuery {
  const where = compileFilters(mapping, plan);
  const page = compilePage(plan);

  if (page.sql === "") {
    return {
      sql: `SELECT COUNT(*) FROM ${quote(mapping.table)}${where.sql}`,
      values: where.values,
    };
  }

  return {
    sql: `SELECT COUNT(*) FROM (SELECT 1 FROM ${quote(mapping.table)}${where.sql}${page.sql})`,
    values: [...where.values, ...page.values],
  };
}
