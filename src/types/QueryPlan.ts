import type { SqlValue } from "./SqlValue";

/**
 * Comparison operators accepted by `Query.where()`.
 *
 * @since 1.0.0
 */
export type QueryOperator = "=" | "!=" | "<" | "<=" | ">" | ">=" | "like" | "in";

/**
 * A value a query can compare a property with.
 *
 * @remarks
 * Booleans and dates are converted the same way entity values are when they
 * are written (`1`/`0` and ISO strings).
 *
 * @since 1.0.0
 */
export type QueryValue = SqlValue | boolean | Date;

/**
 * A single filter of a query plan.
 * @internal
 */
export type QueryFilter =
  | {
      property: string;
      operator: Exclude<QueryOperator, "in">;
      value: QueryValue;
    }
  | {
      property: string;
      operator: "in";
      value: readonly QueryValue[];
    };

/**
 * Sort direction accepted by `Query.orderBy()`.
 *
 * @since 1.0.0
 */
export type QueryDirection = "asc" | "desc";

/**
 * Everything a session needs to execute a query.
 *
 * @remarks
 * Plans are plain data. Filters are combined with `AND`; orderings apply in
 * the order they were added.
 *
 * @since 1.0.0
 */
export type QueryPlan = {
  filters: readonly QueryFilter[];
  orderings: readonly { property: string; direction: QueryDirection }[];
  limit: number | null;
  offset: number | null;
};

/**
 * Executes query plans on behalf of a `Query`.
 *
 * @since 1.0.0
 */
export type QuerySource<$$Entity> = {
  /**
   * Name of the queried entity, used in logs.
   */
  entityName: string;

  /**
   * Runs the plan and yields the matching entities.
   */
  execute: (plan: QueryPlan) => Iterable<$$Entity>;

  /**
   * Counts the rows the plan would yield.
   */
  count: (plan: QueryPlan) => number;
};

/**
 * Called after a query has been enumerated to the end.
 *
 * @since 1.0.0
 */
export type QueryExecutedHook = (args: {
  entityName: string;
  plan: QueryPlan;
  rows: number;
}) => void;
