import type {
  EntityProperty,
  QueryDirection,
  QueryExecutedHook,
  QueryFilter,
  QueryOperator,
  QueryPlan,
  QuerySource,
  QueryValue,
} from "./types";

const EMPTY_PLAN: QueryPlan = {
  filters: [],
  orderings: [],
  limit: null,
  offset: null,
};

function isValueList(
  value: QueryValue | readonly QueryValue[],
): value is readonly QueryValue[] {
  return Array.isArray(value);
}

function assertCount(method: string, count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(
      `${method}() expects a non-negative integer, received ${count}`,
    );
  }
}

/**
 * A lazy, composable query over one entity.
 *
 * @typeParam $$Entity - The queried entity
 *
 * @remarks
 * Queries are immutable: every builder method returns a new query and leaves
 * the original untouched, so a base query can be shared and refined. Nothing
 * runs against the store until the query is enumerated (`for...of`,
 * `toArray()`, `first()`) or counted.
 *
 * `take()` and `skip()` set the page; calling them again replaces the previous
 * value instead of composing with it.
 *
 * @example
 * ```typescript
 * const customers = context.asQueryable(Customer);
 *
 * const vip = customers.where("tier", "=", "gold");
 * const firstPage = vip.orderBy("name").take(20).toArray();
 * const total = vip.count();
 * ```
 *
 * @since 1.0.0
 */
export class Query<$$Entity extends object> implements Iterable<$$Entity> {
  readonly plan: QueryPlan;
  private readonly source: QuerySource<$$Entity>;
  private readonly onExecuted: QueryExecutedHook | null;

  constructor(
    source: QuerySource<$$Entity>,
    plan: QueryPlan = EMPTY_PLAN,
    onExecuted: QueryExecutedHook | null = null,
  ) {
    this.source = source;
    this.plan = plan;
    this.onExecuted = onExecuted;
  }

  get entityName(): string {
    return this.source.entityName;
  }

  where(
    property: EntityProperty<$$Entity>,
    operator: "in",
    value: readonly QueryValue[],
  ): Query<$$Entity>;
  where(
    property: EntityProperty<$$Entity>,
    operator: Exclude<QueryOperator, "in">,
    value: QueryValue,
  ): Query<$$Entity>;
  where(
    property: EntityProperty<$$Entity>,
    operator: QueryOperator,
    value: QueryValue | readonly QueryValue[],
  ): Query<$$Entity> {
    let filter: QueryFilter;

    if (operator === "in") {
      if (!isValueList(value)) {
        throw new TypeError(`Operator "in" expects an array for "${property}"`);
      }
      filter = { property, operator, value: [...value] };
    } else {
      if (isValueList(value)) {
        throw new TypeError(
          `Operator "${operator}" expects a single value for "${property}"`,
        );
      }
      filter = { property, operator, value };
    }

    return this.withPlan({
      ...this.plan,
      filters: [...this.plan.filters, filter],
    });
  }

  orderBy(
    property: EntityProperty<$$Entity>,
    direction: QueryDirection = "asc",
  ): Query<$$Entity> {
    return this.withPlan({
      ...this.plan,
      orderings: [...this.plan.orderings, { property, direction }],
    });
  }

  take(count: number): Query<$$Entity> {
    assertCount("take", count);
    return this.withPlan({ ...this.plan, limit: count });
  }

  skip(count: number): Query<$$Entity> {
    assertCount("skip", count);
    return this.withPlan({ ...this.plan, offset: count });
  }

  /**
   * Returns a query that also reports to `hook` each time it has been
   * enumerated to the end.
   */
  tap(hook: QueryExecutedHook): Query<$$Entity> {
    const previous = this.onExecuted;
    const chained: QueryExecutedHook = previous
      ? (args) => {
          previous(args);
          hook(args);
        }
      : hook;

    return new Query(this.source, this.plan, chained);
  }

  *[Symbol.iterator](): Generator<$$Entity, void, undefined> {
    let rows = 0;

    for (const entity of this.source.execute(this.plan)) {
      rows += 1;
      yield entity;
    }

    this.onExecuted?.({
      entityName: this.source.entityName,
      plan: this.plan,
      rows,
    });
  }

  toArray(): $$Entity[] {
    return Array.from(this);
  }

  first(): $$Entity | null {
    const limit = this.plan.limit === null ? 1 : Math.min(this.plan.limit, 1);
    const [entity] = this.withPlan({ ...this.plan, limit }).toArray();

    return entity ?? null;
  }

  count(): number {
    return this.source.count(this.plan);
  }

  private withPlan(plan: QueryPlan): Query<$$Entity> {
    return new Query(this.source, plan, this.onExecuted);
  }
}
