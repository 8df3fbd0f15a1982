import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { Query } from "../Query";
import type { EntityConstructor } from "./EntityMapping";
import type { EventManager } from "./EventManager";
import type { Hook } from "./Hook";
import type { SqlParameter } from "./SqlValue";

/**
 * Persistence facade over a session.
 *
 * @remarks
 * A data context presents one uniform surface for entity changes, commits and
 * raw SQL, and logs the boundaries of every operation. It adds observability,
 * not resilience: nothing is validated, retried or translated, and any error
 * from the session surfaces unchanged.
 *
 * ```
 * add/remove/update/attach/detach/reload → Session → preSave → commit → postSave
 * ```
 *
 * @since 1.0.0
 */
export type DataContext = {
  /**
   * Starts a lazy query over a mapped entity.
   *
   * @example
   * ```typescript
   * const openOrders = context
   *   .asQueryable(Order)
   *   .where("status", "=", "open")
   *   .orderBy("placedAt", "desc")
   *   .toArray();
   * ```
   */
  asQueryable: <$$Entity extends object>(
    entity: EntityConstructor<$$Entity>,
  ) => Query<$$Entity>;

  /**
   * Adds a new entity to the unit of work.
   *
   * @returns The same entity
   */
  add: <$$Entity extends object>(item: $$Entity) => $$Entity;

  /**
   * Marks an entity for deletion.
   *
   * @returns The same entity
   */
  remove: <$$Entity extends object>(item: $$Entity) => $$Entity;

  /**
   * Marks an entity for an explicit update.
   *
   * @returns The same entity
   */
  update: <$$Entity extends object>(item: $$Entity) => $$Entity;

  /**
   * Attaches an entity to the unit of work.
   *
   * @returns The same entity
   */
  attach: <$$Entity extends object>(item: $$Entity) => $$Entity;

  /**
   * Detaches an entity from the unit of work.
   *
   * @returns The same entity
   */
  detach: <$$Entity extends object>(item: $$Entity) => $$Entity;

  /**
   * Reloads an entity's state from the store.
   *
   * @returns The same entity
   */
  reload: <$$Entity extends object>(item: $$Entity) => $$Entity;

  /**
   * Commits every tracked change.
   *
   * @returns The number of rows written by the session's transaction
   *
   * @remarks
   * `preSave` handlers run first, then the session's transaction commits, then
   * `postSave` handlers run. When the commit throws, `postSave` handlers do not
   * run and the error propagates.
   */
  commit: () => number;

  /**
   * Runs a query and maps each row through a schema.
   *
   * @remarks
   * The returned iterator is single-pass: rows are read and validated as it
   * advances. Any Standard Schema library works (zod, valibot, arktype, ...)
   * as long as its validation is synchronous.
   *
   * @example
   * ```typescript
   * const totals = context.executeSqlQuery(
   *   z.object({ customerId: z.number(), total: z.number() }),
   *   "SELECT customerId, SUM(amount) AS total FROM orders WHERE status = @status GROUP BY customerId",
   *   { name: "@status", value: "paid" },
   * );
   *
   * for (const row of totals) {
   *   console.log(row.customerId, row.total);
   * }
   * ```
   */
  executeSqlQuery: <$$Schema extends StandardSchemaV1>(
    schema: $$Schema,
    sql: string,
    ...parameters: SqlParameter[]
  ) => IterableIterator<StandardSchemaV1.InferOutput<$$Schema>>;

  /**
   * Runs a statement that returns no rows.
   *
   * @returns The number of affected rows reported by the session
   */
  executeSqlCommand: (sql: string, ...parameters: SqlParameter[]) => number;

  /**
   * Calls a database function.
   *
   * @returns The first value returned, as an integer, or `0` when the function
   * returned nothing
   */
  executeFunction: (name: string, ...parameters: SqlParameter[]) => number;

  /**
   * Fired just before the session's transaction commits.
   */
  readonly preSave: Hook;

  /**
   * Fired just after the session's transaction committed.
   */
  readonly postSave: Hook;

  /**
   * The event manager attached with `registerEventManager()`, if any.
   */
  readonly eventManager: EventManager | null;

  /**
   * Closes the underlying session.
   */
  close: () => void;

  /**
   * Replaces the attached event manager.
   * @internal Use `registerEventManager()`.
   */
  " $$setEventManager": (eventManager: EventManager | null) => void;
};
