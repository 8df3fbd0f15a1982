import type { StandardSchemaV1 } from "@standard-schema/spec";
import { createHook } from "./createHook";
import { createLogger, type Logger } from "./createLogger";
import { describeEntity } from "./describeEntity";
import { formatParameter } from "./formatParameter";
import { standardValidate } from "./standard";
import type {
  DataContext,
  EventManager,
  Session,
  SqlParameter,
} from "./types";

function* mapRows<$$Schema extends StandardSchemaV1>(
  schema: $$Schema,
  rows: Iterable<unknown>,
): Generator<StandardSchemaV1.InferOutput<$$Schema>, void, undefined> {
  for (const row of rows) {
    yield standardValidate(schema, row);
  }
}

function toInteger(name: string, value: unknown): number {
  if (value === null || value === undefined) {
    return 0;
  }
  if (typeof value === "bigint") {
    if (
      value > BigInt(Number.MAX_SAFE_INTEGER) ||
      value < BigInt(Number.MIN_SAFE_INTEGER)
    ) {
      throw new RangeError(
        `Function ${name} returned ${value}, outside the safe integer range`,
      );
    }
    return Number(value);
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }

  throw new Error(
    `Function ${name} returned a non-numeric value: ${String(value)}`,
  );
}

/**
 * Creates a data context over a session.
 *
 * @param session - The session the context delegates to. The context owns it
 * from now on and closes it in `close()`.
 * @param options - Context configuration
 * @param options.logger - Logger receiving the operation logs. A default
 * logger from `createLogger()` is used when omitted.
 *
 * @returns A data context
 *
 * @remarks
 * Each entity operation logs its start at `debug` level, makes exactly one
 * session call and logs its completion at `trace` level:
 *
 * | context    | session   |
 * |------------|-----------|
 * | `add`      | `save`    |
 * | `remove`   | `delete`  |
 * | `update`   | `update`  |
 * | `attach`   | `persist` |
 * | `detach`   | `evict`   |
 * | `reload`   | `refresh` |
 *
 * Errors from the session propagate untouched, and the completion log is not
 * written.
 *
 * ## Commit
 *
 * ```
 * preSave handlers → session.transaction.commit() → postSave handlers
 * ```
 *
 * Handlers run synchronously in subscription order. A throwing `preSave`
 * handler prevents the commit; a throwing commit prevents `postSave`.
 *
 * @example
 * ```typescript
 * import Database from "better-sqlite3";
 * import { createDataContext, createSQLiteSession } from "datacontext";
 *
 * const session = createSQLiteSession({
 *   database: new Database("shop.db"),
 *   mappings: [customerMapping, orderMapping],
 * });
 * const context = createDataContext(session);
 *
 * context.preSave.subscribe(() => console.log("saving"));
 *
 * const customer = context.add(Object.assign(new Customer(), { name: "Ada" }));
 * context.commit();
 * ```
 *
 * @since 1.0.0
 */
export function createDataContext(
  session: Session,
  options: { logger?: Logger } = {},
): DataContext {
  const logger = options.logger ?? createLogger();
  const preSave = createHook();
  const postSave = createHook();
  let eventManager: EventManager | null = null;

  const logSql = (sql: string, parameters: readonly SqlParameter[]) => {
    logger.trace(
      { sql, parameters: parameters.map(formatParameter) },
      "Executing SQL",
    );
  };

  const context: DataContext = {
    asQueryable(entity) {
      const entityName = entity.name;

      logger.debug({ entity: entityName }, "Querying object");
      const query = session.query(entity);

      return query.tap(({ rows }) => {
        logger.debug({ entity: entityName, rows }, "Queried object");
      });
    },
    add(item) {
      logger.debug({ entity: describeEntity(item), item }, "Adding object");
      session.save(item);
      logger.trace({ entity: describeEntity(item), item }, "Added object");
      return item;
    },
    remove(item) {
      logger.debug({ entity: describeEntity(item), item }, "Removing object");
      session.delete(item);
      logger.trace({ entity: describeEntity(item), item }, "Removed object");
      return item;
    },
    update(item) {
      logger.debug({ entity: describeEntity(item), item }, "Updating object");
      session.update(item);
      logger.trace({ entity: describeEntity(item), item }, "Updated object");
      return item;
    },
    attach(item) {
      logger.debug({ entity: describeEntity(item), item }, "Attaching object");
      session.persist(item);
      logger.trace({ entity: describeEntity(item), item }, "Attached object");
      return item;
    },
    detach(item) {
      logger.debug({ entity: describeEntity(item), item }, "Detaching object");
      session.evict(item);
      logger.trace({ entity: describeEntity(item), item }, "Detached object");
      return item;
    },
    reload(item) {
      logger.debug({ entity: describeEntity(item), item }, "Reloading object");
      session.refresh(item);
      logger.trace({ entity: describeEntity(item), item }, "Reloaded object");
      return item;
    },
    commit() {
      logger.trace("Commit");
      preSave.invoke({ context });
      const rowsAffected = session.transaction.commit();
      postSave.invoke({ context });
      logger.debug({ rowsAffected }, "Committed changes");
      return rowsAffected;
    },
    executeSqlQuery(schema, sql, ...parameters) {
      logSql(sql, parameters);
      return mapRows(schema, session.sqlQuery(sql, parameters));
    },
    executeSqlCommand(sql, ...parameters) {
      logSql(sql, parameters);
      return session.sqlCommand(sql, parameters);
    },
    executeFunction(name, ...parameters) {
      logger.trace(
        { name, parameters: parameters.map(formatParameter) },
        "Executing function",
      );

      for (const value of session.callFunction(name, parameters)) {
        return toInteger(name, value);
      }
      return 0;
    },
    preSave,
    postSave,
    get eventManager() {
      return eventManager;
    },
    close() {
      logger.debug("Closing context");
      session.close();
    },
    " $$setEventManager"(next) {
      eventManager = next;
    },
  };

  return context;
}
