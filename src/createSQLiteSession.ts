import Database from "better-sqlite3";
import { z } from "zod";
import { compileCount, compileSelect, quote } from "./compileQuery";
import { createLogger, type Logger } from "./createLogger";
import { entityMappingSchema } from "./defineMapping";
import { describeEntity } from "./describeEntity";
import { Query } from "./Query";
import {
  isSameSqlValue,
  parameterKey,
  toBindings,
  toSqlValue,
} from "./sqlValue";
import type {
  AnyEntityMapping,
  EntityConstructor,
  Session,
  SqlParameter,
  SqlValue,
} from "./types";

type Row = Record<string, SqlValue>;

type EntityState = "new" | "persistent" | "deleted";

type Entry = {
  mapping: AnyEntityMapping;
  state: EntityState;
  snapshot: Row | null;
  key: string | null;
};

type Action = {
  kind: "insert" | "update" | "delete";
  item: object;
};

// Rows are fetched in one step on first read; no cursor stays open while the
// caller holds the iterator.
function* readRows(
  statement: Database.Statement,
  parameters: readonly SqlParameter[],
): Generator<unknown, void, undefined> {
  const rows: unknown[] =
    parameters.length > 0
      ? statement.all(toBindings(parameters))
      : statement.all();

  yield* rows;
}

const sessionOptionsSchema = z.object({
  database: z.union([
    z.string().min(1),
    z.custom<Database.Database>(
      (value) => value instanceof Database,
      "must be a better-sqlite3 Database",
    ),
  ]),
  mappings: z.array(entityMappingSchema).min(1),
});

/**
 * Options of `createSQLiteSession()`.
 *
 * @since 1.0.0
 */
export type SQLiteSessionOptions = {
  /**
   * An open database, or a filename to open. A database opened from a
   * filename belongs to the session and is closed with it.
   */
  database: Database.Database | string;

  /**
   * Mappings of every entity the session stores.
   */
  mappings: readonly AnyEntityMapping[];

  logger?: Logger;
};

/**
 * A session over a better-sqlite3 database.
 *
 * @since 1.0.0
 */
export type SQLiteSession = Session & {
  /**
   * The underlying database.
   */
  readonly database: Database.Database;

  /**
   * Whether the session currently tracks the entity.
   */
  contains: (item: object) => boolean;
};

/**
 * Creates a unit-of-work session over a SQLite database.
 *
 * @param options - Session configuration
 * @param options.database - A better-sqlite3 database, or a filename to open
 * @param options.mappings - Mappings created with `defineMapping()`
 * @param options.logger - Logger for the statements the session runs
 *
 * @returns A session to hand to `createDataContext()`
 *
 * @throws `ZodError` when the options are invalid, and `Error` when two
 * mappings share an entity class or a table
 *
 * @remarks
 * The session keeps an identity map (one instance per table row) and a list
 * of pending actions. Nothing is written until `transaction.commit()`, which
 * runs in a single SQLite transaction:
 *
 * 1. pending inserts, updates and deletes, in the order they were scheduled;
 * 2. updates of tracked entities whose mapped values changed since they were
 *    loaded, attached or last committed.
 *
 * If any statement fails the SQLite transaction is rolled back, pending
 * actions are kept and the error propagates.
 *
 * Queries read the database directly and do not see pending changes.
 *
 * @example
 * ```typescript
 * import Database from "better-sqlite3";
 *
 * const db = new Database("shop.db");
 * db.function("order_total", (orderId) => computeTotal(orderId));
 *
 * const session = createSQLiteSession({
 *   database: db,
 *   mappings: [customerMapping, orderMapping],
 * });
 * ```
 *
 * @since 1.0.0
 */
export function createSQLiteSession(
  options: SQLiteSessionOptions,
): SQLiteSession {
  sessionOptionsSchema.parse(options);

  const logger = options.logger ?? createLogger();
  const ownsDatabase = typeof options.database === "string";
  const db =
    typeof options.database === "string"
      ? new Database(options.database)
      : options.database;

  const mappings = new Map<unknown, AnyEntityMapping>();
  const tables = new Set<string>();
  for (const mapping of options.mappings) {
    if (mappings.has(mapping.entity)) {
      throw new Error(`${mapping.entity.name} is mapped more than once`);
    }
    if (tables.has(mapping.table)) {
      throw new Error(`Table "${mapping.table}" is mapped more than once`);
    }
    mappings.set(mapping.entity, mapping);
    tables.add(mapping.table);
  }

  const entries = new Map<object, Entry>();
  const identityMap = new Map<string, object>();
  let actions: Action[] = [];
  let closed = false;

  const assertOpen = () => {
    if (closed) {
      throw new Error("Session is closed");
    }
  };

  const mappingOf = (item: object): AnyEntityMapping => {
    const mapping = mappings.get(item.constructor);

    if (!mapping) {
      throw new Error(`No mapping registered for ${describeEntity(item)}`);
    }
    return mapping;
  };

  const idOf = (item: object, mapping: AnyEntityMapping): SqlValue =>
    toSqlValue(Reflect.get(item, mapping.id), mapping.id);

  const requireId = (item: object, mapping: AnyEntityMapping): SqlValue => {
    const id = idOf(item, mapping);

    if (id === null) {
      throw new Error(`${describeEntity(item)} has no identifier`);
    }
    return id;
  };

  const keyOf = (mapping: AnyEntityMapping, id: SqlValue): string | null =>
    id === null ? null : `${mapping.table}:${String(id)}`;

  const snapshotOf = (item: object, mapping: AnyEntityMapping): Row =>
    Object.fromEntries(
      mapping.columns.map((column) => [
        column,
        toSqlValue(Reflect.get(item, column), column),
      ]),
    );

  const readRow = (mapping: AnyEntityMapping, raw: unknown): Row => {
    if (typeof raw !== "object" || raw === null) {
      throw new Error(`Unexpected row returned for ${mapping.table}`);
    }

    return Object.fromEntries(
      mapping.columns.map((column) => [
        column,
        toSqlValue(Reflect.get(raw, column), column),
      ]),
    );
  };

  const selectById = (mapping: AnyEntityMapping, id: SqlValue): Row | null => {
    const sql = `SELECT ${mapping.columns.map(quote).join(", ")} FROM ${quote(mapping.table)} WHERE ${quote(mapping.id)} = ?`;
    logger.trace({ sql }, "Selecting row");

    const raw = db.prepare(sql).get(id);
    return raw === undefined ? null : readRow(mapping, raw);
  };

  const track = (
    item: object,
    mapping: AnyEntityMapping,
    state: EntityState,
    snapshot: Row | null,
  ) => {
    const key = keyOf(mapping, idOf(item, mapping));

    if (key !== null) {
      const tracked = identityMap.get(key);

      if (tracked && tracked !== item) {
        throw new Error(
          `Another ${describeEntity(item)} with identifier ${String(idOf(item, mapping))} is already tracked`,
        );
      }
      identityMap.set(key, item);
    }

    entries.set(item, { mapping, state, snapshot, key });
  };

  const untrack = (item: object) => {
    const entry = entries.get(item);

    if (entry?.key && identityMap.get(entry.key) === item) {
      identityMap.delete(entry.key);
    }
    entries.delete(item);
  };

  const dropActions = (item: object, kind?: Action["kind"]) => {
    actions = actions.filter(
      (action) =>
        action.item !== item || (kind !== undefined && action.kind !== kind),
    );
  };

  const schedule = (kind: Action["kind"], item: object) => {
    const pending = actions.some(
      (action) => action.item === item && action.kind === kind,
    );

    if (!pending) {
      actions = [...actions, { kind, item }];
    }
  };

  const materialize = <$$Entity extends object>(
    entity: EntityConstructor<$$Entity>,
    mapping: AnyEntityMapping,
    raw: unknown,
  ): $$Entity => {
    const row = readRow(mapping, raw);
    const key = keyOf(mapping, row[mapping.id] ?? null);
    const tracked = key === null ? undefined : identityMap.get(key);

    if (tracked instanceof entity) {
      return tracked;
    }

    const item = Object.assign(new entity(), row);
    track(item, mapping, "persistent", row);
    return item;
  };

  const insert = (item: object, mapping: AnyEntityMapping): number => {
    const values = snapshotOf(item, mapping);
    const generated = values[mapping.id] === null;
    const columns = mapping.columns.filter(
      (column) => !(generated && column === mapping.id),
    );

    const sql = `INSERT INTO ${quote(mapping.table)} (${columns.map(quote).join(", ")}) VALUES (${columns.map(() => "?").join(", ")})`;
    logger.trace({ sql }, "Inserting row");

    const result = db
      .prepare(sql)
      .run(...columns.map((column) => values[column] ?? null));

    if (generated) {
      Reflect.set(item, mapping.id, result.lastInsertRowid);
    }
    return result.changes;
  };

  const updateRow = (item: object, mapping: AnyEntityMapping): number => {
    const values = snapshotOf(item, mapping);
    const columns = mapping.columns.filter((column) => column !== mapping.id);

    if (columns.length === 0) {
      return 0;
    }

    const sql = `UPDATE ${quote(mapping.table)} SET ${columns.map((column) => `${quote(column)} = ?`).join(", ")} WHERE ${quote(mapping.id)} = ?`;
    logger.trace({ sql }, "Updating row");

    return db
      .prepare(sql)
      .run(
        ...columns.map((column) => values[column] ?? null),
        values[mapping.id] ?? null,
      ).changes;
  };

  const deleteRow = (item: object, mapping: AnyEntityMapping): number => {
    const sql = `DELETE FROM ${quote(mapping.table)} WHERE ${quote(mapping.id)} = ?`;
    logger.trace({ sql }, "Deleting row");

    return db.prepare(sql).run(requireId(item, mapping)).changes;
  };

  const isDirty = (item: object, entry: Entry): boolean => {
    const { snapshot } = entry;

    if (!snapshot) {
      return false;
    }

    const current = snapshotOf(item, entry.mapping);
    return entry.mapping.columns.some(
      (column) =>
        !isSameSqlValue(current[column] ?? null, snapshot[column] ?? null),
    );
  };

  const flush = db.transaction((generatedIds: object[]): number => {
    let changes = 0;
    const written = new Set<object>();

    for (const action of actions) {
      const entry = entries.get(action.item);
      if (!entry) {
        continue;
      }

      written.add(action.item);

      switch (action.kind) {
        case "insert": {
          if (idOf(action.item, entry.mapping) === null) {
            generatedIds.push(action.item);
          }
          changes += insert(action.item, entry.mapping);
          break;
        }
        case "update": {
          changes += updateRow(action.item, entry.mapping);
          break;
        }
        case "delete": {
          changes += deleteRow(action.item, entry.mapping);
          break;
        }
      }
    }

    for (const [item, entry] of entries) {
      if (
        entry.state === "persistent" &&
        !written.has(item) &&
        isDirty(item, entry)
      ) {
        changes += updateRow(item, entry.mapping);
      }
    }

    return changes;
  });

  const transaction = {
    commit(): number {
      assertOpen();

      const pending = actions.length;
      const generatedIds: object[] = [];
      let changes: number;

      try {
        changes = flush(generatedIds);
      } catch (error) {
        for (const item of generatedIds) {
          const entry = entries.get(item);
          if (entry) {
            Reflect.set(item, entry.mapping.id, null);
          }
        }
        throw error;
      }

      for (const [item, entry] of [...entries]) {
        if (entry.state === "deleted") {
          untrack(item);
          continue;
        }

        untrack(item);
        track(
          item,
          entry.mapping,
          "persistent",
          snapshotOf(item, entry.mapping),
        );
      }
      actions = [];

      logger.debug(
        { actions: pending, rowsAffected: changes },
        "Flushed unit of work",
      );
      return changes;
    },
    rollback(): void {
      assertOpen();

      for (const [item, entry] of [...entries]) {
        if (
          entry.state === "new" ||
          (entry.state === "deleted" && !entry.snapshot)
        ) {
          untrack(item);
        } else if (entry.state === "deleted") {
          entry.state = "persistent";
        }
      }
      logger.debug({ actions: actions.length }, "Rolled back unit of work");
      actions = [];
    },
  };

  return {
    get database() {
      return db;
    },
    contains(item) {
      return entries.has(item) && entries.get(item)?.state !== "deleted";
    },
    save(item) {
      assertOpen();
      if (entries.has(item)) {
        return;
      }

      track(item, mappingOf(item), "new", null);
      schedule("insert", item);
    },
    persist(item) {
      assertOpen();
      if (entries.has(item)) {
        return;
      }

      const mapping = mappingOf(item);
      const id = idOf(item, mapping);
      const stored = id === null ? null : selectById(mapping, id);

      if (stored) {
        track(item, mapping, "persistent", stored);
      } else {
        track(item, mapping, "new", null);
        schedule("insert", item);
      }
    },
    update(item) {
      assertOpen();
      const entry = entries.get(item);

      if (entry?.state === "new") {
        return;
      }
      if (entry?.state === "deleted") {
        throw new Error(`Cannot update a deleted ${describeEntity(item)}`);
      }
      if (!entry) {
        const mapping = mappingOf(item);
        requireId(item, mapping);
        track(item, mapping, "persistent", snapshotOf(item, mapping));
      }

      schedule("update", item);
    },
    delete(item) {
      assertOpen();
      const entry = entries.get(item);

      if (entry?.state === "new") {
        dropActions(item);
        untrack(item);
        return;
      }
      if (entry?.state === "deleted") {
        return;
      }

      if (entry) {
        entry.state = "deleted";
        dropActions(item, "update");
      } else {
        const mapping = mappingOf(item);
        requireId(item, mapping);
        track(item, mapping, "deleted", null);
      }

      schedule("delete", item);
    },
    evict(item) {
      assertOpen();
      dropActions(item);
      untrack(item);
    },
    refresh(item) {
      assertOpen();
      const mapping = mappingOf(item);
      const id = requireId(item, mapping);
      const stored = selectById(mapping, id);

      if (!stored) {
        throw new Error(
          `Cannot refresh ${describeEntity(item)} ${String(id)}: row not found`,
        );
      }

      Object.assign(item, stored);

      const entry = entries.get(item);
      if (entry) {
        entry.snapshot = stored;
      }
    },
    query<$$Entity extends object>(
      entity: EntityConstructor<$$Entity>,
    ): Query<$$Entity> {
      assertOpen();
      const mapping = mappings.get(entity);

      if (!mapping) {
        throw new Error(`No mapping registered for ${entity.name}`);
      }

      return new Query<$$Entity>({
        entityName: entity.name,
        *execute(plan) {
          assertOpen();
          const { sql, values } = compileSelect(mapping, plan);
          logger.trace({ sql, values }, "Running query");

          for (const raw of db.prepare(sql).all(...values)) {
            yield materialize(entity, mapping, raw);
          }
        },
        count(plan) {
          assertOpen();
          const { sql, values } = compileCount(mapping, plan);
          logger.trace({ sql, values }, "Counting rows");

          return Number(db.prepare(sql).pluck().get(...values));
        },
      });
    },
    transaction,
    sqlQuery(sql, parameters) {
      assertOpen();
      const statement = db.prepare(sql);

      return readRows(statement, parameters);
    },
    sqlCommand(sql, parameters) {
      assertOpen();
      const statement = db.prepare(sql);

      return (
        parameters.length > 0
          ? statement.run(toBindings(parameters))
          : statement.run()
      ).changes;
    },
    callFunction(name, parameters) {
      assertOpen();
      if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
        throw new Error(`"${name}" is not a valid function name`);
      }

      const args = parameters
        .map((parameter) => `@${parameterKey(parameter.name)}`)
        .join(", ");
      const statement = db.prepare(`SELECT ${name}(${args})`).pluck();

      return parameters.length > 0
        ? statement.all(toBindings(parameters))
        : statement.all();
    },
    close() {
      if (closed) {
        return;
      }

      closed = true;
      entries.clear();
      identityMap.clear();
      actions = [];

      if (ownsDatabase) {
        db.close();
      }
      logger.debug({ ownsDatabase }, "Session closed");
    },
  };
}
