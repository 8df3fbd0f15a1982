import type { Query } from "../Query";
import type { EntityConstructor } from "./EntityMapping";
import type { SqlParameter } from "./SqlValue";

/**
 * The transaction of a session's current unit of work.
 *
 * @since 1.0.0
 */
export type Transaction = {
  /**
   * Writes every pending change of the unit of work and starts a new one.
   *
   * @returns The number of rows written
   */
  commit: () => number;

  /**
   * Discards every pending change of the unit of work.
   */
  rollback: () => void;
};

/**
 * Unit-of-work handle over a backing store.
 *
 * @remarks
 * A session tracks entities in memory and writes their changes when its
 * transaction commits. It is the only collaborator the data context talks to:
 * every data context operation is a call to exactly one session member.
 *
 * Sessions are synchronous and not safe to share between units of work. The
 * library ships `createSQLiteSession()`; any object satisfying this type can
 * be handed to `createDataContext()`.
 *
 * Errors thrown by a session reach the caller of the data context untouched.
 *
 * @since 1.0.0
 */
export type Session = {
  /**
   * Schedules a new entity for insertion.
   */
  save: (item: object) => void;

  /**
   * Schedules an entity for deletion.
   */
  delete: (item: object) => void;

  /**
   * Schedules an explicit update of an entity.
   */
  update: (item: object) => void;

  /**
   * Makes an entity persistent in this session, inserting it when the store
   * does not know it yet.
   */
  persist: (item: object) => void;

  /**
   * Stops tracking an entity and forgets its pending changes.
   */
  evict: (item: object) => void;

  /**
   * Re-reads an entity's state from the store.
   */
  refresh: (item: object) => void;

  /**
   * Starts a lazy query over a mapped entity.
   */
  query: <$$Entity extends object>(
    entity: EntityConstructor<$$Entity>,
  ) => Query<$$Entity>;

  /**
   * The transaction of the current unit of work.
   */
  readonly transaction: Transaction;

  /**
   * Prepares a statement that returns rows. The statement runs when the
   * result is first read, and holds no open cursor between reads.
   */
  sqlQuery: (sql: string, parameters: readonly SqlParameter[]) => Iterable<unknown>;

  /**
   * Runs a statement that returns no rows.
   *
   * @returns The number of affected rows
   */
  sqlCommand: (sql: string, parameters: readonly SqlParameter[]) => number;

  /**
   * Calls a database function and yields the values it returns.
   */
  callFunction: (
    name: string,
    parameters: readonly SqlParameter[],
  ) => Iterable<unknown>;

  /**
   * Releases the resources held by the session.
   */
  close: () => void;
};
