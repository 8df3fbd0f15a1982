import { type EntityConstructor, Query, type Session } from "../../src";

export type SessionCall = {
  method: string;
  args: unknown[];
};

/**
 * Session stand-in that records every call made to it.
 *
 * Queries run over `entities` and ignore their plan; raw SQL returns the
 * configured canned results.
 */
export const createRecordingSession = (
  options: {
    entities?: object[];
    rowsAffected?: number;
    commandResult?: number;
    sqlRows?: unknown[];
    functionValues?: unknown[];
    onCommit?: () => void;
    failures?: Partial<Record<string, Error>>;
  } = {},
): RecordingSession => {
  const calls: SessionCall[] = [];

  const record = (method: string, ...args: unknown[]) => {
    calls.push({ method, args });

    const failure = options.failures?.[method];
    if (failure) {
      throw failure;
    }
  };

  const session: Session = {
    save: (item) => record("save", item),
    delete: (item) => record("delete", item),
    update: (item) => record("update", item),
    persist: (item) => record("persist", item),
    evict: (item) => record("evict", item),
    refresh: (item) => record("refresh", item),
    query<$$Entity extends object>(
      entity: EntityConstructor<$$Entity>,
    ): Query<$$Entity> {
      record("query", entity);

      const matching = () =>
        (options.entities ?? []).filter(
          (item): item is $$Entity => item instanceof entity,
        );

      return new Query<$$Entity>({
        entityName: entity.name,
        execute: () => matching(),
        count: () => matching().length,
      });
    },
    transaction: {
      commit() {
        record("transaction.commit");
        options.onCommit?.();
        return options.rowsAffected ?? 0;
      },
      rollback() {
        record("transaction.rollback");
      },
    },
    sqlQuery(sql, parameters) {
      record("sqlQuery", sql, parameters);
      return [...(options.sqlRows ?? [])];
    },
    sqlCommand(sql, parameters) {
      record("sqlCommand", sql, parameters);
      return options.commandResult ?? 0;
    },
    callFunction(name, parameters) {
      record("callFunction", name, parameters);
      return [...(options.functionValues ?? [])];
    },
    close() {
      record("close");
    },
  };

  return { ...session, calls };
};

export type RecordingSession = Session & {
  calls: SessionCall[];
};
