export { createDataContext } from "./createDataContext";
export { createEventManager } from "./createEventManager";
export { createHook } from "./createHook";
export { createLogger } from "./createLogger";
export type { LogLevel, Logger, LoggerOptions } from "./createLogger";
export { createSQLiteSession } from "./createSQLiteSession";
export type {
  SQLiteSession,
  SQLiteSessionOptions,
} from "./createSQLiteSession";
export { defineMapping } from "./defineMapping";
export { Query } from "./Query";
export { registerEventManager } from "./registerEventManager";
export type {
  AnyEntityMapping,
  DataContext,
  EntityConstructor,
  EntityMapping,
  EntityProperty,
  EventManager,
  Hook,
  HookHandler,
  Interceptor,
  InterceptorEvent,
  InterceptorResult,
  QueryDirection,
  QueryExecutedHook,
  QueryFilter,
  QueryOperator,
  QueryPlan,
  QuerySource,
  QueryValue,
  Session,
  SqlParameter,
  SqlValue,
  Transaction,
} from "./types";
