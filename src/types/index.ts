export type { DataContext } from "./DataContext";
export type {
  AnyEntityMapping,
  EntityConstructor,
  EntityMapping,
  EntityProperty,
} from "./EntityMapping";
export type {
  EventManager,
  Interceptor,
  InterceptorEvent,
  InterceptorResult,
} from "./EventManager";
export type { Hook, HookHandler } from "./Hook";
export type {
  QueryDirection,
  QueryExecutedHook,
  QueryFilter,
  QueryOperator,
  QueryPlan,
  QuerySource,
  QueryValue,
} from "./QueryPlan";
export type { Session, Transaction } from "./Session";
export type { SqlParameter, SqlValue } from "./SqlValue";
