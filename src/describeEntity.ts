/**
 * Name of an entity's class, used in logs and error messages.
 * @internal
 */
export function describeEntity(item: object): string {
  return typeof item.constructor === "function" && item.constructor.name
    ? item.constructor.name
    : "Object";
}
