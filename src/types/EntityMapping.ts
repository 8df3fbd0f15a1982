/**
 * A class used as the runtime shape of an entity.
 *
 * @remarks
 * Mapped classes must be constructible without arguments: the session
 * instantiates them when it materialises rows.
 *
 * @since 1.0.0
 */
export type EntityConstructor<$$Entity extends object = object> =
  new () => $$Entity;

/**
 * Property names of an entity that can be mapped onto columns.
 * @internal
 */
export type EntityProperty<$$Entity> = Extract<keyof $$Entity, string>;

/**
 * Describes how an entity class is stored in a table.
 *
 * @remarks
 * Every property listed in `columns` is stored in the column of the same name.
 * `id` must be one of the columns; a `null` or `undefined` identifier on an
 * added entity lets the database assign one (`INTEGER PRIMARY KEY`).
 *
 * Create mappings with `defineMapping()`, which validates them.
 *
 * @since 1.0.0
 */
export type EntityMapping<$$Entity extends object = object> = {
  entity: EntityConstructor<$$Entity>;
  table: string;
  id: EntityProperty<$$Entity>;
  columns: readonly EntityProperty<$$Entity>[];
};

/**
 * Any entity mapping, whatever its entity type.
 *
 * @since 1.0.0
 */
export type AnyEntityMapping = {
  entity: EntityConstructor;
  table: string;
  id: string;
  columns: readonly string[];
};
