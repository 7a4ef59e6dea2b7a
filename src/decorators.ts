/**
 * relmapper - Decorators for Entity Definition
 *
 * Provides decorators that build the per-entity descriptor table at class
 * definition time:
 * - @entity('table') records the table and freezes the EntityMeta
 * - @column() and its typed variants declare columns
 * - @belongsTo / @hasMany declare relation slots
 *
 * Each column also becomes a static ColumnRef on the class, used to build
 * filters and orderings.
 */

import 'reflect-metadata';
import { ColumnRef } from './Column';
import type { Entity, EntityClass } from './Entity';
import { EntityMeta, type ColumnKind, type ColumnMeta, type KeyPair, type RelationDecl, type RelationKind } from './EntityMeta';
import { invalidConfiguration } from './MapperError';

// ============================================
// Metadata Keys
// ============================================

const COLUMNS_KEY = Symbol('relmapper:columns');
const RELATIONS_KEY = Symbol('relmapper:relations');
const ENTITY_KEY = Symbol('relmapper:entity');

// ============================================
// @column Decorator and Variants
// ============================================

/** Options that can be passed to @column decorators */
export interface ColumnOptions {
  /** Physical column name (defaults to property name) */
  columnName?: string;
  /** Mark this column as the primary key */
  primaryKey?: boolean;
  /** Column has a unique constraint (usable in findUnique / connect) */
  unique?: boolean;
  /** Column accepts NULL */
  nullable?: boolean;
}

/**
 * Infer the column kind from design:type metadata.
 * Only available when the compiler emits decorator metadata.
 */
function inferKind(target: object, propertyKey: string): ColumnKind {
  const designType: unknown = Reflect.getMetadata('design:type', target, propertyKey);
  switch (designType) {
    case Number:
      return 'float';
    case Boolean:
      return 'boolean';
    case Date:
      return 'datetime';
    case String:
      return 'string';
    case BigInt:
      return 'bigint';
    default:
      return 'auto';
  }
}

/**
 * Register column metadata on the entity class
 */
function registerColumn(target: object, propertyKey: string, kind: ColumnKind | undefined, options: ColumnOptions): void {
  const constructor = target.constructor;

  const existing: ColumnMeta[] | undefined = Reflect.getOwnMetadata(COLUMNS_KEY, constructor);
  const columns = existing ? [...existing] : [];

  columns.push({
    propertyName: propertyKey,
    columnName: options.columnName || propertyKey,
    kind: kind ?? inferKind(target, propertyKey),
    primaryKey: options.primaryKey ?? false,
    unique: options.unique ?? false,
    nullable: options.nullable ?? false,
  });

  Reflect.defineMetadata(COLUMNS_KEY, columns, constructor);
}

function createColumnDecorator(kind?: ColumnKind) {
  return function (columnNameOrOptions?: string | ColumnOptions): PropertyDecorator {
    return function (target: object, propertyKey: string | symbol) {
      const options = typeof columnNameOrOptions === 'string' ? { columnName: columnNameOrOptions } : columnNameOrOptions ?? {};
      registerColumn(target, String(propertyKey), kind, options);
    };
  };
}

/**
 * Column decorator for defining entity properties.
 *
 * Without an explicit kind, the kind is inferred from the property type when
 * decorator metadata is emitted (number, boolean, Date, string, bigint).
 * Compilers that do not emit it (esbuild) need the typed variants.
 *
 * @example
 * ```typescript
 * @column.int({ primaryKey: true }) id!: number;
 * @column.string({ unique: true }) email!: string;
 * @column.int({ columnName: 'user_id' }) userId!: number;
 * @column.json({ nullable: true }) customData!: JsonValue | null;
 * ```
 */
export const column = Object.assign(createColumnDecorator(), {
  int: createColumnDecorator('int'),
  bigint: createColumnDecorator('bigint'),
  float: createColumnDecorator('float'),
  string: createColumnDecorator('string'),
  uuid: createColumnDecorator('uuid'),
  boolean: createColumnDecorator('boolean'),
  datetime: createColumnDecorator('datetime'),
  json: createColumnDecorator('json'),
});

// ============================================
// Relation Decorators
// ============================================

/**
 * Register relation metadata on the entity class
 */
function registerRelation(target: object, name: string, kind: RelationKind, keys: () => KeyPair): void {
  const constructor = target.constructor;
  const existing: RelationDecl[] | undefined = Reflect.getOwnMetadata(RELATIONS_KEY, constructor);
  Reflect.defineMetadata(RELATIONS_KEY, [...(existing ?? []), { name, kind, keys }], constructor);
}

/**
 * BelongsTo relation decorator (N:1).
 * The current entity holds the foreign key.
 *
 * @param keys - Factory returning [current FK column, target key column];
 *   evaluated lazily so entities may reference each other
 *
 * @example
 * ```typescript
 * @belongsTo(() => [Post.userId, User.id])
 * author?: PostEntity | null;
 * ```
 */
export function belongsTo(keys: () => KeyPair): PropertyDecorator {
  return function (target: object, propertyKey: string | symbol) {
    registerRelation(target, String(propertyKey), 'belongsTo', keys);
  };
}

/**
 * HasMany relation decorator (1:N).
 * The target entity holds the foreign key.
 *
 * @param keys - Factory returning [current key column, target FK column]
 *
 * @example
 * ```typescript
 * @hasMany(() => [User.id, Post.userId])
 * posts?: PostEntity[];
 * ```
 */
export function hasMany(keys: () => KeyPair): PropertyDecorator {
  return function (target: object, propertyKey: string | symbol) {
    registerRelation(target, String(propertyKey), 'hasMany', keys);
  };
}

// ============================================
// @entity Class Decorator
// ============================================

export interface EntityOptions {
  /** Entity name used by relations and the registry (defaults to the class name) */
  name?: string;
}

function defaultTableName(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

/**
 * Entity class decorator.
 *
 * Automatically:
 * 1. Builds the EntityMeta (columns, primary key, relations)
 * 2. Creates static ColumnRef properties for each @column decorated property
 *
 * @example
 * ```typescript
 * @entity('users')
 * class UserEntity extends Entity {
 *   @column.int({ primaryKey: true }) id!: number;
 *   @column.string({ unique: true }) email!: string;
 *
 *   @hasMany(() => [User.id, Post.userId])
 *   posts?: PostEntity[];
 * }
 * export const User = UserEntity as typeof UserEntity & ColumnsOf<UserEntity>;
 * ```
 */
export function entity(tableName?: string, options: EntityOptions = {}) {
  return function <T extends EntityClass>(constructor: T): T {
    // Read before static refs are attached: a `name` column shadows Function.name
    const name = options.name ?? constructor.name;
    const columns: ColumnMeta[] = Reflect.getOwnMetadata(COLUMNS_KEY, constructor) ?? [];
    const relations: RelationDecl[] = Reflect.getOwnMetadata(RELATIONS_KEY, constructor) ?? [];

    const meta = new EntityMeta(name, tableName ?? defaultTableName(name), constructor, columns, relations);

    for (const columnMeta of columns) {
      Object.defineProperty(constructor, columnMeta.propertyName, {
        value: new ColumnRef(meta, columnMeta),
        writable: false,
        enumerable: true,
        configurable: false,
      });
    }

    Reflect.defineMetadata(ENTITY_KEY, meta, constructor);
    return constructor;
  };
}

/**
 * Metadata of an @entity class
 * @throws MapperError InvalidConfiguration when the class is not decorated
 */
export function getEntityMeta<T extends Entity>(cls: EntityClass<T>): EntityMeta<T> {
  const meta: EntityMeta<T> | undefined = Reflect.getOwnMetadata(ENTITY_KEY, cls);
  if (!meta) {
    throw invalidConfiguration(`${cls.name} is not decorated with @entity`);
  }
  return meta;
}

/** Entity name of a model instance, falling back to its class name */
export function entityNameOf(model: object): string {
  const meta: EntityMeta | undefined = Reflect.getOwnMetadata(ENTITY_KEY, model.constructor);
  return meta?.name ?? model.constructor.name;
}

export function isEntityClass(value: unknown): value is EntityClass {
  return typeof value === 'function' && Reflect.hasOwnMetadata(ENTITY_KEY, value);
}
