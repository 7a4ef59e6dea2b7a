/**
 * relmapper - Entity Metadata and Relation Descriptors
 *
 * EntityMeta is the per-entity descriptor table: columns, primary key, unique
 * fields and one RelationDescriptor per relation name. It is built by the
 * @entity decorator and is read-only afterwards.
 */

import type { Entity, EntityClass } from './Entity';
import type { ColumnRef } from './Column';
import { keyFromDBValue, type Key } from './Key';
import { invalidConfiguration, queryValidation, relationNotFound, typeConversion } from './MapperError';

// ============================================
// Columns
// ============================================

export type ColumnKind =
  | 'auto'
  | 'int'
  | 'bigint'
  | 'float'
  | 'string'
  | 'uuid'
  | 'boolean'
  | 'datetime'
  | 'json';

export interface ColumnMeta {
  /** Logical field name; also the alias used in projected selects */
  readonly propertyName: string;
  /** Physical column name */
  readonly columnName: string;
  readonly kind: ColumnKind;
  readonly primaryKey: boolean;
  readonly unique: boolean;
  readonly nullable: boolean;
}

// ============================================
// Relations
// ============================================

export type RelationKind = 'belongsTo' | 'hasMany';

/**
 * Result of fetching one relation for one parent. A belongs-to target that
 * does not exist is `item: null`.
 */
export type RelationValue<T = unknown> =
  | { readonly kind: 'hasMany'; readonly items: readonly T[] }
  | { readonly kind: 'belongsTo'; readonly item: T | null };

export type KeyPair = readonly [ColumnRef, ColumnRef];

/** Relation declaration as recorded by @belongsTo / @hasMany */
export interface RelationDecl {
  readonly name: string;
  readonly kind: RelationKind;
  readonly keys: () => KeyPair;
}

export interface RelationDescriptor<M extends object = object> {
  readonly name: string;
  readonly kind: RelationKind;
  readonly targetEntity: string;
  /** Physical FK column: on the current entity for belongs-to, on the target for has-many */
  readonly foreignKeyColumn: string;
  readonly foreignKeyField: string;
  /** Key column on the current entity the relation is joined through */
  readonly currentPrimaryKeyColumn: string;
  readonly currentKeyField: string;
  /** Key column on the target entity the relation is joined through */
  readonly targetPrimaryKeyColumn: string;
  readonly targetKeyField: string;
  readonly isHasMany: boolean;
  readonly isForeignKeyNullable: boolean;
  /**
   * Key used to fetch the relation from `model`: the FK value for belongs-to,
   * the current key for has-many.
   */
  getForeignKey(model: M): Key | undefined;
  setField(model: M, value: RelationValue): void;
}

export interface HasRelationMetadata<M extends object = object> {
  relationDescriptors(): readonly RelationDescriptor<M>[];
  getRelationDescriptor(name: string): RelationDescriptor<M> | undefined;
}

// ============================================
// Field Access
// ============================================

export function readField(model: object, field: string): unknown {
  const value: unknown = Reflect.get(model, field);
  return value;
}

export function writeField(model: object, field: string, value: unknown): void {
  Reflect.set(model, field, value);
}

export function writeCount(model: object, relation: string, count: number): void {
  const current = readField(model, '_count');
  const counts: Record<string, number> = {};
  if (current !== null && typeof current === 'object') {
    for (const [key, value] of Object.entries(current)) {
      if (typeof value === 'number') counts[key] = value;
    }
  }
  counts[relation] = count;
  writeField(model, '_count', counts);
}

class Descriptor<M extends object> implements RelationDescriptor<M> {
  readonly isHasMany: boolean;

  constructor(
    readonly name: string,
    readonly kind: RelationKind,
    readonly targetEntity: string,
    readonly foreignKeyColumn: string,
    readonly foreignKeyField: string,
    readonly currentPrimaryKeyColumn: string,
    readonly currentKeyField: string,
    readonly targetPrimaryKeyColumn: string,
    readonly targetKeyField: string,
    readonly isForeignKeyNullable: boolean,
    private readonly keyKind: ColumnKind
  ) {
    this.isHasMany = kind === 'hasMany';
  }

  getForeignKey(model: M): Key | undefined {
    const field = this.isHasMany ? this.currentKeyField : this.foreignKeyField;
    return keyFromDBValue(readField(model, field), this.keyKind);
  }

  setField(model: M, value: RelationValue): void {
    if (value.kind !== this.kind) {
      throw typeConversion(this.name, this.kind, value.kind);
    }
    writeField(model, this.name, value.kind === 'hasMany' ? [...value.items] : value.item);
  }
}

// ============================================
// EntityMeta
// ============================================

export class EntityMeta<M extends Entity = Entity> implements HasRelationMetadata<M> {
  readonly primaryKey: ColumnMeta;
  private readonly byProperty = new Map<string, ColumnMeta>();
  private readonly byColumn = new Map<string, ColumnMeta>();
  private relationList: RelationDescriptor<M>[] | null = null;
  private relationMap: Map<string, RelationDescriptor<M>> | null = null;

  constructor(
    readonly name: string,
    readonly tableName: string,
    readonly entityClass: EntityClass<M>,
    readonly columns: readonly ColumnMeta[],
    private readonly relationDecls: readonly RelationDecl[]
  ) {
    const primaryKeys = columns.filter((c) => c.primaryKey);
    if (primaryKeys.length !== 1) {
      throw invalidConfiguration(`${name} must declare exactly one primary key column (found ${primaryKeys.length})`);
    }
    this.primaryKey = primaryKeys[0];
    for (const column of columns) {
      this.byProperty.set(column.propertyName, column);
      this.byColumn.set(column.columnName, column);
    }
  }

  createInstance(): M {
    return new this.entityClass();
  }

  column(field: string): ColumnMeta | undefined {
    return this.byProperty.get(field);
  }

  columnByName(columnName: string): ColumnMeta | undefined {
    return this.byColumn.get(columnName);
  }

  /**
   * @throws MapperError QueryValidation for an unknown field
   */
  requireColumn(field: string): ColumnMeta {
    const column = this.byProperty.get(field);
    if (!column) {
      throw queryValidation(`Unknown field '${field}'`, this.name);
    }
    return column;
  }

  isUniqueField(field: string): boolean {
    const column = this.byProperty.get(field);
    return column !== undefined && (column.primaryKey || column.unique);
  }

  primaryKeyOf(model: object): Key | undefined {
    return keyFromDBValue(readField(model, this.primaryKey.propertyName), this.primaryKey.kind);
  }

  // ============================================
  // Relations
  // ============================================

  /**
   * Descriptors are resolved on first use: key factories reference entity
   * classes that may be declared after this one.
   */
  relationDescriptors(): readonly RelationDescriptor<M>[] {
    if (!this.relationList) {
      const list = this.relationDecls.map((decl) => this.resolveRelation(decl));
      const map = new Map<string, RelationDescriptor<M>>();
      for (const descriptor of list) {
        if (map.has(descriptor.name)) {
          throw invalidConfiguration(`${this.name} declares relation '${descriptor.name}' twice`);
        }
        map.set(descriptor.name, descriptor);
      }
      this.relationList = list;
      this.relationMap = map;
    }
    return this.relationList;
  }

  getRelationDescriptor(name: string): RelationDescriptor<M> | undefined {
    this.relationDescriptors();
    return this.relationMap?.get(name);
  }

  /**
   * @throws MapperError RelationNotFound
   */
  requireRelation(name: string): RelationDescriptor<M> {
    const descriptor = this.getRelationDescriptor(name);
    if (!descriptor) {
      throw relationNotFound(this.name, name);
    }
    return descriptor;
  }

  private resolveRelation(decl: RelationDecl): RelationDescriptor<M> {
    const [source, target] = decl.keys();
    if (source.entityName !== this.name) {
      throw invalidConfiguration(
        `${this.name}.${decl.name}: first key must be a column of ${this.name}, got ${source.entityName}.${source.propertyName}`
      );
    }
    const sourceColumn = this.requireColumn(source.propertyName);

    if (decl.kind === 'belongsTo') {
      return new Descriptor<M>(
        decl.name,
        'belongsTo',
        target.entityName,
        sourceColumn.columnName,
        sourceColumn.propertyName,
        this.primaryKey.columnName,
        this.primaryKey.propertyName,
        target.columnName,
        target.propertyName,
        sourceColumn.nullable,
        sourceColumn.kind
      );
    }

    const targetMeta = target.owner;
    return new Descriptor<M>(
      decl.name,
      'hasMany',
      target.entityName,
      target.columnName,
      target.propertyName,
      sourceColumn.columnName,
      sourceColumn.propertyName,
      targetMeta.primaryKey.columnName,
      targetMeta.primaryKey.propertyName,
      target.column.nullable,
      sourceColumn.kind
    );
  }
}
