/**
 * relmapper - Entity Base Class and Shape Types
 *
 * A fetched entity is an instance of its decorated class. Scalar columns are
 * always populated; relation slots stay absent until the include traversal
 * fills them (`null` for a fetched belongs-to with no target row).
 */

import type { DBToken } from './DBValues';
import { entityNameOf } from './decorators';
import { relationNotFetched } from './MapperError';

// ============================================
// Base Class
// ============================================

/** Per-relation row counts written by count-only includes */
export type Counts = Record<string, number>;

export abstract class Entity {
  declare _count?: Counts;

  /**
   * Value of a relation the query included: the related rows, or `null` for
   * a belongs-to with no target row.
   *
   * @throws MapperError RelationNotFetched when the relation was not included
   */
  related<K extends RelationKeys<this> & keyof this>(relation: K): NonNullable<this[K]> | null {
    const value = this[relation];
    if (isPresent(value)) {
      return value;
    }
    if (value === null) {
      return null;
    }
    throw relationNotFetched(entityNameOf(this), relation);
  }

  /**
   * Plain-object copy with absent (undefined) slots omitted.
   */
  toObject(): Record<string, unknown> {
    return toPlain(this);
  }

  toJSON(): Record<string, unknown> {
    return this.toObject();
  }
}

function isPresent<V>(value: V): value is NonNullable<V> {
  return value !== undefined && value !== null;
}

function toPlainValue(value: unknown): unknown {
  if (value instanceof Entity) return value.toObject();
  if (Array.isArray(value)) return value.map(toPlainValue);
  return value;
}

export function toPlain(source: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    result[key] = toPlainValue(value);
  }
  return result;
}

export type EntityClass<T extends Entity = Entity> = new () => T;

// ============================================
// Shape Types
// ============================================

type Related = Entity | readonly Entity[];

/** Property names of T that hold column values */
export type ScalarKeys<T> = {
  [K in keyof T]-?: K extends `_${string}`
    ? never
    : NonNullable<T[K]> extends (...args: never[]) => unknown
      ? never
      : NonNullable<T[K]> extends Related
        ? never
        : K;
}[keyof T] &
  string;

/** Property names of T that are relation slots */
export type RelationKeys<T> = {
  [K in keyof T]-?: NonNullable<T[K]> extends Related ? K : never;
}[keyof T] &
  string;

/** Column values of T */
export type EntityData<T> = {
  [K in ScalarKeys<T>]?: T[K];
};

/** Column values accepted by create/update; tokens render as SQL */
export type WriteData<T> = {
  [K in ScalarKeys<T>]?: T[K] | DBToken;
};

type SelectedValue<V> = V extends Entity
  ? Selected<V>
  : V extends readonly (infer E)[]
    ? E extends Entity
      ? Selected<E>[]
      : V
    : V;

/**
 * Partial projection of T. An absent key means "not fetched", which is
 * distinct from a fetched SQL NULL (`null`).
 */
export type Selected<T> = {
  [K in keyof T as K extends keyof Entity ? never : K]?: SelectedValue<T[K]>;
} & { _count?: Counts };

/** Entity type on the other side of relation K of T */
export type RelatedOf<T, K extends keyof T> = NonNullable<T[K]> extends readonly (infer E)[] ? E : NonNullable<T[K]>;
