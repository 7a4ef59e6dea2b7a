/**
 * relmapper - Field Selection
 *
 * Partial projections fetch only the requested fields plus the defensive
 * ones traversal needs: the primary key and the key field of every relation
 * included below. Fields outside that set stay absent in the result, which is
 * distinct from a fetched NULL.
 */

import type { Entity, Selected } from './Entity';
import type { ColumnMeta, EntityMeta } from './EntityMeta';
import { writeField } from './EntityMeta';
import type { RelationFilter } from './Filter';
import { decodeValue } from './TypeCast';

type Row = Record<string, unknown>;

/**
 * Required field set: `aliases ∪ {primary key} ∪ {key field of each included relation}`,
 * in that order without duplicates.
 *
 * @throws MapperError QueryValidation for an unknown alias
 * @throws MapperError RelationNotFound for an unknown included relation
 */
export function requiredFieldSet(
  meta: EntityMeta,
  aliases: readonly string[],
  includes: readonly RelationFilter[]
): string[] {
  const fields = new Set<string>();
  for (const alias of aliases) {
    fields.add(meta.requireColumn(alias).propertyName);
  }
  fields.add(meta.primaryKey.propertyName);
  for (const include of includes) {
    const descriptor = meta.requireRelation(include.relation);
    fields.add(descriptor.isHasMany ? descriptor.currentKeyField : descriptor.foreignKeyField);
  }
  return [...fields];
}

export function selectedColumns(meta: EntityMeta, fields: Iterable<string>): ColumnMeta[] {
  return [...fields].map((field) => meta.requireColumn(field));
}

/**
 * Build a full entity instance from a row keyed by property name.
 */
export function hydrate<M extends Entity>(meta: EntityMeta<M>, row: Row): M {
  const model = meta.createInstance();
  for (const column of meta.columns) {
    if (column.propertyName in row) {
      writeField(model, column.propertyName, decodeValue(column.kind, row[column.propertyName]));
    }
  }
  return model;
}

/**
 * Fill a partial projection. Only fields in `fields` are set; a selected
 * column that came back NULL is set to `null`.
 */
export function fillSelected<M extends Entity>(meta: EntityMeta<M>, row: Row, fields: ReadonlySet<string>): Selected<M> {
  const selected: Selected<M> = {};
  for (const column of meta.columns) {
    if (fields.has(column.propertyName) && column.propertyName in row) {
      writeField(selected, column.propertyName, decodeValue(column.kind, row[column.propertyName]));
    }
  }
  return selected;
}
