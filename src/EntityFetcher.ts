/**
 * relmapper - Entity Fetchers
 *
 * An EntityFetcher belongs to the entity that owns a relation and fetches the
 * rows on the other side of it for one key value. It is resolved from the
 * registry by the name of the traversing entity, never the target.
 */

import type { Entity, Selected } from './Entity';
import type { EntityMeta, RelationDescriptor, RelationValue } from './EntityMeta';
import type { EntityRegistry } from './EntityRegistry';
import type { RelationFilter, Where } from './Filter';
import type { Session } from './Session';
import { keyToDBValue, type Key } from './Key';
import { invalidIncludePath } from './MapperError';
import { fillSelected, hydrate, requiredFieldSet, selectedColumns } from './Selection';
import { countRows, selectRows, type RowSelection, type Row } from './query/select';

export interface FetchRequest {
  /** Key read from the parent; undefined when the parent has none */
  readonly foreignKey: Key | undefined;
  readonly foreignKeyColumn: string;
  readonly targetEntity: string;
  readonly relation: string;
  readonly filter: RelationFilter;
}

export interface EntityFetcher {
  readonly entityName: string;
  fetchByForeignKey(session: Session, request: FetchRequest): Promise<RelationValue<Entity>>;
  fetchByForeignKeyWithSelection(session: Session, request: FetchRequest): Promise<RelationValue<Selected<Entity>>>;
  /** Rows matching the relation and its filters, ignoring take/skip/cursor */
  countByForeignKey(session: Session, request: FetchRequest): Promise<number>;
}

function emptyValue(descriptor: RelationDescriptor): RelationValue<never> {
  return descriptor.isHasMany ? { kind: 'hasMany', items: [] } : { kind: 'belongsTo', item: null };
}

function toRelationValue<T>(descriptor: RelationDescriptor, items: T[]): RelationValue<T> {
  return descriptor.isHasMany ? { kind: 'hasMany', items } : { kind: 'belongsTo', item: items[0] ?? null };
}

/**
 * Fetcher over the relations of one @entity class.
 */
export class ModelEntityFetcher implements EntityFetcher {
  constructor(
    readonly meta: EntityMeta,
    private readonly registry: EntityRegistry
  ) {}

  get entityName(): string {
    return this.meta.name;
  }

  private descriptorFor(request: FetchRequest): RelationDescriptor {
    const descriptor = this.meta.requireRelation(request.relation);
    if (descriptor.targetEntity !== request.targetEntity || descriptor.foreignKeyColumn !== request.foreignKeyColumn) {
      throw invalidIncludePath(
        `${this.meta.name}.${request.relation}`,
        `expected ${descriptor.targetEntity} via ${descriptor.foreignKeyColumn}`
      );
    }
    return descriptor;
  }

  /**
   * Join condition selecting the related rows of `key` on the target.
   */
  private joinCondition(descriptor: RelationDescriptor, key: Key): Where {
    const field = descriptor.isHasMany ? descriptor.foreignKeyField : descriptor.targetKeyField;
    return { field, operation: { type: 'equals', value: keyToDBValue(key) } };
  }

  private selection(
    session: Session,
    descriptor: RelationDescriptor,
    targetMeta: EntityMeta,
    key: Key,
    filter: RelationFilter
  ): RowSelection {
    const where = [this.joinCondition(descriptor, key), ...filter.filters];
    if (!descriptor.isHasMany) {
      return { where, take: 1 };
    }

    const limit = session.limits.hasManyHardLimit;
    let distinct: string[] | undefined;
    if (filter.distinct) {
      distinct = filter.nestedSelectAliases
        ? [...filter.nestedSelectAliases]
        : targetMeta.columns.filter((c) => !c.primaryKey).map((c) => c.propertyName);
    }
    return {
      where,
      orderBy: filter.orderBy,
      take: filter.take,
      skip: filter.skip,
      cursor: filter.cursor
        ? { field: targetMeta.primaryKey.propertyName, value: keyToDBValue(filter.cursor) }
        : undefined,
      distinct,
      hardLimit: limit ? { limit, source: 'relation', relation: descriptor.name } : undefined,
    };
  }

  private async fetchRows(
    session: Session,
    request: FetchRequest,
    fields?: readonly string[]
  ): Promise<{ descriptor: RelationDescriptor; targetMeta: EntityMeta; rows: Row[] | null }> {
    const descriptor = this.descriptorFor(request);
    const targetMeta = this.registry.requireMeta(descriptor.targetEntity);
    if (request.foreignKey === undefined) {
      return { descriptor, targetMeta, rows: null };
    }
    const selection = this.selection(session, descriptor, targetMeta, request.foreignKey, request.filter);
    if (fields) {
      selection.columns = selectedColumns(targetMeta, fields);
    }
    const rows = await selectRows(session, targetMeta, selection);
    return { descriptor, targetMeta, rows };
  }

  async fetchByForeignKey(session: Session, request: FetchRequest): Promise<RelationValue<Entity>> {
    const { descriptor, targetMeta, rows } = await this.fetchRows(session, request);
    if (!rows) return emptyValue(descriptor);
    return toRelationValue(
      descriptor,
      rows.map((row) => hydrate(targetMeta, row))
    );
  }

  async fetchByForeignKeyWithSelection(session: Session, request: FetchRequest): Promise<RelationValue<Selected<Entity>>> {
    const targetMeta = this.registry.requireMeta(this.descriptorFor(request).targetEntity);
    const { filter } = request;
    const fields = filter.nestedSelectAliases
      ? requiredFieldSet(targetMeta, filter.nestedSelectAliases, filter.nestedIncludes)
      : targetMeta.columns.map((c) => c.propertyName);

    const { descriptor, rows } = await this.fetchRows(session, request, fields);
    if (!rows) return emptyValue(descriptor);
    const fieldSet = new Set(fields);
    return toRelationValue(
      descriptor,
      rows.map((row) => fillSelected(targetMeta, row, fieldSet))
    );
  }

  async countByForeignKey(session: Session, request: FetchRequest): Promise<number> {
    const descriptor = this.descriptorFor(request);
    if (request.foreignKey === undefined) return 0;
    const targetMeta = this.registry.requireMeta(descriptor.targetEntity);
    return countRows(session, targetMeta, [this.joinCondition(descriptor, request.foreignKey), ...request.filter.filters]);
  }
}
