/**
 * relmapper - Nested Include Traversal
 *
 * Walks a RelationFilter tree over fetched rows, depth-first and one relation
 * at a time, attaching what it fetches to the relation slots. The same walk
 * serves full models and partial projections; an IncludeVisitor decides which
 * fetch mode is used.
 */

import type { Entity, Selected } from './Entity';
import type { EntityMeta, RelationDescriptor, RelationValue } from './EntityMeta';
import type { EntityFetcher, FetchRequest } from './EntityFetcher';
import type { EntityRegistry } from './EntityRegistry';
import type { RelationFilter } from './Filter';
import type { Session } from './Session';
import { writeCount } from './EntityMeta';
import { invalidIncludePath } from './MapperError';

// ============================================
// Visitors
// ============================================

export interface IncludeVisitor<N extends object> {
  fetch(fetcher: EntityFetcher, session: Session, request: FetchRequest): Promise<RelationValue<N>>;
}

export const fullModelVisitor: IncludeVisitor<Entity> = {
  fetch: (fetcher, session, request) => fetcher.fetchByForeignKey(session, request),
};

export const selectionVisitor: IncludeVisitor<Selected<Entity>> = {
  fetch: (fetcher, session, request) => fetcher.fetchByForeignKeyWithSelection(session, request),
};

// ============================================
// Validation
// ============================================

/**
 * Check an include tree against the descriptors before anything is fetched.
 *
 * @param allowSelect - whether includes may restrict their fields
 * @throws MapperError RelationNotFound for an unknown relation
 * @throws MapperError InvalidIncludePath for a malformed tree
 */
export function validateIncludes(
  registry: EntityRegistry,
  meta: EntityMeta,
  includes: readonly RelationFilter[],
  allowSelect: boolean,
  path: string = meta.name
): void {
  const seen = new Set<string>();
  for (const include of includes) {
    const descriptor = meta.requireRelation(include.relation);
    const here = `${path}.${include.relation}`;
    if (seen.has(include.relation)) {
      throw invalidIncludePath(here, 'relation included twice');
    }
    seen.add(include.relation);

    const paginated =
      include.take !== undefined ||
      include.skip !== undefined ||
      include.cursor !== undefined ||
      include.orderBy.length > 0 ||
      include.distinct;
    if (paginated && !descriptor.isHasMany) {
      throw invalidIncludePath(here, 'ordering and pagination apply to has-many relations only');
    }

    const targetMeta = registry.requireMeta(descriptor.targetEntity);
    if (include.nestedSelectAliases) {
      if (!allowSelect) {
        throw invalidIncludePath(here, 'field selection requires a select() query');
      }
      for (const alias of include.nestedSelectAliases) {
        if (!targetMeta.column(alias)) {
          throw invalidIncludePath(here, `unknown field '${alias}'`);
        }
      }
    }
    validateIncludes(registry, targetMeta, include.nestedIncludes, allowSelect, here);
  }
}

// ============================================
// Traversal
// ============================================

function fetchRequest(descriptor: RelationDescriptor, node: object, include: RelationFilter): FetchRequest {
  return {
    foreignKey: descriptor.getForeignKey(node),
    foreignKeyColumn: descriptor.foreignKeyColumn,
    targetEntity: descriptor.targetEntity,
    relation: descriptor.name,
    filter: include,
  };
}

function children<N>(value: RelationValue<N>): readonly N[] {
  if (value.kind === 'hasMany') return value.items;
  return value.item === null ? [] : [value.item];
}

/**
 * Populate the relations named by `includes` on every node of `entityName`.
 *
 * - A belongs-to whose foreign key is absent is skipped (slot left unset).
 * - `includeCount` without nested includes only counts (`_count`), no fetch.
 * - `includeCount` with nested includes fetches, recurses and also counts.
 */
export async function traverseIncludes<N extends object>(
  session: Session,
  visitor: IncludeVisitor<N>,
  entityName: string,
  nodes: readonly N[],
  includes: readonly RelationFilter[]
): Promise<void> {
  if (includes.length === 0 || nodes.length === 0) return;

  const meta = session.registry.requireMeta(entityName);
  const fetcher = session.registry.requireFetcher(entityName);

  for (const node of nodes) {
    for (const include of includes) {
      const descriptor: RelationDescriptor<object> = meta.requireRelation(include.relation);
      const request = fetchRequest(descriptor, node, include);
      if (request.foreignKey === undefined && !descriptor.isHasMany) {
        continue;
      }

      if (include.includeCount && include.nestedIncludes.length === 0) {
        writeCount(node, include.relation, await fetcher.countByForeignKey(session, request));
        continue;
      }

      const value = await visitor.fetch(fetcher, session, request);
      await traverseIncludes(session, visitor, descriptor.targetEntity, children(value), include.nestedIncludes);
      descriptor.setField(node, value);

      if (include.includeCount) {
        writeCount(node, include.relation, await fetcher.countByForeignKey(session, request));
      }
    }
  }
}
