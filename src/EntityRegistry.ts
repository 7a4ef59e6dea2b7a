/**
 * relmapper - Entity Registry
 *
 * Maps entity names to their metadata and fetcher. Built once from the
 * @entity classes and passed to the client; there is no global registry.
 *
 * @example
 * ```typescript
 * const registry = new EntityRegistry([User, Post, Comment]);
 * const client = new Client({ config, registry });
 * ```
 */

import type { Entity, EntityClass } from './Entity';
import type { EntityMeta } from './EntityMeta';
import { getEntityMeta } from './decorators';
import { ModelEntityFetcher, type EntityFetcher } from './EntityFetcher';
import { entityFetcherMissing, invalidConfiguration } from './MapperError';

function normalizeName(name: string): string {
  return name.replace(/_/g, '').toLowerCase();
}

export class EntityRegistry {
  private readonly metas = new Map<string, EntityMeta>();
  private readonly fetchers = new Map<string, EntityFetcher>();

  /**
   * @throws MapperError InvalidConfiguration when a relation targets an
   *   unregistered entity or an unknown column
   */
  constructor(classes: readonly EntityClass[] = []) {
    this.register(...classes);
  }

  /**
   * Register entity classes, then validate every relation of every
   * registered entity.
   */
  register(...classes: EntityClass[]): this {
    for (const cls of classes) {
      const meta = getEntityMeta(cls);
      const existing = this.metas.get(meta.name);
      if (existing && existing.entityClass !== cls) {
        throw invalidConfiguration(`Entity name '${meta.name}' is registered twice`);
      }
      this.metas.set(meta.name, meta);
      this.fetchers.set(meta.name, new ModelEntityFetcher(meta, this));
    }
    this.validate();
    return this;
  }

  private validate(): void {
    for (const meta of this.metas.values()) {
      for (const descriptor of meta.relationDescriptors()) {
        const target = this.metas.get(descriptor.targetEntity);
        const where = `${meta.name}.${descriptor.name}`;
        if (!target) {
          throw invalidConfiguration(`${where} targets unregistered entity '${descriptor.targetEntity}'`);
        }
        const targetField = descriptor.isHasMany ? descriptor.foreignKeyField : descriptor.targetKeyField;
        if (!target.column(targetField)) {
          throw invalidConfiguration(`${where} references unknown column ${target.name}.${targetField}`);
        }
      }
    }
  }

  /**
   * Resolve a name to a registered entity name: exact match, then without a
   * namespace prefix (`blog::Post`, `blog.Post`), then ignoring case and
   * underscores (`post_comment` → `PostComment`).
   */
  resolveName(name: string): string | undefined {
    if (this.metas.has(name)) return name;

    const bare = name.split(/::|\./).pop() ?? name;
    if (this.metas.has(bare)) return bare;

    const normalized = normalizeName(bare);
    for (const registered of this.metas.keys()) {
      if (normalizeName(registered) === normalized) return registered;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.resolveName(name) !== undefined;
  }

  get entityNames(): string[] {
    return [...this.metas.keys()];
  }

  getMeta(name: string): EntityMeta | undefined {
    const resolved = this.resolveName(name);
    return resolved === undefined ? undefined : this.metas.get(resolved);
  }

  /**
   * @throws MapperError EntityFetcherMissing
   */
  requireMeta(name: string): EntityMeta {
    const meta = this.getMeta(name);
    if (!meta) {
      throw entityFetcherMissing(name);
    }
    return meta;
  }

  /**
   * Metadata of a registered class, typed by the class.
   */
  metaOf<T extends Entity>(cls: EntityClass<T>): EntityMeta<T> {
    const meta = getEntityMeta(cls);
    if (this.metas.get(meta.name) !== meta) {
      throw entityFetcherMissing(meta.name);
    }
    return meta;
  }

  getFetcher(name: string): EntityFetcher | undefined {
    const resolved = this.resolveName(name);
    return resolved === undefined ? undefined : this.fetchers.get(resolved);
  }

  /**
   * @throws MapperError EntityFetcherMissing
   */
  requireFetcher(name: string): EntityFetcher {
    const fetcher = this.getFetcher(name);
    if (!fetcher) {
      throw entityFetcherMissing(name);
    }
    return fetcher;
  }
}
