/**
 * SqlBuilder Tests
 */

import { describe, it, expect } from 'vitest';
import { SqlBuilder, aggregateAlias } from '../../src/SqlBuilder';
import { EntityRegistry } from '../../src/EntityRegistry';
import { dbNow, increment } from '../../src/DBValues';
import { mysqlDialect } from '../../src/drivers/MysqlSqlBuilder';
import { postgresDialect } from '../../src/drivers/PostgresSqlBuilder';
import { sqliteDialect } from '../../src/drivers/SqliteSqlBuilder';
import type { SqlDialect } from '../../src/drivers/types';
import { Post, User, entityClasses } from '../helpers/setup';

const registry = new EntityRegistry(entityClasses);

function postBuilder(dialect: SqlDialect = sqliteDialect): SqlBuilder {
  return new SqlBuilder(registry.metaOf(Post), { dialect, resolveMeta: (name) => registry.requireMeta(name) });
}

const POST_COLUMNS =
  '"posts"."id" AS "id", "posts"."title" AS "title", "posts"."author_id" AS "authorId", ' +
  '"posts"."views" AS "views", "posts"."published" AS "published", "posts"."category" AS "category"';

describe('SqlBuilder', () => {
  describe('buildSelect', () => {
    it('should alias every column to its property name', () => {
      const { sql, params } = postBuilder().buildSelect();
      expect(sql).toBe(`SELECT ${POST_COLUMNS} FROM "posts"`);
      expect(params).toEqual([]);
    });

    it('should add where, order, limit and offset', () => {
      const { sql, params } = postBuilder().buildSelect({
        where: [Post.published.equals(true)],
        orderBy: [Post.views.desc()],
        limit: 2,
        offset: 1,
      });

      expect(sql).toBe(
        `SELECT ${POST_COLUMNS} FROM "posts" WHERE "posts"."published" = ? ORDER BY "posts"."views" DESC LIMIT 2 OFFSET 1`
      );
      expect(params).toEqual([true]);
    });

    it('should project only the requested columns', () => {
      const meta = registry.metaOf(Post);
      const { sql } = postBuilder().buildSelect({ columns: [meta.requireColumn('id'), meta.requireColumn('authorId')] });
      expect(sql).toBe('SELECT "posts"."id" AS "id", "posts"."author_id" AS "authorId" FROM "posts"');
    });

    it('should emulate NULLS LAST with an IS NULL sort key', () => {
      const { sql } = postBuilder().buildSelect({ orderBy: [Post.category.asc('last')] });
      expect(sql).toBe(`SELECT ${POST_COLUMNS} FROM "posts" ORDER BY "posts"."category" IS NULL ASC, "posts"."category" ASC`);
    });

    it('should order by a relation count subquery', () => {
      const { sql } = postBuilder().buildSelect({ orderByRelationCount: [{ relation: 'comments', order: 'desc' }] });
      expect(sql).toBe(
        `SELECT ${POST_COLUMNS} FROM "posts" ORDER BY ` +
          '(SELECT COUNT(*) FROM "comments" AS "r1" WHERE "r1"."post_id" = "posts"."id") DESC'
      );
    });

    it('should keep the lowest primary key per distinct group without DISTINCT ON', () => {
      const { sql, params } = postBuilder().buildSelect({
        where: [Post.published.equals(true)],
        distinct: ['category'],
      });

      expect(sql).toBe(
        `SELECT ${POST_COLUMNS} FROM "posts" WHERE "posts"."id" IN ` +
          '(SELECT MIN("d"."id") FROM "posts" AS "d" WHERE "d"."published" = ? GROUP BY "d"."category")'
      );
      expect(params).toEqual([true]);
    });

    it('should use DISTINCT ON with the distinct fields leading the order on PostgreSQL', () => {
      const { sql } = postBuilder(postgresDialect).buildSelect({
        distinct: ['category'],
        orderBy: [Post.views.desc()],
      });

      expect(sql).toBe(
        `SELECT DISTINCT ON ("posts"."category") ${POST_COLUMNS} FROM "posts" ORDER BY "posts"."category" ASC, "posts"."views" DESC`
      );
    });

    it('should write an offset without a limit per dialect', () => {
      expect(postBuilder().buildSelect({ offset: 5 }).sql).toBe(`SELECT ${POST_COLUMNS} FROM "posts" LIMIT -1 OFFSET 5`);
      expect(postBuilder(postgresDialect).buildSelect({ offset: 5 }).sql).toBe(`SELECT ${POST_COLUMNS} FROM "posts" OFFSET 5`);
    });

    it('should reject negative limits and offsets', () => {
      expect(() => postBuilder().buildSelect({ offset: -1 })).toThrow(/skip must be >= 0/);
      expect(() => postBuilder().buildSelect({ limit: -1 })).toThrow(/take must be >= 0/);
    });
  });

  describe('buildCount', () => {
    it('should alias the count', () => {
      const { sql, params } = postBuilder().buildCount([Post.authorId.equals(1)]);
      expect(sql).toBe('SELECT COUNT(*) AS "count" FROM "posts" WHERE "posts"."author_id" = ?');
      expect(params).toEqual([1]);
    });
  });

  describe('buildInsert', () => {
    it('should insert with RETURNING where supported', () => {
      const { sql, params } = postBuilder().buildInsert(
        new Map<string, unknown>([
          ['title', 'Hello'],
          ['authorId', 1],
        ])
      );

      expect(sql).toBe(
        'INSERT INTO "posts" ("title", "author_id") VALUES (?, ?) RETURNING ' +
          '"id" AS "id", "title" AS "title", "author_id" AS "authorId", "views" AS "views", "published" AS "published", "category" AS "category"'
      );
      expect(params).toEqual(['Hello', 1]);
    });

    it('should omit RETURNING on MySQL', () => {
      const { sql } = postBuilder(mysqlDialect).buildInsert(new Map<string, unknown>([['title', 'Hello']]));
      expect(sql).toBe('INSERT INTO `posts` (`title`) VALUES (?)');
    });

    it('should render tokens as SQL', () => {
      const users = new SqlBuilder(registry.metaOf(User), { dialect: sqliteDialect, resolveMeta: (name) => registry.requireMeta(name) });
      const { sql, params } = users.buildInsert(
        new Map<string, unknown>([
          ['email', 'a@example.com'],
          ['createdAt', dbNow()],
        ])
      );

      expect(sql.startsWith('INSERT INTO "users" ("email", "created_at") VALUES (?, CURRENT_TIMESTAMP) RETURNING ')).toBe(true);
      expect(params).toEqual(['a@example.com']);
    });

    it('should insert default values when no column is given', () => {
      const { sql } = postBuilder(mysqlDialect).buildInsert(new Map<string, unknown>());
      expect(sql).toBe('INSERT INTO `posts` () VALUES ()');
    });
  });

  describe('buildUpdate', () => {
    it('should apply arithmetic in the same statement', () => {
      const { sql, params } = postBuilder().buildUpdate(
        new Map<string, unknown>([
          ['views', increment(5)],
          ['title', 'Edited'],
        ]),
        [Post.id.equals(3)]
      );

      expect(sql).toBe('UPDATE "posts" SET "views" = "views" + ?, "title" = ? WHERE "posts"."id" = ?');
      expect(params).toEqual([5, 'Edited', 3]);
    });

    it('should reject an empty update', () => {
      expect(() => postBuilder().buildUpdate(new Map<string, unknown>(), [])).toThrow(/update requires at least one field/);
    });
  });

  describe('buildDelete', () => {
    it('should delete by condition', () => {
      const { sql, params } = postBuilder().buildDelete([Post.views.lt(5)]);
      expect(sql).toBe('DELETE FROM "posts" WHERE "posts"."views" < ?');
      expect(params).toEqual([5]);
    });
  });

  describe('aggregates', () => {
    it('should name aggregate aliases by function and field', () => {
      expect(aggregateAlias({ fn: 'count' })).toBe('_count');
      expect(aggregateAlias({ fn: 'sum', field: 'views' })).toBe('_sum_views');
    });

    it('should build an aggregate select', () => {
      const { sql } = postBuilder().buildAggregate([{ fn: 'count' }, { fn: 'avg', field: 'views' }]);
      expect(sql).toBe('SELECT COUNT(*) AS "_count", AVG("posts"."views") AS "_avg_views" FROM "posts"');
    });

    it('should require a field for non-count aggregates', () => {
      expect(() => postBuilder().buildAggregate([{ fn: 'sum' }])).toThrow(/sum requires a field/);
    });

    it('should build a group by with having, order and limit', () => {
      const { sql, params } = postBuilder().buildGroupBy({
        by: ['authorId'],
        where: [Post.published.equals(true)],
        aggregates: [{ fn: 'count' }, { fn: 'sum', field: 'views' }],
        having: [{ fn: 'count', op: 'gte', value: 2 }],
        orderByAggregate: [{ fn: 'sum', field: 'views', order: 'desc' }],
        limit: 10,
      });

      expect(sql).toBe(
        'SELECT "posts"."author_id" AS "authorId", COUNT(*) AS "_count", SUM("posts"."views") AS "_sum_views" ' +
          'FROM "posts" WHERE "posts"."published" = ? GROUP BY "posts"."author_id" HAVING COUNT(*) >= ? ' +
          'ORDER BY SUM("posts"."views") DESC LIMIT 10'
      );
      expect(params).toEqual([true, 2]);
    });

    it('should reject ordering by a field that is not grouped', () => {
      expect(() =>
        postBuilder().buildGroupBy({ by: ['authorId'], aggregates: [], orderBy: [Post.views.asc()] })
      ).toThrow(/not a grouped field/);
    });
  });
});
