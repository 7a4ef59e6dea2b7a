/**
 * Middleware Hooks Integration Tests
 *
 * Hook flow per builder execution:
 * - query hook once per exec() (batch: once for the batch, once per query)
 * - execute hook once per SQL statement, including include fetches and
 *   deferred lookups
 * - afterQuery once per exec(), after it settles
 */

import 'reflect-metadata';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Middleware, StatisticsMiddleware, include } from '../../src';
import type { Client, ExecuteResult, NextExecute, NextQuery, QueryEvent } from '../../src';
import { Comment, Post, User, createTestClient, seedBlog } from '../helpers/setup';

class RecorderMiddleware extends Middleware {
  events: string[] = [];
  sql: string[] = [];

  async query<R>(next: NextQuery<R>, event: QueryEvent): Promise<R> {
    this.events.push(`${event.operation}:${event.entity}`);
    return next();
  }

  async execute(next: NextExecute, sql: string, params?: unknown[]): Promise<ExecuteResult> {
    this.sql.push(sql);
    return next(sql, params);
  }
}

/** Table read by a SELECT statement */
function tableOf(sql: string): string {
  const match = / FROM ("[a-z_]+")/.exec(sql);
  return match ? match[1] : '';
}

describe('StatisticsMiddleware', () => {
  let client: Client;

  beforeEach(async () => {
    client = createTestClient({ middlewares: [StatisticsMiddleware] });
    await seedBlog(client);
  });

  afterEach(async () => {
    await client.close();
  });

  it('should count builder operations and statements', async () => {
    const stats = await StatisticsMiddleware.run(async () => {
      const posts = client.entity(Post);
      await posts.findMany().exec();
      await posts.create({ title: 'Fourth', authorId: 1 }).exec();
      await posts.update(Post.id.equals(4), { title: 'Fourth!' }).exec();
      await posts.delete(Post.id.equals(4)).exec();
      await client.entity(Comment).count().exec();
      return StatisticsMiddleware.getCurrentContext();
    });

    expect(stats.find_counter).toBe(2);
    expect(stats.insert_counter).toBe(1);
    expect(stats.update_counter).toBe(1);
    expect(stats.delete_counter).toBe(1);
    expect(stats.execute_counter).toBe(8);
    expect(stats.error_counter).toBe(0);
  });

  it('should count a batch and its queries', async () => {
    const stats = await StatisticsMiddleware.run(async () => {
      const posts = client.entity(Post);
      await client.batch([posts.count(), posts.count()]);
      return StatisticsMiddleware.getCurrentContext();
    });

    expect(stats.batch_counter).toBe(1);
    expect(stats.find_counter).toBe(2);
    expect(stats.rowsByOperation.get('batch')).toBe(2);
  });

  it('should count failed operations', async () => {
    const stats = await StatisticsMiddleware.run(async () => {
      await expect(client.entity(Post).update(Post.id.equals(99), { title: 'x' }).exec()).rejects.toThrow(
        /RecordNotFound/
      );
      return StatisticsMiddleware.getCurrentContext();
    });

    expect(stats.update_counter).toBe(1);
    expect(stats.error_counter).toBe(1);
  });

  it('should record rows per operation', async () => {
    const stats = await StatisticsMiddleware.run(async () => {
      await client.entity(Post).findMany().exec();
      await client.entity(Comment).deleteMany([Comment.postId.equals(1)]).exec();
      return StatisticsMiddleware.getCurrentContext();
    });

    expect(stats.rowsByOperation.get('findMany')).toBe(3);
    expect(stats.rowsByOperation.get('deleteMany')).toBe(3);
  });

  it('should count raw statements', async () => {
    const stats = await StatisticsMiddleware.run(async () => {
      await client.execute('SELECT 1');
      return StatisticsMiddleware.getCurrentContext();
    });

    expect(stats.execute_counter).toBe(1);
    expect(stats.totalCount).toBe(0);
  });
});

describe('custom middleware', () => {
  let client: Client;

  beforeEach(async () => {
    client = createTestClient({ middlewares: [RecorderMiddleware] });
    await seedBlog(client);
  });

  afterEach(async () => {
    await client.close();
  });

  it('should see one query event and every statement of an include', async () => {
    const recorder = await RecorderMiddleware.run(async () => {
      await client.entity(User).findUnique(User.id.equals(1)).with(include('posts')).exec();
      return RecorderMiddleware.getCurrentContext();
    });

    expect(recorder.events).toEqual(['findUnique:User']);
    expect(recorder.sql.map(tableOf)).toEqual(['"users"', '"posts"']);
  });

  it('should see the lookup of a deferred connect', async () => {
    const recorder = await RecorderMiddleware.run(async () => {
      await client.entity(Post).create({ title: 'Fourth' }).connect('author', User.email.equals('bob@example.com')).exec();
      return RecorderMiddleware.getCurrentContext();
    });

    expect(recorder.events).toEqual(['create:Post']);
    expect(recorder.sql).toHaveLength(2);
    expect(tableOf(recorder.sql[0])).toBe('"users"');
    expect(recorder.sql[1].startsWith('INSERT INTO "posts"')).toBe(true);
  });

  it('should see statements of queries run inside a transaction', async () => {
    const recorder = await RecorderMiddleware.run(async () => {
      await client.transaction(async (tx) => {
        await tx.entity(Post).count().exec();
      });
      return RecorderMiddleware.getCurrentContext();
    });

    expect(recorder.events).toEqual(['count:Post']);
    expect(recorder.sql.map(tableOf)).toEqual(['"posts"']);
  });
});
