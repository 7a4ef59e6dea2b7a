/**
 * Transaction and Batch Integration Tests
 */

import 'reflect-metadata';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Client } from '../../src';
import { Post, RecordingLogger, User, createTestClient, seedBlog } from '../helpers/setup';

describe('transactions', () => {
  let client: Client;
  let logger: RecordingLogger;

  beforeEach(async () => {
    logger = new RecordingLogger();
    client = createTestClient({ logger });
    await seedBlog(client);
  });

  afterEach(async () => {
    await client.close();
  });

  const userCount = (): Promise<number> => client.entity(User).count().exec();

  describe('transaction', () => {
    it('should commit when the callback resolves', async () => {
      const result = await client.transaction(async (tx) => {
        await tx.entity(User).create({ email: 'carol@example.com', name: 'Carol' }).exec();
        return 'done';
      });

      expect(result).toBe('done');
      expect(await userCount()).toBe(3);
    });

    it('should roll back and rethrow when the callback throws', async () => {
      await expect(
        client.transaction(async (tx) => {
          await tx.entity(User).create({ email: 'carol@example.com', name: 'Carol' }).exec();
          throw new Error('stop');
        })
      ).rejects.toThrow('stop');

      expect(await userCount()).toBe(2);
      expect(logger.at('warn')).toEqual(['Transaction rolled back']);
    });

    it('should rethrow the callback error when ROLLBACK itself fails', async () => {
      await expect(
        client.transaction(async (tx) => {
          // ends the transaction early so the final ROLLBACK has nothing to undo
          await tx.execute('ROLLBACK');
          throw new Error('stop');
        })
      ).rejects.toThrow('stop');

      expect(logger.at('error')).toContain('ROLLBACK failed');
    });

    it('should always roll back with rollbackOnly', async () => {
      const inside = await client.transaction(
        async (tx) => {
          await tx.entity(User).create({ email: 'carol@example.com', name: 'Carol' }).exec();
          return tx.entity(User).count().exec();
        },
        { rollbackOnly: true }
      );

      expect(inside).toBe(3);
      expect(await userCount()).toBe(2);
    });

    it('should join an outer transaction', async () => {
      await expect(
        client.transaction(async (outer) => {
          await outer.transaction(async (inner) => {
            expect(inner.currentSession()).toBe(outer.currentSession());
            await inner.entity(User).create({ email: 'carol@example.com', name: 'Carol' }).exec();
          });
          throw new Error('outer failed');
        })
      ).rejects.toThrow('outer failed');

      expect(await userCount()).toBe(2);
    });

    it('should run builders of the outer client on the active transaction', async () => {
      expect(client.inTransaction).toBe(false);

      await client.transaction(async (tx) => {
        expect(client.inTransaction).toBe(true);
        expect(client.currentSession()).toBe(tx.currentSession());
        await client.entity(Post).updateMany([], { views: 0 }).exec();
      });

      expect(client.inTransaction).toBe(false);
      expect(await client.entity(Post).count([Post.views.equals(0)]).exec()).toBe(3);
    });

    it('should refuse to close a transaction client', async () => {
      await client.transaction(async (tx) => {
        await expect(tx.close()).rejects.toThrow(
          "relmapper::InvalidConfiguration: message='A transaction client cannot be closed'"
        );
      });
    });
  });

  describe('batch', () => {
    it('should return results in order', async () => {
      const users = client.entity(User);
      const [carol, count] = await client.batch([
        users.create({ email: 'carol@example.com', name: 'Carol' }),
        users.count(),
      ]);

      expect(carol.name).toBe('Carol');
      expect(count).toBe(3);
    });

    it('should roll back every query when one fails', async () => {
      const users = client.entity(User);
      await expect(
        client.batch([
          users.create({ email: 'carol@example.com', name: 'Carol' }),
          users.create({ email: 'alice@example.com', name: 'Duplicate' }),
        ])
      ).rejects.toThrow(/UNIQUE constraint failed: users.email/);

      expect(await userCount()).toBe(2);
    });

    it('should roll back nested child inserts of an earlier query', async () => {
      const posts = client.entity(Post);
      await expect(
        client.batch([
          client
            .entity(User)
            .create({ email: 'carol@example.com', name: 'Carol' })
            .createChildren('posts', [{ title: 'Carol one' }, { title: 'Carol two' }]),
          posts.create({ title: 'Orphan' }).connect('author', User.email.equals('nobody@example.com')),
        ])
      ).rejects.toThrow(`relmapper::NotFoundForCondition: entity='User', condition='email equals("nobody@example.com")'`);

      expect(await userCount()).toBe(2);
      expect(await posts.count().exec()).toBe(3);
    });

    it('should accept a list of queries of one type', async () => {
      const posts = client.entity(Post);
      const counts = await client.batch([1, 2, 3].map((authorId) => posts.count([Post.authorId.equals(authorId)])));
      expect(counts).toEqual([2, 1, 0]);
    });
  });
});
