/**
 * Hard Limit Integration Tests
 */

import 'reflect-metadata';
import { describe, it, expect, afterEach } from 'vitest';
import { LimitExceededError, include } from '../../src';
import type { Client, LimitConfig } from '../../src';
import { Post, createTestClient, seedBlog } from '../helpers/setup';

describe('hard limits', () => {
  let client: Client;

  async function setup(limits: LimitConfig): Promise<void> {
    client = createTestClient({ limits });
    await seedBlog(client);
  }

  afterEach(async () => {
    await client.close();
  });

  describe('findHardLimit', () => {
    it('should fail an unbounded find over the limit with the actual count', async () => {
      await setup({ findHardLimit: 2 });

      const error = await client
        .entity(Post)
        .findMany()
        .exec()
        .then(
          () => null,
          (e: unknown) => e
        );

      expect(error).toBeInstanceOf(LimitExceededError);
      if (error instanceof LimitExceededError) {
        expect(error.limit).toBe(2);
        expect(error.actual).toBe(3);
        expect(error.source).toBe('find');
      }
    });

    it('should allow a find at the limit', async () => {
      await setup({ findHardLimit: 3 });
      expect(await client.entity(Post).findMany().exec()).toHaveLength(3);
    });

    it('should not apply when take is given', async () => {
      await setup({ findHardLimit: 1 });
      expect(await client.entity(Post).findMany().take(2).exec()).toHaveLength(2);
      expect(await client.entity(Post).findFirst().exec()).not.toBeNull();
    });

    it('should be disabled by null', async () => {
      await setup({ findHardLimit: null });
      expect(await client.entity(Post).findMany().exec()).toHaveLength(3);
    });
  });

  describe('hasManyHardLimit', () => {
    it('should fail an unbounded relation fetch over the limit', async () => {
      await setup({ hasManyHardLimit: 2 });

      await expect(
        client.entity(Post).findUnique(Post.id.equals(1)).with(include('comments')).exec()
      ).rejects.toThrow(
        "relmapper::LimitExceeded: entity='Comment', source='relation', limit='2', actual='3', relation='comments'"
      );
    });

    it('should not apply when the include has take', async () => {
      await setup({ hasManyHardLimit: 2 });

      const post = await client.entity(Post).findUnique(Post.id.equals(1)).with(include('comments').take(5)).exec();
      expect(post?.comments).toHaveLength(3);
    });

    it('should apply per parent', async () => {
      await setup({ hasManyHardLimit: 2 });

      const posts = await client.entity(Post).findMany([Post.id.in([2, 3])]).with(include('comments')).exec();
      expect(posts.map((p) => p.comments?.length)).toEqual([1, 0]);
    });
  });
});
