/**
 * Eager Include Integration Tests
 */

import 'reflect-metadata';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { include, intKey } from '../../src';
import type { Client } from '../../src';
import { Comment, Device, Post, User, createTestClient, seedBlog, type Blog } from '../helpers/setup';

describe('includes', () => {
  let client: Client;
  let blog: Blog;

  beforeEach(async () => {
    client = createTestClient();
    blog = await seedBlog(client);
  });

  afterEach(async () => {
    await client.close();
  });

  describe('has-many', () => {
    it('should attach ordered children to every parent', async () => {
      const users = await client
        .entity(User)
        .findMany()
        .orderBy('id')
        .with(include('posts').orderBy('views', 'desc'))
        .exec();

      expect(users.map((u) => u.posts?.map((p) => p.title))).toEqual([['Second', 'First'], ['Third']]);
    });

    it('should filter children', async () => {
      const alice = await client
        .entity(User)
        .findUnique(User.id.equals(blog.alice.id))
        .with(include('posts').where(Post.published.equals(true)))
        .exec();

      expect(alice?.posts?.map((p) => p.title)).toEqual(['First']);
    });

    it('should page children with skip and take', async () => {
      const alice = await client
        .entity(User)
        .findUnique(User.id.equals(blog.alice.id))
        .with(include('posts').orderBy('id').skip(1).take(1))
        .exec();

      expect(alice?.posts?.map((p) => p.title)).toEqual(['Second']);
    });

    it('should start children after a cursor', async () => {
      const post = await client
        .entity(Post)
        .findUnique(Post.id.equals(blog.first.id))
        .with(include('comments').cursor(intKey(1)))
        .exec();

      expect(post?.comments?.map((c) => c.body)).toEqual(['c2', 'c3']);
    });

    it('should compare the cursor in the direction of the leading order', async () => {
      const post = await client
        .entity(Post)
        .findUnique(Post.id.equals(blog.first.id))
        .with(include('comments').orderBy('body', 'desc').cursor(intKey(3)))
        .exec();

      expect(post?.comments?.map((c) => c.body)).toEqual(['c2', 'c1']);
    });

    it('should keep one child per distinct value', async () => {
      await client
        .entity(Comment)
        .createMany([
          { body: 'dup', postId: blog.third.id },
          { body: 'dup', postId: blog.third.id },
        ])
        .exec();

      const post = await client
        .entity(Post)
        .findUnique(Post.id.equals(blog.third.id))
        .with(include('comments').distinct())
        .exec();

      expect(post?.comments?.map((c) => c.id)).toEqual([5]);
    });

    it('should set an empty list when there are no children', async () => {
      const post = await client.entity(Post).findUnique(Post.id.equals(blog.third.id)).with(include('comments')).exec();
      expect(post?.comments).toEqual([]);
    });
  });

  describe('belongs-to', () => {
    it('should attach the parent row', async () => {
      const comments = await client.entity(Comment).findMany().orderBy('id').with(include('post')).exec();
      expect(comments.map((c) => c.post?.title)).toEqual(['First', 'First', 'First', 'Second']);
    });

    it('should leave the slot unset when the foreign key is null', async () => {
      const devices = client.entity(Device);
      await devices.create({ name: 'Loose' }).exec();
      await devices.create({ name: 'Owned', ownerId: blog.bob.id }).exec();

      const found = await devices.findMany().orderBy('name').with(include('owner')).exec();

      expect(found.map((d) => d.name)).toEqual(['Loose', 'Owned']);
      expect('owner' in found[0]).toBe(false);
      expect(found[1].owner?.name).toBe('Bob');
    });

    it('should read included relations and reject those not fetched', async () => {
      const comments = client.entity(Comment);
      const withPost = await comments.findUnique(Comment.id.equals(4)).with(include('post')).exec();
      expect(withPost?.related('post')?.title).toBe('Second');

      const bare = await comments.findUnique(Comment.id.equals(4)).exec();
      expect(() => bare?.related('post')).toThrow("relmapper::RelationNotFetched: entity='Comment', relation='post'");
    });
  });

  describe('nesting', () => {
    it('should traverse depth-first through several levels', async () => {
      const post = await client
        .entity(Post)
        .findUnique(Post.id.equals(blog.first.id))
        .with(include('author').with(include('posts').orderBy('id')), include('comments').orderBy('id').with(include('post')))
        .exec();

      expect(post?.author?.name).toBe('Alice');
      expect(post?.author?.posts?.map((p) => p.title)).toEqual(['First', 'Second']);
      expect(post?.comments?.map((c) => c.body)).toEqual(['c1', 'c2', 'c3']);
      expect(post?.comments?.[0].post?.title).toBe('First');
    });

    it('should serialize nested results', async () => {
      const comment = await client.entity(Comment).findUnique(Comment.id.equals(4)).with(include('post')).exec();

      expect(comment?.toObject()).toMatchObject({ id: 4, body: 'c4', postId: 2, post: { id: 2, title: 'Second' } });
    });
  });

  describe('counts', () => {
    it('should count without fetching', async () => {
      const posts = await client.entity(Post).findMany().orderBy('id').with(include('comments').count()).exec();

      expect(posts.map((p) => p._count?.comments)).toEqual([3, 1, 0]);
      expect(posts.map((p) => p.comments)).toEqual([undefined, undefined, undefined]);
    });

    it('should fetch and count when the include has children', async () => {
      const post = await client
        .entity(Post)
        .findUnique(Post.id.equals(blog.first.id))
        .with(include('comments').orderBy('id').take(1).count().with(include('post')))
        .exec();

      expect(post?.comments?.map((c) => c.body)).toEqual(['c1']);
      expect(post?._count).toEqual({ comments: 3 });
    });

    it('should count only the filtered children', async () => {
      const post = await client
        .entity(Post)
        .findUnique(Post.id.equals(blog.first.id))
        .with(include('comments').where(Comment.body.in(['c1', 'c3'])).count())
        .exec();

      expect(post?._count).toEqual({ comments: 2 });
    });
  });

  describe('validation', () => {
    it('should reject pagination on a belongs-to include', async () => {
      await expect(client.entity(Post).findMany().with(include('author').take(1)).exec()).rejects.toThrow(
        "relmapper::InvalidIncludePath: path='Post.author', reason='ordering and pagination apply to has-many relations only'"
      );
    });

    it('should reject a relation included twice', async () => {
      await expect(client.entity(Post).findMany().with(include('comments'), include('comments')).exec()).rejects.toThrow(
        "relmapper::InvalidIncludePath: path='Post.comments', reason='relation included twice'"
      );
    });

    it('should reject an unknown relation', async () => {
      await expect(client.entity(User).findMany().with(include('followers')).exec()).rejects.toThrow(
        "relmapper::RelationNotFound: entity='User', relation='followers'"
      );
    });

    it('should reject nested field selection outside select()', async () => {
      await expect(client.entity(User).findMany().with(include('posts').select(['title'])).exec()).rejects.toThrow(
        "relmapper::InvalidIncludePath: path='User.posts', reason='field selection requires a select() query'"
      );
    });

    it('should validate nested levels with the full path', async () => {
      await expect(
        client
          .entity(User)
          .findMany()
          .with(include('posts').with(include('author').orderBy('id')))
          .exec()
      ).rejects.toThrow("path='User.posts.author'");
    });
  });
});
