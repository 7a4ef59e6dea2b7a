/**
 * Decorator and EntityMeta Tests
 */

import 'reflect-metadata';
import { describe, it, expect } from 'vitest';
import { ColumnRef } from '../../src/Column';
import { Entity } from '../../src/Entity';
import { writeField, writeCount } from '../../src/EntityMeta';
import { column, entity, getEntityMeta, isEntityClass } from '../../src/decorators';
import { Comment, Post, Tag, User, Device } from '../helpers/setup';

describe('@entity', () => {
  it('should record the table, name and primary key', () => {
    const meta = getEntityMeta(User);

    expect(meta.name).toBe('User');
    expect(meta.tableName).toBe('users');
    expect(meta.primaryKey.propertyName).toBe('id');
    expect(meta.columns.map((c) => c.propertyName)).toEqual(['id', 'email', 'name', 'age', 'active', 'settings', 'createdAt']);
  });

  it('should derive a snake_case table name from the class name', () => {
    function define() {
      @entity()
      class BlogPostEntity extends Entity {
        @column.int({ primaryKey: true }) id!: number;
      }
      return BlogPostEntity;
    }
    const meta = getEntityMeta(define());

    expect(meta.name).toBe('BlogPostEntity');
    expect(meta.tableName).toBe('blog_post_entity');
  });

  it('should require exactly one primary key', () => {
    function define() {
      @entity('things')
      class Thing extends Entity {
        @column.string() label!: string;
      }
      return Thing;
    }
    expect(define).toThrow(/Thing must declare exactly one primary key column \(found 0\)/);
  });

  it('should reject undecorated classes', () => {
    class Plain extends Entity {}
    expect(isEntityClass(Plain)).toBe(false);
    expect(isEntityClass(User)).toBe(true);
    expect(() => getEntityMeta(Plain)).toThrow(/Plain is not decorated with @entity/);
  });
});

describe('@column', () => {
  it('should record kind, physical name and flags', () => {
    const meta = getEntityMeta(User);

    expect(meta.requireColumn('createdAt')).toEqual({
      propertyName: 'createdAt',
      columnName: 'created_at',
      kind: 'datetime',
      primaryKey: false,
      unique: false,
      nullable: false,
    });
    expect(meta.requireColumn('email').unique).toBe(true);
    expect(meta.requireColumn('age').nullable).toBe(true);
    expect(getEntityMeta(Device).primaryKey.kind).toBe('uuid');
  });

  it('should treat primary-key and unique columns as unique fields', () => {
    const meta = getEntityMeta(User);

    expect(meta.isUniqueField('id')).toBe(true);
    expect(meta.isUniqueField('email')).toBe(true);
    expect(meta.isUniqueField('name')).toBe(false);
    expect(meta.isUniqueField('missing')).toBe(false);
  });

  it('should attach a static ColumnRef per column', () => {
    expect(User.email).toBeInstanceOf(ColumnRef);
    expect(User.createdAt.columnName).toBe('created_at');
    expect(User.email.equals('a@example.com')).toEqual({
      field: 'email',
      operation: { type: 'equals', value: 'a@example.com' },
    });
    expect(Post.views.desc('first')).toEqual({ field: 'views', order: 'desc', nulls: 'first' });
    expect(Post.title.contains('x')).toEqual({ field: 'title', operation: { type: 'contains', value: 'x', mode: 'default' } });
  });

  it('should let a name column shadow the class name', () => {
    expect(User.name).toBeInstanceOf(ColumnRef);
    expect(getEntityMeta(User).name).toBe('User');
  });
});

describe('relation descriptors', () => {
  it('should describe a belongs-to relation', () => {
    const author = getEntityMeta(Post).requireRelation('author');

    expect(author.kind).toBe('belongsTo');
    expect(author.targetEntity).toBe('User');
    expect(author.foreignKeyColumn).toBe('author_id');
    expect(author.foreignKeyField).toBe('authorId');
    expect(author.currentKeyField).toBe('id');
    expect(author.targetKeyField).toBe('id');
    expect(author.isHasMany).toBe(false);
    expect(author.isForeignKeyNullable).toBe(false);
  });

  it('should describe a has-many relation by the target foreign key', () => {
    const posts = getEntityMeta(User).requireRelation('posts');

    expect(posts.kind).toBe('hasMany');
    expect(posts.targetEntity).toBe('Post');
    expect(posts.foreignKeyColumn).toBe('author_id');
    expect(posts.foreignKeyField).toBe('authorId');
    expect(posts.currentKeyField).toBe('id');
    expect(posts.isHasMany).toBe(true);
  });

  it('should report nullable foreign keys', () => {
    expect(getEntityMeta(Post).requireRelation('tags').isForeignKeyNullable).toBe(true);
    expect(getEntityMeta(Post).requireRelation('comments').isForeignKeyNullable).toBe(false);
    expect(getEntityMeta(Tag).requireRelation('post').isForeignKeyNullable).toBe(true);
  });

  it('should read the key a relation is fetched by', () => {
    const postMeta = getEntityMeta(Post);
    const post = postMeta.createInstance();
    writeField(post, 'id', 4);
    writeField(post, 'authorId', 7);

    expect(postMeta.requireRelation('author').getForeignKey(post)).toEqual({ kind: 'int', value: 7 });
    expect(postMeta.requireRelation('comments').getForeignKey(post)).toEqual({ kind: 'int', value: 4 });

    const tag = getEntityMeta(Tag).createInstance();
    writeField(tag, 'postId', null);
    expect(getEntityMeta(Tag).requireRelation('post').getForeignKey(tag)).toBeUndefined();
  });

  it('should set relation slots and reject a mismatched kind', () => {
    const commentMeta = getEntityMeta(Comment);
    const comment = commentMeta.createInstance();
    const post = commentMeta.requireRelation('post');

    post.setField(comment, { kind: 'belongsTo', item: null });
    expect(comment.post).toBeNull();

    expect(() => post.setField(comment, { kind: 'hasMany', items: [] })).toThrow(/TypeConversion/);
  });

  it('should throw RelationNotFound for unknown relations', () => {
    expect(() => getEntityMeta(User).requireRelation('followers')).toThrow(
      "relmapper::RelationNotFound: entity='User', relation='followers'"
    );
  });
});

describe('Entity', () => {
  it('should omit absent slots in toObject', () => {
    const meta = getEntityMeta(Post);
    const post = meta.createInstance();
    writeField(post, 'id', 1);
    writeField(post, 'category', null);
    writeCount(post, 'comments', 3);

    expect(post.toObject()).toEqual({ id: 1, category: null, _count: { comments: 3 } });
  });

  it('should convert nested entities', () => {
    const post = getEntityMeta(Post).createInstance();
    const author = getEntityMeta(User).createInstance();
    writeField(author, 'id', 2);
    writeField(post, 'author', author);

    expect(JSON.parse(JSON.stringify(post))).toEqual({ author: { id: 2 } });
  });
});
