/**
 * Key Tests
 */

import { describe, it, expect } from 'vitest';
import {
  KeySet,
  bigintKey,
  formatKey,
  intKey,
  keyEquals,
  keyFromDBValue,
  keyHash,
  keyToDBValue,
  parseKey,
  stringKey,
  uuidKey,
} from '../../src/Key';
import { MapperError } from '../../src/MapperError';

const UUID = '0f8fad5b-d9cb-469f-a165-70867728950e';

describe('Key', () => {
  describe('intKey', () => {
    it('should keep 32-bit values as Int', () => {
      expect(intKey(42)).toEqual({ kind: 'int', value: 42 });
      expect(intKey(-2147483648)).toEqual({ kind: 'int', value: -2147483648 });
    });

    it('should widen values outside 32 bits to BigInt', () => {
      expect(intKey(3000000000)).toEqual({ kind: 'bigint', value: BigInt(3000000000) });
    });

    it('should reject non-integers', () => {
      expect(() => intKey(1.5)).toThrow(MapperError);
    });
  });

  describe('keyFromDBValue', () => {
    it('should return undefined for null and undefined', () => {
      expect(keyFromDBValue(null)).toBeUndefined();
      expect(keyFromDBValue(undefined)).toBeUndefined();
    });

    it('should infer the kind from the value without a column kind', () => {
      expect(keyFromDBValue(7)).toEqual({ kind: 'int', value: 7 });
      expect(keyFromDBValue('abc')).toEqual({ kind: 'string', value: 'abc' });
      expect(keyFromDBValue(BigInt(5))).toEqual({ kind: 'bigint', value: BigInt(5) });
    });

    it('should parse integer text for int and bigint columns', () => {
      expect(keyFromDBValue('42', 'int')).toEqual({ kind: 'int', value: 42 });
      expect(keyFromDBValue('9007199254740993', 'bigint')).toEqual({ kind: 'bigint', value: BigInt('9007199254740993') });
      expect(keyFromDBValue('abc', 'int')).toBeUndefined();
    });

    it('should narrow a bigint to Int for int columns', () => {
      expect(keyFromDBValue(BigInt(7), 'int')).toEqual({ kind: 'int', value: 7 });
    });

    it('should widen numbers for bigint columns', () => {
      expect(keyFromDBValue(5, 'bigint')).toEqual({ kind: 'bigint', value: BigInt(5) });
    });

    it('should keep UUIDs as stored and reject malformed ones', () => {
      expect(keyFromDBValue(UUID.toUpperCase(), 'uuid')).toEqual({ kind: 'uuid', value: UUID.toUpperCase() });
      expect(keyToDBValue(uuidKey(UUID.toUpperCase()))).toBe(UUID.toUpperCase());
      expect(keyFromDBValue('not-a-uuid', 'uuid')).toBeUndefined();
    });

    it('should reject numbers for string columns and non-scalars', () => {
      expect(keyFromDBValue(5, 'string')).toBeUndefined();
      expect(keyFromDBValue(1.25)).toBeUndefined();
      expect(keyFromDBValue({ id: 1 })).toBeUndefined();
    });
  });

  describe('keyToDBValue', () => {
    it('should return the bound scalar', () => {
      expect(keyToDBValue(intKey(3))).toBe(3);
      expect(keyToDBValue(bigintKey(BigInt(10)))).toBe(BigInt(10));
      expect(keyToDBValue(uuidKey(UUID))).toBe(UUID);
    });
  });

  describe('formatKey / parseKey', () => {
    it('should format each kind with its tag', () => {
      expect(formatKey(intKey(1))).toBe('Int(1)');
      expect(formatKey(bigintKey(BigInt('9007199254740993')))).toBe('BigInt(9007199254740993)');
      expect(formatKey(stringKey('abc'))).toBe('String(abc)');
      expect(formatKey(uuidKey(UUID))).toBe(`Uuid(${UUID})`);
    });

    it('should parse the formatted text back', () => {
      expect(parseKey('Int(1)')).toEqual(intKey(1));
      expect(parseKey('BigInt(9007199254740993)')).toEqual(bigintKey(BigInt('9007199254740993')));
      expect(parseKey('String(a(b)c)')).toEqual(stringKey('a(b)c'));
      expect(parseKey(`Uuid(${UUID})`)).toEqual(uuidKey(UUID));
    });

    it('should unwrap a single Equals wrapper', () => {
      expect(parseKey('Equals(Int(5))')).toEqual(intKey(5));
    });

    it('should return undefined for malformed text', () => {
      expect(parseKey('Int(x)')).toBeUndefined();
      expect(parseKey('Int(3000000000)')).toBeUndefined();
      expect(parseKey('Float(1)')).toBeUndefined();
      expect(parseKey('Uuid(1234)')).toBeUndefined();
      expect(parseKey('')).toBeUndefined();
    });
  });

  describe('equality', () => {
    it('should compare kind and value', () => {
      expect(keyEquals(intKey(1), intKey(1))).toBe(true);
      expect(keyEquals(intKey(1), stringKey('1'))).toBe(false);
      expect(keyHash(intKey(1))).not.toBe(keyHash(stringKey('1')));
    });
  });

  describe('KeySet', () => {
    it('should keep insertion order without duplicates', () => {
      const set = new KeySet([intKey(3), intKey(1), intKey(3)]);
      set.add(stringKey('3'));

      expect(set.size).toBe(3);
      expect(set.has(intKey(1))).toBe(true);
      expect(set.toDBValues()).toEqual([3, 1, '3']);
      expect([...set].map(formatKey)).toEqual(['Int(3)', 'Int(1)', 'String(3)']);
    });
  });
});
