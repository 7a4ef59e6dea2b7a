/**
 * relmapper - Key Values
 *
 * A Key is any primary or foreign key value. It is an immutable tagged value
 * that converts to and from the scalar a driver binds or returns, and has a
 * canonical text form (`Int(1)`, `BigInt(9007199254740993)`, `String(abc)`,
 * `Uuid(...)`) that parses back losslessly.
 */

import type { ColumnKind } from './EntityMeta';
import { typeConversion } from './MapperError';

// ============================================
// Key Type
// ============================================

export type Key =
  | { readonly kind: 'int'; readonly value: number }
  | { readonly kind: 'bigint'; readonly value: bigint }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'uuid'; readonly value: string };

export type KeyKind = Key['kind'];

/** Scalar a driver accepts as a bound parameter for a key */
export type KeyDBValue = number | bigint | string;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// ============================================
// Constructors
// ============================================

export function intKey(value: number): Key {
  if (!Number.isSafeInteger(value)) {
    throw typeConversion('key', 'integer', value);
  }
  if (value < INT32_MIN || value > INT32_MAX) {
    return { kind: 'bigint', value: BigInt(value) };
  }
  return { kind: 'int', value };
}

export function bigintKey(value: bigint): Key {
  return { kind: 'bigint', value };
}

export function stringKey(value: string): Key {
  return { kind: 'string', value };
}

export function uuidKey(value: string): Key {
  return { kind: 'uuid', value };
}

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

// ============================================
// DB Value Conversion
// ============================================

/**
 * Convert a scalar read from the database (or taken from a typed write value)
 * into a Key. `kind` is the declared column kind when known; without it the
 * kind is inferred from the JavaScript type. Returns undefined for null,
 * undefined, non-integer numbers and any non-scalar value.
 */
export function keyFromDBValue(value: unknown, kind?: ColumnKind): Key | undefined {
  if (value === null || value === undefined) return undefined;

  if (typeof value === 'bigint') {
    if (kind === 'int' && value >= BigInt(INT32_MIN) && value <= BigInt(INT32_MAX)) {
      return { kind: 'int', value: Number(value) };
    }
    return bigintKey(value);
  }

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) return undefined;
    if (kind === 'bigint') return bigintKey(BigInt(value));
    if (kind === 'string' || kind === 'uuid') return undefined;
    return intKey(value);
  }

  if (typeof value === 'string') {
    if (kind === 'int' || kind === 'bigint') {
      // pg returns int8 columns as text
      if (!/^-?\d+$/.test(value)) return undefined;
      const n = Number(value);
      return kind === 'int' && Number.isSafeInteger(n) ? intKey(n) : bigintKey(BigInt(value));
    }
    if (kind === 'uuid') {
      return isUuid(value) ? uuidKey(value) : undefined;
    }
    return stringKey(value);
  }

  return undefined;
}

export function keyToDBValue(key: Key): KeyDBValue {
  return key.value;
}

// ============================================
// Text Form
// ============================================

const TAGS: Record<KeyKind, string> = {
  int: 'Int',
  bigint: 'BigInt',
  string: 'String',
  uuid: 'Uuid',
};

export function formatKey(key: Key): string {
  return `${TAGS[key.kind]}(${String(key.value)})`;
}

/**
 * Parse the canonical text form. A single `Equals(...)` wrapper, the form a
 * unique-equality condition prints as, is accepted and unwrapped.
 * Never throws; malformed input yields undefined.
 */
export function parseKey(text: string): Key | undefined {
  let body = text.trim();
  const equals = /^Equals\(([\s\S]*)\)$/.exec(body);
  if (equals) {
    body = equals[1];
  }

  const match = /^(Int|BigInt|String|Uuid)\(([\s\S]*)\)$/.exec(body);
  if (!match) return undefined;
  const [, tag, raw] = match;

  switch (tag) {
    case 'Int': {
      if (!/^-?\d+$/.test(raw)) return undefined;
      const n = Number(raw);
      if (n < INT32_MIN || n > INT32_MAX) return undefined;
      return { kind: 'int', value: n };
    }
    case 'BigInt':
      if (!/^-?\d+$/.test(raw)) return undefined;
      return bigintKey(BigInt(raw));
    case 'String':
      return stringKey(raw);
    case 'Uuid':
      return isUuid(raw) ? uuidKey(raw) : undefined;
    default:
      return undefined;
  }
}

// ============================================
// Equality / Hashing
// ============================================

export function keyEquals(a: Key, b: Key): boolean {
  return a.kind === b.kind && a.value === b.value;
}

/**
 * Stable string identity of a key, usable as a Map key.
 */
export function keyHash(key: Key): string {
  return `${key.kind}:${String(key.value)}`;
}

/**
 * Insertion-ordered set of keys.
 */
export class KeySet implements Iterable<Key> {
  private readonly entries = new Map<string, Key>();

  constructor(keys: Iterable<Key> = []) {
    for (const key of keys) {
      this.add(key);
    }
  }

  add(key: Key): this {
    const hash = keyHash(key);
    if (!this.entries.has(hash)) {
      this.entries.set(hash, key);
    }
    return this;
  }

  has(key: Key): boolean {
    return this.entries.has(keyHash(key));
  }

  get size(): number {
    return this.entries.size;
  }

  toDBValues(): KeyDBValue[] {
    return [...this.entries.values()].map(keyToDBValue);
  }

  [Symbol.iterator](): Iterator<Key> {
    return this.entries.values();
  }
}
