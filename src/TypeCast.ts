/**
 * relmapper - Type Cast
 *
 * Converts between driver values and entity property values. Decoding accepts
 * every representation the supported drivers return (SQLite 0/1 booleans and
 * ISO text dates, PostgreSQL parsed JSON and int8 text, MySQL TINYINT(1)).
 */

import type { ColumnKind, ColumnMeta } from './EntityMeta';
import { DBToken } from './DBValues';

// ============================================
// DB -> TypeScript
// ============================================

export function castToBoolean(val: unknown): boolean | null {
  if (val === null || val === undefined) return null;
  if (typeof val === 'boolean') return val;
  if (typeof val === 'number') return val !== 0;
  if (typeof val === 'bigint') return val !== BigInt(0);
  if (typeof val === 'string') {
    const lower = val.toLowerCase();
    if (lower === 'true' || lower === 't' || lower === '1') return true;
    if (lower === 'false' || lower === 'f' || lower === '0') return false;
  }
  return null;
}

export function castToDatetime(val: unknown): Date | null {
  if (val === null || val === undefined) return null;
  if (val instanceof Date) return val;
  if (typeof val === 'string' || typeof val === 'number') {
    const date = new Date(val);
    return isNaN(date.getTime()) ? null : date;
  }
  return null;
}

export function castToJson(val: unknown): unknown {
  if (val === null || val === undefined) return null;
  if (typeof val === 'string') {
    try {
      const parsed: unknown = JSON.parse(val);
      return parsed;
    } catch {
      // Plain text stored in a JSON column
      return val;
    }
  }
  if (Buffer.isBuffer(val)) {
    return castToJson(val.toString('utf8'));
  }
  return val;
}

export function castToNumber(val: unknown): number | null {
  if (val === null || val === undefined) return null;
  if (typeof val === 'number') return val;
  const n = Number(val);
  return isNaN(n) ? null : n;
}

export function castToBigint(val: unknown): bigint | null {
  if (val === null || val === undefined) return null;
  if (typeof val === 'bigint') return val;
  if (typeof val === 'number' && Number.isInteger(val)) return BigInt(val);
  if (typeof val === 'string' && /^-?\d+$/.test(val)) return BigInt(val);
  return null;
}

/**
 * Decode one raw column value. `undefined` (column not in the row) stays
 * undefined; SQL NULL becomes null.
 */
export function decodeValue(kind: ColumnKind, raw: unknown): unknown {
  if (raw === undefined) return undefined;
  if (raw === null) return null;
  switch (kind) {
    case 'int':
    case 'float':
      return castToNumber(raw);
    case 'bigint':
      return castToBigint(raw);
    case 'string':
    case 'uuid':
      return raw instanceof Date ? raw.toISOString() : String(raw);
    case 'boolean':
      return castToBoolean(raw);
    case 'datetime':
      return castToDatetime(raw);
    case 'json':
      return castToJson(raw);
    default:
      return raw;
  }
}

// ============================================
// TypeScript -> DB
// ============================================

/**
 * Encode a property value for binding. JSON columns are always bound as text
 * so that drivers do not reinterpret arrays or objects.
 */
export function encodeValue(column: ColumnMeta, value: unknown): unknown {
  if (value === undefined || value === null || value instanceof DBToken) return value ?? null;
  if (column.kind === 'json') {
    return JSON.stringify(value);
  }
  if (column.kind === 'datetime' && typeof value === 'string') {
    return castToDatetime(value) ?? value;
  }
  return value;
}
