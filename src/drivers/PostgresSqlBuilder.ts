/**
 * relmapper - PostgreSQL Dialect
 *
 * JSON columns are compared as jsonb. The jsonb `?` operator is avoided
 * (it collides with placeholders); jsonb_exists() is used instead.
 */

import type { SqlDialect } from './types';

export const postgresDialect: SqlDialect = {
  name: 'postgres',
  supportsReturning: true,
  supportsDistinctOn: true,

  quote(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  },

  like(column, mode) {
    return mode === 'insensitive' ? `${column} ILIKE ?` : `${column} LIKE ?`;
  },

  limitOffset(limit, offset) {
    const parts: string[] = [];
    if (limit !== undefined) parts.push(`LIMIT ${limit}`);
    if (offset) parts.push(`OFFSET ${offset}`);
    return parts.join(' ');
  },

  insertDefaults(table) {
    return `INSERT INTO ${table} DEFAULT VALUES`;
  },

  jsonPathExists(column, path, params) {
    params.push([...path]);
    return `(${column}::jsonb #> ?::text[]) IS NOT NULL`;
  },

  jsonText(column) {
    return `(${column}::jsonb #>> '{}')`;
  },

  jsonArrayContains(column, value, params) {
    params.push(JSON.stringify([value]));
    return `(jsonb_typeof(${column}::jsonb) = 'array' AND ${column}::jsonb @> ?::jsonb)`;
  },

  jsonArrayElementEquals(column, position, value, params) {
    params.push(JSON.stringify(value));
    return `(${column}::jsonb -> ${position === 'first' ? 0 : -1}) = ?::jsonb`;
  },

  jsonHasKey(column, key, params) {
    params.push(key);
    return `(jsonb_typeof(${column}::jsonb) = 'object' AND jsonb_exists(${column}::jsonb, ?))`;
  },

  jsonIsNullLiteral(column) {
    return `jsonb_typeof(${column}::jsonb) = 'null'`;
  },
};
