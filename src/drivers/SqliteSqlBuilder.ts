/**
 * relmapper - SQLite Dialect
 *
 * SQLite has RETURNING (3.35+) but no DISTINCT ON and no native JSON type;
 * JSON columns are TEXT read through the JSON1 functions.
 */

import type { SqlDialect } from './types';
import { jsonPathText } from './types';
import type { JsonValue } from '../Filter';

/**
 * Bind a JSON value for comparison with a json_each / json_extract result:
 * scalars bind as themselves, arrays and objects as JSON text.
 */
function jsonScalarParam(value: JsonValue): unknown {
  return value !== null && typeof value === 'object' ? JSON.stringify(value) : value;
}

export const sqliteDialect: SqlDialect = {
  name: 'sqlite',
  supportsReturning: true,
  supportsDistinctOn: false,

  quote(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  },

  // LIKE is ASCII case-insensitive in SQLite; 'insensitive' also folds the pattern
  like(column, mode) {
    return mode === 'insensitive' ? `LOWER(${column}) LIKE LOWER(?) ESCAPE '\\'` : `${column} LIKE ? ESCAPE '\\'`;
  },

  limitOffset(limit, offset) {
    if (limit === undefined && offset === undefined) return '';
    const clause = `LIMIT ${limit ?? -1}`;
    return offset ? `${clause} OFFSET ${offset}` : clause;
  },

  insertDefaults(table) {
    return `INSERT INTO ${table} DEFAULT VALUES`;
  },

  jsonPathExists(column, path, params) {
    params.push(jsonPathText(path));
    return `json_type(${column}, ?) IS NOT NULL`;
  },

  jsonText(column) {
    return `json_extract(${column}, '$')`;
  },

  jsonArrayContains(column, value, params) {
    params.push(jsonScalarParam(value));
    return `EXISTS (SELECT 1 FROM json_each(${column}) WHERE json_each.value = ?)`;
  },

  jsonArrayElementEquals(column, position, value, params) {
    params.push(jsonScalarParam(value));
    return position === 'first' ? `json_extract(${column}, '$[0]') = ?` : `json_extract(${column}, '$[#-1]') = ?`;
  },

  jsonHasKey(column, key, params) {
    params.push(jsonPathText([key]));
    return `(json_type(${column}) = 'object' AND json_type(${column}, ?) IS NOT NULL)`;
  },

  jsonIsNullLiteral(column) {
    return `json_type(${column}) = 'null'`;
  },
};
