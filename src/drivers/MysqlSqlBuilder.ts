/**
 * relmapper - MySQL Dialect
 *
 * MySQL has neither RETURNING nor DISTINCT ON. Inserted rows are re-read by
 * the generated id the driver reports.
 */

import type { SqlDialect } from './types';
import { jsonPathText } from './types';

// Largest LIMIT MySQL accepts; used when only an offset is given
const MAX_LIMIT = '18446744073709551615';

export const mysqlDialect: SqlDialect = {
  name: 'mysql',
  supportsReturning: false,
  supportsDistinctOn: false,

  quote(identifier: string): string {
    return `\`${identifier.replace(/`/g, '``')}\``;
  },

  like(column, mode) {
    return mode === 'insensitive' ? `LOWER(${column}) LIKE LOWER(?)` : `${column} LIKE BINARY ?`;
  },

  limitOffset(limit, offset) {
    if (limit === undefined && offset === undefined) return '';
    const clause = `LIMIT ${limit ?? MAX_LIMIT}`;
    return offset ? `${clause} OFFSET ${offset}` : clause;
  },

  insertDefaults(table) {
    return `INSERT INTO ${table} () VALUES ()`;
  },

  jsonPathExists(column, path, params) {
    params.push(jsonPathText(path));
    return `JSON_CONTAINS_PATH(${column}, 'one', ?)`;
  },

  jsonText(column) {
    return `JSON_UNQUOTE(${column})`;
  },

  jsonArrayContains(column, value, params) {
    params.push(JSON.stringify(value));
    return `(JSON_TYPE(${column}) = 'ARRAY' AND JSON_CONTAINS(${column}, ?))`;
  },

  jsonArrayElementEquals(column, position, value, params) {
    params.push(JSON.stringify(value));
    const path = position === 'first' ? `'$[0]'` : `'$[last]'`;
    return `JSON_EXTRACT(${column}, ${path}) = CAST(? AS JSON)`;
  },

  jsonHasKey(column, key, params) {
    params.push(jsonPathText([key]));
    return `(JSON_TYPE(${column}) = 'OBJECT' AND JSON_CONTAINS_PATH(${column}, 'one', ?))`;
  },

  jsonIsNullLiteral(column) {
    return `JSON_TYPE(${column}) = 'NULL'`;
  },
};
