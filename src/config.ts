/**
 * relmapper - Configuration
 */

import type { DBConfig } from './drivers/types';
import { invalidConfiguration } from './MapperError';

/**
 * Read a DBConfig from environment variables: `<prefix>DRIVER`,
 * `<prefix>DATABASE`, `<prefix>HOST`, `<prefix>PORT`, `<prefix>USER`,
 * `<prefix>PASSWORD`, `<prefix>MAX`.
 *
 * @throws MapperError InvalidConfiguration when DATABASE is missing or a
 *   value is malformed
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env, prefix = 'DB_'): DBConfig {
  const read = (name: string): string | undefined => {
    const value = env[`${prefix}${name}`];
    return value === undefined || value === '' ? undefined : value;
  };
  const readInt = (name: string): number | undefined => {
    const value = read(name);
    if (value === undefined) return undefined;
    const n = Number(value);
    if (!Number.isInteger(n) || n <= 0) {
      throw invalidConfiguration(`${prefix}${name} must be a positive integer, got '${value}'`);
    }
    return n;
  };

  const database = read('DATABASE');
  if (!database) {
    throw invalidConfiguration(`${prefix}DATABASE is required`);
  }
  const driver = read('DRIVER');
  if (driver !== undefined && driver !== 'postgres' && driver !== 'sqlite' && driver !== 'mysql') {
    throw invalidConfiguration(`${prefix}DRIVER must be postgres, sqlite or mysql, got '${driver}'`);
  }

  return {
    driver,
    database,
    host: read('HOST'),
    port: readInt('PORT'),
    user: read('USER'),
    password: read('PASSWORD'),
    max: readInt('MAX'),
  };
}
