/**
 * configFromEnv Tests
 */

import { describe, it, expect } from 'vitest';
import { configFromEnv } from '../../src/config';

describe('configFromEnv', () => {
  it('should read every variable under the default prefix', () => {
    const config = configFromEnv({
      DB_DRIVER: 'postgres',
      DB_DATABASE: 'app',
      DB_HOST: 'localhost',
      DB_PORT: '5432',
      DB_USER: 'app',
      DB_PASSWORD: 'test-secret',
      DB_MAX: '4',
    });

    expect(config).toEqual({
      driver: 'postgres',
      database: 'app',
      host: 'localhost',
      port: 5432,
      user: 'app',
      password: 'test-secret',
      max: 4,
    });
  });

  it('should treat empty values as unset', () => {
    const config = configFromEnv({ APP_DATABASE: ':memory:', APP_DRIVER: 'sqlite', APP_HOST: '' }, 'APP_');
    expect(config.driver).toBe('sqlite');
    expect(config.host).toBeUndefined();
    expect(config.port).toBeUndefined();
  });

  it('should require a database', () => {
    expect(() => configFromEnv({ DB_DRIVER: 'sqlite' })).toThrow("message='DB_DATABASE is required'");
  });

  it('should reject an unknown driver', () => {
    expect(() => configFromEnv({ DB_DATABASE: 'app', DB_DRIVER: 'oracle' })).toThrow(
      "DB_DRIVER must be postgres, sqlite or mysql, got 'oracle'"
    );
  });

  it('should reject a malformed port', () => {
    expect(() => configFromEnv({ DB_DATABASE: 'app', DB_PORT: '0' })).toThrow(
      "DB_PORT must be a positive integer, got '0'"
    );
    expect(() => configFromEnv({ DB_DATABASE: 'app', DB_MAX: 'ten' })).toThrow(
      "DB_MAX must be a positive integer, got 'ten'"
    );
  });
});
