import { describe, expect, it } from 'vitest';
import { ConfigError } from '../utils/errors';
import { loadDatabaseConfig } from './env';

const baseEnv = {
  DB_NAME: 'notes',
  DB_USER_NAME: 'notes_user',
  DB_PASS: 'test-secret',
  DB_URL: 'db.internal',
  DB_PORT: '3307',
};

describe('loadDatabaseConfig', () => {
  it('reads every connection parameter', () => {
    expect(loadDatabaseConfig(baseEnv)).toEqual({
      dialect: 'mysql',
      name: 'notes',
      user: 'notes_user',
      password: 'test-secret',
      host: 'db.internal',
      port: 3307,
      logging: true,
    });
  });

  it('names every missing variable', () => {
    const { DB_PASS: _pass, DB_PORT: _port, ...env } = baseEnv;
    expect(() => loadDatabaseConfig(env)).toThrowError(
      new ConfigError('Missing required environment variable(s): DB_PASS, DB_PORT')
    );
  });

  it('accepts an empty password', () => {
    expect(loadDatabaseConfig({ ...baseEnv, DB_PASS: '' }).password).toBe('');
  });

  it.each(['abc', '0', '70000', '33.5', ''])('rejects DB_PORT=%j', (port) => {
    expect(() => loadDatabaseConfig({ ...baseEnv, DB_PORT: port })).toThrow(ConfigError);
  });

  it('rejects a database name that is not a bare identifier', () => {
    expect(() => loadDatabaseConfig({ ...baseEnv, DB_NAME: 'notes; DROP TABLE x' })).toThrow(
      'DB_NAME must contain only letters, digits, "_" or "$", got "notes; DROP TABLE x"'
    );
  });

  it('reads the optional dialect and logging switches', () => {
    const config = loadDatabaseConfig({ ...baseEnv, DB_DIALECT: 'sqlite', DB_LOGGING: 'false' });
    expect(config.dialect).toBe('sqlite');
    expect(config.logging).toBe(false);
  });

  it('rejects an unknown dialect', () => {
    expect(() => loadDatabaseConfig({ ...baseEnv, DB_DIALECT: 'oracle' })).toThrow(
      'DB_DIALECT must be "mysql" or "sqlite", got "oracle"'
    );
  });
});
