// src/config/env.ts
import { ConfigError } from '../utils/errors';

export type DatabaseDialect = 'mysql' | 'sqlite';

export interface DatabaseConfig {
  dialect: DatabaseDialect;
  name: string;
  user: string;
  password: string;
  host: string;
  port: number;
  logging: boolean;
}

export const REQUIRED_VARIABLES = ['DB_NAME', 'DB_USER_NAME', 'DB_PASS', 'DB_URL', 'DB_PORT'] as const;

type RequiredVariable = (typeof REQUIRED_VARIABLES)[number];

// The name ends up inside CREATE/DROP DATABASE, so keep it to a bare identifier.
const DATABASE_NAME = /^[A-Za-z0-9_$]+$/;

const parsePort = (raw: string): number => {
  const port = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`DB_PORT must be an integer between 1 and 65535, got "${raw}"`);
  }
  return port;
};

const parseDialect = (raw: string | undefined): DatabaseDialect => {
  if (raw === undefined || raw === '' || raw === 'mysql') return 'mysql';
  if (raw === 'sqlite') return 'sqlite';
  throw new ConfigError(`DB_DIALECT must be "mysql" or "sqlite", got "${raw}"`);
};

/**
 * Reads the connection parameters from the environment.
 * Every variable in REQUIRED_VARIABLES must be set; DB_PASS may be empty.
 */
export const loadDatabaseConfig = (env: NodeJS.ProcessEnv = process.env): DatabaseConfig => {
  const missing = REQUIRED_VARIABLES.filter((key) => env[key] === undefined);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variable(s): ${missing.join(', ')}`);
  }

  const read = (key: RequiredVariable): string => env[key] ?? '';

  const name = read('DB_NAME');
  if (!DATABASE_NAME.test(name)) {
    throw new ConfigError(`DB_NAME must contain only letters, digits, "_" or "$", got "${name}"`);
  }

  return {
    dialect: parseDialect(env.DB_DIALECT),
    name,
    user: read('DB_USER_NAME'),
    password: read('DB_PASS'),
    host: read('DB_URL'),
    port: parsePort(read('DB_PORT')),
    logging: env.DB_LOGGING !== 'false',
  };
};
