import { Database } from '../config/db';
import type { DatabaseConfig } from '../config/env';

export const testConfig = (overrides: Partial<DatabaseConfig> = {}): DatabaseConfig => ({
  dialect: 'sqlite',
  name: 'notes_test',
  user: 'test-user',
  password: 'test-secret',
  host: '127.0.0.1',
  port: 3306,
  logging: false,
  ...overrides,
});

/** An in-memory sqlite database with the schema already in place. */
export const openTestDatabase = async (): Promise<Database> => {
  const db = new Database(testConfig());
  await db.initializeSchema();
  return db;
};
