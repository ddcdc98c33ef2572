// src/utils/script.ts
import { Database } from '../config/db';
import { loadDatabaseConfig } from '../config/env';
import type { DatabaseConfig } from '../config/env';

/**
 * Runs one maintenance task against a freshly opened Database and always closes it.
 * Failures, configuration errors included, are logged and turned into exit code 1.
 */
export const runWithDatabase = async (
  label: string,
  task: (db: Database) => Promise<void>,
  env: NodeJS.ProcessEnv = process.env,
  open: (config: DatabaseConfig) => Database = (config) => new Database(config)
): Promise<void> => {
  console.log(`--- ${label} ---`);

  let db: Database;
  try {
    db = open(loadDatabaseConfig(env));
  } catch (error) {
    console.error('❌ Invalid database configuration:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
    return;
  }

  try {
    await task(db);
    console.log(`✅ ${label} finished.`);
  } catch (error) {
    console.error(`❌ ${label} failed:`, error);
    process.exitCode = 1;
  } finally {
    await db.close();
    console.log('Connection closed.');
  }
};
