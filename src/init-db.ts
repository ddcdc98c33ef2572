// src/init-db.ts
import dotenv from 'dotenv';
import { runWithDatabase } from './utils/script';

dotenv.config();

runWithDatabase('Database Init Script', (db) => db.initializeSchema()).catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
