// src/drop-db.ts
import dotenv from 'dotenv';
import { runWithDatabase } from './utils/script';

dotenv.config();

if (process.argv[2] === 'confirm') {
  console.warn('⚠️  WARNING: This will permanently delete the database and every note in it.');
  runWithDatabase('Database Drop Script', (db) => db.dropDatabase()).catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
} else {
  console.log('--------------------------------------------------');
  console.log("This script will drop the database. To run it, you must provide the 'confirm' argument:");
  console.log('Example: npm run db:drop confirm');
  console.log('--------------------------------------------------');
}
