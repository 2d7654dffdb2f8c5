import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { loadConfig } from '../plugins/config.js';
import { runMigrations } from './migrate.js';

// Run migrations standalone (without starting the server)
function main() {
  const { databaseUrl } = loadConfig(process.env);

  mkdirSync(dirname(databaseUrl), { recursive: true });
  const db = new Database(databaseUrl);

  try {
    const applied = runMigrations(db);
    for (const file of applied) {
      console.warn(`Applied migration: ${file}`);
    }
    console.warn('Migrations completed successfully');
  } catch (err) {
    console.error('Migration failed:', err);
    process.exitCode = 1;
  } finally {
    db.close();
  }
}

main();
