import fp from 'fastify-plugin';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from '../db/migrate.js';
import * as schema from '../db/schema.js';
import type { DbType } from '../db/transaction.js';

// Type augmentation: makes fastify.db available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    db: DbType & { $client: Database.Database };
  }
}

export default fp(
  async function dbPlugin(fastify) {
    const dbPath = fastify.config.databaseUrl;

    // Ensure parent directory exists
    mkdirSync(dirname(dbPath), { recursive: true });

    fastify.log.info({ dbPath }, 'Opening SQLite database');
    const sqlite = new Database(dbPath);

    // WAL for concurrent reads; foreign keys for link cascades and category SET NULL
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');

    // Run pending migrations (throws on failure, preventing startup)
    const applied = runMigrations(sqlite);
    fastify.log.info({ applied }, 'Database migrations completed');

    const db = drizzle(sqlite, { schema });
    fastify.decorate('db', db);

    fastify.addHook('onClose', () => {
      fastify.log.info('Closing SQLite database connection');
      sqlite.close();
    });
  },
  {
    name: 'db',
    dependencies: ['config'],
  },
);
