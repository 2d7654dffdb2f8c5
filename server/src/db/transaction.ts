import type Database from 'better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import type * as schemaTypes from './schema.js';
import { AppError, PersistenceError } from '../errors/AppError.js';

/** The connection-level drizzle instance decorated onto Fastify. */
export type DbType = BetterSQLite3Database<typeof schemaTypes>;

/**
 * Either the connection or a transaction opened on it.
 * Both expose the same query builder, so services accept this type.
 */
export type DbHandle = BaseSQLiteDatabase<'sync', Database.RunResult, typeof schemaTypes>;

/**
 * Run `fn` inside a `BEGIN IMMEDIATE` transaction.
 *
 * The write lock is taken up front so concurrent writers serialize on the
 * database instead of failing at commit. Returning commits; throwing rolls
 * back. Application errors are rethrown as-is, anything else (constraint
 * violations, I/O, busy database) surfaces as a PersistenceError.
 *
 * @param action - what the transaction does, for the error message ("start timer")
 */
export function withTransaction<T>(db: DbHandle, action: string, fn: (tx: DbHandle) => T): T {
  try {
    return db.transaction((tx) => fn(tx), { behavior: 'immediate' });
  } catch (err) {
    if (err instanceof AppError) {
      throw err;
    }
    throw new PersistenceError(`Failed to ${action}`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}
