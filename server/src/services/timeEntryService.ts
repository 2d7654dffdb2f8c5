import { desc, eq, isNull } from 'drizzle-orm';
import type { FastifyBaseLogger } from 'fastify';
import type {
  StartTimerRequest,
  TimeEntry,
  TimeEntryWithCategory,
  UpdateActiveTimeEntryRequest,
  UpdateTimeEntryRequest,
} from '@timekeep/shared';
import { categories, timeEntries, timeEntryTags } from '../db/schema.js';
import type { DbHandle } from '../db/transaction.js';
import { withTransaction } from '../db/transaction.js';
import { DEFAULT_DESCRIPTION, DEFAULT_ENTRY_LIST_LIMIT } from '../constants.js';
import { NotFoundError, ValidationError } from '../errors/AppError.js';
import { deleteOrphanedTags, listTagsForTimeEntry, syncTimeEntryTags } from './tagService.js';

type TimeEntryRow = typeof timeEntries.$inferSelect;

/**
 * Column selection for reads joined with the entry's category.
 */
export const timeEntryWithCategoryFields = {
  entry: timeEntries,
  categoryName: categories.name,
  categoryColor: categories.color,
};

export interface TimeEntryJoinRow {
  entry: TimeEntryRow;
  categoryName: string | null;
  categoryColor: string | null;
}

function toTimeEntry(row: TimeEntryRow): TimeEntry {
  return {
    id: row.id,
    description: row.description,
    startTime: row.startTime,
    endTime: row.endTime,
    categoryId: row.categoryId,
    createdAt: row.createdAt,
  };
}

/**
 * Convert a joined row to TimeEntryWithCategory, loading the entry's tags.
 */
export function toTimeEntryWithCategory(db: DbHandle, row: TimeEntryJoinRow): TimeEntryWithCategory {
  return {
    ...toTimeEntry(row.entry),
    categoryName: row.categoryName,
    categoryColor: row.categoryColor,
    tags: listTagsForTimeEntry(db, row.entry.id),
  };
}

/**
 * The running entry, if any. Should there ever be more than one, the most
 * recently started wins.
 */
function findActiveEntryRow(db: DbHandle): TimeEntryRow | undefined {
  return db
    .select()
    .from(timeEntries)
    .where(isNull(timeEntries.endTime))
    .orderBy(desc(timeEntries.startTime), desc(timeEntries.id))
    .limit(1)
    .get();
}

function assertCategoryExists(db: DbHandle, categoryId: number): void {
  const category = db
    .select({ id: categories.id })
    .from(categories)
    .where(eq(categories.id, categoryId))
    .get();
  if (!category) {
    throw new ValidationError(`Category not found: ${categoryId}`, { categoryId });
  }
}

/**
 * Parse a client-supplied timestamp into the stored ISO-8601 UTC form.
 * @throws ValidationError with the offending value
 */
function toStoredInstant(value: string, field: string): string {
  const millis = Date.parse(value);
  if (Number.isNaN(millis)) {
    throw new ValidationError(`Invalid ${field}: '${value}'`, { field, value });
  }
  return new Date(millis).toISOString();
}

function descriptionOrDefault(description: string | undefined): string {
  const trimmed = description?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : DEFAULT_DESCRIPTION;
}

/**
 * List the most recently started entries, newest first.
 */
export function listTimeEntries(
  db: DbHandle,
  limit: number = DEFAULT_ENTRY_LIST_LIMIT,
): TimeEntryWithCategory[] {
  const rows = db
    .select(timeEntryWithCategoryFields)
    .from(timeEntries)
    .leftJoin(categories, eq(categories.id, timeEntries.categoryId))
    .orderBy(desc(timeEntries.startTime), desc(timeEntries.id))
    .limit(limit)
    .all();
  return rows.map((row) => toTimeEntryWithCategory(db, row));
}

/**
 * Look up an entry by ID, or null when it does not exist.
 */
export function findTimeEntry(db: DbHandle, id: number): TimeEntryWithCategory | null {
  const row = db
    .select(timeEntryWithCategoryFields)
    .from(timeEntries)
    .leftJoin(categories, eq(categories.id, timeEntries.categoryId))
    .where(eq(timeEntries.id, id))
    .get();
  return row ? toTimeEntryWithCategory(db, row) : null;
}

/**
 * Get a single entry by ID.
 * @throws NotFoundError if the entry does not exist
 */
export function getTimeEntry(db: DbHandle, id: number): TimeEntryWithCategory {
  const entry = findTimeEntry(db, id);
  if (!entry) {
    throw new NotFoundError('Time entry not found', { id });
  }
  return entry;
}

/**
 * The running entry, or null when no timer is running.
 */
export function getActiveTimeEntry(db: DbHandle): TimeEntryWithCategory | null {
  const active = findActiveEntryRow(db);
  return active ? getTimeEntry(db, active.id) : null;
}

/**
 * Start a new timer.
 *
 * Closes the running entry at `now` and creates the new one in the same
 * immediate transaction, so two concurrent starts cannot both leave an entry
 * running. Tags are synced from the description.
 *
 * @throws ValidationError if categoryId does not reference a category
 * @throws PersistenceError if the transaction fails (nothing is applied)
 */
export function startTimer(
  db: DbHandle,
  data: StartTimerRequest,
  now: Date = new Date(),
): TimeEntryWithCategory {
  const description = descriptionOrDefault(data.description);
  const categoryId = data.categoryId ?? null;
  const nowIso = now.toISOString();

  const entryId = withTransaction(db, 'start timer', (tx) => {
    if (categoryId !== null) {
      assertCategoryExists(tx, categoryId);
    }

    const active = findActiveEntryRow(tx);
    if (active) {
      tx.update(timeEntries).set({ endTime: nowIso }).where(eq(timeEntries.id, active.id)).run();
    }

    const created = tx
      .insert(timeEntries)
      .values({ description, startTime: nowIso, endTime: null, categoryId, createdAt: nowIso })
      .returning({ id: timeEntries.id })
      .get();

    syncTimeEntryTags(tx, created.id, description);
    return created.id;
  });

  return getTimeEntry(db, entryId);
}

/**
 * Stop the running timer at `now`.
 * @returns the closed entry, or null when nothing was running
 */
export function stopTimer(db: DbHandle, now: Date = new Date()): TimeEntryWithCategory | null {
  const stoppedId = withTransaction(db, 'stop timer', (tx) => {
    const active = findActiveEntryRow(tx);
    if (!active) {
      return null;
    }
    tx.update(timeEntries)
      .set({ endTime: now.toISOString() })
      .where(eq(timeEntries.id, active.id))
      .run();
    return active.id;
  });

  return stoppedId === null ? null : getTimeEntry(db, stoppedId);
}

/**
 * Overwrite every mutable field of an entry and resync its tags.
 *
 * The interval is stored as given: an end before the start is accepted so
 * manual corrections are never blocked here. Omitting endTime re-opens the
 * entry.
 *
 * @throws NotFoundError if the entry does not exist
 * @throws ValidationError if a timestamp cannot be parsed or the category does not exist
 */
export function updateTimeEntry(
  db: DbHandle,
  id: number,
  data: UpdateTimeEntryRequest,
): TimeEntryWithCategory {
  const startTime = toStoredInstant(data.startTime, 'startTime');
  const endTime =
    data.endTime === undefined || data.endTime === null
      ? null
      : toStoredInstant(data.endTime, 'endTime');
  const categoryId = data.categoryId ?? null;

  withTransaction(db, 'update time entry', (tx) => {
    const existing = tx
      .select({ id: timeEntries.id })
      .from(timeEntries)
      .where(eq(timeEntries.id, id))
      .get();
    if (!existing) {
      throw new NotFoundError('Time entry not found', { id });
    }
    if (categoryId !== null) {
      assertCategoryExists(tx, categoryId);
    }

    tx.update(timeEntries)
      .set({ description: data.description, startTime, endTime, categoryId })
      .where(eq(timeEntries.id, id))
      .run();
    syncTimeEntryTags(tx, id, data.description);
  });

  return getTimeEntry(db, id);
}

/**
 * Change the description and category of the running entry, keeping its start.
 * @throws NotFoundError if no timer is running
 */
export function updateActiveTimeEntry(
  db: DbHandle,
  data: UpdateActiveTimeEntryRequest,
): TimeEntryWithCategory {
  const description = descriptionOrDefault(data.description);
  const categoryId = data.categoryId ?? null;

  const entryId = withTransaction(db, 'update active time entry', (tx) => {
    const active = findActiveEntryRow(tx);
    if (!active) {
      throw new NotFoundError('No active time entry');
    }
    if (categoryId !== null) {
      assertCategoryExists(tx, categoryId);
    }

    tx.update(timeEntries)
      .set({ description, categoryId })
      .where(eq(timeEntries.id, active.id))
      .run();
    syncTimeEntryTags(tx, active.id, description);
    return active.id;
  });

  return getTimeEntry(db, entryId);
}

/**
 * Delete an entry and its tag links. Deleting an unknown ID does nothing.
 *
 * Tags left without entries are then removed on a best-effort basis: a
 * failure there leaves only unused tags behind, so it is logged and not
 * rethrown.
 */
export function deleteTimeEntry(
  db: DbHandle,
  id: number,
  log?: Pick<FastifyBaseLogger, 'warn'>,
): void {
  withTransaction(db, 'delete time entry', (tx) => {
    tx.delete(timeEntryTags).where(eq(timeEntryTags.timeEntryId, id)).run();
    tx.delete(timeEntries).where(eq(timeEntries.id, id)).run();
  });

  try {
    deleteOrphanedTags(db);
  } catch (err) {
    log?.warn({ err, timeEntryId: id }, 'Failed to delete orphaned tags');
  }
}
