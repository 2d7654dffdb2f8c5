import { asc, count, eq, notExists, sql } from 'drizzle-orm';
import type { Tag, TagWithUsage } from '@timekeep/shared';
import { tags, timeEntryTags } from '../db/schema.js';
import type { DbHandle } from '../db/transaction.js';
import { extractTags } from './hashtags.js';

/**
 * Convert database tag row to Tag shape.
 */
function toTag(tag: typeof tags.$inferSelect): Tag {
  return {
    id: tag.id,
    name: tag.name,
    createdAt: tag.createdAt,
  };
}

/**
 * List all tags, sorted alphabetically, with the number of linked entries.
 */
export function listTags(db: DbHandle): TagWithUsage[] {
  const rows = db
    .select({ tag: tags, entryCount: count(timeEntryTags.timeEntryId) })
    .from(tags)
    .leftJoin(timeEntryTags, eq(timeEntryTags.tagId, tags.id))
    .groupBy(tags.id)
    .orderBy(asc(tags.name))
    .all();
  return rows.map((row) => ({ ...toTag(row.tag), entryCount: row.entryCount }));
}

/**
 * Fetch the tags linked to a time entry, sorted by name.
 */
export function listTagsForTimeEntry(db: DbHandle, timeEntryId: number): Tag[] {
  const rows = db
    .select({ tag: tags })
    .from(timeEntryTags)
    .innerJoin(tags, eq(tags.id, timeEntryTags.tagId))
    .where(eq(timeEntryTags.timeEntryId, timeEntryId))
    .orderBy(asc(tags.name))
    .all();
  return rows.map((row) => toTag(row.tag));
}

/**
 * Return the tag with this name, creating it first if needed.
 * Names are expected to be lowercase already (see extractTags).
 */
export function getOrCreateTag(db: DbHandle, name: string): Tag {
  const existing = db.select().from(tags).where(eq(tags.name, name)).get();
  if (existing) {
    return toTag(existing);
  }

  const created = db
    .insert(tags)
    .values({ name, createdAt: new Date().toISOString() })
    .returning()
    .get();
  return toTag(created);
}

/**
 * Delete every tag that no time entry links to.
 * @returns number of tags deleted
 */
export function deleteOrphanedTags(db: DbHandle): number {
  const result = db
    .delete(tags)
    .where(
      notExists(
        db
          .select({ one: sql`1` })
          .from(timeEntryTags)
          .where(eq(timeEntryTags.tagId, tags.id)),
      ),
    )
    .run();
  return result.changes;
}

/**
 * Replace a time entry's tag links with the hashtags found in its description.
 *
 * Drops all existing links, links each extracted tag (creating missing ones),
 * then removes tags left without any entry. Call inside the transaction that
 * wrote the entry.
 */
export function syncTimeEntryTags(db: DbHandle, timeEntryId: number, description: string): Tag[] {
  db.delete(timeEntryTags).where(eq(timeEntryTags.timeEntryId, timeEntryId)).run();

  const linked = extractTags(description).map((name) => getOrCreateTag(db, name));
  if (linked.length > 0) {
    db.insert(timeEntryTags)
      .values(linked.map((tag) => ({ timeEntryId, tagId: tag.id })))
      .run();
  }

  deleteOrphanedTags(db);
  return linked;
}
