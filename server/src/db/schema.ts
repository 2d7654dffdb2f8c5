/**
 * Drizzle ORM schema definitions.
 *
 * Mirrors the SQL migrations in ./migrations; the migrations are the source of
 * truth for the database, this file gives the query builder its types.
 * Instants are stored as ISO-8601 UTC text so range filters compare text.
 */

import { sqliteTable, text, integer, index, primaryKey } from 'drizzle-orm/sqlite-core';

/**
 * Categories table - user-defined groupings for time entries.
 */
export const categories = sqliteTable('categories', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').unique().notNull(),
  color: text('color').notNull().default('#cccccc'),
  createdAt: text('created_at').notNull(),
});

/**
 * Time entries table - one row per tracked activity.
 * A row with a NULL end_time is the running (active) entry; at most one exists.
 * Deleting a category sets category_id to NULL.
 */
export const timeEntries = sqliteTable(
  'time_entries',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    description: text('description').notNull(),
    startTime: text('start_time').notNull(),
    endTime: text('end_time'),
    categoryId: integer('category_id').references(() => categories.id, {
      onDelete: 'set null',
    }),
    createdAt: text('created_at').notNull(),
  },
  (table) => ({
    startTimeIdx: index('idx_time_entries_start_time').on(table.startTime),
    categoryIdIdx: index('idx_time_entries_category_id').on(table.categoryId),
  }),
);

/**
 * Tags table - lowercase hashtags derived from entry descriptions.
 * Tags with no linked entries are deleted after every resync.
 */
export const tags = sqliteTable('tags', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').unique().notNull(),
  createdAt: text('created_at').notNull(),
});

/**
 * Time entry tags junction table - many-to-many relationship between entries and tags.
 */
export const timeEntryTags = sqliteTable(
  'time_entry_tags',
  {
    timeEntryId: integer('time_entry_id')
      .notNull()
      .references(() => timeEntries.id, { onDelete: 'cascade' }),
    tagId: integer('tag_id')
      .notNull()
      .references(() => tags.id, { onDelete: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.timeEntryId, table.tagId] }),
    tagIdIdx: index('idx_time_entry_tags_tag_id').on(table.tagId),
  }),
);
