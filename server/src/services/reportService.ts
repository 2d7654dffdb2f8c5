import { and, desc, eq, gte, isNull, lte } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { CategoryBreakdown, Report, TimeEntryWithCategory } from '@timekeep/shared';
import { categories, timeEntries } from '../db/schema.js';
import type { DbHandle } from '../db/transaction.js';
import {
  DEFAULT_CATEGORY_COLOR,
  NO_CATEGORY_COLOR,
  NO_CATEGORY_ID,
  NO_CATEGORY_NAME,
} from '../constants.js';
import { timeEntryWithCategoryFields, toTimeEntryWithCategory } from './timeEntryService.js';

export interface ReportCriteria {
  startDate: Date;
  /** Inclusive. */
  endDate: Date;
  /** 0 = all categories, -1 = uncategorized only, positive = that category. */
  categoryFilter: number;
  /** Entries must carry every one of these tags. */
  tagIds: number[];
}

/**
 * Whole seconds between start and end, truncated toward zero.
 * Running entries have no elapsed time for reporting purposes.
 */
export function elapsedSeconds(entry: Pick<TimeEntryWithCategory, 'startTime' | 'endTime'>): number {
  if (entry.endTime === null) {
    return 0;
  }
  return Math.trunc((Date.parse(entry.endTime) - Date.parse(entry.startTime)) / 1000);
}

/**
 * Render seconds as "Xm Ys" below an hour and "Xh Ym" from an hour on.
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.trunc(totalSeconds);
  if (seconds < 3600) {
    return `${Math.trunc(seconds / 60)}m ${seconds % 60}s`;
  }
  return `${Math.trunc(seconds / 3600)}h ${Math.trunc(seconds / 60) % 60}m`;
}

function categoryCondition(categoryFilter: number): SQL | undefined {
  if (categoryFilter === NO_CATEGORY_ID) {
    return isNull(timeEntries.categoryId);
  }
  if (categoryFilter > 0) {
    return eq(timeEntries.categoryId, categoryFilter);
  }
  return undefined;
}

function hasAllTags(entry: TimeEntryWithCategory, tagIds: number[]): boolean {
  const entryTagIds = new Set(entry.tags.map((tag) => tag.id));
  return tagIds.every((tagId) => entryTagIds.has(tagId));
}

/**
 * Build the report for entries started within the criteria's date range.
 *
 * Category filtering happens in the query; tag filtering (AND) happens per
 * entry afterwards. Only closed entries add to the totals. The uncategorized
 * bucket is listed only when it holds time; percentages stay 0 when the total
 * is 0. Breakdown is ordered by seconds, largest first.
 */
export function getReport(db: DbHandle, criteria: ReportCriteria): Report {
  const rows = db
    .select(timeEntryWithCategoryFields)
    .from(timeEntries)
    .leftJoin(categories, eq(categories.id, timeEntries.categoryId))
    .where(
      and(
        gte(timeEntries.startTime, criteria.startDate.toISOString()),
        lte(timeEntries.startTime, criteria.endDate.toISOString()),
        categoryCondition(criteria.categoryFilter),
      ),
    )
    .orderBy(desc(timeEntries.startTime), desc(timeEntries.id))
    .all();

  const entries: TimeEntryWithCategory[] = [];
  const buckets = new Map<number, CategoryBreakdown>();
  const uncategorized: CategoryBreakdown = {
    categoryId: NO_CATEGORY_ID,
    categoryName: NO_CATEGORY_NAME,
    color: NO_CATEGORY_COLOR,
    totalSeconds: 0,
    percentage: 0,
  };
  let totalSeconds = 0;

  for (const row of rows) {
    const entry = toTimeEntryWithCategory(db, row);
    if (criteria.tagIds.length > 0 && !hasAllTags(entry, criteria.tagIds)) {
      continue;
    }
    entries.push(entry);

    if (entry.endTime === null) {
      continue;
    }
    const seconds = elapsedSeconds(entry);
    totalSeconds += seconds;

    if (entry.categoryId === null) {
      uncategorized.totalSeconds += seconds;
      continue;
    }
    let bucket = buckets.get(entry.categoryId);
    if (!bucket) {
      bucket = {
        categoryId: entry.categoryId,
        categoryName: entry.categoryName ?? '',
        color: entry.categoryColor ?? DEFAULT_CATEGORY_COLOR,
        totalSeconds: 0,
        percentage: 0,
      };
      buckets.set(entry.categoryId, bucket);
    }
    bucket.totalSeconds += seconds;
  }

  const categoryBreakdown = [...buckets.values()];
  if (uncategorized.totalSeconds !== 0) {
    categoryBreakdown.push(uncategorized);
  }
  for (const bucket of categoryBreakdown) {
    bucket.percentage = totalSeconds > 0 ? (bucket.totalSeconds / totalSeconds) * 100 : 0;
  }
  categoryBreakdown.sort(
    (a, b) => b.totalSeconds - a.totalSeconds || a.categoryName.localeCompare(b.categoryName),
  );

  return {
    entries,
    totalSeconds,
    categoryBreakdown,
    filter: {
      startDate: criteria.startDate.toISOString(),
      endDate: criteria.endDate.toISOString(),
      categoryFilter: criteria.categoryFilter,
      tagIds: [...criteria.tagIds],
    },
  };
}
