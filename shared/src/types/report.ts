import type { TimeEntryWithCategory } from './timeEntry.js';

/**
 * Named report periods. Anything else is treated as `all`.
 */
export type ReportPeriod = 'today' | 'week' | 'month' | 'year' | 'all';

/**
 * Report filter.
 * categoryFilter: 0 = all categories, -1 = entries without a category,
 * any positive value = exactly that category.
 * tagIds are combined with AND semantics.
 */
export interface ReportFilter {
  startDate: string;
  endDate: string;
  categoryFilter: number;
  tagIds: number[];
}

/**
 * Aggregated seconds for one category, or for uncategorized time
 * (`categoryId` -1).
 */
export interface CategoryBreakdown {
  categoryId: number;
  categoryName: string;
  color: string;
  totalSeconds: number;
  percentage: number;
}

export interface Report {
  entries: TimeEntryWithCategory[];
  totalSeconds: number;
  categoryBreakdown: CategoryBreakdown[];
  filter: ReportFilter;
}

/**
 * Response for GET /api/reports.
 */
export interface ReportResponse extends Report {
  /** `custom` when an explicit startDate/endDate range was requested. */
  period: ReportPeriod | 'custom';
  totalFormatted: string;
}

/**
 * Query string for GET /api/reports. An explicit startDate/endDate range
 * takes precedence over `period`.
 */
export interface ReportQuery {
  period?: string;
  startDate?: string;
  endDate?: string;
  categoryId?: number;
  tagIds?: number[];
}
