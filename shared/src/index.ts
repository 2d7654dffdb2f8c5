/**
 * @timekeep/shared
 *
 * Shared TypeScript types used by the server and its clients.
 * This package contains API request/response shapes and entity types.
 */

export type { ApiError, ApiErrorResponse } from './types/api.js';
export type { ErrorCode } from './types/errors.js';

// Tags
export type { Tag, TagWithUsage, TagListResponse } from './types/tag.js';

// Categories
export type {
  Category,
  CreateCategoryRequest,
  UpdateCategoryRequest,
  CategoryListResponse,
} from './types/category.js';

// Time entries
export type {
  TimeEntry,
  TimeEntryWithCategory,
  StartTimerRequest,
  UpdateTimeEntryRequest,
  UpdateActiveTimeEntryRequest,
  TimeEntryListResponse,
  ActiveTimeEntryResponse,
} from './types/timeEntry.js';

// Reports
export type {
  ReportPeriod,
  ReportFilter,
  CategoryBreakdown,
  Report,
  ReportResponse,
  ReportQuery,
} from './types/report.js';

// CSV import/export
export type {
  CsvPreviewStatus,
  CsvComparedField,
  CsvPreviewEntry,
  CsvPreviewResponse,
  CsvImportResult,
} from './types/csv.js';
