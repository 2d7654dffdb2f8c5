import type { Tag } from './tag.js';

/**
 * Time entry as stored. An entry without `endTime` is running.
 * All instants are ISO-8601 strings.
 */
export interface TimeEntry {
  id: number;
  description: string;
  startTime: string;
  endTime: string | null;
  categoryId: number | null;
  createdAt: string;
}

/**
 * Time entry joined with its category display fields and linked tags.
 */
export interface TimeEntryWithCategory extends TimeEntry {
  categoryName: string | null;
  categoryColor: string | null;
  tags: Tag[];
}

/**
 * Request body for POST /api/time-entries/start.
 */
export interface StartTimerRequest {
  description?: string;
  categoryId?: number | null;
}

/**
 * Request body for PUT /api/time-entries/:id.
 * Every mutable field is overwritten; omitting `endTime` re-opens the entry.
 */
export interface UpdateTimeEntryRequest {
  description: string;
  startTime: string;
  endTime?: string | null;
  categoryId?: number | null;
}

/**
 * Request body for PATCH /api/time-entries/active.
 */
export interface UpdateActiveTimeEntryRequest {
  description: string;
  categoryId?: number | null;
}

export interface TimeEntryListResponse {
  entries: TimeEntryWithCategory[];
}

/**
 * Response for GET /api/time-entries/active and POST /api/time-entries/stop.
 * `entry` is null when no timer is running.
 */
export interface ActiveTimeEntryResponse {
  entry: TimeEntryWithCategory | null;
}
