/**
 * CSV import/export types.
 */

export type CsvPreviewStatus = 'New' | 'Updated';

/**
 * Fields compared when an imported row targets an existing entry.
 */
export type CsvComparedField = 'description' | 'startTime' | 'endTime' | 'category';

/**
 * A CSV row that would change storage if imported.
 * Rows identical to the stored entry are not listed.
 */
export interface CsvPreviewEntry {
  id: number | null;
  description: string;
  startTime: string;
  endTime: string | null;
  category: string | null;
  status: CsvPreviewStatus;
  changedFields: CsvComparedField[];
}

export interface CsvPreviewResponse {
  entries: CsvPreviewEntry[];
}

/**
 * Response for POST /api/csv/import.
 */
export interface CsvImportResult {
  created: number;
  updated: number;
}
