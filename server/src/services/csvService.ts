import { asc, eq } from 'drizzle-orm';
import type {
  CsvComparedField,
  CsvImportResult,
  CsvPreviewEntry,
  TimeEntryWithCategory,
} from '@timekeep/shared';
import { categories, timeEntries } from '../db/schema.js';
import type { DbHandle } from '../db/transaction.js';
import { withTransaction } from '../db/transaction.js';
import { ValidationError } from '../errors/AppError.js';
import { getOrCreateCategoryByName } from './categoryService.js';
import { formatCsvRow, parseCsv } from './csvFormat.js';
import { syncTimeEntryTags } from './tagService.js';
import { findTimeEntry } from './timeEntryService.js';

export const CSV_COLUMNS = ['id', 'description', 'start_time', 'end_time', 'category'] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export const CSV_HEADER = CSV_COLUMNS.join(',');

const REQUIRED_COLUMNS: readonly CsvColumn[] = ['description', 'start_time'];

/** Position of each known column in the file's header, if present. */
type ColumnPositions = Record<CsvColumn, number | undefined>;

/** One data row with trimmed values, before time parsing. */
interface CsvRow {
  /** 1-based position among data rows, for error messages. */
  rowNumber: number;
  id: number;
  description: string;
  startTime: string;
  endTime: string;
  category: string;
}

interface ParsedCsvRow {
  id: number;
  description: string;
  startTime: Date;
  endTime: Date | null;
  category: string;
}

// RFC 3339 date-time with a mandatory offset; fractional seconds optional.
const OFFSET_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:(Z)|([+-])(\d{2}):(\d{2}))$/;

// Layouts without an offset, tried in order and read as UTC.
const NAIVE_DATE_TIMES = [
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/,
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/,
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/,
  /^(\d{4})-(\d{2})-(\d{2})$/,
];

function daysInMonth(year: number, month: number): number {
  const isLeapYear = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return [31, isLeapYear ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][month - 1];
}

/**
 * Milliseconds since the epoch for UTC calendar fields, or null when a field
 * is out of range (month 13, February 30th, 24:00).
 */
function utcMillis(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millisecond: number,
): number | null {
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second, millisecond));
  date.setUTCFullYear(year);
  return date.getTime();
}

function toInt(value: string | undefined): number {
  return value === undefined ? 0 : Number.parseInt(value, 10);
}

/**
 * Parse an imported timestamp.
 *
 * Accepts RFC 3339 with an offset (`2024-01-15T09:30:00Z`,
 * `2024-01-15T09:30:00.250+02:00`), then `YYYY-MM-DD HH:MM:SS`,
 * `YYYY-MM-DDTHH:MM:SS`, `YYYY-MM-DD HH:MM` and `YYYY-MM-DD`, which carry no
 * offset and are read as UTC.
 *
 * @returns the instant, or null if the value matches no format
 */
export function parseFlexibleTime(value: string): Date | null {
  const offsetMatch = OFFSET_DATE_TIME.exec(value);
  if (offsetMatch) {
    const [, year, month, day, hour, minute, second, fraction, zulu, sign, offHours, offMinutes] =
      offsetMatch;
    const millis = utcMillis(
      toInt(year),
      toInt(month),
      toInt(day),
      toInt(hour),
      toInt(minute),
      toInt(second),
      fraction === undefined ? 0 : toInt(fraction.slice(0, 3).padEnd(3, '0')),
    );
    if (millis === null) {
      return null;
    }
    if (zulu !== undefined) {
      return new Date(millis);
    }
    const offsetHours = toInt(offHours);
    const offsetMinutes = toInt(offMinutes);
    if (offsetHours > 23 || offsetMinutes > 59) {
      return null;
    }
    const offsetMillis = (offsetHours * 60 + offsetMinutes) * 60_000 * (sign === '-' ? -1 : 1);
    return new Date(millis - offsetMillis);
  }

  for (const layout of NAIVE_DATE_TIMES) {
    const match = layout.exec(value);
    if (!match) {
      continue;
    }
    const [, year, month, day, hour, minute, second] = match;
    const millis = utcMillis(
      toInt(year),
      toInt(month),
      toInt(day),
      toInt(hour),
      toInt(minute),
      toInt(second),
      0,
    );
    return millis === null ? null : new Date(millis);
  }

  return null;
}

/**
 * Map the header onto the fixed column set. Names are matched
 * case-insensitively after trimming, so columns may come in any order.
 *
 * @throws ValidationError if description or start_time is missing
 */
function resolveColumns(header: string[]): ColumnPositions {
  const positions = new Map<string, number>();
  header.forEach((name, index) => positions.set(name.trim().toLowerCase(), index));

  const columns: ColumnPositions = {
    id: positions.get('id'),
    description: positions.get('description'),
    start_time: positions.get('start_time'),
    end_time: positions.get('end_time'),
    category: positions.get('category'),
  };

  const missing = REQUIRED_COLUMNS.filter((column) => columns[column] === undefined);
  if (missing.length > 0) {
    throw new ValidationError(`CSV header is missing required column(s): ${missing.join(', ')}`, {
      missing,
    });
  }
  return columns;
}

function parseRowId(value: string): number {
  return /^[+-]?\d+$/.test(value) ? Number.parseInt(value, 10) : 0;
}

/**
 * Read the data rows of a CSV file. Rows with neither a description nor a
 * start time are skipped.
 */
function readCsvRows(text: string): CsvRow[] {
  const records = parseCsv(text);
  if (records.length < 2) {
    return [];
  }

  const columns = resolveColumns(records[0]);
  const rows: CsvRow[] = [];
  records.slice(1).forEach((record, index) => {
    const value = (column: CsvColumn): string => {
      const position = columns[column];
      return position !== undefined && position < record.length ? record[position].trim() : '';
    };

    const row: CsvRow = {
      rowNumber: index + 1,
      id: parseRowId(value('id')),
      description: value('description'),
      startTime: value('start_time'),
      endTime: value('end_time'),
      category: value('category'),
    };
    if (row.description !== '' || row.startTime !== '') {
      rows.push(row);
    }
  });
  return rows;
}

/**
 * @throws ValidationError naming the row, column and offending value
 */
function requireTime(row: CsvRow, column: 'start_time' | 'end_time', value: string): Date {
  const parsed = parseFlexibleTime(value);
  if (!parsed) {
    throw new ValidationError(`Invalid ${column} '${value}' in row ${row.rowNumber}`, {
      row: row.rowNumber,
      column,
      value,
    });
  }
  return parsed;
}

function parseImportRow(row: CsvRow): ParsedCsvRow {
  return {
    id: row.id,
    description: row.description,
    startTime: requireTime(row, 'start_time', row.startTime),
    endTime: row.endTime === '' ? null : requireTime(row, 'end_time', row.endTime),
    category: row.category,
  };
}

/**
 * Parse a row for preview; null when either timestamp is unreadable.
 */
function parsePreviewRow(row: CsvRow): ParsedCsvRow | null {
  const startTime = parseFlexibleTime(row.startTime);
  if (!startTime) {
    return null;
  }
  let endTime: Date | null = null;
  if (row.endTime !== '') {
    endTime = parseFlexibleTime(row.endTime);
    if (!endTime) {
      return null;
    }
  }
  return { id: row.id, description: row.description, startTime, endTime, category: row.category };
}

/**
 * Stream every time entry as CSV, header first, one line per entry ordered
 * by start time. Running entries have an empty end_time; uncategorized ones
 * an empty category.
 */
export function* exportTimeEntriesCsv(db: DbHandle): Generator<string, void, undefined> {
  yield `${CSV_HEADER}\n`;

  const rows = db
    .select({ entry: timeEntries, categoryName: categories.name })
    .from(timeEntries)
    .leftJoin(categories, eq(categories.id, timeEntries.categoryId))
    .orderBy(asc(timeEntries.startTime), asc(timeEntries.id))
    .all();

  for (const { entry, categoryName } of rows) {
    const line = formatCsvRow([
      String(entry.id),
      entry.description,
      entry.startTime,
      entry.endTime ?? '',
      categoryName ?? '',
    ]);
    yield `${line}\n`;
  }
}

/**
 * Import CSV rows in a single transaction.
 *
 * Rows with a positive id overwrite (or recreate) the entry with that id;
 * other rows become new entries. Unknown category names create categories.
 * Tags are resynced for every written entry. Any invalid timestamp rejects the
 * whole file before anything is written.
 *
 * @throws ValidationError for a malformed file, header or timestamp
 * @throws PersistenceError if the transaction fails (nothing is applied)
 */
export function importTimeEntriesCsv(
  db: DbHandle,
  text: string,
  now: Date = new Date(),
): CsvImportResult {
  const rows = readCsvRows(text).map(parseImportRow);
  const createdAt = now.toISOString();

  return withTransaction(db, 'import CSV', (tx) => {
    const result: CsvImportResult = { created: 0, updated: 0 };

    for (const row of rows) {
      const categoryId = row.category === '' ? null : getOrCreateCategoryByName(tx, row.category).id;
      const values = {
        description: row.description,
        startTime: row.startTime.toISOString(),
        endTime: row.endTime === null ? null : row.endTime.toISOString(),
        categoryId,
      };

      let entryId: number;
      if (row.id > 0) {
        const existing = tx
          .select({ id: timeEntries.id })
          .from(timeEntries)
          .where(eq(timeEntries.id, row.id))
          .get();
        tx.insert(timeEntries)
          .values({ id: row.id, ...values, createdAt })
          .onConflictDoUpdate({ target: timeEntries.id, set: values })
          .run();
        entryId = row.id;
        if (existing) {
          result.updated++;
        } else {
          result.created++;
        }
      } else {
        entryId = tx
          .insert(timeEntries)
          .values({ ...values, createdAt })
          .returning({ id: timeEntries.id })
          .get().id;
        result.created++;
      }

      syncTimeEntryTags(tx, entryId, row.description);
    }

    return result;
  });
}

function changedFieldsOf(existing: TimeEntryWithCategory, row: ParsedCsvRow): CsvComparedField[] {
  const changed: CsvComparedField[] = [];
  if (existing.description !== row.description) {
    changed.push('description');
  }
  if (Date.parse(existing.startTime) !== row.startTime.getTime()) {
    changed.push('startTime');
  }
  const sameEnd =
    existing.endTime === null || row.endTime === null
      ? existing.endTime === null && row.endTime === null
      : Date.parse(existing.endTime) === row.endTime.getTime();
  if (!sameEnd) {
    changed.push('endTime');
  }
  if ((existing.categoryName ?? '') !== row.category) {
    changed.push('category');
  }
  return changed;
}

/**
 * Dry-run an import: classify each row without writing anything.
 *
 * Rows whose id matches an existing entry are `Updated` and list the fields
 * that differ; a row identical to its entry is left out. Everything else is
 * `New`. Rows with unreadable timestamps are skipped.
 *
 * @throws ValidationError for a malformed file or header
 */
export function previewTimeEntriesCsv(db: DbHandle, text: string): CsvPreviewEntry[] {
  const preview: CsvPreviewEntry[] = [];

  for (const csvRow of readCsvRows(text)) {
    const row = parsePreviewRow(csvRow);
    if (!row) {
      continue;
    }

    const entry = {
      id: row.id > 0 ? row.id : null,
      description: row.description,
      startTime: row.startTime.toISOString(),
      endTime: row.endTime === null ? null : row.endTime.toISOString(),
      category: row.category === '' ? null : row.category,
    };

    const existing = row.id > 0 ? findTimeEntry(db, row.id) : null;
    if (!existing) {
      preview.push({ ...entry, status: 'New', changedFields: [] });
      continue;
    }

    const changedFields = changedFieldsOf(existing, row);
    if (changedFields.length > 0) {
      preview.push({ ...entry, status: 'Updated', changedFields });
    }
  }

  return preview;
}
