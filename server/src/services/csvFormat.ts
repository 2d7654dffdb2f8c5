import { ValidationError } from '../errors/AppError.js';

const BYTE_ORDER_MARK = '\uFEFF';
const NEEDS_QUOTES = /[",\r\n]|^[ \t]/;

function isBlankRecord(record: string[]): boolean {
  return record.length === 1 && record[0] === '';
}

/**
 * Parse RFC 4180 CSV text into records.
 *
 * Handles quoted fields with doubled quotes and embedded line breaks, CRLF or
 * LF line endings and a leading byte order mark. Blank lines are dropped.
 * Records may have differing field counts.
 *
 * @throws ValidationError if a quoted field is never closed
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  const endRecord = () => {
    record.push(field);
    if (!isBlankRecord(record)) {
      records.push(record);
    }
    record = [];
    field = '';
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch !== '"') {
        field += ch;
      } else if (input[i + 1] === '"') {
        field += '"';
        i++;
      } else {
        inQuotes = false;
      }
      continue;
    }

    if (ch === '"' && field.length === 0) {
      inQuotes = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\n') {
      endRecord();
    } else if (ch === '\r') {
      if (input[i + 1] === '\n') {
        i++;
      }
      endRecord();
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new ValidationError('Malformed CSV: unterminated quoted field');
  }
  if (field.length > 0 || record.length > 0) {
    endRecord();
  }
  return records;
}

/**
 * Format one CSV record (without line terminator).
 * Fields containing a comma, quote or line break, or starting with
 * whitespace, are quoted.
 */
export function formatCsvRow(fields: readonly string[]): string {
  return fields
    .map((field) => (NEEDS_QUOTES.test(field) ? `"${field.replaceAll('"', '""')}"` : field))
    .join(',');
}
