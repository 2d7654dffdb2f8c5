import type { ReportPeriod } from '@timekeep/shared';

export const REPORT_PERIODS: readonly ReportPeriod[] = ['today', 'week', 'month', 'year', 'all'];

/**
 * Earliest instant used for the `all` period; precedes any stored entry.
 */
export const BEGINNING_OF_TIME = new Date('0001-01-01T00:00:00.000Z');

const ONE_SECOND_MS = 1000;

export interface PeriodRange {
  start: Date;
  /** Inclusive: the last second of the period (23:59:59). */
  end: Date;
}

export function isReportPeriod(value: string): value is ReportPeriod {
  return (REPORT_PERIODS as readonly string[]).includes(value);
}

/**
 * Range from `start` up to one second before `nextStart`.
 */
function inclusiveRange(start: Date, nextStart: Date): PeriodRange {
  return { start, end: new Date(nextStart.getTime() - ONE_SECOND_MS) };
}

/**
 * Compute the inclusive date range of a report period around `now`.
 *
 * Boundaries use the local clock. Weeks start on Monday; a Sunday belongs to
 * the week that began six days earlier. `all` and unrecognized keywords span
 * from the beginning of time to a hundred years after `now`.
 */
export function calculateReportPeriod(period: string, now: Date): PeriodRange {
  const year = now.getFullYear();
  const month = now.getMonth();
  const day = now.getDate();

  switch (period) {
    case 'today':
      return inclusiveRange(new Date(year, month, day), new Date(year, month, day + 1));
    case 'week': {
      const weekday = now.getDay() === 0 ? 7 : now.getDay();
      const monday = day - weekday + 1;
      return inclusiveRange(new Date(year, month, monday), new Date(year, month, monday + 7));
    }
    case 'month':
      return inclusiveRange(new Date(year, month, 1), new Date(year, month + 1, 1));
    case 'year':
      return inclusiveRange(new Date(year, 0, 1), new Date(year + 1, 0, 1));
    default: {
      const end = new Date(now.getTime());
      end.setFullYear(end.getFullYear() + 100);
      return { start: new Date(BEGINNING_OF_TIME.getTime()), end };
    }
  }
}
