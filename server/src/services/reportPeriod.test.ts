import { describe, it, expect } from '@jest/globals';
import { BEGINNING_OF_TIME, calculateReportPeriod, isReportPeriod } from './reportPeriod.js';

// Reference instants are built in local time because period boundaries use the local clock.
const MONDAY_NOON = new Date(2024, 0, 15, 12, 0, 0);
const SUNDAY_NOON = new Date(2024, 0, 14, 12, 0, 0);

describe('calculateReportPeriod()', () => {
  it('today spans midnight to 23:59:59 of the same date', () => {
    const { start, end } = calculateReportPeriod('today', MONDAY_NOON);

    expect(start).toEqual(new Date(2024, 0, 15, 0, 0, 0));
    expect(end).toEqual(new Date(2024, 0, 15, 23, 59, 59));
  });

  it('week spans Monday to Sunday when now is a Monday', () => {
    const { start, end } = calculateReportPeriod('week', MONDAY_NOON);

    expect(start).toEqual(new Date(2024, 0, 15, 0, 0, 0));
    expect(end).toEqual(new Date(2024, 0, 21, 23, 59, 59));
  });

  it('week treats Sunday as the last day of the week that began the previous Monday', () => {
    const { start, end } = calculateReportPeriod('week', SUNDAY_NOON);

    expect(start).toEqual(new Date(2024, 0, 8, 0, 0, 0));
    expect(end).toEqual(new Date(2024, 0, 14, 23, 59, 59));
  });

  it('week crosses a month boundary', () => {
    const { start, end } = calculateReportPeriod('week', new Date(2024, 1, 1, 9, 30));

    expect(start).toEqual(new Date(2024, 0, 29, 0, 0, 0));
    expect(end).toEqual(new Date(2024, 1, 4, 23, 59, 59));
  });

  it('month spans the first to the last day of the month', () => {
    const { start, end } = calculateReportPeriod('month', MONDAY_NOON);

    expect(start).toEqual(new Date(2024, 0, 1, 0, 0, 0));
    expect(end).toEqual(new Date(2024, 0, 31, 23, 59, 59));
  });

  it('month ends on February 29th in a leap year', () => {
    const { end } = calculateReportPeriod('month', new Date(2024, 1, 10, 8, 0));

    expect(end).toEqual(new Date(2024, 1, 29, 23, 59, 59));
  });

  it('year spans January 1st to December 31st', () => {
    const { start, end } = calculateReportPeriod('year', MONDAY_NOON);

    expect(start).toEqual(new Date(2024, 0, 1, 0, 0, 0));
    expect(end).toEqual(new Date(2024, 11, 31, 23, 59, 59));
  });

  it('all spans from the beginning of time to a hundred years after now', () => {
    const { start, end } = calculateReportPeriod('all', MONDAY_NOON);

    expect(start).toEqual(BEGINNING_OF_TIME);
    expect(end).toEqual(new Date(2124, 0, 15, 12, 0, 0));
  });

  it('treats an unrecognized keyword like all', () => {
    expect(calculateReportPeriod('fortnight', MONDAY_NOON)).toEqual(
      calculateReportPeriod('all', MONDAY_NOON),
    );
  });

  it('does not modify the reference instant', () => {
    const now = new Date(MONDAY_NOON.getTime());
    calculateReportPeriod('all', now);

    expect(now).toEqual(MONDAY_NOON);
  });
});

describe('isReportPeriod()', () => {
  it('accepts the named periods', () => {
    expect(['today', 'week', 'month', 'year', 'all'].every(isReportPeriod)).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isReportPeriod('quarter')).toBe(false);
    expect(isReportPeriod('')).toBe(false);
  });
});
