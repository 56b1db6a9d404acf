import { format, isValid } from 'date-fns';

/**
 * Date utilities for evaluation periods
 *
 * Periods are calendar months of the server's UTC clock. Display names and
 * export filenames are derived from (year, month) alone so they never depend on
 * the host timezone.
 *
 * @module utils/date
 */

/**
 * Calendar month in UTC
 */
export interface YearMonth {
  readonly year: number;

  /**
   * 1-12
   */
  readonly month: number;
}

/**
 * Resolve the UTC calendar month of an instant
 *
 * @example
 * resolveYearMonth(new Date('2024-03-31T23:30:00Z')); // { year: 2024, month: 3 }
 *
 * @throws {Error} If the date is invalid
 */
export function resolveYearMonth(date: Date): YearMonth {
  if (!(date instanceof Date) || !isValid(date)) {
    throw new Error('Invalid date provided');
  }

  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
  };
}

export const YEAR_MIN = 1900;
export const YEAR_MAX = 9999;

export function isValidYear(year: number): boolean {
  return Number.isInteger(year) && year >= YEAR_MIN && year <= YEAR_MAX;
}

export function isValidMonth(month: number): boolean {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}

export function isValidYearMonth(year: number, month: number): boolean {
  return isValidYear(year) && isValidMonth(month);
}

/**
 * Human-readable period name
 *
 * @example
 * formatPeriodName(2024, 3); // "March 2024"
 */
export function formatPeriodName(year: number, month: number): string {
  // Built from local components and formatted locally, so the host timezone cancels out
  return format(new Date(year, month - 1, 1), 'MMMM yyyy');
}

/**
 * Export filename for a period, e.g. `evaluations_2024_03.csv`
 */
export function buildExportFilename(year: number, month: number): string {
  return `evaluations_${year}_${String(month).padStart(2, '0')}.csv`;
}
