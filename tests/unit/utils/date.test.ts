import { describe, it, expect } from 'vitest';

import {
  buildExportFilename,
  formatPeriodName,
  isValidYearMonth,
  resolveYearMonth,
} from '../../../src/utils/date.js';

describe('Date Utility Functions', () => {
  describe('resolveYearMonth', () => {
    it('should use the UTC calendar month', () => {
      expect(resolveYearMonth(new Date('2024-03-31T23:30:00Z'))).toEqual({ year: 2024, month: 3 });
    });

    it('should roll over at UTC midnight on the first of the month', () => {
      expect(resolveYearMonth(new Date('2024-04-01T00:00:00Z'))).toEqual({ year: 2024, month: 4 });
    });

    it('should handle year boundaries', () => {
      expect(resolveYearMonth(new Date('2023-12-31T23:59:59Z'))).toEqual({ year: 2023, month: 12 });
      expect(resolveYearMonth(new Date('2024-01-01T00:00:00Z'))).toEqual({ year: 2024, month: 1 });
    });

    it('should throw for an invalid date', () => {
      expect(() => resolveYearMonth(new Date('not-a-date'))).toThrow('Invalid date provided');
    });
  });

  describe('isValidYearMonth', () => {
    it('should accept months 1 through 12', () => {
      expect(isValidYearMonth(2024, 1)).toBe(true);
      expect(isValidYearMonth(2024, 12)).toBe(true);
    });

    it('should reject out-of-range or fractional values', () => {
      expect(isValidYearMonth(2024, 0)).toBe(false);
      expect(isValidYearMonth(2024, 13)).toBe(false);
      expect(isValidYearMonth(2024.5, 3)).toBe(false);
      expect(isValidYearMonth(1899, 3)).toBe(false);
    });
  });

  describe('formatPeriodName', () => {
    it('should render the full month name and year', () => {
      expect(formatPeriodName(2024, 3)).toBe('March 2024');
      expect(formatPeriodName(2025, 12)).toBe('December 2025');
      expect(formatPeriodName(2023, 1)).toBe('January 2023');
    });
  });

  describe('buildExportFilename', () => {
    it('should zero-pad the month', () => {
      expect(buildExportFilename(2024, 3)).toBe('evaluations_2024_03.csv');
    });

    it('should keep two-digit months as they are', () => {
      expect(buildExportFilename(2024, 11)).toBe('evaluations_2024_11.csv');
    });
  });
});
