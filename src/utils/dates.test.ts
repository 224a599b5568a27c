import { describe, expect, it } from 'vitest';
import {
  assertOrderedRange,
  calendarMonth,
  eachDay,
  formatDisplayDate,
  formatLongDate,
  formatMonthLabel,
  formatShortDate,
  formatWeekday,
  lastDays,
  parseDisplayDate,
  today,
  weekdayOf,
} from './dates';
import { ValidationError } from './ErrorResponse';

describe('parseDisplayDate', () => {
  it('turns DD-MM-YYYY into a day key', () => {
    expect(parseDisplayDate('15-07-2025')).toBe('2025-07-15');
    expect(parseDisplayDate(' 01-01-2024 ')).toBe('2024-01-01');
  });

  it('rejects other layouts and impossible dates', () => {
    expect(() => parseDisplayDate('2025-07-15')).toThrow('Invalid date format. Use DD-MM-YYYY');
    expect(() => parseDisplayDate('31-02-2025')).toThrow(ValidationError);
    expect(() => parseDisplayDate('5-7-2025')).toThrow(ValidationError);
  });

  it('rejects values that are not text', () => {
    expect(() => parseDisplayDate(20250715)).toThrow('Invalid date format. Use DD-MM-YYYY');
    expect(() => parseDisplayDate(['15-07-2025'], 'end date')).toThrow('Invalid end date format. Use DD-MM-YYYY');
  });

  it('names the field in the error', () => {
    expect(() => parseDisplayDate('tomorrow', 'start date')).toThrow(
      'Invalid start date format. Use DD-MM-YYYY',
    );
  });
});

describe('formatting', () => {
  it('renders the display variants', () => {
    expect(formatDisplayDate('2025-07-15')).toBe('15-07-2025');
    expect(formatLongDate('2025-07-15')).toBe('15-Jul-2025');
    expect(formatShortDate('2025-07-15')).toBe('15-Jul');
    expect(formatMonthLabel('2025-07-01')).toBe('July 2025');
    expect(formatWeekday('2025-07-15')).toBe('Tuesday');
  });

  it('uses the local calendar day for today', () => {
    expect(today(new Date(2025, 6, 15, 23, 59))).toBe('2025-07-15');
  });
});

describe('ranges', () => {
  it('enumerates every day across a month boundary', () => {
    expect(eachDay({ start: '2025-07-30', end: '2025-08-02' })).toEqual([
      '2025-07-30',
      '2025-07-31',
      '2025-08-01',
      '2025-08-02',
    ]);
  });

  it('returns no days for a reversed range', () => {
    expect(eachDay({ start: '2025-07-18', end: '2025-07-15' })).toEqual([]);
  });

  it('derives named periods ending on a day', () => {
    expect(lastDays(7, '2025-07-15')).toEqual({ start: '2025-07-09', end: '2025-07-15' });
    expect(lastDays(30, '2025-07-15')).toEqual({ start: '2025-06-16', end: '2025-07-15' });
    expect(calendarMonth(2024, 2)).toEqual({ start: '2024-02-01', end: '2024-02-29' });
    expect(calendarMonth(50, 1)).toEqual({ start: '0050-01-01', end: '0050-01-31' });
  });

  it('rejects a start after the end', () => {
    expect(() => assertOrderedRange({ start: '2025-07-18', end: '2025-07-15' })).toThrow(
      'Start date must be before end date',
    );
    expect(assertOrderedRange({ start: '2025-07-15', end: '2025-07-15' })).toEqual({
      start: '2025-07-15',
      end: '2025-07-15',
    });
  });

  it('numbers weekdays from Sunday', () => {
    expect(weekdayOf('2025-07-13')).toBe(0);
    expect(weekdayOf('2025-07-15')).toBe(2);
  });
});
