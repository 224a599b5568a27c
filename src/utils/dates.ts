import {
  addDays,
  eachDayOfInterval,
  endOfMonth,
  format,
  getDay,
  isValid,
  parse,
  parseISO,
  startOfMonth,
} from 'date-fns';
import { ValidationError } from './ErrorResponse';

/**
 * Canonical calendar day used everywhere behind the HTTP boundary, `yyyy-MM-dd`.
 * Ordering day keys as strings is the same as ordering them by calendar.
 */
export type DayKey = string;

export interface DayRange {
  start: DayKey;
  end: DayKey;
}

const DISPLAY_FORMAT = 'dd-MM-yyyy';
const KEY_FORMAT = 'yyyy-MM-dd';
const DISPLAY_PATTERN = /^\d{2}-\d{2}-\d{4}$/;

export const toDayKey = (date: Date): DayKey => format(date, KEY_FORMAT);

const fromDayKey = (key: DayKey): Date => parseISO(key);

export const today = (now: Date = new Date()): DayKey => toDayKey(now);

// Parses the DD-MM-YYYY text admins type. `label` names the field in the error.
export const parseDisplayDate = (text: unknown, label = 'date'): DayKey => {
  if (typeof text !== 'string') {
    throw new ValidationError(`Invalid ${label} format. Use DD-MM-YYYY`);
  }
  const trimmed = text.trim();
  const parsed = parse(trimmed, DISPLAY_FORMAT, new Date());

  if (!DISPLAY_PATTERN.test(trimmed) || !isValid(parsed)) {
    throw new ValidationError(`Invalid ${label} format. Use DD-MM-YYYY`);
  }
  return toDayKey(parsed);
};

export const formatDisplayDate = (key: DayKey): string => format(fromDayKey(key), DISPLAY_FORMAT);

// 15-Jul-2025
export const formatLongDate = (key: DayKey): string => format(fromDayKey(key), 'dd-MMM-yyyy');

// 15-Jul
export const formatShortDate = (key: DayKey): string => format(fromDayKey(key), 'dd-MMM');

export const formatMonthLabel = (key: DayKey): string => format(fromDayKey(key), 'MMMM yyyy');

export const addDaysToKey = (key: DayKey, amount: number): DayKey =>
  toDayKey(addDays(fromDayKey(key), amount));

export const weekdayOf = (key: DayKey): number => getDay(fromDayKey(key));

export const formatWeekday = (key: DayKey): string => format(fromDayKey(key), 'EEEE');

export const eachDay = ({ start, end }: DayRange): DayKey[] => {
  if (start > end) return [];
  return eachDayOfInterval({ start: fromDayKey(start), end: fromDayKey(end) }).map(toDayKey);
};

export const assertOrderedRange = (range: DayRange): DayRange => {
  if (range.start > range.end) {
    throw new ValidationError('Start date must be before end date');
  }
  return range;
};

export const lastDays = (days: number, until: DayKey): DayRange => ({
  start: addDaysToKey(until, -(days - 1)),
  end: until,
});

export const calendarMonth = (year: number, month: number): DayRange => {
  // setFullYear keeps years below 100 literal
  const first = new Date(2000, 0, 1);
  first.setFullYear(year, month - 1, 1);
  return {
    start: toDayKey(startOfMonth(first)),
    end: toDayKey(endOfMonth(first)),
  };
};
