import { ValidationError } from './ErrorResponse';

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

export const monthNameToNumber = (month: string): number | null => {
  const index = MONTHS.findIndex((m) => m === month.trim().toLowerCase());
  return index === -1 ? null : index + 1;
};

export interface MonthParam {
  year: number;
  month: number;
}

// Accepts "07-2025" or "july-2025".
export const parseMonthParam = (text: unknown): MonthParam => {
  const match = typeof text === 'string' ? /^([a-z]+|\d{1,2})-(\d{4})$/i.exec(text.trim()) : null;
  if (!match) {
    throw new ValidationError('Invalid month format. Use MM-YYYY');
  }

  const [, monthPart, yearPart] = match;
  const month = /^\d+$/.test(monthPart) ? Number(monthPart) : monthNameToNumber(monthPart);

  if (month === null || month < 1 || month > 12) {
    throw new ValidationError(`Unknown month "${monthPart}"`);
  }
  return { year: Number(yearPart), month };
};
