import { ValidationError } from './ErrorResponse';

// Employee ids arrive as JSON numbers or as path/query text.
export const parseEmployeeId = (value: unknown): number => {
  const id = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;

  if (typeof id !== 'number' || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError('Employee ID must be a positive integer');
  }
  return id;
};
