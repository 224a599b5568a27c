import { ValidationError } from './ErrorResponse';

// JSON bodies and repeated query keys can carry any type where text is expected.
export const optionalText = (value: unknown, label: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${label} must be text`);
  }
  return value;
};
