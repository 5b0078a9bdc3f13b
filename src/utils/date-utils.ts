import { format, isValid, parse } from 'date-fns';
import { ValidationError } from '../middleware/error.middleware';

// Month comes first whenever the date is all digits
const DATE_FORMATS = [
  'yyyy-M-d',
  'M/d/yyyy',
  'M-d-yyyy',
  'MMMM d yyyy',
  'MMMM do yyyy',
  'MMMM d, yyyy',
  'MMMM do, yyyy',
  'MMM d yyyy',
  'MMM d, yyyy',
] as const;

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Convert a spoken or typed date to `yyyy-MM-dd`, or null when no known
 * format matches.
 */
export const tryNormalizeAppointmentDate = (value: string | Date): string | null => {
  if (value instanceof Date) {
    return isValid(value) ? format(value, 'yyyy-MM-dd') : null;
  }

  const input = value.trim().replace(/\s+/g, ' ');
  for (const pattern of DATE_FORMATS) {
    const parsed = parse(input, pattern, REFERENCE_DATE);
    if (isValid(parsed) && parsed.getFullYear() >= 1000) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
};

export const normalizeAppointmentDate = (value: string | Date): string => {
  const normalized = tryNormalizeAppointmentDate(value);
  if (normalized === null) {
    throw new ValidationError(`Unrecognized appointment date: ${String(value)}`);
  }
  return normalized;
};

const TIME_PATTERN = /^(\d{1,2})(?::(\d{2}))?\s*(a\.?m\.?|p\.?m\.?|in the morning|in the afternoon|in the evening)$/i;

/**
 * `10 am`, `10:30pm`, `3 in the afternoon` → `10:00 AM`, `10:30 PM`, `3:00 PM`.
 * Anything else comes back trimmed.
 */
export const normalizeAppointmentTime = (value: string): string => {
  const input = value.trim();
  const match = TIME_PATTERN.exec(input);
  if (!match) return input;

  const hour = Number(match[1]);
  const minutes = match[2] ?? '00';
  if (hour < 1 || hour > 12 || Number(minutes) > 59) return input;

  const suffix = match[3].toLowerCase();
  const meridiem = suffix.startsWith('a') || suffix.endsWith('morning') ? 'AM' : 'PM';

  return `${hour}:${minutes} ${meridiem}`;
};
