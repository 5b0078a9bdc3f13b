import { describe, expect, it } from 'vitest';
import {
  normalizeAppointmentDate,
  normalizeAppointmentTime,
  tryNormalizeAppointmentDate,
} from '../src/utils/date-utils';
import { ValidationError } from '../src/middleware/error.middleware';

describe('tryNormalizeAppointmentDate', () => {
  it('accepts ISO dates with or without padding', () => {
    expect(tryNormalizeAppointmentDate('2025-06-15')).toBe('2025-06-15');
    expect(tryNormalizeAppointmentDate('2025-6-5')).toBe('2025-06-05');
  });

  it('reads numeric dates month first', () => {
    expect(tryNormalizeAppointmentDate('6/15/2025')).toBe('2025-06-15');
    expect(tryNormalizeAppointmentDate('06-15-2025')).toBe('2025-06-15');
  });

  it('reads spoken month names and ordinals', () => {
    expect(tryNormalizeAppointmentDate('June 15 2025')).toBe('2025-06-15');
    expect(tryNormalizeAppointmentDate('june 15th, 2025')).toBe('2025-06-15');
    expect(tryNormalizeAppointmentDate('  June   15,  2025 ')).toBe('2025-06-15');
  });

  it('formats Date instances', () => {
    expect(tryNormalizeAppointmentDate(new Date(2025, 11, 1))).toBe('2025-12-01');
    expect(tryNormalizeAppointmentDate(new Date('not a date'))).toBeNull();
  });

  it('returns null for anything else', () => {
    expect(tryNormalizeAppointmentDate('next tuesday')).toBeNull();
    expect(tryNormalizeAppointmentDate('2025-13-40')).toBeNull();
  });
});

describe('normalizeAppointmentDate', () => {
  it('throws a validation error for an unknown format', () => {
    expect(() => normalizeAppointmentDate('someday')).toThrow(ValidationError);
    expect(() => normalizeAppointmentDate('someday')).toThrow('Unrecognized appointment date: someday');
  });
});

describe('normalizeAppointmentTime', () => {
  it.each([
    ['10 am', '10:00 AM'],
    ['10:30pm', '10:30 PM'],
    ['10 a.m.', '10:00 AM'],
    ['07 PM', '7:00 PM'],
    ['3 in the afternoon', '3:00 PM'],
    ['9 in the morning', '9:00 AM'],
    ['6 in the evening', '6:00 PM'],
  ])('normalizes %s', (input, expected) => {
    expect(normalizeAppointmentTime(input)).toBe(expected);
  });

  it('returns unrecognized times trimmed', () => {
    expect(normalizeAppointmentTime(' noon ')).toBe('noon');
    expect(normalizeAppointmentTime('13 pm')).toBe('13 pm');
    expect(normalizeAppointmentTime("4 o'clock")).toBe("4 o'clock");
  });
});
