import { describe, it, expect } from 'vitest';
import {
  calendarDaysBetween,
  formatTimeOfDay,
  isValidTimeOfDay,
  isWeekday,
  parseTimeOfDay,
  toFileTimestamp,
  toLocalDateKey,
  weekdayOf,
} from './calendar.js';

describe('calendar', () => {
  describe('parseTimeOfDay', () => {
    it('should parse 24h HH:MM times', () => {
      expect(parseTimeOfDay('09:00')).toEqual({ hour: 9, minute: 0 });
      expect(parseTimeOfDay('23:59')).toEqual({ hour: 23, minute: 59 });
      expect(parseTimeOfDay('00:00')).toEqual({ hour: 0, minute: 0 });
    });

    it('should reject anything else', () => {
      for (const value of ['9:00', '24:00', '12:60', '12:5', '12:00:00', 'noon', '']) {
        expect(parseTimeOfDay(value)).toBeNull();
        expect(isValidTimeOfDay(value)).toBe(false);
      }
    });
  });

  it('should format times with leading zeros', () => {
    expect(formatTimeOfDay({ hour: 7, minute: 5 })).toBe('07:05');
  });

  it('should name weekdays like Date#getDay', () => {
    expect(weekdayOf(new Date(2025, 0, 5))).toBe('Sunday');
    expect(weekdayOf(new Date(2025, 0, 6))).toBe('Monday');
    expect(weekdayOf(new Date(2025, 0, 11))).toBe('Saturday');
    expect(isWeekday('Friday')).toBe(true);
    expect(isWeekday('friday')).toBe(false);
  });

  it('should key dates by local calendar day', () => {
    expect(toLocalDateKey(new Date(2025, 0, 6, 0, 0, 0))).toBe('2025-01-06');
    expect(toLocalDateKey(new Date(2025, 0, 6, 23, 59, 59))).toBe('2025-01-06');
    expect(toLocalDateKey(new Date(2025, 11, 31, 12, 0))).toBe('2025-12-31');
  });

  it('should count whole local days between dates', () => {
    expect(calendarDaysBetween(new Date(2025, 0, 6, 23, 0), new Date(2025, 0, 7, 1, 0))).toBe(1);
    expect(calendarDaysBetween(new Date(2025, 0, 6, 8, 0), new Date(2025, 0, 6, 22, 0))).toBe(0);
    expect(calendarDaysBetween(new Date(2025, 0, 6), new Date(2025, 0, 13))).toBe(7);
  });

  it('should build file timestamps from local time', () => {
    expect(toFileTimestamp(new Date(2025, 0, 6, 9, 5, 7))).toBe('20250106_090507');
  });
});
