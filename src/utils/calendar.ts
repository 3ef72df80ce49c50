/**
 * Local wall-clock helpers.
 *
 * All scheduling and ledger keys use the process's local time. No zone
 * conversion is done anywhere.
 */

/**
 * Weekday names, indexed like Date#getDay()
 */
export const WEEKDAYS = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/**
 * Hour and minute of a day, 24h
 */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function isWeekday(value: string): value is Weekday {
  return (WEEKDAYS as readonly string[]).includes(value);
}

export function weekdayOf(date: Date): Weekday {
  return WEEKDAYS[date.getDay()];
}

/**
 * Calendar date as YYYY-MM-DD in local time
 */
export function toLocalDateKey(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse "HH:MM" (24h). Returns null for anything else.
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_PATTERN.exec(value);
  if (!match) return null;
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

export function isValidTimeOfDay(value: string): boolean {
  return TIME_PATTERN.test(value);
}

/**
 * Whole local calendar days from `from` to `to`
 */
export function calendarDaysBetween(from: Date, to: Date): number {
  const start = new Date(from.getFullYear(), from.getMonth(), from.getDate());
  const end = new Date(to.getFullYear(), to.getMonth(), to.getDate());
  return Math.round((end.getTime() - start.getTime()) / (24 * 60 * 60 * 1000));
}

/**
 * Local time as YYYYMMDD_HHMMSS, for file names
 */
export function toFileTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${toLocalDateKey(date).replaceAll('-', '')}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
