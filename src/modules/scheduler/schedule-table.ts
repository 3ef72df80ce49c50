/**
 * Weekly schedule table: at most one publish time per weekday.
 *
 * The scheduler reads it on every tick; the settings API replaces its
 * contents when the stored schedule changes.
 */

import { z } from 'zod';
import {
  WEEKDAYS,
  formatTimeOfDay,
  isValidTimeOfDay,
  parseTimeOfDay,
  type TimeOfDay,
  type Weekday,
} from '../../utils/calendar.js';

const timeOfDaySchema = z
  .string()
  .trim()
  .refine(isValidTimeOfDay, { message: 'Expected a 24h time as HH:MM' });

/**
 * Stored shape: {"Monday": "09:00", "Friday": "14:30"}
 */
export const weeklyScheduleSchema = z
  .object({
    Sunday: timeOfDaySchema.optional(),
    Monday: timeOfDaySchema.optional(),
    Tuesday: timeOfDaySchema.optional(),
    Wednesday: timeOfDaySchema.optional(),
    Thursday: timeOfDaySchema.optional(),
    Friday: timeOfDaySchema.optional(),
    Saturday: timeOfDaySchema.optional(),
  })
  .strict();

export type WeeklySchedule = z.infer<typeof weeklyScheduleSchema>;

export interface ScheduleEntry {
  weekday: Weekday;
  time: TimeOfDay;
}

export class ScheduleTable {
  private readonly table = new Map<Weekday, TimeOfDay>();

  constructor(schedule: WeeklySchedule = {}) {
    this.replace(schedule);
  }

  /**
   * Build from an untrusted value (settings row, request body)
   */
  static parse(value: unknown): ScheduleTable {
    return new ScheduleTable(weeklyScheduleSchema.parse(value ?? {}));
  }

  /**
   * Replace every entry
   */
  replace(schedule: WeeklySchedule): void {
    this.table.clear();
    for (const weekday of WEEKDAYS) {
      const value = schedule[weekday];
      if (value === undefined) continue;
      const time = parseTimeOfDay(value.trim());
      if (!time) {
        throw new Error(`Invalid time for ${weekday}: ${value}`);
      }
      this.table.set(weekday, time);
    }
  }

  entryFor(weekday: Weekday): TimeOfDay | undefined {
    return this.table.get(weekday);
  }

  /**
   * Entries in weekday order, Sunday first
   */
  entries(): ScheduleEntry[] {
    const result: ScheduleEntry[] = [];
    for (const weekday of WEEKDAYS) {
      const time = this.table.get(weekday);
      if (time) {
        result.push({ weekday, time: { ...time } });
      }
    }
    return result;
  }

  isEmpty(): boolean {
    return this.table.size === 0;
  }

  toRecord(): WeeklySchedule {
    const record: WeeklySchedule = {};
    for (const { weekday, time } of this.entries()) {
      record[weekday] = formatTimeOfDay(time);
    }
    return record;
  }
}
