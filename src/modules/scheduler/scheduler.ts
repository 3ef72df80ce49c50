/**
 * Workflow Scheduler
 *
 * Polls once a minute and starts a run when the current local weekday and
 * minute match an entry in the weekly schedule.
 *
 * Features:
 * - Exact minute match, fired at most once per matching minute
 * - Skips the day when the upload ledger already has a publish for it
 * - Reads the schedule table on every tick, so edits apply without restart
 * - Can be stopped and started again
 */

import {
  calendarDaysBetween,
  formatTimeOfDay,
  systemClock,
  toLocalDateKey,
  weekdayOf,
  type Clock,
} from '../../utils/calendar.js';
import type { UploadLedger } from '../ledger/index.js';
import type { TriggerKind } from '../workflow/types.js';
import type { ScheduleTable } from './schedule-table.js';
import { CronTicker, type Ticker } from './ticker.js';
import type { SchedulerState, SchedulerStatus } from './types.js';

export interface WorkflowSchedulerOptions {
  schedule: ScheduleTable;
  ledger: UploadLedger;
  /** Starts a run. Called without awaiting; the run reports its own outcome. */
  onTrigger: (kind: TriggerKind) => void;
  ticker?: Ticker;
  clock?: Clock;
}

/**
 * WorkflowScheduler fires scheduled runs from the weekly schedule table
 */
export class WorkflowScheduler {
  private readonly schedule: ScheduleTable;
  private readonly ledger: UploadLedger;
  private readonly onTrigger: (kind: TriggerKind) => void;
  private readonly ticker: Ticker;
  private readonly clock: Clock;

  private status: SchedulerStatus = 'idle';
  private lastFiredMinute: string | null = null;
  private lastTriggeredAt?: Date;
  private totalTriggers = 0;
  private skippedTriggers = 0;

  constructor(options: WorkflowSchedulerOptions) {
    this.schedule = options.schedule;
    this.ledger = options.ledger;
    this.onTrigger = options.onTrigger;
    this.ticker = options.ticker ?? new CronTicker();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Start polling
   */
  start(): void {
    if (this.status === 'polling') {
      console.log('Scheduler is already running');
      return;
    }

    console.log('\n--- Starting Workflow Scheduler ---');
    const entries = this.schedule.entries();
    if (entries.length === 0) {
      console.log('Weekly schedule is empty');
    }
    for (const { weekday, time } of entries) {
      console.log(`  ${weekday}: ${formatTimeOfDay(time)}`);
    }

    this.status = 'polling';
    this.ticker.start(() => {
      this.tick().catch((error) => {
        console.error('[Scheduler] Tick failed:', error);
      });
    });

    console.log(`Next scheduled run: ${this.describeNextRun()}`);
  }

  /**
   * Stop polling. Safe to call more than once.
   */
  stop(): void {
    if (this.status !== 'polling') {
      this.status = 'stopped';
      return;
    }

    console.log('\n--- Stopping Workflow Scheduler ---');
    this.ticker.stop();
    this.status = 'stopped';
    console.log('Scheduler stopped');
  }

  isPolling(): boolean {
    return this.status === 'polling';
  }

  /**
   * One poll. Returns true when a scheduled run was triggered.
   */
  async tick(now: Date = this.clock()): Promise<boolean> {
    if (this.status !== 'polling') {
      return false;
    }

    const weekday = weekdayOf(now);
    const time = this.schedule.entryFor(weekday);
    if (!time || time.hour !== now.getHours() || time.minute !== now.getMinutes()) {
      return false;
    }

    const date = toLocalDateKey(now);
    const minuteKey = `${date} ${formatTimeOfDay(time)}`;
    if (this.lastFiredMinute === minuteKey) {
      return false;
    }
    this.lastFiredMinute = minuteKey;

    console.log(`\n[Scheduler] Scheduled time reached: ${weekday} at ${formatTimeOfDay(time)}`);

    let alreadyPublished: boolean;
    try {
      alreadyPublished = await this.ledger.hasPublishedOn(date);
    } catch (error) {
      console.error('[Scheduler] Could not read upload ledger, skipping this trigger:', error);
      return false;
    }

    if (alreadyPublished) {
      this.skippedTriggers++;
      console.log(`[Scheduler] Video already uploaded on ${date}, skipping`);
      return false;
    }

    // Stopped while the ledger was being read
    if (this.status !== 'polling') {
      return false;
    }

    this.totalTriggers++;
    this.lastTriggeredAt = now;

    try {
      this.onTrigger('scheduled');
    } catch (error) {
      console.error('[Scheduler] Failed to start scheduled run:', error);
    }
    return true;
  }

  /**
   * Next local time strictly after `now` that matches a schedule entry
   */
  nextScheduledFireTime(now: Date = this.clock()): Date | null {
    if (this.schedule.isEmpty()) {
      return null;
    }

    for (let offset = 0; offset <= 7; offset++) {
      const day = new Date(now.getFullYear(), now.getMonth(), now.getDate() + offset);
      const time = this.schedule.entryFor(weekdayOf(day));
      if (!time) continue;

      const candidate = new Date(
        day.getFullYear(),
        day.getMonth(),
        day.getDate(),
        time.hour,
        time.minute
      );
      if (candidate.getTime() > now.getTime()) {
        return candidate;
      }
    }

    return null;
  }

  /**
   * e.g. "Today (Monday) at 09:00", "Friday (3 days) at 14:30"
   */
  describeNextRun(now: Date = this.clock()): string {
    const next = this.nextScheduledFireTime(now);
    if (!next) {
      return 'No schedule configured';
    }

    const weekday = weekdayOf(next);
    const at = formatTimeOfDay({ hour: next.getHours(), minute: next.getMinutes() });
    const days = calendarDaysBetween(now, next);

    if (days === 0) {
      return `Today (${weekday}) at ${at}`;
    }
    return `${weekday} (${days} ${days === 1 ? 'day' : 'days'}) at ${at}`;
  }

  /**
   * Get current scheduler state
   */
  getState(now: Date = this.clock()): SchedulerState {
    return {
      status: this.status,
      nextRunTime: this.nextScheduledFireTime(now) ?? undefined,
      nextRunDescription: this.describeNextRun(now),
      lastTriggeredAt: this.lastTriggeredAt,
      totalTriggers: this.totalTriggers,
      skippedTriggers: this.skippedTriggers,
    };
  }
}
