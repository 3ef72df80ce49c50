/**
 * Scheduler Module
 *
 * Starts scheduled workflow runs from a weekly schedule table:
 * - Polls once a minute
 * - Fires on an exact weekday + HH:MM match
 * - Skips days that already have a publish in the upload ledger
 */

// Export types
export {
  type SchedulerConfig,
  type SchedulerState,
  type SchedulerStatus,
  DEFAULT_SCHEDULER_CONFIG,
} from './types.js';

// Export schedule table
export {
  ScheduleTable,
  weeklyScheduleSchema,
  type WeeklySchedule,
  type ScheduleEntry,
} from './schedule-table.js';

// Export tick sources
export { CronTicker, type Ticker } from './ticker.js';

// Export scheduler
export { WorkflowScheduler, type WorkflowSchedulerOptions } from './scheduler.js';
