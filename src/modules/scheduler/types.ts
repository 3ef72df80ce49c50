/**
 * Scheduler Module Types
 *
 * Type definitions for the weekly publish scheduler.
 */

// =============================================================================
// SCHEDULER CONFIGURATION
// =============================================================================

/**
 * Scheduler configuration options
 */
export interface SchedulerConfig {
  /** Cron expression for the polling tick (default: '* * * * *' = every 60 seconds) */
  pollExpression: string;
  /** Whether to run the scheduler (default: true, can be disabled for testing) */
  enabled: boolean;
}

/**
 * Default scheduler configuration
 */
export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  pollExpression: '* * * * *', // Every minute
  enabled: true,
};

// =============================================================================
// SCHEDULER STATE
// =============================================================================

export type SchedulerStatus = 'idle' | 'polling' | 'stopped';

/**
 * Current scheduler state
 */
export interface SchedulerState {
  status: SchedulerStatus;
  /** Next scheduled publish time, if any entry exists */
  nextRunTime?: Date;
  /** Human-readable form of nextRunTime */
  nextRunDescription: string;
  /** When the scheduler last fired a run */
  lastTriggeredAt?: Date;
  /** Scheduled runs fired since start */
  totalTriggers: number;
  /** Matches skipped because the day already had a publish */
  skippedTriggers: number;
}
