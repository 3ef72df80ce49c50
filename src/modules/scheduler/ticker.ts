/**
 * Polling tick sources for the scheduler
 */

import cron, { type ScheduledTask } from 'node-cron';
import { DEFAULT_SCHEDULER_CONFIG } from './types.js';

/**
 * Repeating tick that can be stopped at any time
 */
export interface Ticker {
  start(onTick: () => void): void;
  stop(): void;
}

/**
 * Ticks on a cron expression using node-cron, in the process's local time
 */
export class CronTicker implements Ticker {
  private task: ScheduledTask | null = null;

  constructor(private readonly expression: string = DEFAULT_SCHEDULER_CONFIG.pollExpression) {
    // Validate cron expression
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression: ${expression}`);
    }
  }

  start(onTick: () => void): void {
    this.stop();
    this.task = cron.schedule(this.expression, () => onTick());
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
  }
}
