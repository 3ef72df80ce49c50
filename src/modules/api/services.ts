import type { SettingsStore } from '../config/settings.js';
import type { UploadLedger } from '../ledger/types.js';
import type { ScheduleTable } from '../scheduler/schedule-table.js';
import type { WorkflowScheduler } from '../scheduler/scheduler.js';
import type { ProgressChannel } from '../workflow/progress.js';
import type { WorkflowRunner } from '../workflow/runner.js';

/**
 * Services the HTTP routes read from and act on
 */
export interface ApiServices {
  runner: WorkflowRunner;
  /** null when the scheduler is disabled */
  scheduler: WorkflowScheduler | null;
  /** The live table the scheduler reads */
  schedule: ScheduleTable;
  progress: ProgressChannel;
  settings: SettingsStore;
  ledger: UploadLedger;
  checkHealth: () => Promise<boolean>;
}
