/**
 * In-process stand-ins for the database-backed stores, the progress sink,
 * the tick source and the external collaborators.
 */

import type { SettingsStore } from '../modules/config/settings.js';
import type { LedgerRecord, PublishEntry, UploadLedger } from '../modules/ledger/types.js';
import type { Ticker } from '../modules/scheduler/ticker.js';
import type {
  ContentPlan,
  ProgressSink,
  RunStatus,
  RunSummary,
  StepName,
  WorkflowCollaborators,
} from '../modules/workflow/types.js';

export class InMemoryUploadLedger implements UploadLedger {
  readonly records = new Map<string, LedgerRecord>();
  failOnRead: Error | null = null;
  failOnWrite: Error | null = null;

  async hasPublishedOn(date: string): Promise<boolean> {
    if (this.failOnRead) throw this.failOnRead;
    return this.records.get(date)?.published === true;
  }

  async recordPublish(entry: PublishEntry): Promise<void> {
    if (this.failOnWrite) throw this.failOnWrite;
    this.records.set(entry.date, { ...entry, published: true, url: entry.url ?? null });
  }

  async recentRecords(limit: number): Promise<LedgerRecord[]> {
    return [...this.records.values()].sort((a, b) => b.date.localeCompare(a.date)).slice(0, limit);
  }
}

export class InMemorySettingsStore implements SettingsStore {
  readonly values: Map<string, unknown>;

  constructor(initial: Record<string, unknown> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  async getAll(): Promise<Record<string, unknown>> {
    return Object.fromEntries(this.values);
  }

  async set(key: string, value: unknown): Promise<void> {
    this.values.set(key, value);
  }
}

export type SinkCall =
  | { type: 'step'; step: StepName; percent: number; message: string }
  | { type: 'run'; status: Exclude<RunStatus, 'running'>; summary: RunSummary };

export class RecordingSink implements ProgressSink {
  readonly calls: SinkCall[] = [];

  onStepUpdate(step: StepName, percent: number, message: string): void {
    this.calls.push({ type: 'step', step, percent, message });
  }

  onRunCompleted(status: Exclude<RunStatus, 'running'>, summary: RunSummary): void {
    this.calls.push({ type: 'run', status, summary });
  }

  runCalls(): Array<Extract<SinkCall, { type: 'run' }>> {
    return this.calls.filter((call): call is Extract<SinkCall, { type: 'run' }> => call.type === 'run');
  }
}

/**
 * Ticker driven by the test
 */
export class ManualTicker implements Ticker {
  private onTick: (() => void) | null = null;
  startCount = 0;

  start(onTick: () => void): void {
    this.onTick = onTick;
    this.startCount++;
  }

  stop(): void {
    this.onTick = null;
  }

  get running(): boolean {
    return this.onTick !== null;
  }

  fire(): void {
    this.onTick?.();
  }
}

export const SAMPLE_PLAN: ContentPlan = {
  promptText: 'A paper boat drifting down a rain-soaked city street at dusk',
  title: 'Paper Boat Journey',
  description: 'A short cinematic clip of a paper boat in the rain.',
  tags: ['paper boat', 'rain', 'cinematic'],
};

export const GENERATED_PATH = '/tmp/content-autopilot-test/generated.mp4';
export const CLEANED_PATH = '/tmp/content-autopilot-test/cleaned.mp4';
export const VIDEO_ID = 'vid-123';
export const VIDEO_URL = 'https://www.youtube.com/watch?v=vid-123';

/**
 * Collaborators that succeed without touching the filesystem or network
 */
export function fakeCollaborators(overrides: Partial<WorkflowCollaborators> = {}): WorkflowCollaborators {
  return {
    planner: {
      plan: async () => ({ ...SAMPLE_PLAN, tags: [...SAMPLE_PLAN.tags] }),
    },
    generator: {
      generate: async (_promptText, _durationSeconds, _resolution, onProgress) => {
        onProgress?.(50, 'rendering video');
        return GENERATED_PATH;
      },
    },
    cleaner: {
      clean: async () => ({ filePath: CLEANED_PATH, strategy: 'fake' }),
    },
    publisher: {
      publish: async () => ({ identifier: VIDEO_ID, url: VIDEO_URL }),
    },
    ...overrides,
  };
}

/**
 * A promise with its resolve function exposed
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
