/**
 * Workflow Runner
 *
 * Executes the content pipeline once:
 * 1. Plan: Ask the planner for a video prompt and metadata
 * 2. Generate: Render the video from the prompt
 * 3. Clean: Remove the watermark and enhance the video
 * 4. Publish: Upload the video and record it in the ledger
 *
 * Steps run strictly in order and each feeds the next. The first failure
 * ends the run: remaining steps are skipped and nothing is written to the
 * ledger. Only one run may be active at a time.
 */

import type { UploadLedger } from '../ledger/index.js';
import { systemClock, toLocalDateKey, weekdayOf, type Clock } from '../../utils/calendar.js';
import {
  AlreadyPublishedError,
  ResourceError,
  RunInProgressError,
  WorkflowError,
  errorMessage,
  toStepError,
} from './errors.js';
import {
  PIPELINE_STEPS,
  type PipelineStep,
  type ProgressSink,
  type RunStatus,
  type RunSummary,
  type StepName,
  type StepOutput,
  type TriggerKind,
  type WorkflowCollaborators,
  type WorkflowRun,
  type WorkflowRunnerState,
  type WorkflowSettings,
  type WorkflowSettingsSource,
  type ProgressReporter,
} from './types.js';

export interface WorkflowRunnerOptions {
  collaborators: WorkflowCollaborators;
  ledger: UploadLedger;
  loadSettings: WorkflowSettingsSource;
  sink?: ProgressSink;
  clock?: Clock;
}

export interface RunOptions {
  /**
   * Scheduled runs check the ledger for today's publish unless the caller
   * already did. Manual runs never check.
   */
  skipDedupCheck?: boolean;
}

/**
 * Create a run with every step pending
 */
export function createRun(trigger: TriggerKind, startedAt: Date): WorkflowRun {
  return {
    id: startedAt.toISOString(),
    trigger,
    status: 'running',
    startedAt,
    completedAt: null,
    steps: PIPELINE_STEPS.map((name, index): PipelineStep => ({
      ordinal: index + 1,
      name,
      status: 'pending',
      startedAt: null,
      finishedAt: null,
      error: null,
      output: null,
    })),
  };
}

function findStep(run: WorkflowRun, name: StepName): PipelineStep {
  const step = run.steps.find((candidate) => candidate.name === name);
  if (!step) {
    throw new Error(`Run ${run.id} has no ${name} step`);
  }
  return step;
}

function clampPercent(percent: number): number {
  if (!Number.isFinite(percent)) return 0;
  return Math.min(100, Math.max(0, Math.round(percent)));
}

/**
 * WorkflowRunner owns the pipeline for the duration of a run
 */
export class WorkflowRunner {
  private readonly collaborators: WorkflowCollaborators;
  private readonly ledger: UploadLedger;
  private readonly loadSettings: WorkflowSettingsSource;
  private readonly sink: ProgressSink | undefined;
  private readonly clock: Clock;

  private busy = false;
  private inFlight: Promise<WorkflowRun> | null = null;
  private activeRun: WorkflowRun | null = null;
  private lastRun: WorkflowRun | null = null;
  private totalRuns = 0;
  private successfulRuns = 0;
  private failedRuns = 0;

  constructor(options: WorkflowRunnerOptions) {
    this.collaborators = options.collaborators;
    this.ledger = options.ledger;
    this.loadSettings = options.loadSettings;
    this.sink = options.sink;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Run the full pipeline.
   *
   * Rejects with RunInProgressError while another run is active, and with
   * AlreadyPublishedError for a scheduled run on a day that already has a
   * publish. Step failures do not reject: they resolve to a failed run.
   */
  async run(trigger: TriggerKind = 'manual', options: RunOptions = {}): Promise<WorkflowRun> {
    if (this.busy) {
      throw new RunInProgressError(this.activeRun?.id ?? 'starting');
    }
    this.busy = true;

    const pending = this.start(trigger, options);
    this.inFlight = pending;
    return pending;
  }

  isRunning(): boolean {
    return this.busy;
  }

  /**
   * Settles once the in-flight run, if any, has finished, whatever its outcome
   */
  async whenIdle(): Promise<void> {
    if (!this.inFlight) return;
    await this.inFlight.then(
      () => undefined,
      () => undefined
    );
  }

  private async start(trigger: TriggerKind, options: RunOptions): Promise<WorkflowRun> {
    try {
      const startedAt = this.clock();

      if (trigger === 'scheduled' && !options.skipDedupCheck) {
        const date = toLocalDateKey(startedAt);
        if (await this.ledger.hasPublishedOn(date)) {
          console.log(`[Workflow] Video already uploaded on ${date}, skipping scheduled run`);
          throw new AlreadyPublishedError(date);
        }
      }

      return await this.execute(createRun(trigger, startedAt));
    } finally {
      this.activeRun = null;
      this.busy = false;
    }
  }

  /**
   * Snapshot of the runner; callers may not mutate the live run
   */
  getState(): WorkflowRunnerState {
    return {
      isRunning: this.busy,
      activeRun: this.activeRun ? structuredClone(this.activeRun) : null,
      lastRun: this.lastRun ? structuredClone(this.lastRun) : null,
      totalRuns: this.totalRuns,
      successfulRuns: this.successfulRuns,
      failedRuns: this.failedRuns,
    };
  }

  private async execute(run: WorkflowRun): Promise<WorkflowRun> {
    this.activeRun = run;
    this.totalRuns++;

    console.log('\n' + '='.repeat(60));
    console.log('WORKFLOW STARTED');
    console.log(`Run ID: ${run.id}`);
    console.log(`Trigger: ${run.trigger}`);
    console.log('='.repeat(60) + '\n');

    const { planner, generator, cleaner, publisher } = this.collaborators;
    const runDate = run.startedAt;
    let published: { identifier: string; url: string; title: string } | null = null;

    try {
      // Step 1: Plan
      const { settings, plan } = await this.runStep(
        run,
        'plan',
        async () => {
          const settings = await this.readSettings();
          const plan = await planner.plan(settings.agentInstructions);
          console.log(`[Workflow] Planned video: "${plan.title}"`);
          return { settings, plan };
        },
        (value) => value.plan
      );

      // Step 2: Generate
      const generatedPath = await this.runStep(
        run,
        'generate',
        (report) =>
          generator.generate(plan.promptText, settings.videoDurationSeconds, settings.videoResolution, report),
        (filePath) => ({ filePath })
      );

      // Step 3: Clean (watermark removal, then enhancement)
      const cleaned = await this.runStep(
        run,
        'clean',
        (report) => cleaner.clean(generatedPath, report),
        (value) => value
      );

      // Step 4: Publish
      const video = await this.runStep(
        run,
        'publish',
        async (report) => {
          const result = await publisher.publish(
            {
              filePath: cleaned.filePath,
              title: plan.title,
              description: plan.description,
              tags: plan.tags,
              privacy: settings.privacyStatus,
            },
            report
          );
          await this.recordPublish(runDate, result.identifier, plan.title, result.url);
          return result;
        },
        (value) => value
      );

      published = { identifier: video.identifier, url: video.url, title: plan.title };
      run.status = 'succeeded';
    } catch (error) {
      run.status = 'failed';

      // Mark any pending steps as skipped
      for (const step of run.steps) {
        if (step.status === 'pending') {
          step.status = 'skipped';
        }
      }

      if (!run.steps.some((step) => step.status === 'failed')) {
        // Only step failures are expected here
        throw error;
      }
    }

    run.completedAt = this.clock();
    const summary = this.summarize(run, published);

    if (run.status === 'succeeded') {
      this.successfulRuns++;
    } else {
      this.failedRuns++;
    }
    this.lastRun = run;

    console.log('\n' + '='.repeat(60));
    console.log(`WORKFLOW ${run.status.toUpperCase()}`);
    console.log(`Duration: ${summary.durationMs}ms`);
    if (summary.identifier) {
      console.log(`Video ID: ${summary.identifier}`);
    }
    if (summary.failedStep && summary.error) {
      console.log(`Failed step: ${summary.failedStep} (${summary.error.kind}): ${summary.error.message}`);
    }
    console.log('='.repeat(60) + '\n');

    this.notifyCompleted(run.status === 'succeeded' ? 'succeeded' : 'failed', summary);

    return run;
  }

  /**
   * Run a pipeline step, recording its state transitions.
   * Throws the step's error after marking it failed.
   */
  private async runStep<T>(
    run: WorkflowRun,
    name: StepName,
    fn: (report: ProgressReporter) => Promise<T>,
    toOutput: (value: T) => StepOutput
  ): Promise<T> {
    const step = findStep(run, name);
    step.status = 'running';
    step.startedAt = this.clock();

    console.log(`\n--- Step ${step.ordinal}/${run.steps.length}: ${name.toUpperCase()} ---`);
    this.notifyStep(name, 0, 'started');

    // Sub-progress stops once the step leaves the running state
    const report: ProgressReporter = (percent, message) => {
      if (step.status === 'running') {
        this.notifyStep(name, percent, message);
      }
    };

    try {
      const value = await fn(report);
      step.output = toOutput(value);
      step.status = 'succeeded';
      step.finishedAt = this.clock();
      this.notifyStep(name, 100, 'completed');
      console.log(`Step ${name} completed successfully`);
      return value;
    } catch (error) {
      step.status = 'failed';
      step.finishedAt = this.clock();
      step.error = toStepError(error);
      console.error(`Step ${name} failed (${step.error.kind}): ${step.error.message}`);
      throw error;
    }
  }

  private async readSettings(): Promise<WorkflowSettings> {
    try {
      return await this.loadSettings();
    } catch (error) {
      if (error instanceof WorkflowError) throw error;
      throw new ResourceError(`Could not read workflow settings: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async recordPublish(runDate: Date, identifier: string, title: string, url: string): Promise<void> {
    try {
      await this.ledger.recordPublish({
        date: toLocalDateKey(runDate),
        identifier,
        title,
        weekday: weekdayOf(runDate),
        url,
        timestamp: this.clock(),
      });
    } catch (error) {
      throw new ResourceError(
        `Video ${identifier} was published but the upload ledger could not be updated: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private summarize(
    run: WorkflowRun,
    published: { identifier: string; url: string; title: string } | null
  ): RunSummary {
    const completedAt = run.completedAt ?? this.clock();
    const summary: RunSummary = {
      runId: run.id,
      trigger: run.trigger,
      durationMs: completedAt.getTime() - run.startedAt.getTime(),
    };

    const failed = run.steps.find((step) => step.status === 'failed');
    if (failed?.error) {
      summary.failedStep = failed.name;
      summary.error = failed.error;
    }
    if (published) {
      summary.identifier = published.identifier;
      summary.title = published.title;
      summary.url = published.url;
    }
    return summary;
  }

  private notifyStep(step: StepName, percent: number, message: string): void {
    try {
      this.sink?.onStepUpdate(step, clampPercent(percent), message);
    } catch (error) {
      console.error('[Workflow] Progress sink failed:', error);
    }
  }

  private notifyCompleted(status: Exclude<RunStatus, 'running'>, summary: RunSummary): void {
    try {
      this.sink?.onRunCompleted(status, summary);
    } catch (error) {
      console.error('[Workflow] Progress sink failed:', error);
    }
  }
}
