/**
 * Workflow Module Types
 *
 * Type definitions for a single pipeline run and the external collaborators
 * each step calls.
 */

import type { StepError } from './errors.js';

// =============================================================================
// PIPELINE STEPS
// =============================================================================

/**
 * Pipeline step names, in execution order
 */
export const PIPELINE_STEPS = ['plan', 'generate', 'clean', 'publish'] as const;

export type StepName = (typeof PIPELINE_STEPS)[number];

export type StepStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';

export type RunStatus = 'running' | 'succeeded' | 'failed';

export type TriggerKind = 'manual' | 'scheduled';

export type PrivacyStatus = 'public' | 'unlisted' | 'private';

export type VideoResolution = '1080p' | '720p';

/**
 * Output of the plan step
 */
export interface ContentPlan {
  promptText: string;
  title: string;
  description: string;
  tags: string[];
}

/**
 * Output of the generate step
 */
export interface GeneratedVideo {
  filePath: string;
}

/**
 * Output of the clean step
 */
export interface CleanedVideo {
  filePath: string;
  /** Name of the strategy that produced the file */
  strategy: string;
}

/**
 * Output of the publish step
 */
export interface PublishedVideo {
  identifier: string;
  url: string;
}

export type StepOutput = ContentPlan | GeneratedVideo | CleanedVideo | PublishedVideo;

/**
 * State of one step within a run
 */
export interface PipelineStep {
  /** 1-based position */
  ordinal: number;
  name: StepName;
  status: StepStatus;
  startedAt: Date | null;
  finishedAt: Date | null;
  error: StepError | null;
  output: StepOutput | null;
}

/**
 * One attempt to execute the pipeline
 */
export interface WorkflowRun {
  /** ISO timestamp of the run start */
  id: string;
  trigger: TriggerKind;
  status: RunStatus;
  startedAt: Date;
  completedAt: Date | null;
  /** Always PIPELINE_STEPS.length entries, in execution order */
  steps: PipelineStep[];
}

// =============================================================================
// SETTINGS
// =============================================================================

/**
 * Settings read at the start of each run
 */
export interface WorkflowSettings {
  agentInstructions: string;
  videoDurationSeconds: number;
  videoResolution: VideoResolution;
  privacyStatus: PrivacyStatus;
}

export type WorkflowSettingsSource = () => Promise<WorkflowSettings>;

// =============================================================================
// COLLABORATORS
// =============================================================================

/**
 * Sub-progress callback handed to collaborators (percent 0-100)
 */
export type ProgressReporter = (percent: number, message: string) => void;

export interface Planner {
  plan(instructions: string): Promise<ContentPlan>;
}

export interface VideoGenerator {
  /** Returns the path of the downloaded video */
  generate(
    promptText: string,
    durationSeconds: number,
    resolution: VideoResolution,
    onProgress?: ProgressReporter
  ): Promise<string>;
}

export interface VideoCleaner {
  clean(inputPath: string, onProgress?: ProgressReporter): Promise<CleanedVideo>;
}

/**
 * Video upload request
 */
export interface PublishRequest {
  filePath: string;
  title: string;
  description: string;
  tags: string[];
  privacy: PrivacyStatus;
}

export interface Publisher {
  publish(request: PublishRequest, onProgress?: ProgressReporter): Promise<PublishedVideo>;
}

export interface WorkflowCollaborators {
  planner: Planner;
  generator: VideoGenerator;
  cleaner: VideoCleaner;
  publisher: Publisher;
}

// =============================================================================
// PROGRESS
// =============================================================================

/**
 * Summary sent with onRunCompleted
 */
export interface RunSummary {
  runId: string;
  trigger: TriggerKind;
  durationMs: number;
  failedStep?: StepName;
  error?: StepError;
  identifier?: string;
  title?: string;
  url?: string;
}

/**
 * Receives fire-and-forget notifications in step execution order
 */
export interface ProgressSink {
  onStepUpdate(step: StepName, percent: number, message: string): void;
  onRunCompleted(status: Exclude<RunStatus, 'running'>, summary: RunSummary): void;
}

// =============================================================================
// RUNNER STATE
// =============================================================================

/**
 * Snapshot of the runner for status endpoints
 */
export interface WorkflowRunnerState {
  isRunning: boolean;
  activeRun: WorkflowRun | null;
  lastRun: WorkflowRun | null;
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
}
