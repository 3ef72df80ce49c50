/**
 * Workflow Module
 *
 * Runs the content pipeline (plan -> generate -> clean -> publish) once per
 * trigger and reports progress to a sink.
 */

// Export types
export {
  PIPELINE_STEPS,
  type StepName,
  type StepStatus,
  type RunStatus,
  type TriggerKind,
  type PrivacyStatus,
  type VideoResolution,
  type ContentPlan,
  type GeneratedVideo,
  type CleanedVideo,
  type PublishedVideo,
  type StepOutput,
  type PipelineStep,
  type WorkflowRun,
  type WorkflowSettings,
  type WorkflowSettingsSource,
  type ProgressReporter,
  type Planner,
  type VideoGenerator,
  type VideoCleaner,
  type PublishRequest,
  type Publisher,
  type WorkflowCollaborators,
  type RunSummary,
  type ProgressSink,
  type WorkflowRunnerState,
} from './types.js';

// Export errors
export {
  WorkflowError,
  ConfigurationError,
  ExternalServiceError,
  ResourceError,
  RunInProgressError,
  AlreadyPublishedError,
  toStepError,
  errorMessage,
  type WorkflowErrorKind,
  type StepError,
} from './errors.js';

// Export progress channel
export { ProgressChannel, type ProgressEvent, type ProgressListener } from './progress.js';

// Export runner
export { WorkflowRunner, createRun, type WorkflowRunnerOptions, type RunOptions } from './runner.js';
