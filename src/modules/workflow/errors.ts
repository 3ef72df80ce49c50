/**
 * Workflow Errors
 *
 * Every failure a step can report is one of three kinds. The runner never
 * retries: any of them ends the current run.
 */

/**
 * Error kind attached to a failed step
 */
export type WorkflowErrorKind = 'configuration' | 'external_service' | 'resource';

/**
 * Base class for step failures
 */
export abstract class WorkflowError extends Error {
  abstract readonly kind: WorkflowErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkflowError';
  }
}

/**
 * Missing or invalid credentials/settings. Raised before any external call.
 */
export class ConfigurationError extends WorkflowError {
  readonly kind = 'configuration';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * An external service rejected the call or returned an error payload
 */
export class ExternalServiceError extends WorkflowError {
  readonly kind = 'external_service';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExternalServiceError';
  }
}

/**
 * A local file or artifact is missing or unreadable
 */
export class ResourceError extends WorkflowError {
  readonly kind = 'resource';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResourceError';
  }
}

/**
 * Thrown by WorkflowRunner.run() while another run is active
 */
export class RunInProgressError extends Error {
  readonly activeRunId: string;

  constructor(activeRunId: string) {
    super(`A workflow run is already in progress (${activeRunId})`);
    this.activeRunId = activeRunId;
    this.name = 'RunInProgressError';
  }
}

/**
 * Thrown by a scheduled run when the ledger already has a publish for the day
 */
export class AlreadyPublishedError extends Error {
  readonly date: string;

  constructor(date: string) {
    super(`A video was already published on ${date}`);
    this.date = date;
    this.name = 'AlreadyPublishedError';
  }
}

/**
 * Error detail stored on a failed step
 */
export interface StepError {
  kind: WorkflowErrorKind;
  message: string;
}

/**
 * Tag a thrown value with its error kind. Untagged collaborator errors count
 * as external service failures.
 */
export function toStepError(error: unknown): StepError {
  if (error instanceof WorkflowError) {
    return { kind: error.kind, message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'external_service', message };
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
