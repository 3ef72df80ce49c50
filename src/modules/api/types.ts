import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import {
  agentInstructionsSchema,
  privacyStatusSchema,
  videoDurationSchema,
  videoResolutionSchema,
} from '../config/settings.js';
import type { SchedulerStatus } from '../scheduler/types.js';
import { weeklyScheduleSchema } from '../scheduler/schedule-table.js';
import type { ProgressEvent } from '../workflow/progress.js';
import type { WorkflowRunnerState } from '../workflow/types.js';

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Request body for updating settings
 */
export const updateSettingsBodySchema = z
  .object({
    weekly_schedule: weeklyScheduleSchema.optional(),
    agent_instructions: agentInstructionsSchema.optional(),
    video_duration: videoDurationSchema.optional(),
    video_resolution: videoResolutionSchema.optional(),
    privacy_status: privacyStatusSchema.optional(),
  })
  .strict();

export type UpdateSettingsBody = z.infer<typeof updateSettingsBodySchema>;

/**
 * Query params for listing recent uploads
 */
export const uploadsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional().default(30),
});

export type UploadsQuery = z.infer<typeof uploadsQuerySchema>;

/**
 * Query params for polling progress events
 */
export const eventsQuerySchema = z.object({
  after: z.coerce.number().int().min(0).optional().default(0),
});

export type EventsQuery = z.infer<typeof eventsQuerySchema>;

// =============================================================================
// API RESPONSE TYPES
// =============================================================================

/**
 * Response for GET /api/settings
 */
export interface SettingsResponse {
  [key: string]: unknown;
}

/**
 * Scheduler part of GET /api/status
 */
export interface SchedulerStatusResponse {
  status: SchedulerStatus | 'disabled';
  nextRunTime: string | null;
  nextRunDescription: string;
  lastTriggeredAt: string | null;
  totalTriggers: number;
  skippedTriggers: number;
}

/**
 * Response for GET /api/status
 */
export interface StatusResponse {
  scheduler: SchedulerStatusResponse;
  workflow: WorkflowRunnerState;
}

/**
 * Response for POST /api/status/trigger-pipeline
 */
export interface TriggerResponse {
  message: string;
  status: 'running';
  runId: string | null;
}

/**
 * Response for GET /api/status/events
 */
export interface EventsResponse {
  events: ProgressEvent[];
  lastSeq: number;
}

/**
 * Upload ledger record in GET /api/uploads
 */
export interface UploadRecordResponse {
  date: string;
  published: boolean;
  videoId: string;
  title: string;
  weekday: string;
  url: string | null;
  timestamp: string;
}

/**
 * Response for GET /api/uploads
 */
export interface UploadsResponse {
  uploads: UploadRecordResponse[];
}

/**
 * Response for GET /health
 */
export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  database: 'connected' | 'disconnected';
}

/**
 * Standard error response
 */
export interface ErrorResponse {
  error: string;
  message: string;
}

// =============================================================================
// ERROR CLASSES
// =============================================================================

/**
 * Base API error class
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly error: string;

  constructor(statusCode: number, error: string, message: string) {
    super(message);
    this.statusCode = statusCode;
    this.error = error;
    this.name = 'ApiError';
  }

  toJSON(): ErrorResponse {
    return {
      error: this.error,
      message: this.message,
    };
  }
}

/**
 * 400 Bad Request error
 */
export class BadRequestError extends ApiError {
  constructor(message: string) {
    super(400, 'Bad Request', message);
    this.name = 'BadRequestError';
  }
}

/**
 * 409 Conflict error
 */
export class ConflictError extends ApiError {
  constructor(message: string) {
    super(409, 'Conflict', message);
    this.name = 'ConflictError';
  }
}

/**
 * Turn a failed zod parse into a 400
 */
export function validationError(error: z.ZodError): BadRequestError {
  const errorMessages = error.issues.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`);
  return new BadRequestError(errorMessages.join('; '));
}

// =============================================================================
// TYPED REQUEST HANDLERS
// =============================================================================

/**
 * Typed async request handler with error handling
 */
export type AsyncRequestHandler<
  Params = Record<string, string>,
  ResBody = unknown,
  ReqBody = unknown,
  Query = Record<string, unknown>
> = (
  req: Request<Params, ResBody, ReqBody, Query>,
  res: Response<ResBody>,
  next: NextFunction
) => Promise<void>;

/**
 * Wraps an async handler to catch errors and pass them to the error middleware
 */
export function asyncHandler<
  Params = Record<string, string>,
  ResBody = unknown,
  ReqBody = unknown,
  Query = Record<string, unknown>
>(
  fn: AsyncRequestHandler<Params, ResBody, ReqBody, Query>
): (req: Request<Params, ResBody, ReqBody, Query>, res: Response<ResBody>, next: NextFunction) => void {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
