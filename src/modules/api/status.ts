import { Router } from 'express';
import type { SchedulerState } from '../scheduler/types.js';
import type { ApiServices } from './services.js';
import {
  asyncHandler,
  eventsQuerySchema,
  validationError,
  ConflictError,
  type EventsResponse,
  type SchedulerStatusResponse,
  type StatusResponse,
  type TriggerResponse,
} from './types.js';

function toSchedulerStatus(state: SchedulerState | null): SchedulerStatusResponse {
  if (!state) {
    return {
      status: 'disabled',
      nextRunTime: null,
      nextRunDescription: 'Scheduler disabled',
      lastTriggeredAt: null,
      totalTriggers: 0,
      skippedTriggers: 0,
    };
  }

  return {
    status: state.status,
    nextRunTime: state.nextRunTime?.toISOString() ?? null,
    nextRunDescription: state.nextRunDescription,
    lastTriggeredAt: state.lastTriggeredAt?.toISOString() ?? null,
    totalTriggers: state.totalTriggers,
    skippedTriggers: state.skippedTriggers,
  };
}

export function createStatusRouter(services: Pick<ApiServices, 'runner' | 'scheduler' | 'progress'>): Router {
  const { runner, scheduler, progress } = services;
  const router = Router();

  /**
   * GET /api/status
   *
   * Returns scheduler state (next scheduled run, trigger counters) and
   * workflow state (active run with per-step status, last run, counters).
   */
  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const response: StatusResponse = {
        scheduler: toSchedulerStatus(scheduler?.getState() ?? null),
        workflow: runner.getState(),
      };

      res.json(response);
    })
  );

  /**
   * POST /api/status/trigger-pipeline
   *
   * Manually starts a workflow run. Returns immediately; the run continues
   * in the background and reports through the progress channel.
   */
  router.post(
    '/trigger-pipeline',
    asyncHandler(async (_req, res) => {
      if (runner.isRunning()) {
        const activeRunId = runner.getState().activeRun?.id;
        throw new ConflictError(`Workflow is already running${activeRunId ? ` (run ${activeRunId})` : ''}`);
      }

      // Trigger workflow in background (don't await)
      runner.run('manual').catch((err) => {
        console.error('Workflow execution error:', err);
      });

      const response: TriggerResponse = {
        message: 'Workflow triggered successfully',
        status: 'running',
        runId: runner.getState().activeRun?.id ?? null,
      };

      res.status(202).json(response);
    })
  );

  /**
   * GET /api/status/events?after=N
   *
   * Progress events with a sequence number greater than N, oldest first.
   */
  router.get(
    '/events',
    asyncHandler(async (req, res) => {
      const parseResult = eventsQuerySchema.safeParse(req.query);
      if (!parseResult.success) {
        throw validationError(parseResult.error);
      }

      const response: EventsResponse = {
        events: progress.replay(parseResult.data.after),
        lastSeq: progress.lastSeq,
      };

      res.json(response);
    })
  );

  return router;
}
