/**
 * API Module
 *
 * REST endpoints for the control panel.
 *
 * API Endpoints:
 * - GET /api/status - Scheduler and workflow state
 * - POST /api/status/trigger-pipeline - Start a manual run
 * - GET /api/status/events - Progress events for polling
 * - GET /api/settings - Get current settings
 * - PUT /api/settings - Update settings
 * - GET /api/uploads - Recent upload ledger records
 * - GET /health - Database health
 */

import express, { Router } from 'express';
import cors from 'cors';
import { createHealthRouter } from './health.js';
import { createSettingsRouter } from './settings.js';
import { createStatusRouter } from './status.js';
import { createUploadsRouter } from './uploads.js';
import type { ApiServices } from './services.js';
import { errorHandler, notFoundHandler, requestLogger } from './middleware.js';

// Export types
export * from './types.js';
export type { ApiServices } from './services.js';

// Export middleware
export { errorHandler, notFoundHandler, requestLogger } from './middleware.js';

/**
 * Creates the API router with all routes.
 */
export function createApiRouter(services: ApiServices): Router {
  const router = Router();

  // Mount route handlers
  router.use('/settings', createSettingsRouter(services));
  router.use('/status', createStatusRouter(services));
  router.use('/uploads', createUploadsRouter(services));

  return router;
}

export interface CreateAppOptions {
  services: ApiServices;
  enableCors?: boolean;
  enableLogging?: boolean;
}

/**
 * Creates and configures the Express application with all middleware.
 */
export function createApp(options: CreateAppOptions): express.Application {
  const { services, enableCors = true, enableLogging = true } = options;

  const app = express();

  // Parse JSON request bodies
  app.use(express.json());

  // Enable CORS if requested
  if (enableCors) {
    app.use(cors());
  }

  // Request logging
  if (enableLogging) {
    app.use(requestLogger);
  }

  // Health check
  app.use('/health', createHealthRouter(services));

  // Mount API routes
  app.use('/api', createApiRouter(services));

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}

// Default export for convenience
export default createApp;
