import type { Request, Response, NextFunction } from 'express';
import { ApiError } from './types.js';

/**
 * Global error handling middleware.
 *
 * Catches all errors and returns JSON responses with a consistent format.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Log the error
  console.error('[Error]', {
    name: err.name,
    message: err.message,
    stack: err.stack,
    path: req.path,
    timestamp: new Date().toISOString(),
  });

  // Determine status code and message
  let statusCode = 500;
  let errorTitle = 'Internal Server Error';
  let errorMessage = process.env.NODE_ENV === 'production'
    ? 'An unexpected error occurred'
    : err.message;

  if (err instanceof ApiError) {
    statusCode = err.statusCode;
    errorTitle = err.error;
    errorMessage = err.message;
  } else if (err instanceof SyntaxError && 'body' in err) {
    // Malformed JSON rejected by express.json()
    statusCode = 400;
    errorTitle = 'Bad Request';
    errorMessage = 'Request body is not valid JSON';
  }

  res.status(statusCode).json({
    error: errorTitle,
    message: errorMessage,
  });
}

/**
 * 404 Not Found handler for undefined routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'Not Found',
    message: `Route ${req.method} ${req.path} not found`,
  });
}

/**
 * Request logging middleware.
 */
export function requestLogger(req: Request, _res: Response, next: NextFunction): void {
  console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
  next();
}
