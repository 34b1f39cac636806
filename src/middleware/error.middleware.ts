/**
 * Error handling middleware
 * Centralized error processing and response formatting
 */

import '../types/express.types';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import logger, { logError } from '../config/logger';
import { AppError, isOperationalError } from '../utils/errors';
import { isDevelopment } from '../config/env';

interface ErrorResponse {
  status: 'error';
  message: string;
  code?: string;
  errors?: unknown[];
  stack?: string;
  correlationId?: string;
}

/**
 * Main error handling middleware
 * Request bodies are not logged: they carry caller speech
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof ZodError) {
    logger.warn(
      { correlationId: req.correlationId, method: req.method, url: req.originalUrl, issues: error.errors.length },
      'Request validation failed'
    );

    const errorResponse: ErrorResponse = {
      status: 'error',
      message: 'Validation failed',
      code: 'VALIDATION_ERROR',
      errors: error.errors.map((err) => ({
        path: err.path.join('.'),
        message: err.message,
      })),
      correlationId: req.correlationId,
    };

    res.status(400).json(errorResponse);
    return;
  }

  logError(error, {
    correlationId: req.correlationId,
    method: req.method,
    url: req.originalUrl,
    params: req.params,
  });

  if (error instanceof AppError) {
    const errorResponse: ErrorResponse = {
      status: 'error',
      message: error.isOperational || isDevelopment ? error.message : 'Internal server error',
      code: error.name,
      correlationId: req.correlationId,
    };

    if (isDevelopment && error.stack) {
      errorResponse.stack = error.stack;
    }

    if (error.context && error.isOperational) {
      errorResponse.errors = [error.context];
    }

    res.status(error.statusCode).json(errorResponse);
    return;
  }

  const errorResponse: ErrorResponse = {
    status: 'error',
    message: isDevelopment ? error.message : 'Internal server error',
    code: 'INTERNAL_ERROR',
    correlationId: req.correlationId,
  };

  if (isDevelopment && error.stack) {
    errorResponse.stack = error.stack;
  }

  res.status(500).json(errorResponse);
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  const errorResponse: ErrorResponse = {
    status: 'error',
    message: `Route ${req.method} ${req.path} not found`,
    code: 'NOT_FOUND',
    correlationId: req.correlationId,
  };

  res.status(404).json(errorResponse);
}

/**
 * Async handler wrapper
 * Forwards rejected promises to the error middleware
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Unhandled rejection handler (process level)
 */
export function handleUnhandledRejection(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error({ err: reason }, 'Unhandled Promise Rejection');

    if (!isDevelopment && !isOperationalError(reason)) {
      logger.fatal('Unhandled rejection outside development, shutting down');
      process.exit(1);
    }
  });
}

/**
 * Uncaught exception handler (process level)
 */
export function handleUncaughtException(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal({ err: error }, 'Uncaught Exception');
    process.exit(1);
  });
}
