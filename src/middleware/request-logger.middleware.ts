/**
 * Request logging middleware
 * Request bodies are never logged here: turn bodies carry caller speech
 */

import '../types/express.types';
import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { createChildLogger } from '../config/logger';

const log = createChildLogger({ component: 'http' });

const CORRELATION_ID = /^[\w-]{1,128}$/;

/**
 * Attach a correlation ID to the request and response
 * Inbound ids are only reused when they look like ids
 */
export function correlationId(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.header('X-Correlation-ID') || req.header('X-Request-ID');
  req.correlationId = inbound && CORRELATION_ID.test(inbound) ? inbound : randomUUID();

  res.setHeader('X-Correlation-ID', req.correlationId);
  next();
}

/**
 * Log each request once it has been answered
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  req.startTime = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - (req.startTime ?? Date.now());
    const context = {
      correlationId: req.correlationId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration,
    };
    const message = `${req.method} ${req.originalUrl} - ${res.statusCode} (${duration}ms)`;

    if (res.statusCode >= 500) {
      log.error(context, message);
    } else if (req.path === '/health') {
      log.debug(context, message);
    } else {
      log.info(context, message);
    }
  });

  next();
}
