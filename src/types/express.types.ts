/**
 * Extended Express types for request context
 */

declare global {
  namespace Express {
    interface Request {
      /**
       * Correlation ID for request tracking across services
       */
      correlationId?: string;

      /**
       * Request start time for performance tracking
       */
      startTime?: number;
    }
  }
}

export {};
