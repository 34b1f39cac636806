import pino from 'pino';
import { config, isDevelopment } from './env';

/**
 * Structured logger shared by every module
 * Pretty output only in development with LOG_PRETTY set, JSON lines otherwise
 */
const logger = pino({
  level: config.LOG_LEVEL,

  transport: config.LOG_PRETTY && isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          singleLine: false,
        },
      }
    : undefined,

  base: {
    pid: process.pid,
    env: config.NODE_ENV,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  serializers: {
    err: pino.stdSerializers.err,
  },

  // Transcripts and credentials never reach the log sink verbatim
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers["x-api-key"]',
      'apiKey',
      'token',
      'speechText',
      'body.speech_text',
      'body.SpeechResult',
      '*.apiKey',
      '*.token',
    ],
    censor: '[REDACTED]',
  },
});

/**
 * Create a child logger with additional context
 * @param context - Fields included in every line the child writes
 * @example
 * const log = createChildLogger({ service: 'conversation' });
 * log.info({ callId }, 'Turn handled');
 */
export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

/**
 * Log error with full context
 * @param error - Error object or message
 * @param context - Additional context
 */
export function logError(error: unknown, context?: Record<string, unknown>) {
  if (error instanceof Error) {
    logger.error({ err: error, ...context }, error.message);
  } else {
    logger.error({ err: error, ...context }, 'Non-error value thrown');
  }
}

/**
 * Log performance metrics
 * @param operation - Operation name
 * @param duration - Duration in milliseconds
 */
export function logPerformance(
  operation: string,
  duration: number,
  context?: Record<string, unknown>
) {
  logger.info(
    {
      type: 'performance',
      operation,
      duration_ms: duration,
      ...context,
    },
    `${operation} completed in ${duration}ms`
  );
}

export default logger;
