/**
 * Express server bootstrap
 * Main application entry point
 */

import express, { Application } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { config, isDevelopment } from './config/env';
import logger from './config/logger';
import { connectRedis, closeRedis, checkRedisHealth } from './config/redis';
import { closeDatabase, checkDatabaseHealth, isDatabaseConfigured } from './config/database';
import { createContainer, type Container } from './config/container';
import {
  errorHandler,
  notFoundHandler,
  handleUnhandledRejection,
  handleUncaughtException,
} from './middleware/error.middleware';
import { correlationId, requestLogger } from './middleware/request-logger.middleware';
import { createVoiceController } from './controllers/voice.controller';
import { createTwilioController } from './controllers/twilio.controller';
import { createAdminController } from './controllers/admin.controller';
import { createVoiceRoutes } from './routes/voice.routes';
import { createTwilioRoutes } from './routes/twilio.routes';
import { createAdminRoutes } from './routes/admin.routes';

type DependencyStatus = 'up' | 'down' | 'disabled';

async function dependencyStatus(enabled: boolean, check: () => Promise<boolean>): Promise<DependencyStatus> {
  if (!enabled) {
    return 'disabled';
  }
  return (await check()) ? 'up' : 'down';
}

/**
 * Create and configure Express application
 * @param container - Wired services; tests pass one built on in-process fakes
 */
function createApp(container: Container = createContainer()): Application {
  const app = express();

  // Trust proxy (required for rate limiting behind load balancer)
  app.set('trust proxy', 1);

  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );

  app.use(
    cors({
      origin: isDevelopment ? '*' : false,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'X-API-Key', 'X-Correlation-ID'],
      exposedHeaders: ['X-Correlation-ID'],
    })
  );

  const limiter = rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    max: config.RATE_LIMIT_MAX_REQUESTS,
    message: 'Too many requests from this IP, please try again later',
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.path === '/health',
  });

  app.use(limiter);

  app.use(express.json({ limit: '64kb' }));
  // Twilio posts form-encoded bodies
  app.use(express.urlencoded({ extended: false, limit: '64kb' }));

  app.use(correlationId);
  app.use(requestLogger);

  app.use('/api/v1/voice', createVoiceRoutes(createVoiceController(container.conversation)));
  app.use('/api/v1/twilio', createTwilioRoutes(createTwilioController(container.conversation)));
  app.use('/api/v1/admin', createAdminRoutes(createAdminController(container.conversation)));

  app.get('/', (_req, res) => {
    res.json({
      name: 'Voice Booking Intake',
      version: '1.0.0',
      status: 'running',
      timestamp: new Date().toISOString(),
    });
  });

  // Always 200: turns keep working on the in-process store while Redis is down
  app.get('/health', async (_req, res) => {
    const [redis, database] = await Promise.all([
      dependencyStatus(config.REDIS_ENABLED, checkRedisHealth),
      dependencyStatus(isDatabaseConfigured(), checkDatabaseHealth),
    ]);

    res.status(200).json({
      status: redis === 'down' || database === 'down' ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      services: { redis, database },
    });
  });

  // 404 handler (must be after all routes)
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}

/**
 * Start the server
 */
async function startServer(): Promise<void> {
  logger.info('Starting voice booking intake server...');

  handleUnhandledRejection();
  handleUncaughtException();

  if (config.REDIS_ENABLED) {
    const connected = await connectRedis();
    if (connected) {
      logger.info('Redis connection established');
    } else {
      logger.warn({ event: 'store_degraded' }, 'Redis not reachable at startup, sessions fall back to memory');
    }
  }

  const app = createApp();

  const server = app.listen(config.PORT, config.HOST, () => {
    logger.info(
      { host: config.HOST, port: config.PORT, env: config.NODE_ENV },
      `Server is running on http://${config.HOST}:${config.PORT}`
    );
  });

  const gracefulShutdown = (signal: string): void => {
    logger.info(`Received ${signal}, starting graceful shutdown`);

    server.close(() => {
      logger.info('HTTP server closed');

      Promise.all([closeDatabase(), closeRedis()])
        .then(() => {
          logger.info('Graceful shutdown completed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Error during graceful shutdown');
          process.exit(1);
        });
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forceful shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

// Start the server if this file is run directly
if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  });
}

export { createApp, startServer };
