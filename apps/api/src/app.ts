import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createApiRouter, ServiceControllers } from './routes';
import { logger } from './utils/logger';

export interface AppOptions {
  /** Requests per minute per client; 0 turns the limiter off. */
  rateLimitPerMinute?: number;
}

export function createApp(controllers: ServiceControllers, options: AppOptions = {}): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: true, credentials: true }));
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use((req, _res, next) => {
    logger.info(`${req.method} ${req.path}`);
    next();
  });

  // Rate limiting
  const perMinute = options.rateLimitPerMinute ?? 100;
  if (perMinute > 0) {
    app.use(
      rateLimit({
        windowMs: 60 * 1000, // 1 minute
        max: perMinute,
        message: 'Too many requests, please try again later',
        standardHeaders: true,
        legacyHeaders: false,
      })
    );
  }

  app.use('/api/v1', createApiRouter(controllers));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
