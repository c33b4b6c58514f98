import express from 'express';
import type { Services } from '../services.js';
import { createAuthRoutes } from './routes/auth.js';
import { createAdminRoutes } from './routes/admin.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import {
  createApiRateLimiter,
  createLoginRateLimiter,
  type RateLimitOptions,
} from './middleware/rateLimit.js';
import { withTimeout } from '../db/guardedStore.js';

export interface AppOptions {
  rateLimit: RateLimitOptions;
  healthTimeoutMs: number;
  /** Serve Swagger UI at /docs. */
  docs?: boolean;
}

export function createApp(services: Services, options: AppOptions): express.Application {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(createApiRateLimiter(options.rateLimit));

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(services.store.ping(), options.healthTimeoutMs)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(503).json({
          code: 'STORAGE_UNAVAILABLE',
          message: 'Storage unavailable',
        });
      })
      .catch(next);
  });

  // Swagger/OpenAPI docs
  if (options.docs ?? true) {
    app.use(createSwaggerRoutes());
  }

  app.use('/api/auth', createAuthRoutes(services, createLoginRateLimiter(options.rateLimit)));
  app.use('/api/admin', createAdminRoutes(services));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
