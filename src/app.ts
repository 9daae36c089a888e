// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';

// Load the appropriate environment file based on NODE_ENV
if (process.env.NODE_ENV === 'test') {
  dotenv.config({ path: '.env.test' });
} else {
  dotenv.config();
}

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { AuditServices } from './app/composition-root';
import { createAuditRouter } from './routes/audit.routes';
import { createHealthRouter } from './routes/health.routes';
import type { HealthController } from './controllers/health.controller';
import { traceIdMiddleware } from './middleware/trace-id.middleware';
import { requestLoggingMiddleware } from './middleware/request-logging.middleware';
import { httpMetricsMiddleware } from './middleware/metrics.middleware';
import { errorHandler, notFoundHandler } from './middleware/error-handler.middleware';
import { ACTOR_HEADER } from './middleware/actor.middleware';
import { metricsRegistry } from './utils/metrics';
import { logger } from './utils/logger';

export interface AppDependencies {
  services: AuditServices;
  health: HealthController;
  uploadMaxBytes: number;
  corsOrigins?: string[];
}

function parseCorsOrigins(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

export function createApp(deps: AppDependencies): express.Application {
  const app = express();
  const allowedOrigins = deps.corsOrigins ?? parseCorsOrigins(process.env.CORS_ORIGINS);

  app.disable('x-powered-by');
  app.use(traceIdMiddleware);
  app.use(requestLoggingMiddleware);
  app.use(helmet());
  app.use(
    cors({
      origin: (origin, callback) => {
        // Same-origin and non-browser clients send no Origin header
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        logger.warn('cors-origin-rejected', { origin });
        callback(null, false);
      },
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', ACTOR_HEADER, 'X-Trace-Id'],
      exposedHeaders: ['X-Trace-Id', 'Content-Disposition'],
    })
  );
  app.use(express.json({ limit: '1mb' }));
  app.use(httpMetricsMiddleware);

  app.get('/metrics', (_req, res, next) => {
    metricsRegistry
      .metrics()
      .then((body) => {
        res.setHeader('Content-Type', metricsRegistry.contentType);
        res.send(body);
      })
      .catch(next);
  });

  app.use('/api/v1/health', createHealthRouter(deps.health));
  app.use('/api/v1/audit', createAuditRouter(deps.services, { uploadMaxBytes: deps.uploadMaxBytes }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
