import express from 'express';
import helmet from 'helmet';
import { requestIdMiddleware } from './middleware/requestId';
import { requestLoggerMiddleware } from './middleware/requestLogger';
import { errorHandler } from './middleware/errorHandler';
import { successResponse, errorResponse } from './shared/envelope';
import { createJobRoutes } from './modules/jobs/job.routes';
import type { JobOrchestrator } from './modules/jobs/job-orchestrator';
import { createCostRoutes } from './modules/cost/cost.routes';
import type { CostControllerDeps } from './modules/cost/cost.controller';

export interface HealthChecks {
  postgres(): Promise<boolean>;
  /** Absent when no Redis is configured. */
  redis?: () => Promise<boolean>;
}

export interface AppDeps {
  orchestrator: JobOrchestrator;
  costs: CostControllerDeps;
  health: HealthChecks;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.disable('x-powered-by');

  // Middleware pipeline (order matters)
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));

  // Health check: Postgres is required, Redis only degrades the cache
  app.get('/api/v1/health', async (_req, res, next) => {
    try {
      const postgresHealthy = await deps.health.postgres();
      const redis = deps.health.redis ? ((await deps.health.redis()) ? 'ok' : 'unavailable') : 'disabled';

      res.status(postgresHealthy ? 200 : 503).json(successResponse({
        status: postgresHealthy ? 'ok' : 'degraded',
        postgres: postgresHealthy ? 'ok' : 'unavailable',
        redis,
      }));
    } catch (err) {
      next(err);
    }
  });

  const { jobRoutes, batchRoutes } = createJobRoutes(deps.orchestrator);
  app.use('/api/v1/jobs', jobRoutes);
  app.use('/api/v1/batches', batchRoutes);
  app.use('/api/v1/costs', createCostRoutes(deps.costs));

  // 404 catch-all for unknown routes
  app.use((_req, res) => {
    res.status(404).json(errorResponse('NOT_FOUND', 'The requested resource was not found'));
  });

  // Must be last
  app.use(errorHandler);

  return app;
}
