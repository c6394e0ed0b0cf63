/**
 * Express application setup for the planner gateway.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers global middleware (JSON parsing, correlation ids, request logging).
 * - Exposes a healthcheck endpoint and system info for monitoring.
 * - Mounts planning routes when a planning service is supplied.
 */
import express, { Application, NextFunction, Request, Response } from 'express';

import { config, getPaths } from './shared/config/Config';
import type { FailureLocale } from './shared/config/PlanningConfig';
import { logger } from './shared/logging/Logger';
import { correlationIdMiddleware } from './http/middleware/correlationId';
import { errorHandler } from './http/middleware/errorHandler';
import { notFound } from './http/middleware/notFound';
import { createPlanRoutes, type PlanningServicePort } from './http/routes/planRoutes';
import { createSystemRoutes } from './http/routes/systemRoutes';

export type AppDeps = {
  planningService?: PlanningServicePort;
  failureLocale?: FailureLocale;
};

export function createApp(deps: AppDeps = {}): Application {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());
  app.use(correlationIdMiddleware);

  // Simple request logging for visibility in development
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(
      { method: req.method, path: req.path, correlationId: req.correlationId },
      'Incoming request',
    );
    next();
  });

  // Basic healthcheck endpoint used by monitors
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: config.serviceName,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(
    createSystemRoutes({
      planningEnabled: deps.planningService !== undefined,
      projectRoot: getPaths().root,
    }),
  );

  if (deps.planningService) {
    app.use(createPlanRoutes(deps.planningService, deps.failureLocale));
  }

  app.use(notFound);

  // Global error handler (keeps errors in one place)
  app.use(errorHandler);

  return app;
}
