// src/http/routes/planRoutes.ts

/**
 * Planning routes
 *
 * - Keep HTTP boundary thin (payload -> application service -> response map).
 * - Planning failures are answered with the planning response map, never thrown.
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';

import type { Failure } from '../../planning/domain/Failure';
import type { Result } from '../../planning/domain/Result';
import type {
  ConfigValidation,
  PlanExplanation,
  PlanningSuccess,
} from '../../planning/application/PlanningTaskService';
import {
  httpStatusForFailure,
  toFailureResponse,
  toResponse,
} from '../../planning/application/responseMapper';
import type { FailureLocale } from '../../shared/config/PlanningConfig';
import { logger } from '../../shared/logging/Logger';

import '../requestContext';

export interface PlanningServicePort {
  runTask(payload: unknown): Promise<Result<PlanningSuccess, Failure>>;
  explain(payload: unknown): Result<PlanExplanation, Failure>;
  validateConfiguration(): Promise<ConfigValidation>;
}

export function createPlanRoutes(
  planningService: PlanningServicePort,
  locale: FailureLocale = 'en',
): Router {
  const router = Router();

  router.post('/v1/plan', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await planningService.runTask(req.body);

      if (!result.ok) {
        logger.info(
          { correlationId: req.correlationId, kind: result.error.kind },
          'Planning task failed',
        );
        res.status(httpStatusForFailure(result.error.kind)).json(toResponse(result, locale));
        return;
      }

      res.status(200).json(toResponse(result, locale));
    } catch (err) {
      next(err);
    }
  });

  router.post('/v1/plan/explain', (req: Request, res: Response) => {
    const result = planningService.explain(req.body);

    if (!result.ok) {
      res.status(httpStatusForFailure(result.error.kind)).json(toFailureResponse(result.error, locale));
      return;
    }

    res.status(200).json({
      success: true,
      explanation: result.value.explanation,
      summary: {
        reached_goal: result.value.summary.reachedGoal,
        steps: result.value.summary.steps,
      },
    });
  });

  router.get('/v1/config/validate', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = await planningService.validateConfiguration();
      res.status(200).json({ success: true, validation });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
