// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * - Malformed JSON bodies (rejected by express.json) -> HTTP 400
 * - Anything else -> HTTP 500
 * - Always returns the standard error envelope with the correlationId
 *
 * Planning failures never reach this handler; routes turn them into response maps.
 */

import type { NextFunction, Request, Response } from 'express';
import { buildErrorEnvelope } from '../errors/errorEnvelope';
import { logger } from '../../shared/logging/Logger';

import '../requestContext';

function isBodyParseError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  return (err as { type?: unknown }).type === 'entity.parse.failed';
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (isBodyParseError(err)) {
    logger.debug({ correlationId: req.correlationId }, 'Request body is not valid JSON');

    res.status(400).json(
      buildErrorEnvelope({
        code: 'INVALID_JSON',
        message: 'Request body must be valid JSON.',
        correlationId: req.correlationId,
      }),
    );
    return;
  }

  logger.error({ correlationId: req.correlationId, err }, 'Unhandled error in request pipeline');

  res.status(500).json(
    buildErrorEnvelope({
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred.',
      correlationId: req.correlationId,
    }),
  );
}
