// src/http/middleware/correlationId.ts

/**
 * Correlation ID middleware
 *
 * Rules:
 * 1) Prefer header: x-correlation-id
 * 2) Fallback: body.correlation_id (tool callers put it next to the task)
 * 3) Otherwise generate a UUID
 *
 * Outputs:
 * - req.correlationId
 * - response header x-correlation-id
 */

import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

import '../requestContext';

function readCorrelationIdFromBody(req: Request): string | undefined {
  const body: unknown = req.body;
  if (!body || typeof body !== 'object') return undefined;

  const maybeCorrelationId = (body as { correlation_id?: unknown }).correlation_id;
  return typeof maybeCorrelationId === 'string' && maybeCorrelationId.trim().length > 0
    ? maybeCorrelationId
    : undefined;
}

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header('x-correlation-id');
  const bodyId = readCorrelationIdFromBody(req);

  const correlationId =
    (typeof headerId === 'string' && headerId.trim().length > 0 ? headerId : undefined) ??
    bodyId ??
    randomUUID();

  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);

  next();
}
