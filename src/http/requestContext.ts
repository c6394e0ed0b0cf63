// src/http/requestContext.ts

/**
 * Request augmentation: every request carries the correlation id assigned by
 * correlationIdMiddleware.
 */
declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export {};
