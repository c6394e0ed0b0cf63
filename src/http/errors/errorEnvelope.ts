// src/http/errors/errorEnvelope.ts

/**
 * Standard error envelope for requests that never reached a planning result
 * (unknown routes, malformed JSON, unexpected crashes).
 *
 * Planning failures use the planning response map instead.
 */

export type ErrorEnvelope = {
  error: {
    code: string;
    message: string;
    correlationId?: string;
  };
};

export function buildErrorEnvelope(params: {
  code: string;
  message: string;
  correlationId?: string;
}): ErrorEnvelope {
  return {
    error: {
      code: params.code,
      message: params.message,
      ...(params.correlationId ? { correlationId: params.correlationId } : {}),
    },
  };
}
