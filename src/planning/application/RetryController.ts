// src/planning/application/RetryController.ts

/**
 * Bounded retry with exponential backoff.
 *
 * - Up to maxRetries + 1 attempts, strictly sequential.
 * - Delay before retry i (0-indexed) is initialDelaySeconds * backoffFactor^i. No jitter.
 * - Every error is retried the same way; the last one is rethrown unchanged.
 *   Classification belongs to the caller.
 */

import type { AppLogger } from '../../shared/logging/Logger';
import { logger as defaultLogger } from '../../shared/logging/Logger';

export type Sleep = (ms: number) => Promise<void>;

export type RetryOptions = {
  maxRetries: number;
  initialDelaySeconds: number;
  backoffFactor: number;

  /** Name used in log lines. */
  label?: string;
  sleep?: Sleep;
  logger?: AppLogger;
};

export const sleepMs: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function backoffDelaySeconds(
  attempt: number,
  initialDelaySeconds: number,
  backoffFactor: number,
): number {
  return initialDelaySeconds * Math.pow(backoffFactor, attempt);
}

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? sleepMs;
  const log = options.logger ?? defaultLogger;
  const label = options.label ?? 'operation';
  const maxRetries = nonNegative(Math.floor(options.maxRetries));

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (attempt >= maxRetries) {
        log.error(
          { label, attempts: attempt + 1, err: error },
          `${label} failed after ${attempt + 1} attempt(s)`,
        );
        break;
      }

      const delaySeconds = nonNegative(
        backoffDelaySeconds(attempt, options.initialDelaySeconds, options.backoffFactor),
      );
      log.warn(
        { label, attempt: attempt + 1, delaySeconds, err: error },
        `${label} attempt ${attempt + 1} failed, retrying in ${delaySeconds.toFixed(2)}s`,
      );
      await sleep(delaySeconds * 1000);
    }
  }

  throw lastError;
}

// NaN and negative counts or delays collapse to zero.
function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}
