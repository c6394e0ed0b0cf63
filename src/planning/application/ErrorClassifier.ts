// src/planning/application/ErrorClassifier.ts

/**
 * ErrorClassifier
 *
 * Converts an arbitrary thrown value into a typed Failure.
 * Rules are ordered; the first match wins.
 *
 * The full diagnostic (stack, context) goes to the log at error level.
 * The returned Failure only carries the original message, the caller context
 * and the cause.
 */

import type { AppLogger } from '../../shared/logging/Logger';
import { logger as defaultLogger } from '../../shared/logging/Logger';
import { Failure, errorMessage, type FailureKind } from '../domain/Failure';

const FILE_IO_CODES = new Set([
  'ENOENT',
  'EACCES',
  'EISDIR',
  'ENOTDIR',
  'EEXIST',
  'EPERM',
  'EMFILE',
  'ENOSPC',
  'EROFS',
  'EBUSY',
]);

const ENVIRONMENT_CODES = new Set(['ENOEXEC', 'E2BIG']);

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN']);

const PARSING_ERROR_NAMES = new Set(['TypeError', 'RangeError', 'SyntaxError']);

type ErrnoLike = { code?: unknown; syscall?: unknown };

function errnoCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') return undefined;
  const code = (error as ErrnoLike).code;
  return typeof code === 'string' ? code : undefined;
}

function isSpawnError(error: unknown): boolean {
  if (!error || typeof error !== 'object') return false;
  const syscall = (error as ErrnoLike).syscall;
  return typeof syscall === 'string' && syscall.startsWith('spawn');
}

function errorField(error: unknown, field: 'name' | 'stack'): string | undefined {
  if (!error || typeof error !== 'object') return undefined;
  const value = (error as { name?: unknown; stack?: unknown })[field];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Decide the failure kind of a raw error (no side effects).
 */
export function classifyKind(error: unknown): FailureKind {
  const code = errnoCode(error);
  const message = errorMessage(error).toLowerCase();
  const spawnError = isSpawnError(error);

  if ((code !== undefined && FILE_IO_CODES.has(code) && !spawnError) || message.includes('no such file')) {
    return 'FileIO';
  }

  if (message.includes('template') || message.includes('render')) {
    return 'Parsing';
  }

  if (
    PARSING_ERROR_NAMES.has(errorField(error, 'name') ?? '') ||
    message.includes('json')
  ) {
    return 'Parsing';
  }

  if (
    spawnError ||
    (code !== undefined && ENVIRONMENT_CODES.has(code)) ||
    message.includes('command not found') ||
    message.includes('not recognized as an internal or external command')
  ) {
    return 'Configuration';
  }

  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    code === 'ETIMEDOUT' ||
    errorField(error, 'name') === 'TimeoutError'
  ) {
    return 'Timeout';
  }

  if (
    message.includes('connection') ||
    message.includes('network') ||
    (code !== undefined && NETWORK_CODES.has(code))
  ) {
    return 'Network';
  }

  return 'Unknown';
}

export class ErrorClassifier {
  public constructor(private readonly log: AppLogger = defaultLogger) {}

  /**
   * Classify `error` into a Failure. A Failure passes through unchanged.
   */
  public classify(error: unknown, context: Record<string, unknown> = {}): Failure {
    if (error instanceof Failure) {
      this.log.error(
        { kind: error.kind, details: error.details, context, err: error },
        `Planning failure: ${error.message}`,
      );
      return error;
    }

    const kind = classifyKind(error);
    const failure = new Failure({
      kind,
      message: errorMessage(error),
      details: context,
      cause: error,
    });

    this.log.error(
      {
        kind,
        context,
        errorMessage: failure.message,
        stack: errorField(error, 'stack'),
      },
      `Error classified as ${kind}`,
    );

    return failure;
  }
}

export const defaultErrorClassifier = new ErrorClassifier();

export function classify(error: unknown, context?: Record<string, unknown>): Failure {
  return defaultErrorClassifier.classify(error, context);
}
