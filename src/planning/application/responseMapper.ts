// src/planning/application/responseMapper.ts

/**
 * The single adapter that flattens a planning Result into the caller-facing map.
 *
 * Failure details (command lines, log paths, excerpts, causes) are never copied
 * into the response; they only go to the log.
 */

import type { FailureLocale } from '../../shared/config/PlanningConfig';
import type { Failure, FailureKind } from '../domain/Failure';
import type { Result } from '../domain/Result';

import type { PlanningSuccess } from './PlanningTaskService';

export type PlanningSuccessResponse = {
  success: true;
  plan_path: string;
  log_path: string;
  plan_content: string;
  explanation: string;
  summary: { reached_goal: boolean; steps: number };
  timestamp: string;
};

export type PlanningFailureResponse = {
  success: false;
  error: string;
  error_type: FailureKind;
  plan_content: '';
  explanation: string;
  summary: { reached_goal: false; steps: 0 };
};

export type PlanningResponse = PlanningSuccessResponse | PlanningFailureResponse;

export const FAILURE_EXPLANATION = 'Task execution failed';

export function toResponse(
  result: Result<PlanningSuccess, Failure>,
  locale: FailureLocale = 'en',
): PlanningResponse {
  if (result.ok) {
    const value = result.value;
    return {
      success: true,
      plan_path: value.planPath,
      log_path: value.logPath,
      plan_content: value.planContent,
      explanation: value.explanation,
      summary: { reached_goal: value.summary.reachedGoal, steps: value.summary.steps },
      timestamp: value.timestamp,
    };
  }

  return toFailureResponse(result.error, locale);
}

export function toFailureResponse(
  failure: Failure,
  locale: FailureLocale = 'en',
): PlanningFailureResponse {
  return {
    success: false,
    error: failure.userMessage(locale),
    error_type: failure.kind,
    plan_content: '',
    explanation: FAILURE_EXPLANATION,
    summary: { reached_goal: false, steps: 0 },
  };
}

const STATUS_BY_KIND: Record<FailureKind, number> = {
  Configuration: 400,
  Validation: 400,
  Parsing: 400,
  Timeout: 504,
  Planning: 502,
  Network: 502,
  FileIO: 500,
  Unknown: 500,
};

export function httpStatusForFailure(kind: FailureKind): number {
  return STATUS_BY_KIND[kind];
}
