// src/planning/dto/PlanningTaskDto.ts

/**
 * PlanningTask DTO parser/validator
 *
 * Boundary validator for planning inputs (snake_case JSON, as sent by tool callers).
 *
 * - Never throws: returns a typed task or a Configuration failure listing every issue.
 * - File mode wins when `domain_path` or `problem_path` is present.
 */

import { configurationFailure, type Failure } from '../domain/Failure';
import type { PlanningTask, ProblemFields } from '../domain/PlanningTask';
import { err, ok, type Result } from '../domain/Result';

export const REQUIRED_FILE_PARAMS = ['domain_path', 'problem_path'] as const;
export const REQUIRED_TASK_PARAMS = ['robot', 'start', 'goal', 'domain'] as const;

export function parsePlanningTaskDto(payload: unknown): Result<PlanningTask, Failure> {
  const issues: string[] = [];

  if (!isRecord(payload)) {
    return err(invalidTask(['Payload must be a JSON object.']));
  }

  const outputDir = readOptionalNonEmptyString(payload, 'output_dir', issues);
  const fileMode = REQUIRED_FILE_PARAMS.some((key) => payload[key] !== undefined);

  if (fileMode) {
    const domainPath = readNonEmptyString(payload, 'domain_path', issues);
    const problemPath = readNonEmptyString(payload, 'problem_path', issues);
    const problem = readProblemFieldsIfComplete(payload);

    if (issues.length > 0) return err(invalidTask(issues));

    return ok({
      mode: 'file',
      domainPath,
      problemPath,
      ...(outputDir ? { outputDir } : {}),
      ...(problem ? { problem } : {}),
    });
  }

  const domain = readNonEmptyString(payload, 'domain', issues);
  const robot = readNonEmptyString(payload, 'robot', issues);
  const start = readNonEmptyString(payload, 'start', issues);
  const goal = readNonEmptyString(payload, 'goal', issues);

  if (issues.length > 0) return err(invalidTask(issues));

  return ok({
    mode: 'structured',
    problem: { domain, robot, start, goal },
    ...(outputDir ? { outputDir } : {}),
  });
}

/**
 * Names of the template fields missing from `payload`.
 */
export function missingProblemFields(payload: unknown): string[] {
  if (!isRecord(payload)) return [...REQUIRED_TASK_PARAMS];
  return REQUIRED_TASK_PARAMS.filter((key) => !isNonEmptyString(payload[key]));
}

function invalidTask(issues: string[]): Failure {
  return configurationFailure(`Invalid planning task: ${issues.join(' ')}`, { issues });
}

/* ------------------------- small internal helpers ------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function readProblemFieldsIfComplete(obj: Record<string, unknown>): ProblemFields | undefined {
  const { domain, robot, start, goal } = obj;
  if (
    isNonEmptyString(domain) &&
    isNonEmptyString(robot) &&
    isNonEmptyString(start) &&
    isNonEmptyString(goal)
  ) {
    return { domain, robot, start, goal };
  }
  return undefined;
}

function readNonEmptyString(obj: Record<string, unknown>, key: string, issues: string[]) {
  const value = obj[key];
  if (!isNonEmptyString(value)) {
    issues.push(`"${key}" must be a non-empty string.`);
    return '';
  }
  return value;
}

function readOptionalNonEmptyString(obj: Record<string, unknown>, key: string, issues: string[]) {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!isNonEmptyString(value)) {
    issues.push(`"${key}" must be a non-empty string when provided.`);
    return undefined;
  }
  return value;
}
