/**
 * PlanningTask
 *
 * The validated task the planning service works on. Two shapes are accepted:
 *
 * - file mode: the caller points at an existing domain/problem pair
 *   (the problem may be rendered on the fly when structured fields are present);
 * - structured mode: the caller describes a robot move and the service renders
 *   the problem against the configured domain file.
 */

/**
 * Values substituted into the problem template.
 */
export interface ProblemFields {
  /** PDDL domain name, e.g. "delivery". */
  domain: string;
  robot: string;
  start: string;
  goal: string;
}

export interface FilePlanningTask {
  mode: 'file';
  domainPath: string;
  problemPath: string;
  outputDir?: string;

  /** Used to render `problemPath` when that file does not exist yet. */
  problem?: ProblemFields;
}

export interface StructuredPlanningTask {
  mode: 'structured';
  problem: ProblemFields;
  outputDir?: string;
}

export type PlanningTask = FilePlanningTask | StructuredPlanningTask;
