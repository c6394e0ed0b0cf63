/**
 * IProcessRunner
 * --------------
 * Port for running the external planner.
 *
 * Why this exists:
 * - PlanningEngine should not depend on child_process directly.
 * - Tests can swap in an in-process fake that writes a log and a plan file.
 */

export type ProcessRunRequest = {
  command: string;
  args: string[];
  cwd: string;

  /** Receives stdout and stderr; truncated before the run starts. */
  logPath: string;
  timeoutMs: number;
};

export type ProcessRunOutcome = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  durationMs: number;
};

export interface IProcessRunner {
  /**
   * Resolves once the process has exited and the log file is closed.
   * Rejects only when the process could not be started.
   */
  run(request: ProcessRunRequest): Promise<ProcessRunOutcome>;
}
