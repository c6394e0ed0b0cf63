/**
 * Planner invocation settings.
 *
 * A fresh, frozen snapshot is loaded for every invocation so a running
 * plan never observes a configuration change half way through.
 */

export type FailureLocale = 'en' | 'zh-CN';

export interface PlanningConfig {
  /** Launcher for the planner; a value starting with "wsl " runs it through WSL. */
  readonly plannerCommand: string;
  /** Interpreter that runs the launcher script in direct mode. */
  readonly interpreter: string;
  readonly searchAlgorithm: string;
  readonly timeoutSeconds: number;
  readonly maxRetries: number;
  readonly retryDelaySeconds: number;
  readonly backoffFactor: number;
  /** Number of trailing log characters attached to a planning failure. */
  readonly errorLogExcerptLength: number;
  readonly fileEncoding: BufferEncoding;
  /** Name of the file the planner writes into its working directory on success. */
  readonly defaultPlanFileName: string;
  /** Working directory the planner runs in (where the default plan file appears). */
  readonly workingDirectory: string;
  readonly failureLocale: FailureLocale;
}

export interface OutputFileNames {
  readonly planPrefix: string;
  readonly planExtension: string;
  readonly logPrefix: string;
  readonly logExtension: string;
}

export const DEFAULT_OUTPUT_FILE_NAMES: OutputFileNames = Object.freeze({
  planPrefix: 'plan',
  planExtension: '.txt',
  logPrefix: 'log',
  logExtension: '.txt',
});

export const PLANNING_DEFAULTS = Object.freeze({
  plannerCommand: 'fast-downward.py',
  interpreter: 'python3',
  searchAlgorithm: 'astar(blind())',
  timeoutSeconds: 300,
  maxRetries: 2,
  retryDelaySeconds: 1.0,
  backoffFactor: 2.0,
  errorLogExcerptLength: 500,
  fileEncoding: 'utf8',
  defaultPlanFileName: 'sas_plan',
} as const);

/** Largest timeout a Node timer can hold (2^31 - 1 ms), in whole seconds. */
export const MAX_TIMEOUT_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

function readString(raw: string | undefined, fallback: string): string {
  return raw && raw.trim().length > 0 ? raw.trim() : fallback;
}

function readNumber(
  raw: string | undefined,
  fallback: number,
  accept: (value: number) => boolean,
): number {
  if (raw === undefined || raw.trim().length === 0) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && accept(value) ? value : fallback;
}

function readEncoding(raw: string | undefined): BufferEncoding {
  const value = readString(raw, PLANNING_DEFAULTS.fileEncoding).toLowerCase();
  const normalized = value === 'utf-8' ? 'utf8' : value;
  return Buffer.isEncoding(normalized) ? normalized : PLANNING_DEFAULTS.fileEncoding;
}

function readLocale(raw: string | undefined): FailureLocale {
  return raw === 'zh-CN' || raw === 'zh' ? 'zh-CN' : 'en';
}

/**
 * Build a planning configuration snapshot from environment variables.
 * Invalid numbers fall back to their defaults; the timeout is capped at
 * MAX_TIMEOUT_SECONDS.
 */
export function loadPlanningConfig(env: NodeJS.ProcessEnv = process.env): PlanningConfig {
  return Object.freeze({
    plannerCommand: readString(env.FAST_DOWNWARD_PATH, PLANNING_DEFAULTS.plannerCommand),
    interpreter: readString(env.PLANNER_INTERPRETER, PLANNING_DEFAULTS.interpreter),
    searchAlgorithm: readString(env.SEARCH_ALGORITHM, PLANNING_DEFAULTS.searchAlgorithm),
    timeoutSeconds: Math.min(
      readNumber(env.MAX_PLANNING_TIME, PLANNING_DEFAULTS.timeoutSeconds, (v) => v > 0),
      MAX_TIMEOUT_SECONDS,
    ),
    maxRetries: Math.floor(
      readNumber(env.MAX_RETRIES, PLANNING_DEFAULTS.maxRetries, (v) => v >= 0),
    ),
    retryDelaySeconds: readNumber(
      env.RETRY_DELAY,
      PLANNING_DEFAULTS.retryDelaySeconds,
      (v) => v >= 0,
    ),
    backoffFactor: readNumber(env.BACKOFF_FACTOR, PLANNING_DEFAULTS.backoffFactor, (v) => v >= 1),
    errorLogExcerptLength: Math.floor(
      readNumber(env.ERROR_LOG_LENGTH, PLANNING_DEFAULTS.errorLogExcerptLength, (v) => v >= 0),
    ),
    fileEncoding: readEncoding(env.FILE_ENCODING),
    defaultPlanFileName: PLANNING_DEFAULTS.defaultPlanFileName,
    workingDirectory: readString(env.PLANNER_WORKDIR, process.cwd()),
    failureLocale: readLocale(env.FAILURE_LOCALE),
  });
}
