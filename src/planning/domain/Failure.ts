/**
 * Failure
 *
 * The one typed error of the planning service. Instead of a subclass per
 * category, every failure carries a `kind` discriminant so boundaries can
 * catch `Failure` once and branch on the kind.
 *
 * Fields are readonly and `details` is frozen. The instance itself stays
 * extensible: pino's error serializer tags every error it logs.
 *
 * `message` is the diagnostic text and may name paths or commands; only
 * `clientMessage` is ever shown to callers.
 */

import type { FailureLocale } from '../../shared/config/PlanningConfig';

export type FailureKind =
  | 'Configuration'
  | 'Planning'
  | 'Parsing'
  | 'FileIO'
  | 'Timeout'
  | 'Network'
  | 'Validation'
  | 'Unknown';

export const FAILURE_KINDS: readonly FailureKind[] = [
  'Configuration',
  'Planning',
  'Parsing',
  'FileIO',
  'Timeout',
  'Network',
  'Validation',
  'Unknown',
];

/**
 * Structured context attached to a failure (command line, log path, excerpt, ...).
 * Logged for diagnostics, never returned to callers.
 */
export type FailureDetails = Readonly<Record<string, unknown>>;

const SUMMARIES: Record<FailureLocale, Record<FailureKind, string>> = {
  en: {
    Configuration: 'Configuration error: the system is not set up correctly',
    Planning: 'Planning failed: no valid plan could be produced',
    Parsing: 'Parsing error: the input is not in the expected format',
    FileIO: 'File error: a file could not be read or written',
    Timeout: 'Timeout: the operation took too long',
    Network: 'Network error: the connection failed',
    Validation: 'Validation error: the input data is invalid',
    Unknown: 'Unexpected error: please contact support',
  },
  'zh-CN': {
    Configuration: '配置错误：系统配置不正确',
    Planning: '规划失败：无法生成有效计划',
    Parsing: '解析错误：输入格式不正确',
    FileIO: '文件操作错误：无法读取或写入文件',
    Timeout: '超时错误：操作耗时过长',
    Network: '网络错误：连接失败',
    Validation: '验证错误：输入数据无效',
    Unknown: '未知错误：请联系技术支持',
  },
};

export type FailureInit = {
  kind: FailureKind;
  message: string;
  /** Curated text appended to the summary in `userMessage`; omit for raw messages. */
  clientMessage?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
  timestamp?: number;
};

export class Failure extends Error {
  public readonly kind: FailureKind;
  public readonly clientMessage: string | undefined;
  public readonly details: FailureDetails;
  public readonly cause: unknown;
  /** Creation time in epoch milliseconds. */
  public readonly timestamp: number;

  public constructor(init: FailureInit) {
    super(init.message);
    this.name = 'Failure';
    this.kind = init.kind;
    this.clientMessage = init.clientMessage;
    this.details = Object.freeze({ ...(init.details ?? {}) });
    this.cause = init.cause;
    this.timestamp = init.timestamp ?? Date.now();
  }

  /**
   * Short, localized text that is safe to show to clients.
   */
  public userMessage(locale: FailureLocale = 'en'): string {
    const summary = failureSummary(this.kind, locale);
    return this.clientMessage ? `${summary}. ${this.clientMessage}` : summary;
  }

  public toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
      cause: this.cause === undefined ? undefined : errorMessage(this.cause),
    };
  }
}

export function failureSummary(kind: FailureKind, locale: FailureLocale = 'en'): string {
  return SUMMARIES[locale][kind];
}

/**
 * Message of any thrown value. Checked structurally: errors raised by Node
 * internals may come from another realm and fail `instanceof Error`.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

export function isFailure(value: unknown): value is Failure {
  return value instanceof Failure;
}

/**
 * Failures raised with a curated message; the message is shown to callers,
 * so keep paths and commands in `details`.
 */
export function configurationFailure(
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): Failure {
  return new Failure({ kind: 'Configuration', message, clientMessage: message, details, cause });
}

export function planningFailure(
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): Failure {
  return new Failure({ kind: 'Planning', message, clientMessage: message, details, cause });
}
