// src/planning/application/PlanningEngine.ts

import { promises as fs } from 'fs';

import type { AppLogger } from '../../shared/logging/Logger';
import { logger as defaultLogger } from '../../shared/logging/Logger';
import {
  DEFAULT_OUTPUT_FILE_NAMES,
  type OutputFileNames,
  type PlanningConfig,
} from '../../shared/config/PlanningConfig';
import { Failure, configurationFailure, errorMessage, planningFailure } from '../domain/Failure';
import type { IPlanResultLocator } from '../domain/PlanResultLocator';
import type { IProcessRunner } from '../domain/ProcessRunner';
import { err, ok, type Result } from '../domain/Result';

import { directoryExists, nextIndex, slotPaths } from './OutputSlots';
import { buildPlannerCommand, formatCommand } from './PlannerCommand';
import { type Sleep, withRetry } from './RetryController';

export type GeneratePlanRequest = {
  domainPath: string;
  problemPath: string;
  outputDir: string;
  filePrefix?: string;
  fileExt?: string;
};

export type PlanArtifacts = {
  planPath: string;
  logPath: string;
  index: number;
};

/**
 * Dependencies required for invoking the planner.
 * Injected for testability; `config` is a snapshot taken per invocation.
 */
export type PlanningEngineDeps = {
  config: PlanningConfig;
  runner: IProcessRunner;
  resultLocator: IPlanResultLocator;
  fileNames?: OutputFileNames;
  logger?: AppLogger;
  sleep?: Sleep;
};

/**
 * PlanningEngine turns a domain/problem pair into a plan file by running the
 * external planner, with bounded retries and typed failures.
 *
 * Invocations sharing an output directory or a working directory must be
 * serialized by the caller.
 */
export class PlanningEngine {
  private readonly fileNames: OutputFileNames;
  private readonly log: AppLogger;

  public constructor(private readonly deps: PlanningEngineDeps) {
    this.fileNames = deps.fileNames ?? DEFAULT_OUTPUT_FILE_NAMES;
    this.log = deps.logger ?? defaultLogger;
  }

  public async generatePlan(request: GeneratePlanRequest): Promise<Result<PlanArtifacts, Failure>> {
    const { config } = this.deps;

    // A structurally absent directory is not worth retrying.
    if (!(await directoryExists(request.outputDir))) {
      return err(configurationFailure('Output directory does not exist', { outputDir: request.outputDir }));
    }

    try {
      const artifacts = await withRetry(() => this.attempt(request), {
        maxRetries: config.maxRetries,
        initialDelaySeconds: config.retryDelaySeconds,
        backoffFactor: config.backoffFactor,
        label: 'generatePlan',
        sleep: this.deps.sleep,
        logger: this.log,
      });
      return ok(artifacts);
    } catch (error) {
      return err(toPlanningFailure(error));
    }
  }

  private async attempt(request: GeneratePlanRequest): Promise<PlanArtifacts> {
    const { config, runner, resultLocator } = this.deps;
    const prefix = request.filePrefix ?? this.fileNames.planPrefix;
    const ext = request.fileExt ?? this.fileNames.planExtension;

    try {
      // 1) Next free slot + derived paths.
      const index = await nextIndex(request.outputDir, prefix, ext, this.log);
      const slot = slotPaths(request.outputDir, index, this.fileNames, prefix, ext);

      // 2) Planner argv.
      const cmd = buildPlannerCommand(config, request.domainPath, request.problemPath);
      const commandLine = formatCommand(cmd);

      this.log.info({ command: commandLine, index, logPath: slot.logPath }, 'Running planner');

      // 3) Run under the timeout, output captured into the log file.
      await resultLocator.clear();
      const outcome = await runner.run({
        command: cmd.command,
        args: cmd.args,
        cwd: resultLocator.workingDirectory,
        logPath: slot.logPath,
        timeoutMs: config.timeoutSeconds * 1000,
      });

      if (outcome.timedOut) {
        throw new Failure({
          kind: 'Timeout',
          message: `Planner timed out after ${config.timeoutSeconds} seconds`,
          clientMessage: `Planner timed out after ${config.timeoutSeconds} seconds`,
          details: {
            stage: 'planning',
            command: commandLine,
            logPath: slot.logPath,
            timeoutSeconds: config.timeoutSeconds,
          },
        });
      }

      // 4) Success is signalled by the planner's default output file.
      const producedPlan = await resultLocator.locate();
      if (producedPlan !== null) {
        await movePlanFile(producedPlan, slot.planPath);
        this.log.info(
          { planPath: slot.planPath, durationMs: outcome.durationMs },
          'Plan generated',
        );
        return { planPath: slot.planPath, logPath: slot.logPath, index };
      }

      const errorExcerpt = await readLogExcerpt(
        slot.logPath,
        config.errorLogExcerptLength,
        config.fileEncoding,
      );

      throw planningFailure('Planner did not produce a plan file', {
        command: commandLine,
        logPath: slot.logPath,
        errorExcerpt,
        exitCode: outcome.exitCode,
      });
    } catch (error) {
      throw toPlanningFailure(error);
    }
  }
}

/**
 * Typed failures pass through; anything else becomes a Planning failure.
 */
export function toPlanningFailure(error: unknown): Failure {
  if (error instanceof Failure) return error;

  const reason = errorMessage(error);
  return new Failure({
    kind: 'Planning',
    message: `Planning process failed: ${reason}`,
    clientMessage: 'Planning process failed',
    details: { reason },
    cause: error,
  });
}

/**
 * Move the planner's result file into its slot. The working directory and the
 * output directory may sit on different filesystems, where rename fails with EXDEV.
 */
export async function movePlanFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (errnoCodeOf(error) !== 'EXDEV') throw error;
    await fs.copyFile(from, to);
    await fs.rm(from, { force: true });
  }
}

function errnoCodeOf(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

/**
 * Last `length` characters of the log (characters, not lines); empty when unreadable.
 */
export async function readLogExcerpt(
  logPath: string,
  length: number,
  encoding: BufferEncoding = 'utf8',
): Promise<string> {
  if (length <= 0) return '';

  try {
    const content = await fs.readFile(logPath, { encoding });
    const chars = Array.from(content);
    return chars.length <= length ? content : chars.slice(-length).join('');
  } catch {
    return '';
  }
}
