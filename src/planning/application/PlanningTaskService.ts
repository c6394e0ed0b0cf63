// src/planning/application/PlanningTaskService.ts

import { promises as fs } from 'fs';
import path from 'path';

import type { AppPaths } from '../../shared/config/Config';
import type { PlanningConfig } from '../../shared/config/PlanningConfig';
import type { AppLogger } from '../../shared/logging/Logger';
import { logger as defaultLogger } from '../../shared/logging/Logger';
import { configurationFailure, type Failure } from '../domain/Failure';
import type { PlanningTask, ProblemFields } from '../domain/PlanningTask';
import { err, ok, type Result } from '../domain/Result';
import { missingProblemFields, parsePlanningTaskDto } from '../dto/PlanningTaskDto';

import { ErrorClassifier } from './ErrorClassifier';
import type { GeneratePlanRequest, PlanArtifacts } from './PlanningEngine';
import type { ProblemRenderer } from './ProblemRenderer';
import { type PlanSummary, summarizePlan, translatePlan } from './TraceTranslator';

export type PlanningSuccess = {
  planPath: string;
  logPath: string;
  planContent: string;
  explanation: string;
  summary: PlanSummary;
  timestamp: string;
};

export type PlanExplanation = {
  explanation: string;
  summary: PlanSummary;
};

export type ConfigValidation = {
  domainFileExists: boolean;
  templateFileExists: boolean;
  outputDirectoriesReady: boolean;
  plannerCommand: string;
  searchAlgorithm: string;
};

export interface PlanGeneratorPort {
  generatePlan(request: GeneratePlanRequest): Promise<Result<PlanArtifacts, Failure>>;
}

/**
 * Dependencies for the task service. `loadConfig` is called once per task so
 * every run works from its own configuration snapshot.
 */
export type PlanningTaskServiceDeps = {
  paths: AppPaths;
  loadConfig: () => PlanningConfig;
  createEngine: (config: PlanningConfig) => PlanGeneratorPort;
  renderer: ProblemRenderer;
  classifier?: ErrorClassifier;
  logger?: AppLogger;
  now?: () => Date;
};

/**
 * PlanningTaskService is the exported entry point for planning requests:
 * validate -> prepare problem -> run planner -> explain.
 *
 * It never throws; every failure comes back as `err(Failure)`.
 */
export class PlanningTaskService {
  private readonly classifier: ErrorClassifier;
  private readonly log: AppLogger;
  private readonly now: () => Date;

  public constructor(private readonly deps: PlanningTaskServiceDeps) {
    this.log = deps.logger ?? defaultLogger;
    this.classifier = deps.classifier ?? new ErrorClassifier(this.log);
    this.now = deps.now ?? (() => new Date());
  }

  public async runTask(payload: unknown): Promise<Result<PlanningSuccess, Failure>> {
    const parsed = parsePlanningTaskDto(payload);
    if (!parsed.ok) {
      return err(this.classifier.classify(parsed.error, { stage: 'validation' }));
    }

    const task = parsed.value;

    try {
      return await this.execute(task, payload);
    } catch (error) {
      return err(this.classifier.classify(error, { stage: 'task', mode: task.mode }));
    }
  }

  /**
   * Explain an already generated plan without running the planner.
   */
  public explain(payload: unknown): Result<PlanExplanation, Failure> {
    const planContent = readPlanContent(payload);
    if (planContent === undefined) {
      return err(
        configurationFailure('Invalid explain request: "plan_content" must be a string.', {
          issues: ['"plan_content" must be a string.'],
        }),
      );
    }

    return ok({ explanation: translatePlan(planContent), summary: summarizePlan(planContent) });
  }

  public async validateConfiguration(): Promise<ConfigValidation> {
    const config = this.deps.loadConfig();
    const { paths } = this.deps;

    let outputDirectoriesReady = true;
    try {
      for (const dir of [paths.output, paths.pddl, paths.plan]) {
        await fs.mkdir(dir, { recursive: true });
      }
    } catch (error) {
      outputDirectoriesReady = false;
      this.log.warn({ err: error }, 'Could not create output directories');
    }

    return {
      domainFileExists: await fileExists(paths.domain),
      templateFileExists: await fileExists(paths.problemTemplate),
      outputDirectoriesReady,
      plannerCommand: config.plannerCommand,
      searchAlgorithm: config.searchAlgorithm,
    };
  }

  private async execute(
    task: PlanningTask,
    payload: unknown,
  ): Promise<Result<PlanningSuccess, Failure>> {
    const config = this.deps.loadConfig();
    const outputDir = path.resolve(task.outputDir ?? this.deps.paths.plan);

    // 1) Domain + problem files.
    const domainPath = path.resolve(task.mode === 'file' ? task.domainPath : this.deps.paths.domain);
    if (!(await fileExists(domainPath))) {
      return err(configurationFailure('Domain file does not exist', { domainPath }));
    }

    const prepared = await this.prepareProblem(task, payload);
    if (!prepared.ok) return prepared;
    const problemPath = prepared.value;

    // 2) Planner.
    await fs.mkdir(outputDir, { recursive: true });
    this.log.info({ domainPath, problemPath, outputDir }, 'Starting planning task');

    const engine = this.deps.createEngine(config);
    const generated = await engine.generatePlan({ domainPath, problemPath, outputDir });
    if (!generated.ok) {
      return err(this.classifier.classify(generated.error, { stage: 'planning', domainPath, problemPath }));
    }

    // 3) Explanation.
    const { planPath, logPath } = generated.value;
    const planContent = await fs.readFile(planPath, { encoding: config.fileEncoding });

    this.log.info({ planPath }, 'Planning task succeeded');

    return ok({
      planPath,
      logPath,
      planContent,
      explanation: translatePlan(planContent),
      summary: summarizePlan(planContent),
      timestamp: this.now().toISOString(),
    });
  }

  private async prepareProblem(
    task: PlanningTask,
    payload: unknown,
  ): Promise<Result<string, Failure>> {
    if (task.mode === 'structured') {
      const problemPath = path.join(this.deps.paths.pddl, problemFileName(task.problem));
      await this.deps.renderer.writeProblemFile(task.problem, problemPath);
      return ok(problemPath);
    }

    const problemPath = path.resolve(task.problemPath);
    if (await fileExists(problemPath)) return ok(problemPath);

    if (!task.problem) {
      const missing = missingProblemFields(payload);
      return err(
        configurationFailure(
          `Problem file does not exist and cannot be generated; missing: ${missing.join(', ')}`,
          { problemPath, missing },
        ),
      );
    }

    this.log.info({ problemPath }, 'Problem file missing, rendering it from task fields');
    await this.deps.renderer.writeProblemFile(task.problem, problemPath);
    return ok(problemPath);
  }
}

export function problemFileName(fields: ProblemFields): string {
  const slug = [fields.robot, fields.start, fields.goal]
    .map((part) => part.replace(/[^A-Za-z0-9_-]/g, '_'))
    .join('_');
  return `problem_${slug}.pddl`;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

function readPlanContent(payload: unknown): string | undefined {
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) return undefined;
  const value = (payload as { plan_content?: unknown }).plan_content;
  return typeof value === 'string' ? value : undefined;
}
