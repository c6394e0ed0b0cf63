// src/bootstrap/buildDeps.ts

/**
 * Composition Root
 * ----------------
 * The only place that wires infrastructure + application services.
 *
 * - app.ts depends on the PlanningServicePort, not on child_process or fs.
 * - A new PlanningEngine is built per task from that task's configuration snapshot.
 */

import { getPaths } from '../shared/config/Config';
import { loadPlanningConfig, type FailureLocale } from '../shared/config/PlanningConfig';
import { logger } from '../shared/logging/Logger';

import { ErrorClassifier } from '../planning/application/ErrorClassifier';
import { PlanningEngine } from '../planning/application/PlanningEngine';
import { PlanningTaskService } from '../planning/application/PlanningTaskService';
import { ProblemRenderer } from '../planning/application/ProblemRenderer';
import { ChildProcessRunner } from '../planning/infrastructure/ChildProcessRunner';
import { WorkingDirectoryResultLocator } from '../planning/infrastructure/WorkingDirectoryResultLocator';

export type RuntimeDeps = {
  planningService: PlanningTaskService;
  failureLocale: FailureLocale;
};

export function buildRuntimeDeps(env: NodeJS.ProcessEnv = process.env): RuntimeDeps {
  const paths = getPaths(env);
  const startupConfig = loadPlanningConfig(env);

  const runner = new ChildProcessRunner(logger);
  const classifier = new ErrorClassifier(logger);
  const renderer = new ProblemRenderer({
    templatePath: paths.problemTemplate,
    encoding: startupConfig.fileEncoding,
    logger,
  });

  const planningService = new PlanningTaskService({
    paths,
    loadConfig: () => loadPlanningConfig(env),
    createEngine: (planningConfig) =>
      new PlanningEngine({
        config: planningConfig,
        runner,
        resultLocator: new WorkingDirectoryResultLocator(
          planningConfig.workingDirectory,
          planningConfig.defaultPlanFileName,
        ),
        logger,
      }),
    renderer,
    classifier,
    logger,
  });

  return { planningService, failureLocale: startupConfig.failureLocale };
}
