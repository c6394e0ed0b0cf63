import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import path from 'path';

import type {
  GeneratePlanRequest,
  PlanArtifacts,
} from '../../src/planning/application/PlanningEngine';
import {
  PlanningTaskService,
  problemFileName,
  type PlanGeneratorPort,
} from '../../src/planning/application/PlanningTaskService';
import { ProblemRenderer } from '../../src/planning/application/ProblemRenderer';
import { ErrorClassifier } from '../../src/planning/application/ErrorClassifier';
import { planningFailure, type Failure } from '../../src/planning/domain/Failure';
import { err, ok, type Result } from '../../src/planning/domain/Result';
import { getPaths, type AppPaths } from '../../src/shared/config/Config';

import { createCapturingLogger } from '../helpers/logCapture';
import { testPlanningConfig } from '../helpers/planningConfig';
import { makeTempDir, removeDir } from '../helpers/tempDir';

const PLAN_TEXT = '(move r1 room1 room3)\n; cost = 1 (unit cost)\n';

/**
 * Engine stand-in: records requests and writes a plan file into the output dir.
 */
class FakePlanGenerator implements PlanGeneratorPort {
  public readonly requests: GeneratePlanRequest[] = [];

  public constructor(private readonly failure?: Failure) {}

  public async generatePlan(request: GeneratePlanRequest): Promise<Result<PlanArtifacts, Failure>> {
    this.requests.push(request);
    if (this.failure) return err(this.failure);

    const planPath = path.join(request.outputDir, 'plan1.txt');
    const logPath = path.join(request.outputDir, 'log1.txt');
    writeFileSync(planPath, PLAN_TEXT);
    writeFileSync(logPath, 'Solution found!\n');
    return ok({ planPath, logPath, index: 1 });
  }
}

describe('PlanningTaskService', () => {
  let root: string;
  let paths: AppPaths;

  beforeEach(() => {
    root = makeTempDir('service');
    const output = path.join(root, 'output');
    paths = {
      root,
      templates: path.dirname(getPaths().problemTemplate),
      problemTemplate: getPaths().problemTemplate,
      domain: path.join(root, 'domain.pddl'),
      output,
      pddl: path.join(output, 'pddl'),
      plan: path.join(output, 'plan'),
    };
    writeFileSync(paths.domain, '(define (domain delivery))');
  });

  afterEach(() => {
    removeDir(root);
  });

  function makeService(generator: FakePlanGenerator) {
    const { logger } = createCapturingLogger();
    return new PlanningTaskService({
      paths,
      loadConfig: () => testPlanningConfig(),
      createEngine: () => generator,
      renderer: new ProblemRenderer({ templatePath: paths.problemTemplate, logger }),
      classifier: new ErrorClassifier(logger),
      logger,
      now: () => new Date('2026-03-01T10:00:00.000Z'),
    });
  }

  it('renders the problem for a structured task and explains the plan', async () => {
    const generator = new FakePlanGenerator();
    const service = makeService(generator);

    const result = await service.runTask({ robot: 'r1', start: 'room1', goal: 'room3', domain: 'delivery' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const problemPath = path.join(paths.pddl, 'problem_r1_room1_room3.pddl');
    expect(generator.requests).toEqual([
      { domainPath: paths.domain, problemPath, outputDir: paths.plan },
    ]);
    expect(readFileSync(problemPath, 'utf8')).toContain('(at r1 room3)');

    expect(result.value).toEqual({
      planPath: path.join(paths.plan, 'plan1.txt'),
      logPath: path.join(paths.plan, 'log1.txt'),
      planContent: PLAN_TEXT,
      explanation: 'Robot r1 moves from room1 to room3.',
      summary: { steps: 1, reachedGoal: true },
      timestamp: '2026-03-01T10:00:00.000Z',
    });
  });

  it('uses an existing problem file in file mode', async () => {
    const generator = new FakePlanGenerator();
    const problemPath = path.join(root, 'problem.pddl');
    const outputDir = path.join(root, 'custom-out');
    writeFileSync(problemPath, '(define (problem p))');

    const result = await makeService(generator).runTask({
      domain_path: paths.domain,
      problem_path: problemPath,
      output_dir: outputDir,
    });

    expect(result.ok).toBe(true);
    expect(existsSync(outputDir)).toBe(true);
    expect(generator.requests[0]).toEqual({ domainPath: paths.domain, problemPath, outputDir });
    expect(readFileSync(problemPath, 'utf8')).toBe('(define (problem p))');
  });

  it('renders a missing problem file from structured fields in file mode', async () => {
    const generator = new FakePlanGenerator();
    const problemPath = path.join(root, 'generated', 'problem.pddl');

    const result = await makeService(generator).runTask({
      domain_path: paths.domain,
      problem_path: problemPath,
      robot: 'r2',
      start: 'hall',
      goal: 'lab',
      domain: 'delivery',
    });

    expect(result.ok).toBe(true);
    expect(readFileSync(problemPath, 'utf8')).toContain('(at r2 hall)');
  });

  it('fails with Configuration when the problem is missing and cannot be generated', async () => {
    const generator = new FakePlanGenerator();

    const result = await makeService(generator).runTask({
      domain_path: paths.domain,
      problem_path: path.join(root, 'absent.pddl'),
      robot: 'r1',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('Configuration');
    expect(result.error.details.missing).toEqual(['start', 'goal', 'domain']);
    expect(generator.requests).toHaveLength(0);
  });

  it('fails with Configuration when the domain file is missing', async () => {
    const generator = new FakePlanGenerator();

    const result = await makeService(generator).runTask({
      domain_path: path.join(root, 'nope.pddl'),
      problem_path: path.join(root, 'p.pddl'),
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('Configuration');
    expect(result.error.message).toBe('Domain file does not exist');
  });

  it('returns validation failures without calling the planner', async () => {
    const generator = new FakePlanGenerator();

    const result = await makeService(generator).runTask({});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('Configuration');
    expect(generator.requests).toHaveLength(0);
  });

  it('passes engine failures through unchanged', async () => {
    const failure = planningFailure('Planner did not produce a plan file', { logPath: '/x/log1.txt' });
    const generator = new FakePlanGenerator(failure);

    const result = await makeService(generator).runTask({
      robot: 'r1',
      start: 'room1',
      goal: 'room3',
      domain: 'delivery',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe(failure);
  });

  it('classifies unexpected errors instead of throwing', async () => {
    const generator = new FakePlanGenerator();
    // a file where the output directory should be makes mkdir fail
    mkdirSync(paths.output, { recursive: true });
    writeFileSync(paths.plan, 'not a directory');

    const result = await makeService(generator).runTask({
      robot: 'r1',
      start: 'room1',
      goal: 'room3',
      domain: 'delivery',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('FileIO');
    expect(result.error.details).toEqual({ stage: 'task', mode: 'structured' });
  });

  it('explains plan content without the planner', () => {
    const service = makeService(new FakePlanGenerator());

    expect(service.explain({ plan_content: '(move r9 a b)\n(wait r9)' })).toEqual({
      ok: true,
      value: {
        explanation: 'Robot r9 moves from a to b.',
        summary: { steps: 2, reachedGoal: true },
      },
    });

    const invalid = service.explain({ plan_content: 42 });
    expect(invalid.ok).toBe(false);
  });

  it('validates the configuration and prepares output directories', async () => {
    const validation = await makeService(new FakePlanGenerator()).validateConfiguration();

    expect(validation).toEqual({
      domainFileExists: true,
      templateFileExists: true,
      outputDirectoriesReady: true,
      plannerCommand: 'fast-downward.py',
      searchAlgorithm: 'astar(blind())',
    });
    expect(existsSync(paths.plan)).toBe(true);
  });
});

describe('problemFileName', () => {
  it('builds a filesystem-safe name from the task fields', () => {
    expect(problemFileName({ domain: 'delivery', robot: 'r 1', start: 'a/b', goal: 'c' })).toBe(
      'problem_r_1_a_b_c.pddl',
    );
  });
});
