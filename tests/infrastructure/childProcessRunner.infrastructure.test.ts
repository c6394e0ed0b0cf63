/**
 * Infrastructure tests for ChildProcessRunner.
 *
 * Runs small Node.js stub planners (tests/fixtures/planners) with the current
 * node binary; no real planner is needed.
 */

import { readFileSync, writeFileSync } from 'fs';
import path from 'path';

import { ChildProcessRunner } from '../../src/planning/infrastructure/ChildProcessRunner';

import { makeTempDir, removeDir } from '../helpers/tempDir';

const PLANNERS = path.join(__dirname, '..', 'fixtures', 'planners');

describe('ChildProcessRunner', () => {
  let dir: string;
  const runner = new ChildProcessRunner();

  beforeEach(() => {
    dir = makeTempDir('runner');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('captures stdout and stderr into a truncated log file', async () => {
    const logPath = path.join(dir, 'log1.txt');
    writeFileSync(logPath, 'stale output from an earlier run\n'.repeat(10));

    const outcome = await runner.run({
      command: process.execPath,
      args: [path.join(PLANNERS, 'no-plan.js')],
      cwd: dir,
      logPath,
      timeoutMs: 10_000,
    });

    expect(outcome.timedOut).toBe(false);
    expect(outcome.exitCode).toBe(12);
    expect(readFileSync(logPath, 'utf8')).toBe(
      'Parsing...\nSearch stopped without finding a solution.\n',
    );
  });

  it('runs in the requested working directory', async () => {
    const logPath = path.join(dir, 'log1.txt');

    const outcome = await runner.run({
      command: process.execPath,
      args: [path.join(PLANNERS, 'writes-plan.js'), 'd.pddl', 'p.pddl', '--search', 'astar(blind())'],
      cwd: dir,
      logPath,
      timeoutMs: 10_000,
    });

    expect(outcome.exitCode).toBe(0);
    expect(readFileSync(path.join(dir, 'sas_plan'), 'utf8')).toContain('(move r1 room1 room2)');
    expect(readFileSync(logPath, 'utf8')).toBe(
      'domain=d.pddl\nproblem=p.pddl\n--search=astar(blind())\nSolution found!\n',
    );
  });

  it('kills the process when the timeout elapses', async () => {
    const startedAt = Date.now();

    const outcome = await runner.run({
      command: process.execPath,
      args: [path.join(PLANNERS, 'slow.js')],
      cwd: dir,
      logPath: path.join(dir, 'log1.txt'),
      timeoutMs: 300,
    });

    expect(outcome.timedOut).toBe(true);
    expect(outcome.signal).toBe('SIGKILL');
    expect(Date.now() - startedAt).toBeLessThan(4_000);
  });

  it('does not kill the process when the timeout exceeds the timer range', async () => {
    const outcome = await runner.run({
      command: process.execPath,
      args: [path.join(PLANNERS, 'writes-plan.js'), 'd.pddl', 'p.pddl'],
      cwd: dir,
      logPath: path.join(dir, 'log1.txt'),
      timeoutMs: 3_000_000 * 1000,
    });

    expect(outcome.timedOut).toBe(false);
    expect(outcome.exitCode).toBe(0);
  });

  it('rejects when the command cannot be started', async () => {
    const error: unknown = await runner
      .run({
        command: path.join(dir, 'no-such-planner'),
        args: [],
        cwd: dir,
        logPath: path.join(dir, 'log1.txt'),
        timeoutMs: 1_000,
      })
      .catch((e: unknown) => e);

    expect(error).toEqual(expect.objectContaining({ code: 'ENOENT', syscall: expect.stringMatching(/^spawn/) }));
  });
});
