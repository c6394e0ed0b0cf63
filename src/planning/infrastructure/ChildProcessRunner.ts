// src/planning/infrastructure/ChildProcessRunner.ts

/**
 * ChildProcessRunner
 *
 * Runs the planner with stdout and stderr both redirected into a freshly
 * truncated log file. The process is killed with SIGKILL once the timeout
 * elapses. The log file handle is always closed before the run settles.
 */

import { spawn } from 'child_process';
import { promises as fs } from 'fs';

import type { AppLogger } from '../../shared/logging/Logger';
import { logger as defaultLogger } from '../../shared/logging/Logger';
import type {
  IProcessRunner,
  ProcessRunOutcome,
  ProcessRunRequest,
} from '../domain/ProcessRunner';

// setTimeout fires after 1 ms for anything larger.
const MAX_TIMER_MS = 2 ** 31 - 1;

export class ChildProcessRunner implements IProcessRunner {
  public constructor(private readonly log: AppLogger = defaultLogger) {}

  public async run(request: ProcessRunRequest): Promise<ProcessRunOutcome> {
    const logFile = await fs.open(request.logPath, 'w');

    try {
      return await this.spawnAndWait(request, logFile.fd);
    } finally {
      await logFile.close();
    }
  }

  private spawnAndWait(request: ProcessRunRequest, logFd: number): Promise<ProcessRunOutcome> {
    const startedAt = Date.now();
    const timeoutMs = Math.min(request.timeoutMs, MAX_TIMER_MS);

    return new Promise<ProcessRunOutcome>((resolve, reject) => {
      let settled = false;
      let timedOut = false;

      const child = spawn(request.command, request.args, {
        cwd: request.cwd,
        env: process.env,
        stdio: ['ignore', logFd, logFd],
      });

      const timer = setTimeout(() => {
        timedOut = true;
        this.log.warn(
          { pid: child.pid, timeoutMs, command: request.command },
          'Planner exceeded its time limit, killing process',
        );
        child.kill('SIGKILL');
      }, timeoutMs);

      child.once('error', (error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(error);
      });

      child.once('close', (exitCode, signal) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({
          exitCode,
          signal,
          timedOut,
          durationMs: Date.now() - startedAt,
        });
      });
    });
  }
}
