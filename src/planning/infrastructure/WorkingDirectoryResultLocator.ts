// src/planning/infrastructure/WorkingDirectoryResultLocator.ts

import { promises as fs } from 'fs';
import path from 'path';

import type { IPlanResultLocator } from '../domain/PlanResultLocator';

/**
 * Looks for the planner's fixed-name output file in one working directory.
 */
export class WorkingDirectoryResultLocator implements IPlanResultLocator {
  public readonly workingDirectory: string;
  private readonly resultPath: string;

  public constructor(workingDirectory: string, fileName: string = 'sas_plan') {
    this.workingDirectory = path.resolve(workingDirectory);
    this.resultPath = path.join(this.workingDirectory, fileName);
  }

  public async locate(): Promise<string | null> {
    try {
      const stats = await fs.stat(this.resultPath);
      return stats.isFile() ? this.resultPath : null;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  public async clear(): Promise<void> {
    await fs.rm(this.resultPath, { force: true });
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    (error as { code?: unknown }).code === 'ENOENT'
  );
}
