// src/planning/application/OutputSlots.ts

/**
 * Indexed output slots.
 *
 * Plans and logs are written as {prefix}{N}{ext} inside an output directory.
 * The next slot is max(existing N) + 1, or 1 for an empty directory.
 *
 * NOTE: not safe against concurrent invocations on the same directory; two
 * callers can pick the same index. Callers serialize per directory.
 */

import { promises as fs } from 'fs';
import path from 'path';

import type { AppLogger } from '../../shared/logging/Logger';
import { logger as defaultLogger } from '../../shared/logging/Logger';
import type { OutputFileNames } from '../../shared/config/PlanningConfig';
import { configurationFailure } from '../domain/Failure';

export type OutputSlot = {
  index: number;
  planPath: string;
  logPath: string;
};

const DIGITS = /^\d+$/;

/**
 * Extract N from a file called {prefix}{N}{ext}; null when the name does not match.
 */
export function parseSlotIndex(fileName: string, prefix: string, ext: string): number | null {
  if (!fileName.startsWith(prefix) || !fileName.endsWith(ext)) return null;
  if (fileName.length <= prefix.length + ext.length) return null;

  const middle = fileName.slice(prefix.length, fileName.length - ext.length);
  return DIGITS.test(middle) ? Number.parseInt(middle, 10) : null;
}

export async function directoryExists(dir: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dir);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Compute the next free index in `outputDir`.
 * A missing directory is a Configuration failure; any other listing error yields 1.
 */
export async function nextIndex(
  outputDir: string,
  prefix: string,
  ext: string,
  log: AppLogger = defaultLogger,
): Promise<number> {
  if (!(await directoryExists(outputDir))) {
    throw configurationFailure('Output directory does not exist', { outputDir });
  }

  try {
    const entries = await fs.readdir(outputDir);
    const indices = entries
      .map((name) => parseSlotIndex(name, prefix, ext))
      .filter((index): index is number => index !== null);

    return Math.max(0, ...indices) + 1;
  } catch (error) {
    log.warn({ outputDir, err: error }, 'Could not list output directory, using index 1');
    return 1;
  }
}

export function slotPaths(
  outputDir: string,
  index: number,
  names: OutputFileNames,
  prefix: string = names.planPrefix,
  ext: string = names.planExtension,
): OutputSlot {
  return {
    index,
    planPath: path.join(outputDir, `${prefix}${index}${ext}`),
    logPath: path.join(outputDir, `${names.logPrefix}${index}${names.logExtension}`),
  };
}
