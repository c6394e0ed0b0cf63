// src/planning/application/ProblemRenderer.ts

/**
 * Renders a PDDL problem file from the problem template.
 *
 * The template uses `$domain`, `$robot`, `$start` and `$goal` placeholders.
 */

import { promises as fs } from 'fs';
import path from 'path';

import type { AppLogger } from '../../shared/logging/Logger';
import { logger as defaultLogger } from '../../shared/logging/Logger';
import { Failure, errorMessage } from '../domain/Failure';
import type { ProblemFields } from '../domain/PlanningTask';

export type ProblemRendererOptions = {
  templatePath: string;
  encoding?: BufferEncoding;
  logger?: AppLogger;
};

export class ProblemRenderer {
  private readonly encoding: BufferEncoding;
  private readonly log: AppLogger;

  public constructor(private readonly options: ProblemRendererOptions) {
    this.encoding = options.encoding ?? 'utf8';
    this.log = options.logger ?? defaultLogger;
  }

  public async render(fields: ProblemFields): Promise<string> {
    const template = await fs.readFile(this.options.templatePath, { encoding: this.encoding });
    return fillTemplate(template, fields);
  }

  /**
   * Render `fields` into `outputPath`, creating parent directories.
   */
  public async writeProblemFile(fields: ProblemFields, outputPath: string): Promise<string> {
    try {
      const content = await this.render(fields);
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, content, { encoding: this.encoding });

      this.log.info({ problemPath: outputPath }, 'Problem file rendered');
      return outputPath;
    } catch (error) {
      throw new Failure({
        kind: 'Parsing',
        message: 'Failed to render problem file',
        clientMessage: 'Failed to render problem file',
        details: {
          problemPath: outputPath,
          templatePath: this.options.templatePath,
          reason: errorMessage(error),
        },
        cause: error,
      });
    }
  }
}

export function fillTemplate(template: string, fields: ProblemFields): string {
  return template
    .replaceAll('$domain', fields.domain)
    .replaceAll('$robot', fields.robot)
    .replaceAll('$start', fields.start)
    .replaceAll('$goal', fields.goal);
}
