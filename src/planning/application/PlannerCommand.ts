// src/planning/application/PlannerCommand.ts

/**
 * Builds the argv for the external planner.
 *
 * Direct mode:  <interpreter> <launcher> <domain> <problem> --search <algorithm>
 * WSL mode:     wsl <launcher...> <domain> <problem> --search '<algorithm>'
 *               with Windows paths rewritten to their /mnt/<drive> form.
 */

import type { PlanningConfig } from '../../shared/config/PlanningConfig';

export const REMOTE_SHELL_MARKER = 'wsl ';
export const REMOTE_MOUNT_ROOT = '/mnt';

export type PlannerCommand = {
  command: string;
  args: string[];
};

export function isRemoteShellLauncher(launcher: string): boolean {
  return launcher.startsWith(REMOTE_SHELL_MARKER);
}

/**
 * `D:\work\domain.pddl` -> `/mnt/d/work/domain.pddl`.
 */
export function toRemotePath(filePath: string): string {
  const forward = filePath.replace(/\\/g, '/');
  return forward.replace(/^([A-Za-z]):/, (_match, drive: string) => {
    return `${REMOTE_MOUNT_ROOT}/${drive.toLowerCase()}`;
  });
}

export function buildPlannerCommand(
  config: Pick<PlanningConfig, 'plannerCommand' | 'interpreter' | 'searchAlgorithm'>,
  domainPath: string,
  problemPath: string,
): PlannerCommand {
  if (isRemoteShellLauncher(config.plannerCommand)) {
    const [command, ...launcherArgs] = config.plannerCommand.trim().split(/\s+/);
    return {
      command,
      args: [
        ...launcherArgs,
        toRemotePath(domainPath),
        toRemotePath(problemPath),
        '--search',
        `'${config.searchAlgorithm}'`,
      ],
    };
  }

  return {
    command: config.interpreter,
    args: [config.plannerCommand, domainPath, problemPath, '--search', config.searchAlgorithm],
  };
}

export function formatCommand(cmd: PlannerCommand): string {
  return [cmd.command, ...cmd.args].join(' ');
}
