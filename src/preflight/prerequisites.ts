import type { CommandRunner } from '../shared/exec.js';
import { DeployError, DeployErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const REQUIRED_COMMANDS = ['ssh', 'scp', 'git'] as const;
// rsync falls back to scp; curl and docker-compose are only used on the remote host.
export const OPTIONAL_COMMANDS = ['rsync', 'curl', 'docker-compose'] as const;

export interface PrerequisiteReport {
  available: Set<string>;
  missingOptional: string[];
}

export async function commandExists(runner: CommandRunner, cmd: string): Promise<boolean> {
  const result = await runner.run('sh', ['-c', 'command -v "$1" >/dev/null 2>&1', 'sh', cmd]);
  return result.exitCode === 0;
}

export async function checkPrerequisites(
  runner: CommandRunner,
  required: readonly string[] = REQUIRED_COMMANDS,
  optional: readonly string[] = OPTIONAL_COMMANDS
): Promise<PrerequisiteReport> {
  const available = new Set<string>();
  for (const cmd of required) {
    if (!(await commandExists(runner, cmd))) {
      throw new DeployError(DeployErrorCode.MISSING_PREREQUISITE, `Required command not found: ${cmd}`);
    }
    available.add(cmd);
  }

  const missingOptional: string[] = [];
  for (const cmd of optional) {
    if (await commandExists(runner, cmd)) {
      available.add(cmd);
    } else {
      missingOptional.push(cmd);
      logger.debug({ cmd }, 'Optional local command not found');
    }
  }
  return { available, missingOptional };
}
