import type { CommandRunner } from '../shared/exec.js';
import { runOrThrow } from '../shared/exec.js';
import type { RemoteShell, SshTarget } from '../remote/ssh.js';
import { destination, rsyncShell, scpArgs } from '../remote/ssh.js';
import { remotePath } from '../remote/quote.js';
import { DeployError, DeployErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type TransferMethod = 'rsync' | 'scp';

export interface TransferOptions {
  repoDir: string;
  remoteProjectDir: string;
  exclude: string[];
  useRsync: boolean;
  timeoutMs?: number;
}

export async function ensureRemoteDir(shell: RemoteShell, dir: string): Promise<void> {
  const result = await shell.exec(`mkdir -p ${remotePath(dir)}`);
  if (result.exitCode !== 0) {
    throw new DeployError(DeployErrorCode.REMOTE_EXEC_FAILED, `Could not create remote directory ${dir}`, {
      stderr: result.stderr.trim(),
    });
  }
}

export function rsyncArgs(target: SshTarget, options: TransferOptions): string[] {
  return [
    '-az',
    '--delete',
    ...options.exclude.flatMap((pattern) => ['--exclude', pattern]),
    '-e',
    rsyncShell(target),
    `${options.repoDir}/`,
    `${destination(target)}:${options.remoteProjectDir}/`,
  ];
}

export function scpTransferArgs(target: SshTarget, options: TransferOptions): string[] {
  return [...scpArgs(target), '-r', `${options.repoDir}/.`, `${destination(target)}:${options.remoteProjectDir}/`];
}

/** rsync when available, with scp as the fallback if rsync is missing or fails. */
export async function transferProject(
  runner: CommandRunner,
  target: SshTarget,
  options: TransferOptions
): Promise<TransferMethod> {
  logger.info(
    { remote: `${destination(target)}:${options.remoteProjectDir}` },
    'Transferring project files to remote'
  );

  if (options.useRsync) {
    logger.info('Using rsync for deployment');
    const result = await runner.run('rsync', rsyncArgs(target, options), { timeoutMs: options.timeoutMs });
    if (result.exitCode === 0) return 'rsync';
    logger.warn({ exitCode: result.exitCode, stderr: result.stderr.trim() }, 'rsync failed, switching to scp');
  } else {
    logger.info('rsync not available, using scp');
  }

  await runOrThrow(
    runner,
    'scp',
    scpTransferArgs(target, options),
    { timeoutMs: options.timeoutMs },
    DeployErrorCode.TRANSFER_FAILED,
    'File transfer failed (scp fallback)'
  );
  return 'scp';
}
