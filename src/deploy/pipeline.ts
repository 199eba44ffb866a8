import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { DeployConfig } from '../types/config.js';
import type { DeployInputs } from '../input/types.js';
import type { CommandRunner } from '../shared/exec.js';
import { RemoteShell, type SshTarget } from '../remote/ssh.js';
import { prepareRemote } from '../remote/prepare.js';
import { detectBuildMode, fetchRepository, redactUrl, type BuildMode } from '../repo/git.js';
import { ensureRemoteDir, transferProject, type TransferMethod } from '../transfer/sync.js';
import { runRemoteDeploy } from './remote-deploy.js';
import { runCleanup } from './cleanup.js';
import { checkHealth } from './health.js';
import { describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface PipelineDeps {
  runner: CommandRunner;
  config: DeployConfig;
  /** Whether a local rsync binary was found during the prerequisite check. */
  rsyncAvailable: boolean;
}

export interface DeploymentResult {
  action: 'deploy' | 'cleanup';
  projectName: string;
  remoteProjectDir: string;
  buildMode?: BuildMode;
  transferMethod?: TransferMethod;
  httpStatus?: number | null;
  durationMs: number;
}

export function sshTargetFor(inputs: DeployInputs, config: DeployConfig): SshTarget {
  return {
    user: inputs.sshUser,
    host: inputs.sshHost,
    keyPath: inputs.sshKeyPath,
    port: config.ssh.port,
    connectTimeoutSeconds: config.ssh.connect_timeout_seconds,
    strictHostKeyChecking: config.ssh.strict_host_key_checking,
  };
}

// A cache dir holds one checkout per project under <cache_dir>/<project>.
async function createWorkspace(config: DeployConfig, projectName: string): Promise<{ dir: string; temporary: boolean }> {
  if (config.workspace.cache_dir) {
    const dir = path.resolve(config.workspace.cache_dir, projectName);
    await fs.mkdir(dir, { recursive: true });
    return { dir, temporary: false };
  }
  return { dir: await fs.mkdtemp(path.join(os.tmpdir(), 'hostdeploy-')), temporary: true };
}

export async function runDeployment(
  inputs: DeployInputs,
  options: { cleanup: boolean },
  deps: PipelineDeps
): Promise<DeploymentResult> {
  const started = Date.now();
  const { runner, config } = deps;
  const commandTimeoutMs = config.remote.command_timeout_seconds * 1000;
  const target = sshTargetFor(inputs, config);
  const shell = new RemoteShell(runner, target, commandTimeoutMs);

  logger.info(
    {
      repo: redactUrl(inputs.gitUrl),
      branch: inputs.branch,
      remote: `${inputs.sshUser}@${inputs.sshHost}`,
      appPort: inputs.appPort,
      remoteBase: inputs.remoteBase,
    },
    'Inputs collected'
  );

  await shell.testConnection();

  if (options.cleanup) {
    await runCleanup(shell, {
      projectName: inputs.projectName,
      remoteProjectDir: inputs.remoteProjectDir,
      siteName: config.nginx.site_name,
    });
    return {
      action: 'cleanup',
      projectName: inputs.projectName,
      remoteProjectDir: inputs.remoteProjectDir,
      durationMs: Date.now() - started,
    };
  }

  if (config.remote.skip_prepare) {
    logger.info('Skipping remote preparation (remote.skip_prepare)');
  } else {
    await prepareRemote(shell);
  }

  const workspace = await createWorkspace(config, inputs.projectName);
  try {
    logger.info({ workspace: workspace.dir }, 'Cloning/pulling repo locally');
    const repoDir = await fetchRepository(runner, {
      gitUrl: inputs.gitUrl,
      token: inputs.token,
      tokenUser: config.git.token_user,
      branch: inputs.branch,
      workspaceDir: workspace.dir,
      timeoutMs: commandTimeoutMs,
    });
    const manifest = await detectBuildMode(repoDir);
    logger.info({ mode: manifest.mode, file: manifest.file }, 'Build manifest detected');

    await ensureRemoteDir(shell, inputs.remoteProjectDir);
    const transferMethod = await transferProject(runner, target, {
      repoDir,
      remoteProjectDir: inputs.remoteProjectDir,
      exclude: config.transfer.exclude,
      useRsync: config.transfer.prefer_rsync && deps.rsyncAvailable,
      timeoutMs: commandTimeoutMs,
    });

    await runRemoteDeploy(shell, {
      projectName: inputs.projectName,
      remoteProjectDir: inputs.remoteProjectDir,
      manifest,
      appPort: inputs.appPort,
      hostPort: config.deploy.host_port ?? inputs.appPort,
      settleSeconds: config.deploy.settle_seconds,
      nginx: {
        siteName: config.nginx.site_name,
        serverName: config.nginx.server_name,
        listenPort: config.nginx.listen_port,
        removeDefaultSite: config.nginx.remove_default_site,
      },
    });

    const health = await checkHealth(shell, {
      listenPort: config.nginx.listen_port,
      attempts: config.health.attempts,
      intervalSeconds: config.health.interval_seconds,
      strict: config.health.strict,
    });

    return {
      action: 'deploy',
      projectName: inputs.projectName,
      remoteProjectDir: inputs.remoteProjectDir,
      buildMode: manifest.mode,
      transferMethod,
      httpStatus: health.httpStatus,
      durationMs: Date.now() - started,
    };
  } finally {
    if (workspace.temporary) {
      await fs.rm(workspace.dir, { recursive: true, force: true }).catch((err: unknown) => {
        logger.warn({ workspace: workspace.dir, error: describeError(err) }, 'Could not remove local workspace');
      });
    }
  }
}
