import fs from 'fs/promises';
import path from 'path';
import type { CommandRunner } from '../shared/exec.js';
import { runOrThrow } from '../shared/exec.js';
import { DeployError, DeployErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type BuildMode = 'compose' | 'dockerfile';

export interface BuildManifest {
  mode: BuildMode;
  file: string;
}

export const COMPOSE_FILES = ['docker-compose.yml', 'docker-compose.yaml', 'compose.yml', 'compose.yaml'] as const;
export const DOCKERFILE = 'Dockerfile';

// "https://host/user/repo.git" and "git@host:user/repo.git" both yield "repo".
export function projectNameFromUrl(gitUrl: string): string {
  let pathPart: string;
  try {
    pathPart = new URL(gitUrl).pathname;
  } catch {
    pathPart = gitUrl.slice(gitUrl.indexOf(':') + 1);
  }
  const segments = pathPart.split('/').filter((s) => s !== '');
  const last = segments[segments.length - 1] ?? '';
  return last.replace(/\.git$/, '');
}

/** Strip any user:password@ section so a URL is safe to log. */
export function redactUrl(gitUrl: string): string {
  try {
    const url = new URL(gitUrl);
    if (!url.username && !url.password) return gitUrl;
    url.username = '';
    url.password = '';
    return url.toString();
  } catch {
    return gitUrl;
  }
}

/**
 * Environment for git invocations. The PAT travels as an http.extraHeader scoped to the
 * repository origin, passed through GIT_CONFIG_* so it never lands in the URL, argv,
 * or .git/config.
 */
export function gitAuthEnv(gitUrl: string, token: string, tokenUser: string): Record<string, string> {
  const env: Record<string, string> = { GIT_TERMINAL_PROMPT: '0' };
  if (!token) return env;

  let url: URL;
  try {
    url = new URL(gitUrl);
  } catch {
    return env;
  }
  if (url.protocol !== 'https:') {
    logger.warn({ protocol: url.protocol }, 'Token ignored for non-https repository URL');
    return env;
  }

  const credentials = Buffer.from(`${tokenUser}:${token}`).toString('base64');
  env['GIT_CONFIG_COUNT'] = '1';
  env['GIT_CONFIG_KEY_0'] = `http.${url.origin}/.extraHeader`;
  env['GIT_CONFIG_VALUE_0'] = `Authorization: Basic ${credentials}`;
  return env;
}

async function fileExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export interface FetchRepositoryOptions {
  gitUrl: string;
  token: string;
  tokenUser: string;
  branch: string;
  workspaceDir: string;
  timeoutMs?: number;
}

// Clones into <workspace>/repo, or brings an existing checkout of the same origin there up to date
// with the branch tip.
export async function fetchRepository(runner: CommandRunner, options: FetchRepositoryOptions): Promise<string> {
  const { gitUrl, token, tokenUser, branch, workspaceDir, timeoutMs } = options;
  const repoDir = path.join(workspaceDir, 'repo');
  const env = gitAuthEnv(gitUrl, token, tokenUser);
  const code = DeployErrorCode.GIT_CLONE_FAILED;

  if (await fileExists(path.join(repoDir, '.git'))) {
    const opts = { cwd: repoDir, env, timeoutMs };
    const origin = await runner.run('git', ['remote', 'get-url', 'origin'], opts);
    if (origin.exitCode === 0 && origin.stdout.trim() === gitUrl) {
      logger.info({ repoDir, branch }, 'Updating existing checkout');
      await runOrThrow(
        runner,
        'git',
        ['fetch', '--prune', 'origin', `+refs/heads/${branch}:refs/remotes/origin/${branch}`],
        opts,
        code,
        `git fetch failed for branch ${branch}`
      );
      await runOrThrow(runner, 'git', ['checkout', '--force', '-B', branch, `origin/${branch}`], opts, code, `git checkout failed for branch ${branch}`);
      await runOrThrow(runner, 'git', ['clean', '-ffdx'], opts, code, 'git clean failed');
      return repoDir;
    }
    // Cached checkout of some other repository: start over.
    logger.warn({ repoDir, origin: redactUrl(origin.stdout.trim()) }, 'Cached checkout has a different origin, cloning again');
    await fs.rm(repoDir, { recursive: true, force: true });
  }

  await fs.mkdir(workspaceDir, { recursive: true });
  logger.info({ repo: redactUrl(gitUrl), branch, workspaceDir }, 'Cloning repository');
  await runOrThrow(
    runner,
    'git',
    ['clone', '--branch', branch, '--single-branch', '--', gitUrl, 'repo'],
    { cwd: workspaceDir, env, timeoutMs },
    code,
    'git clone failed'
  );
  return repoDir;
}

// Compose wins when both a compose file and a Dockerfile are present.
export async function detectBuildMode(repoDir: string): Promise<BuildManifest> {
  for (const file of COMPOSE_FILES) {
    if (await fileExists(path.join(repoDir, file))) return { mode: 'compose', file };
  }
  if (await fileExists(path.join(repoDir, DOCKERFILE))) return { mode: 'dockerfile', file: DOCKERFILE };
  throw new DeployError(
    DeployErrorCode.NO_BUILD_MANIFEST,
    'Neither Dockerfile nor docker-compose.yml found in repo',
    { repoDir }
  );
}
