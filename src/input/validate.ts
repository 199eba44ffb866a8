import { existsSync, statSync } from 'fs';
import { homedir } from 'os';
import path from 'path';
import { z } from 'zod';
import type { DeployInputs, RawInputs } from './types.js';
import { projectNameFromUrl } from '../repo/git.js';
import { DeployError, DeployErrorCode } from '../shared/errors.js';

const SCP_STYLE_URL = /^[\w.-]+@[\w.-]+:.+$/;
const PROJECT_NAME = /^[A-Za-z0-9_.-]+$/;

function isSupportedGitUrl(value: string): boolean {
  if (SCP_STYLE_URL.test(value)) return true;
  try {
    const url = new URL(value);
    return ['https:', 'http:', 'ssh:'].includes(url.protocol) && url.hostname !== '';
  } catch {
    return false;
  }
}

const rawInputsSchema = z.object({
  gitUrl: z.string().trim().min(1, 'is required').refine(isSupportedGitUrl, 'must be an https://, ssh:// or user@host:path URL'),
  token: z.string().trim(),
  branch: z.string().trim().min(1, 'is required').refine((b) => !/\s/.test(b), 'must not contain whitespace'),
  sshUser: z.string().trim().min(1, 'is required').regex(/^[^\s@]+$/, 'must not contain whitespace or @'),
  sshHost: z.string().trim().min(1, 'is required').regex(/^[^\s@]+$/, 'must not contain whitespace or @'),
  sshKey: z.string().trim().min(1, 'is required'),
  appPort: z
    .string()
    .trim()
    .regex(/^[0-9]+$/, 'must be a number')
    .transform(Number)
    .refine((p) => p >= 1 && p <= 65535, 'must be between 1 and 65535'),
  remoteBase: z.string().trim().min(1, 'is required'),
});

export function expandHome(p: string, home: string = homedir()): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return path.join(home, p.slice(2));
  return p;
}

export function validateInputs(raw: RawInputs): DeployInputs {
  const result = rawInputsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new DeployError(DeployErrorCode.VALIDATION_FAILED, `Invalid ${field}: ${issue.message}`, { field });
  }
  const data = result.data;

  const sshKeyPath = path.resolve(expandHome(data.sshKey));
  if (!existsSync(sshKeyPath) || !statSync(sshKeyPath).isFile()) {
    throw new DeployError(DeployErrorCode.VALIDATION_FAILED, `SSH key not found at ${data.sshKey}`, { field: 'sshKey' });
  }

  // The name becomes a path segment under the remote base, so `.` and `..` are refused.
  const projectName = projectNameFromUrl(data.gitUrl);
  if (!PROJECT_NAME.test(projectName) || projectName === '.' || projectName === '..') {
    throw new DeployError(DeployErrorCode.VALIDATION_FAILED, `Cannot derive a project name from ${data.gitUrl}`, {
      field: 'gitUrl',
    });
  }
  const remoteBase = data.remoteBase.replace(/\/+$/, '') || '/';

  return {
    gitUrl: data.gitUrl,
    token: data.token,
    branch: data.branch,
    sshUser: data.sshUser,
    sshHost: data.sshHost,
    sshKeyPath,
    appPort: data.appPort,
    remoteBase,
    projectName,
    remoteProjectDir: remoteBase === '/' ? `/${projectName}` : `${remoteBase}/${projectName}`,
  };
}
