import type { RemoteShell } from '../remote/ssh.js';
import { parseMarkers, stripMarkers } from '../remote/markers.js';
import { remotePath, shellQuote } from '../remote/quote.js';
import { COMPOSE_FILES } from '../repo/git.js';
import { DeployError, DeployErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { DOCKER_PRELUDE, containerName } from './docker.js';
import { sitePaths } from './nginx.js';

export interface CleanupPlan {
  projectName: string;
  remoteProjectDir: string;
  siteName: string;
}

// Teardown is best-effort per resource: a container that is already gone is not an error.
// The directory removal is the one step that must succeed.
export function buildCleanupScript(plan: CleanupPlan): string {
  const dir = remotePath(plan.remoteProjectDir);
  const site = sitePaths(plan.siteName);
  const composeTests = COMPOSE_FILES.map((f) => `[ -f ${shellQuote(f)} ]`).join(' || ');
  return [
    'set -u',
    DOCKER_PRELUDE,
    `NAME=${shellQuote(containerName(plan.projectName))}`,
    `if [ -d ${dir} ]; then`,
    `  cd ${dir}`,
    `  if ${composeTests}; then`,
    '    $COMPOSE down --remove-orphans || echo "compose down failed"',
    '  else',
    '    $DOCKER rm -f "$NAME" >/dev/null 2>&1 || true',
    '    $DOCKER rmi "$NAME:latest" >/dev/null 2>&1 || true',
    '  fi',
    '  cd /',
    'fi',
    `sudo rm -rf ${dir} || exit 1`,
    `sudo rm -f ${site.enabled} ${site.available}`,
    'if command -v nginx >/dev/null 2>&1; then',
    '  sudo nginx -t >/dev/null 2>&1 && { sudo systemctl reload nginx || sudo nginx -s reload; }',
    'fi',
    'echo "::done::cleanup"',
    '',
  ].join('\n');
}

export async function runCleanup(shell: RemoteShell, plan: CleanupPlan): Promise<void> {
  logger.info({ remoteProjectDir: plan.remoteProjectDir }, 'Cleanup mode: removing deployed app and containers on remote');
  const result = await shell.runScript(buildCleanupScript(plan));
  const report = parseMarkers(result.stdout);
  logger.debug({ output: stripMarkers(result.stdout), stderr: result.stderr.trim() }, 'Remote cleanup output');
  if (result.exitCode !== 0 || !report.done.includes('cleanup')) {
    throw new DeployError(DeployErrorCode.CLEANUP_FAILED, 'Remote cleanup failed', {
      exitCode: result.exitCode,
      stderr: result.stderr.trim(),
    });
  }
  logger.info('Remote cleanup completed');
}
