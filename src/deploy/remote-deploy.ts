import type { BuildManifest } from '../repo/git.js';
import type { RemoteShell } from '../remote/ssh.js';
import { parseMarkers, stripMarkers, type MarkerReport } from '../remote/markers.js';
import { remotePath, shellQuote } from '../remote/quote.js';
import { DeployError, DeployErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { DOCKER_PRELUDE, containerName } from './docker.js';
import { renderSiteConfig, sitePaths, SITES_ENABLED } from './nginx.js';

export interface NginxPlan {
  siteName: string;
  serverName: string;
  listenPort: number;
  removeDefaultSite: boolean;
}

export interface DeployPlan {
  projectName: string;
  remoteProjectDir: string;
  manifest: BuildManifest;
  appPort: number;
  /** Host side of the published port and the nginx upstream; the container listens on appPort. */
  hostPort: number;
  settleSeconds: number;
  nginx: NginxPlan;
}

const HEREDOC_END = 'HOSTDEPLOY_NGINX_SITE';

function buildCommands(plan: DeployPlan): string[] {
  if (plan.manifest.mode === 'compose') {
    const compose = `$COMPOSE -f ${shellQuote(plan.manifest.file)}`;
    return [
      // nothing to stop on a first deploy, and build-only services have nothing to pull
      `${compose} down --remove-orphans || true`,
      `${compose} pull --ignore-buildable || true`,
      `${compose} up -d --build`,
    ];
  }
  return [
    `NAME=${shellQuote(containerName(plan.projectName))}`,
    `if $DOCKER ps -a --format '{{.Names}}' | grep -qx "$NAME"; then $DOCKER rm -f "$NAME" >/dev/null; fi`,
    `$DOCKER build -t "$NAME:latest" .`,
    `$DOCKER run -d --restart unless-stopped -p ${plan.hostPort}:${plan.appPort} --name "$NAME" "$NAME:latest"`,
  ];
}

function nginxCommands(plan: DeployPlan): string[] {
  const site = sitePaths(plan.nginx.siteName);
  const config = renderSiteConfig({
    appPort: plan.hostPort,
    listenPort: plan.nginx.listenPort,
    serverName: plan.nginx.serverName,
  }).trimEnd();
  const commands = [
    `sudo tee ${site.available} >/dev/null <<'${HEREDOC_END}'`,
    config,
    HEREDOC_END,
    `sudo ln -sf ${site.available} ${site.enabled}`,
  ];
  if (plan.nginx.removeDefaultSite) commands.push(`sudo rm -f ${SITES_ENABLED}/default`);
  commands.push('sudo nginx -t', 'sudo systemctl reload nginx || sudo nginx -s reload');
  return commands;
}

/** `set -eu` script: any failing command aborts, and the last ::stage:: marker says where. */
export function buildDeployScript(plan: DeployPlan): string {
  return [
    'set -eu',
    DOCKER_PRELUDE,
    `cd ${remotePath(plan.remoteProjectDir)}`,
    `echo "::stage::build"`,
    `echo "Using ${plan.manifest.mode} (${plan.manifest.file})"`,
    ...buildCommands(plan),
    `sleep ${plan.settleSeconds}`,
    `echo "::stage::verify"`,
    `$DOCKER ps --filter status=running --format '{{.Names}}\\t{{.Status}}'`,
    `echo "::stage::nginx"`,
    ...nginxCommands(plan),
    `echo "::done::deploy"`,
    '',
  ].join('\n');
}

function tail(text: string, lines: number): string {
  return text.trim().split('\n').slice(-lines).join('\n');
}

export async function runRemoteDeploy(shell: RemoteShell, plan: DeployPlan): Promise<MarkerReport> {
  logger.info(
    { mode: plan.manifest.mode, remoteProjectDir: plan.remoteProjectDir },
    'Running remote deployment commands (build/run containers, nginx config)'
  );
  const result = await shell.runScript(buildDeployScript(plan));
  const report = parseMarkers(result.stdout);
  logger.debug({ output: stripMarkers(result.stdout), stderr: result.stderr.trim() }, 'Remote deploy output');

  if (result.exitCode !== 0 || !report.done.includes('deploy')) {
    const stage = report.stages[report.stages.length - 1] ?? 'setup';
    throw new DeployError(DeployErrorCode.DEPLOY_FAILED, `Remote deploy failed during stage ${stage}`, {
      stage,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      stderr: tail(result.stderr, 20),
    });
  }
  logger.info('Remote deployment finished');
  return report;
}
