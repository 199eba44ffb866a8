import type { RemoteShell } from './ssh.js';
import { parseMarkers, stripMarkers, type MarkerReport } from './markers.js';
import { DeployError, DeployErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/** Tools the host must have once provisioning has run. */
export const REQUIRED_REMOTE_TOOLS = ['docker', 'compose', 'nginx'] as const;

// Each step appends its output to the remote log and reports a marker. A failed step does not stop
// the script; the probes at the end decide whether the host is usable.
export function buildPrepareScript(): string {
  return `set -u
LOG="/tmp/remote_prepare_$(date +%Y%m%d_%H%M%S).log"
echo "$(date -u +%Y-%m-%dT%H:%M:%SZ) Starting remote setup" >> "$LOG"
echo "::log::$LOG"

step() {
  name="$1"; shift
  echo "--- $name" >> "$LOG"
  if "$@" >> "$LOG" 2>&1; then
    echo "::step::$name::ok"
  else
    echo "::step::$name::failed"
  fi
}

has_compose() {
  docker compose version >/dev/null 2>&1 || command -v docker-compose >/dev/null 2>&1
}

if command -v apt-get >/dev/null 2>&1; then
  APT="sudo DEBIAN_FRONTEND=noninteractive apt-get"
  step apt-update $APT update -y
  step apt-base $APT install -y ca-certificates curl gnupg lsb-release
else
  echo "Non-apt system; manual install required" >> "$LOG"
  echo "::step::apt::skipped"
  APT=""
fi

if ! command -v docker >/dev/null 2>&1; then
  step docker-install sh -c 'curl -fsSL https://get.docker.com | sh'
fi

if ! has_compose; then
  if [ -n "$APT" ]; then
    step compose-install $APT install -y docker-compose-plugin
  else
    echo "::step::compose-install::skipped"
  fi
fi

if [ "$(id -un)" != "root" ]; then
  step docker-group sudo usermod -aG docker "$(id -un)"
fi

if ! command -v nginx >/dev/null 2>&1; then
  if [ -n "$APT" ]; then
    step nginx-install $APT install -y nginx
    step nginx-enable sudo systemctl enable nginx
    step nginx-start sudo systemctl start nginx
  else
    echo "::step::nginx-install::skipped"
  fi
fi

if command -v docker >/dev/null 2>&1; then echo "::probe::docker::present"; else echo "::probe::docker::missing"; fi
if has_compose; then echo "::probe::compose::present"; else echo "::probe::compose::missing"; fi
if command -v nginx >/dev/null 2>&1; then echo "::probe::nginx::present"; else echo "::probe::nginx::missing"; fi

echo "Remote prep done" >> "$LOG"
echo "::done::prepare"
`;
}

export async function prepareRemote(shell: RemoteShell): Promise<MarkerReport> {
  logger.info('Preparing remote environment (docker, compose, nginx)');
  const result = await shell.runScript(buildPrepareScript());
  const report = parseMarkers(result.stdout);
  logger.debug({ output: stripMarkers(result.stdout), stderr: result.stderr.trim() }, 'Remote prepare output');

  if (result.exitCode !== 0 || !report.done.includes('prepare')) {
    throw new DeployError(DeployErrorCode.REMOTE_EXEC_FAILED, `Remote prepare script exited with ${result.exitCode}`, {
      stderr: result.stderr.trim(),
    });
  }

  for (const step of report.steps) {
    if (step.status === 'failed') {
      logger.warn({ step: step.name, remoteLog: report.remoteLog }, `Remote step failed: ${step.name}`);
    } else {
      logger.info({ step: step.name }, `Remote step ${step.status}: ${step.name}`);
    }
  }

  const missing = REQUIRED_REMOTE_TOOLS.filter((tool) => report.probes[tool] !== true);
  if (missing.length > 0) {
    throw new DeployError(
      DeployErrorCode.REMOTE_EXEC_FAILED,
      `Remote host is missing ${missing.join(', ')} after provisioning`,
      { missing, remoteLog: report.remoteLog }
    );
  }
  logger.info('Remote environment prepared');
  return report;
}
