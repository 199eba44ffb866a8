import type { RemoteShell } from '../remote/ssh.js';
import { DeployError, DeployErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface HealthOptions {
  listenPort: number;
  attempts: number;
  intervalSeconds: number;
  strict: boolean;
}

export interface HealthResult {
  healthy: boolean;
  httpStatus: number | null;
  attempts: number;
}

export function healthCommand(listenPort: number): string {
  return `curl -s -o /dev/null -w '%{http_code}' http://127.0.0.1:${listenPort}/`;
}

/** curl prints 000 when it never got a response. */
export function parseHttpStatus(output: string): number | null {
  const match = /^\s*(\d{3})\s*$/.exec(output);
  if (!match) return null;
  const status = Number(match[1]);
  return status === 0 ? null : status;
}

export function isHealthyStatus(status: number | null): boolean {
  return status !== null && status >= 200 && status < 400;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function checkHealth(shell: RemoteShell, options: HealthOptions): Promise<HealthResult> {
  logger.info('Checking remote service status');
  let status: number | null = null;
  let attempt = 0;
  while (attempt < options.attempts) {
    attempt++;
    const result = await shell.exec(healthCommand(options.listenPort));
    status = parseHttpStatus(result.stdout);
    if (isHealthyStatus(status)) {
      logger.info({ httpStatus: status, attempt }, `Remote nginx returned HTTP status ${status}`);
      return { healthy: true, httpStatus: status, attempts: attempt };
    }
    logger.debug({ httpStatus: status, attempt }, 'Health check attempt did not succeed');
    if (attempt < options.attempts) await sleep(options.intervalSeconds * 1000);
  }

  if (options.strict) {
    throw new DeployError(DeployErrorCode.HEALTH_CHECK_FAILED, 'Remote nginx did not return a healthy status', {
      httpStatus: status,
      attempts: attempt,
    });
  }
  if (status === null) {
    logger.warn('Warning: could not contact remote nginx via 127.0.0.1');
  } else {
    logger.warn({ httpStatus: status }, `Remote nginx returned HTTP status ${status}`);
  }
  return { healthy: false, httpStatus: status, attempts: attempt };
}
