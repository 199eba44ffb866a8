import path from 'path';
import pino from 'pino';

const streams = pino.multistream([{ level: 'info', stream: process.stdout }]);

export const logger = pino(
  {
    name: 'hostdeploy',
    level: process.env['LOG_LEVEL'] ?? 'debug',
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: ['token', '*.token', 'env.GIT_CONFIG_VALUE_0'], censor: '[redacted]' },
  },
  streams
);

// Local time, matching `date +%Y%m%d_%H%M%S`.
export function fileTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function logFilePath(logDir: string, date: Date = new Date()): string {
  return path.resolve(logDir, `deploy_${fileTimestamp(date)}.log`);
}

/** Mirror everything at debug and above into the per-run log file. */
export function attachLogFile(filePath: string): void {
  streams.add({ level: 'debug', stream: pino.destination({ dest: filePath, sync: true, mkdir: true }) });
}
