import type { CommandRunner, ExecResult } from '../shared/exec.js';
import { DeployError, DeployErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { shellQuote } from './quote.js';

export interface SshTarget {
  user: string;
  host: string;
  keyPath: string;
  port: number;
  connectTimeoutSeconds: number;
  strictHostKeyChecking: 'yes' | 'no' | 'accept-new';
}

export function destination(target: SshTarget): string {
  return `${target.user}@${target.host}`;
}

// -o options shared by ssh, scp and the rsync transport. BatchMode keeps ssh from ever prompting.
function commonOptions(target: SshTarget): string[] {
  return [
    '-i', target.keyPath,
    '-o', 'BatchMode=yes',
    '-o', `ConnectTimeout=${target.connectTimeoutSeconds}`,
    '-o', `StrictHostKeyChecking=${target.strictHostKeyChecking}`,
  ];
}

export function sshArgs(target: SshTarget): string[] {
  return [...commonOptions(target), '-p', String(target.port)];
}

export function scpArgs(target: SshTarget): string[] {
  return [...commonOptions(target), '-P', String(target.port)];
}

/** The `-e` transport string for rsync, quoted for the shell rsync hands it to. */
export function rsyncShell(target: SshTarget): string {
  return ['ssh', ...sshArgs(target)].map(shellQuote).join(' ');
}

export const REMOTE_SCRIPT_RUNNER = 'f=$(mktemp) && cat > "$f" && sh "$f"; rc=$?; rm -f "$f"; exit $rc';

export class RemoteShell {
  constructor(
    private readonly runner: CommandRunner,
    readonly target: SshTarget,
    private readonly timeoutMs?: number
  ) {}

  /** Run a single command line on the remote host. */
  async exec(command: string, timeoutMs: number | undefined = this.timeoutMs): Promise<ExecResult> {
    return this.runner.run('ssh', [...sshArgs(this.target), destination(this.target), command], { timeoutMs });
  }

  /**
   * Send a POSIX script over stdin and run it from a temp file on the remote host. The script
   * is fully read before it starts, so commands inside it see an empty stdin.
   */
  async runScript(script: string, timeoutMs: number | undefined = this.timeoutMs): Promise<ExecResult> {
    return this.runner.run('ssh', [...sshArgs(this.target), destination(this.target), REMOTE_SCRIPT_RUNNER], {
      input: script,
      timeoutMs,
    });
  }

  async testConnection(): Promise<void> {
    const where = destination(this.target);
    logger.info({ target: where, port: this.target.port }, `Testing SSH connectivity to ${where}`);
    // ssh's own ConnectTimeout bounds the handshake; the extra margin covers a slow login.
    const result = await this.exec('echo ok', (this.target.connectTimeoutSeconds + 5) * 1000);
    if (result.exitCode !== 0 || result.stdout.trim() !== 'ok') {
      throw new DeployError(DeployErrorCode.SSH_FAILED, `SSH connection failed to ${where}`, {
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
    }
    logger.info('SSH connectivity OK');
  }
}
