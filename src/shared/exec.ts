import execa from 'execa';
import { DeployError, DeployErrorCode, describeError } from './errors.js';

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  input?: string;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
  timedOut: boolean;
}

/** Runs external programs. Every ssh, scp, rsync and git call goes through one of these. */
export interface CommandRunner {
  run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult>;
}

export class ExecaRunner implements CommandRunner {
  async run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
    try {
      const result = await execa(command, args, {
        cwd: options?.cwd,
        env: options?.env,
        timeout: options?.timeoutMs,
        input: options?.input,
        reject: false,
        stripFinalNewline: true,
      });
      return {
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        // a process killed by a signal reports no exit code
        exitCode: result.exitCode ?? (result.signal ? 128 : 1),
        signal: result.signal ?? undefined,
        timedOut: result.timedOut,
      };
    } catch (err) {
      throw new DeployError(DeployErrorCode.REMOTE_EXEC_FAILED, `Command failed to spawn: ${command}`, {
        cause: describeError(err),
      });
    }
  }
}

export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: ExecOptions | undefined,
  code: DeployErrorCode,
  message?: string
): Promise<ExecResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new DeployError(code, message ?? `Command exited with ${result.exitCode}: ${command}`, {
      stdout: result.stdout,
      stderr: result.stderr,
      timedOut: result.timedOut,
    });
  }
  return result;
}
