import readline from 'readline';
import { Writable } from 'stream';
import type { InputDefaults } from '../types/config.js';
import type { RawInputs } from './types.js';
import { DeployError, DeployErrorCode } from '../shared/errors.js';

export const DEFAULT_BRANCH = 'main';
export const DEFAULT_REMOTE_BASE = '~/deploy_app';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

function isTTY(stream: object): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}

/**
 * Line-oriented prompter. Lines are pulled through the readline async iterator so
 * answers piped in ahead of their questions are buffered rather than dropped.
 */
export class Prompter {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;
  private muted = false;

  constructor(private readonly streams: PromptStreams = { input: process.stdin, output: process.stdout }) {
    // readline echoes keystrokes through this stream; hidden answers swallow them.
    const echo = new Writable({
      write: (chunk, _encoding, callback) => {
        if (!this.muted) streams.output.write(chunk);
        callback();
      },
    });
    this.rl = readline.createInterface({ input: streams.input, output: echo, terminal: isTTY(streams.input) });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(question: string, options: { hidden?: boolean } = {}): Promise<string> {
    this.streams.output.write(question);
    this.muted = options.hidden === true;
    try {
      const next = await this.lines.next();
      if (next.done) {
        throw new DeployError(DeployErrorCode.VALIDATION_FAILED, `Input closed before answering: ${question.trim()}`);
      }
      return next.value.trim();
    } finally {
      if (options.hidden) {
        this.muted = false;
        this.streams.output.write('\n');
      }
    }
  }

  close(): void {
    this.rl.close();
  }
}

/** Prefill answers from DEPLOY_* variables, then from the config file's defaults. */
export function seedInputs(env: NodeJS.ProcessEnv, defaults: InputDefaults): Partial<RawInputs> {
  const pick = (envKey: string, fallback: string | undefined): string | undefined => {
    const value = env[envKey];
    return value !== undefined && value !== '' ? value : fallback;
  };
  const seed: Partial<RawInputs> = {
    gitUrl: pick('DEPLOY_GIT_URL', defaults.git_url),
    branch: pick('DEPLOY_BRANCH', defaults.branch),
    sshUser: pick('DEPLOY_SSH_USER', defaults.ssh_user),
    sshHost: pick('DEPLOY_SSH_HOST', defaults.ssh_host),
    sshKey: pick('DEPLOY_SSH_KEY', defaults.ssh_key),
    appPort: pick('DEPLOY_APP_PORT', defaults.app_port),
    remoteBase: pick('DEPLOY_REMOTE_BASE', defaults.remote_base),
  };
  // An empty token is meaningful (public repository), so presence is what counts here.
  const token = env['DEPLOY_GIT_TOKEN'];
  if (token !== undefined) seed.token = token;
  return seed;
}

export async function collectInputs(prompter: Prompter, seed: Partial<RawInputs> = {}): Promise<RawInputs> {
  const gitUrl =
    seed.gitUrl ?? (await prompter.ask('Enter Git repository HTTPS URL (e.g. https://github.com/user/repo.git): '));
  const token =
    seed.token ?? (await prompter.ask('Enter Personal Access Token (PAT) (input will be hidden): ', { hidden: true }));
  const branch = seed.branch ?? ((await prompter.ask('Enter branch name (press ENTER for main): ')) || DEFAULT_BRANCH);
  const sshUser = seed.sshUser ?? (await prompter.ask('Enter remote SSH username (e.g. ubuntu): '));
  const sshHost = seed.sshHost ?? (await prompter.ask('Enter remote server IP or hostname: '));
  const sshKey = seed.sshKey ?? (await prompter.ask('Enter path to SSH private key for remote (e.g. ~/.ssh/id_rsa): '));
  const appPort =
    seed.appPort ?? (await prompter.ask('Enter application internal port (container port) (e.g. 8000): '));
  const remoteBase =
    seed.remoteBase ??
    ((await prompter.ask(`Enter remote deploy base folder (default: ${DEFAULT_REMOTE_BASE}): `)) || DEFAULT_REMOTE_BASE);

  return { gitUrl, token, branch, sshUser, sshHost, sshKey, appPort, remoteBase };
}
