import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { runDeployment, sshTargetFor } from '../../../src/deploy/pipeline.js';
import type { DeployInputs } from '../../../src/input/types.js';
import { DeployErrorCode } from '../../../src/shared/errors.js';
import type { DeployConfig } from '../../../src/types/config.js';
import { FakeRunner, healthyHost, remoteCommand, scriptOf, type RecordedCall } from '../../helpers/fake-runner.js';

const inputs: DeployInputs = {
  gitUrl: 'https://github.com/acme/webapp.git',
  token: 'test-token',
  branch: 'main',
  sshUser: 'ubuntu',
  sshHost: '203.0.113.10',
  sshKeyPath: '/keys/id_ed25519',
  appPort: 8000,
  remoteBase: '~/deploy_app',
  projectName: 'webapp',
  remoteProjectDir: '~/deploy_app/webapp',
};

function withConfig(overrides: Partial<DeployConfig>): DeployConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

function describeCall(call: RecordedCall): string {
  if (call.command !== 'ssh') return `${call.command} ${call.args[0] ?? ''}`.trim();
  const script = scriptOf(call);
  const marker = /::done::([a-z]+)/.exec(script);
  return marker ? `ssh script:${marker[1]}` : `ssh ${remoteCommand(call).split(' ')[0]}`;
}

describe('sshTargetFor', () => {
  it('combines the answers with the ssh config section', () => {
    expect(sshTargetFor(inputs, withConfig({ ssh: { port: 2222, connect_timeout_seconds: 5, strict_host_key_checking: 'yes' } }))).toEqual({
      user: 'ubuntu',
      host: '203.0.113.10',
      keyPath: '/keys/id_ed25519',
      port: 2222,
      connectTimeoutSeconds: 5,
      strictHostKeyChecking: 'yes',
    });
  });
});

describe('runDeployment', () => {
  it('runs every stage in order and removes the temporary checkout', async () => {
    const runner = new FakeRunner(healthyHost());
    const result = await runDeployment(inputs, { cleanup: false }, { runner, config: DEFAULT_CONFIG, rsyncAvailable: true });

    expect(runner.calls.map(describeCall)).toEqual([
      'ssh echo',
      'ssh script:prepare',
      'git clone',
      'ssh mkdir',
      'rsync -az',
      'ssh script:deploy',
      'ssh curl',
    ]);
    expect(result).toMatchObject({
      action: 'deploy',
      projectName: 'webapp',
      buildMode: 'dockerfile',
      transferMethod: 'rsync',
      httpStatus: 200,
    });

    const cloneDir = runner.callsTo('git')[0].options?.cwd ?? '';
    expect(path.basename(cloneDir)).toMatch(/^hostdeploy-/);
    expect(fs.existsSync(cloneDir)).toBe(false);
  });

  it('deploys compose projects with compose', async () => {
    const runner = new FakeRunner(healthyHost('compose.yaml'));
    const result = await runDeployment(inputs, { cleanup: false }, { runner, config: DEFAULT_CONFIG, rsyncAvailable: true });
    expect(result.buildMode).toBe('compose');
    const deploy = runner.calls.find((c) => scriptOf(c).includes('::done::deploy'));
    expect(scriptOf(deploy ?? { command: '', args: [] })).toContain('$COMPOSE -f compose.yaml up -d --build');
  });

  it('publishes the container on deploy.host_port when one is configured', async () => {
    const runner = new FakeRunner(healthyHost());
    const config = withConfig({ deploy: { settle_seconds: 0, host_port: 8080 } });
    await runDeployment({ ...inputs, appPort: 80 }, { cleanup: false }, { runner, config, rsyncAvailable: true });
    const deploy = runner.calls.find((c) => scriptOf(c).includes('::done::deploy'));
    const script = scriptOf(deploy ?? { command: '', args: [] });
    expect(script).toContain('-p 8080:80 --name');
    expect(script).toContain('proxy_pass http://127.0.0.1:8080;');
  });

  it('skips provisioning when remote.skip_prepare is set', async () => {
    const runner = new FakeRunner(healthyHost());
    const config = withConfig({ remote: { skip_prepare: true, command_timeout_seconds: 60 } });
    await runDeployment(inputs, { cleanup: false }, { runner, config, rsyncAvailable: true });
    expect(runner.calls.map(describeCall)).not.toContain('ssh script:prepare');
  });

  it('copies with scp when rsync is not installed locally', async () => {
    const runner = new FakeRunner(healthyHost());
    const result = await runDeployment(inputs, { cleanup: false }, { runner, config: DEFAULT_CONFIG, rsyncAvailable: false });
    expect(result.transferMethod).toBe('scp');
    expect(runner.callsTo('rsync')).toHaveLength(0);
  });

  it('keeps one checkout per project in a configured cache directory', async () => {
    const cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hostdeploy-cache-'));
    try {
      const runner = new FakeRunner(healthyHost());
      const config = withConfig({ workspace: { cache_dir: cacheDir, log_dir: '.' } });
      await runDeployment(inputs, { cleanup: false }, { runner, config, rsyncAvailable: true });
      expect(runner.callsTo('git')[0].options?.cwd).toBe(path.join(cacheDir, 'webapp'));
      expect(fs.existsSync(path.join(cacheDir, 'webapp', 'repo', 'Dockerfile'))).toBe(true);
    } finally {
      fs.rmSync(cacheDir, { recursive: true, force: true });
    }
  });

  it('only tears down in cleanup mode', async () => {
    const runner = new FakeRunner(healthyHost());
    const result = await runDeployment(inputs, { cleanup: true }, { runner, config: DEFAULT_CONFIG, rsyncAvailable: true });
    expect(result.action).toBe('cleanup');
    expect(runner.calls.map(describeCall)).toEqual(['ssh echo', 'ssh script:cleanup']);
  });

  it('stops with SSH_FAILED when the host is unreachable', async () => {
    const runner = new FakeRunner(
      healthyHost('Dockerfile', (call) =>
        call.command === 'ssh' && remoteCommand(call) === 'echo ok' ? { exitCode: 255, stderr: 'Permission denied (publickey).' } : undefined
      )
    );
    await expect(
      runDeployment(inputs, { cleanup: false }, { runner, config: DEFAULT_CONFIG, rsyncAvailable: true })
    ).rejects.toMatchObject({ code: DeployErrorCode.SSH_FAILED });
    expect(runner.calls).toHaveLength(1);
  });

  it('removes the temporary checkout when the remote deploy fails', async () => {
    const runner = new FakeRunner(
      healthyHost('Dockerfile', (call) =>
        scriptOf(call).includes('::done::deploy') ? { exitCode: 1, stdout: '::stage::build' } : undefined
      )
    );
    await expect(
      runDeployment(inputs, { cleanup: false }, { runner, config: DEFAULT_CONFIG, rsyncAvailable: true })
    ).rejects.toMatchObject({ code: DeployErrorCode.DEPLOY_FAILED, message: 'Remote deploy failed during stage build' });
    const cloneDir = runner.callsTo('git')[0].options?.cwd ?? '';
    expect(fs.existsSync(cloneDir)).toBe(false);
  });
});
