import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { expandHome, validateInputs } from '../../../src/input/validate.js';
import type { RawInputs } from '../../../src/input/types.js';
import { DeployErrorCode } from '../../../src/shared/errors.js';

describe('validateInputs', () => {
  let tmpDir: string;
  let keyPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hostdeploy-key-'));
    keyPath = path.join(tmpDir, 'id_ed25519');
    await fs.writeFile(keyPath, 'placeholder key', 'utf-8');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const raw = (overrides: Partial<RawInputs> = {}): RawInputs => ({
    gitUrl: 'https://github.com/acme/webapp.git',
    token: 'test-token',
    branch: 'main',
    sshUser: 'ubuntu',
    sshHost: '203.0.113.10',
    sshKey: keyPath,
    appPort: '8000',
    remoteBase: '~/deploy_app',
    ...overrides,
  });

  it('accepts valid input and derives project paths', () => {
    expect(validateInputs(raw())).toEqual({
      gitUrl: 'https://github.com/acme/webapp.git',
      token: 'test-token',
      branch: 'main',
      sshUser: 'ubuntu',
      sshHost: '203.0.113.10',
      sshKeyPath: keyPath,
      appPort: 8000,
      remoteBase: '~/deploy_app',
      projectName: 'webapp',
      remoteProjectDir: '~/deploy_app/webapp',
    });
  });

  it('trims surrounding whitespace', () => {
    const inputs = validateInputs(raw({ sshHost: '  203.0.113.10 ', appPort: ' 8000 ' }));
    expect(inputs.sshHost).toBe('203.0.113.10');
    expect(inputs.appPort).toBe(8000);
  });

  it('drops a trailing slash from the remote base', () => {
    expect(validateInputs(raw({ remoteBase: '/srv/apps/' })).remoteProjectDir).toBe('/srv/apps/webapp');
  });

  it('rejects a non-numeric port', () => {
    expect(() => validateInputs(raw({ appPort: '80a' }))).toThrow('Invalid appPort: must be a number');
  });

  it('rejects a port outside 1-65535', () => {
    expect(() => validateInputs(raw({ appPort: '70000' }))).toThrow('Invalid appPort: must be between 1 and 65535');
    expect(() => validateInputs(raw({ appPort: '0' }))).toThrow('Invalid appPort: must be between 1 and 65535');
  });

  it('rejects a missing SSH key with a validation error', () => {
    expect(() => validateInputs(raw({ sshKey: path.join(tmpDir, 'nope') }))).toThrow(
      expect.objectContaining({
        code: DeployErrorCode.VALIDATION_FAILED,
        message: `SSH key not found at ${path.join(tmpDir, 'nope')}`,
      })
    );
  });

  it('rejects a directory given as the SSH key', () => {
    expect(() => validateInputs(raw({ sshKey: tmpDir }))).toThrow(`SSH key not found at ${tmpDir}`);
  });

  it('rejects unsupported repository URLs', () => {
    expect(() => validateInputs(raw({ gitUrl: 'ftp://example.com/webapp.git' }))).toThrow(
      'Invalid gitUrl: must be an https://, ssh:// or user@host:path URL'
    );
  });

  it('accepts scp-style repository URLs', () => {
    expect(validateInputs(raw({ gitUrl: 'git@github.com:acme/api-server.git' })).projectName).toBe('api-server');
  });

  it.each([
    ['https://git.example.test/team/...git', '..'],
    ['git@git.example.test:team/..git', '.'],
    ['https://git.example.test/team/web%20app.git', 'web%20app'],
  ])('refuses %s, whose project name %s is not a safe directory name', (gitUrl) => {
    expect(() => validateInputs(raw({ gitUrl }))).toThrow(
      expect.objectContaining({
        code: DeployErrorCode.VALIDATION_FAILED,
        message: `Cannot derive a project name from ${gitUrl}`,
        context: { field: 'gitUrl' },
      })
    );
  });

  it('rejects an empty host', () => {
    expect(() => validateInputs(raw({ sshHost: '' }))).toThrow('Invalid sshHost: is required');
  });

  it('rejects a host containing a user part', () => {
    expect(() => validateInputs(raw({ sshHost: 'root@203.0.113.10' }))).toThrow(
      'Invalid sshHost: must not contain whitespace or @'
    );
  });

  it('allows an empty token for public repositories', () => {
    expect(validateInputs(raw({ token: '' })).token).toBe('');
  });
});

describe('expandHome', () => {
  it('expands a leading ~', () => {
    expect(expandHome('~/.ssh/id_rsa', '/home/dev')).toBe('/home/dev/.ssh/id_rsa');
    expect(expandHome('~', '/home/dev')).toBe('/home/dev');
  });

  it('leaves other paths alone', () => {
    expect(expandHome('/keys/id_rsa', '/home/dev')).toBe('/keys/id_rsa');
    expect(expandHome('keys/~/id', '/home/dev')).toBe('keys/~/id');
  });
});
