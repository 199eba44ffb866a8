import { DOCKER_PRELUDE, containerName } from '../../../src/deploy/docker.js';

describe('containerName', () => {
  it('keeps valid names', () => {
    expect(containerName('webapp')).toBe('webapp');
    expect(containerName('api_server.v2')).toBe('api_server.v2');
  });

  it('lowercases and replaces invalid characters', () => {
    expect(containerName('My App')).toBe('my-app');
    expect(containerName('_Web+App')).toBe('web-app');
  });

  it('falls back when nothing usable is left', () => {
    expect(containerName('+++')).toBe('app');
  });
});

describe('DOCKER_PRELUDE', () => {
  const lines = DOCKER_PRELUDE.split('\n');

  it('prefers the compose plugin of whichever docker works', () => {
    expect(lines).toContain('if $DOCKER compose version >/dev/null 2>&1; then');
    expect(lines).toContain('  COMPOSE="$DOCKER compose"');
  });

  it('runs standalone docker-compose under sudo when docker needs sudo', () => {
    const sudoBranch = lines.indexOf('elif [ "$DOCKER" = "sudo docker" ]; then');
    expect(sudoBranch).toBeGreaterThan(0);
    expect(lines[sudoBranch + 1]).toBe('  COMPOSE="sudo docker-compose"');
    expect(lines[sudoBranch + 3]).toBe('  COMPOSE="docker-compose"');
  });
});
