// Shell prelude shared by the deploy and cleanup scripts. Picks `sudo docker` while the
// login user's new docker group membership has not taken effect yet, and docker compose
// v2 over the standalone docker-compose binary. Standalone compose gets sudo whenever docker does.
export const DOCKER_PRELUDE = `DOCKER="docker"
if ! docker info >/dev/null 2>&1; then DOCKER="sudo docker"; fi
if $DOCKER compose version >/dev/null 2>&1; then
  COMPOSE="$DOCKER compose"
elif [ "$DOCKER" = "sudo docker" ]; then
  COMPOSE="sudo docker-compose"
else
  COMPOSE="docker-compose"
fi`;

/** Docker container and image names must be lowercase and limited to [a-z0-9_.-]. */
export function containerName(projectName: string): string {
  const name = projectName
    .toLowerCase()
    .replace(/[^a-z0-9_.-]+/g, '-')
    .replace(/^[^a-z0-9]+/, '');
  return name || 'app';
}
