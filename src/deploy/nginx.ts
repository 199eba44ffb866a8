export const SITES_AVAILABLE = '/etc/nginx/sites-available';
export const SITES_ENABLED = '/etc/nginx/sites-enabled';

export interface SiteOptions {
  appPort: number;
  listenPort: number;
  serverName: string;
}

export interface SitePaths {
  available: string;
  enabled: string;
}

export function sitePaths(siteName: string): SitePaths {
  return {
    available: `${SITES_AVAILABLE}/${siteName}.conf`,
    enabled: `${SITES_ENABLED}/${siteName}.conf`,
  };
}

/** Reverse-proxy site forwarding the listen port to the container port on loopback. */
export function renderSiteConfig(options: SiteOptions): string {
  return [
    'server {',
    `    listen ${options.listenPort};`,
    `    server_name ${options.serverName};`,
    '    location / {',
    `        proxy_pass http://127.0.0.1:${options.appPort};`,
    '        proxy_set_header Host $host;',
    '        proxy_set_header X-Real-IP $remote_addr;',
    '        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;',
    '    }',
    '}',
    '',
  ].join('\n');
}
