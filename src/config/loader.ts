// Config loader: reads ~/.config/hostdeploy/config.yaml (or --config) and deep-merges it over DEFAULT_CONFIG.
// Unset keys inherit defaults. The PAT is never read from this file.
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { deployConfigSchema, type DeployConfig } from '../types/config.js';
import { DeployError, DeployErrorCode, describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'hostdeploy', 'config.yaml');

export const DEFAULT_CONFIG: DeployConfig = {
  defaults: {},
  ssh: { port: 22, connect_timeout_seconds: 10, strict_host_key_checking: 'accept-new' },
  git: { token_user: 'x-access-token' },
  remote: { skip_prepare: false, command_timeout_seconds: 1800 },
  transfer: { exclude: ['.git'], prefer_rsync: true },
  deploy: { settle_seconds: 3, host_port: null },
  nginx: { site_name: 'auto_deploy', server_name: '_', listen_port: 80, remove_default_site: true },
  health: { attempts: 3, interval_seconds: 2, strict: false },
  workspace: { cache_dir: null, log_dir: '.' },
};

export interface ConfigResult {
  config: DeployConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    if (explicitPath) {
      throw new DeployError(DeployErrorCode.VALIDATION_FAILED, `Config file not found: ${configPath}`);
    }
    return { config: DEFAULT_CONFIG, configPath, fromFile: false };
  }

  try {
    const raw = readFileSync(configPath, 'utf-8');
    const parsed: unknown = parseYaml(raw) ?? {};
    if (!isPlainObject(parsed)) {
      throw new Error('top level must be a mapping');
    }
    const merged = deepMerge(DEFAULT_CONFIG, parsed);
    const result = deployConfigSchema.safeParse(merged);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new Error(`${issue.path.join('.')}: ${issue.message}`);
    }
    return { config: result.data, configPath, fromFile: true };
  } catch (err) {
    if (explicitPath) {
      throw new DeployError(DeployErrorCode.VALIDATION_FAILED, `Invalid config file ${configPath}: ${describeError(err)}`);
    }
    logger.error({ configPath, error: describeError(err) }, 'Failed to parse config, using defaults');
    return { config: DEFAULT_CONFIG, configPath, fromFile: false };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: object, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = result[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
