import { z } from 'zod';

const inputDefaultsSchema = z
  .object({
    git_url: z.string(),
    branch: z.string(),
    ssh_user: z.string(),
    ssh_host: z.string(),
    ssh_key: z.string(),
    app_port: z.union([z.string(), z.number().int()]).transform(String),
    remote_base: z.string(),
  })
  .partial();

export const deployConfigSchema = z.object({
  defaults: inputDefaultsSchema,
  ssh: z.object({
    port: z.number().int().min(1).max(65535),
    connect_timeout_seconds: z.number().int().positive(),
    strict_host_key_checking: z.enum(['yes', 'no', 'accept-new']),
  }),
  git: z.object({
    token_user: z.string().min(1),
  }),
  remote: z.object({
    skip_prepare: z.boolean(),
    command_timeout_seconds: z.number().int().positive(),
  }),
  transfer: z.object({
    exclude: z.array(z.string()),
    prefer_rsync: z.boolean(),
  }),
  deploy: z.object({
    settle_seconds: z.number().int().min(0),
    host_port: z.number().int().min(1).max(65535).nullable(),
  }),
  nginx: z.object({
    site_name: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'site_name may only contain letters, digits, _ . -'),
    server_name: z.string().min(1),
    listen_port: z.number().int().min(1).max(65535),
    remove_default_site: z.boolean(),
  }),
  health: z.object({
    attempts: z.number().int().min(1),
    interval_seconds: z.number().min(0),
    strict: z.boolean(),
  }),
  workspace: z.object({
    cache_dir: z.string().nullable(),
    log_dir: z.string().min(1),
  }),
});

export type DeployConfig = z.infer<typeof deployConfigSchema>;
export type InputDefaults = DeployConfig['defaults'];
