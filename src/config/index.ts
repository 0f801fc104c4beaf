import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import type { ConduitConfig } from '../types/index.js';

export const CONDUIT_DIR = join(homedir(), '.conduit');
export const CONFIG_FILE = join(CONDUIT_DIR, 'config.yaml');
export const PLUGINS_DIR = join(CONDUIT_DIR, 'plugins');
export const DEFAULT_DB_PATH = join(CONDUIT_DIR, 'subscriptions.db');

const oauthClientSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().optional(),
  tenant: z.string().optional(),
  subdomain: z.string().optional(),
});

export const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(1).max(65535).default(3847),
      host: z.string().default('localhost'),
      publicUrl: z.string().url().optional(),
    })
    .default({}),
  storage: z.object({ dbPath: z.string().optional() }).default({}),
  oauth: z.record(oauthClientSchema).optional(),
  wecom: z
    .object({
      token: z.string().optional(),
      encodingAesKey: z.string().optional(),
      receiveId: z.string().optional(),
      corpId: z.string().optional(),
      agentSecret: z.string().optional(),
      agentId: z.string().optional(),
    })
    .optional(),
  wecomBot: z
    .object({
      token: z.string().optional(),
      encodingAesKey: z.string().optional(),
      receiveId: z.string().optional(),
    })
    .optional(),
  model: z
    .object({
      baseUrl: z.string().url(),
      apiKey: z.string().optional(),
      model: z.string().min(1),
    })
    .optional(),
  refresh: z.object({ cron: z.string().default('0 * * * *') }).default({}),
  pluginsDir: z.string().default(PLUGINS_DIR),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate a parsed config document, filling in defaults.
 */
export function parseConfig(raw: unknown, source = 'config'): ConduitConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Apply CONDUIT_* environment overrides on top of a loaded config.
 */
export function resolveConfig(config: ConduitConfig, env: NodeJS.ProcessEnv = process.env): ConduitConfig {
  const server = { ...config.server };
  if (env.CONDUIT_PORT) {
    const port = Number.parseInt(env.CONDUIT_PORT, 10);
    if (Number.isNaN(port)) {
      throw new ConfigError(`CONDUIT_PORT is not a number: ${env.CONDUIT_PORT}`);
    }
    server.port = port;
  }
  if (env.CONDUIT_HOST) server.host = env.CONDUIT_HOST;
  if (env.CONDUIT_PUBLIC_URL) server.publicUrl = env.CONDUIT_PUBLIC_URL;

  const storage = env.CONDUIT_DB_PATH ? { dbPath: env.CONDUIT_DB_PATH } : config.storage;
  return { ...config, server, storage };
}

export async function ensureConfigDir(dir = CONDUIT_DIR): Promise<void> {
  await mkdir(dir, { recursive: true });
  await mkdir(join(dir, 'plugins'), { recursive: true });
}

export async function loadConfig(path = CONFIG_FILE): Promise<ConduitConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return parseConfig({});
    }
    throw err;
  }
  return parseConfig(parseYaml(content), path);
}

export async function saveConfig(config: ConduitConfig, path = CONFIG_FILE): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, stringifyYaml(config), 'utf-8');
}

/** Where the subscription database lives once config and overrides are applied. */
export function databasePath(config: ConduitConfig): string {
  return config.storage.dbPath ?? DEFAULT_DB_PATH;
}
