import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getStowawayDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const FeedSchema = z.object({
  key: z.string().regex(/^[a-z0-9-]+$/, 'feed key must be lowercase letters, digits or dashes'),
  name: z.string(),
  url: z.string().url(),
});

export const FeedSiteSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/, 'site id must be lowercase letters, digits or dashes'),
  name: z.string(),
  category: z.string().default('podcast'),
  heavy: z.boolean().default(false),
  prefer_transcript: z.boolean().default(false),
  feeds: z.array(FeedSchema).min(1),
});

export type FeedSiteConfig = z.infer<typeof FeedSiteSchema>;

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(5055),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  downloads: z
    .object({
      base_dir: z.string().default('~/.stowaway/downloads'),
      // Top-level directory scanned for existing files; empty means base_dir.
      search_dir: z.string().default(''),
    })
    .default({}),

  batch: z
    .object({
      item_delay_ms: z.number().min(0).default(1000),
      video_delay_ms: z.number().min(0).default(3000),
      item_timeout_ms: z.number().positive().default(30 * 60 * 1000),
      stall_timeout_ms: z.number().positive().default(60_000),
      max_consecutive_failures: z.number().int().positive().default(3),
      heartbeat_ms: z.number().positive().default(30_000),
      session_retention_ms: z.number().min(0).default(60_000),
      progress_save_every: z.number().int().positive().default(25),
    })
    .default({}),

  http: z
    .object({
      user_agent: z
        .string()
        .default('Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 stowaway/0.1'),
      fetch_timeout_ms: z.number().positive().default(30_000),
      download_timeout_ms: z.number().positive().default(10 * 60 * 1000),
    })
    .default({}),

  feed_sites: z.array(FeedSiteSchema).default([]),

  schedule: z
    .object({
      // Empty disables the scheduled sync.
      sync_cron: z.string().default(''),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.stowaway/stowaway.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type BatchSettings = Config['batch'];
export type HttpSettings = Config['http'];

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  const defaults = generateDefaultConfig();
  return yamlStringify(defaults);
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('stowaway', {
    searchPlaces: [
      'stowaway.config.yaml',
      'stowaway.config.yml',
      '.stowawayrc.yaml',
      '.stowawayrc.yml',
    ],
  });

  const envConfigPath = process.env['STOWAWAY_CONFIG'];
  const defaultConfigPath = path.join(getStowawayDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  applyEnvOverrides(rawConfig, process.env);

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Fold STOWAWAY_DOWNLOAD_DIR / STOWAWAY_SEARCH_DIR into the raw config in place.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): void {
  const downloadDir = env['STOWAWAY_DOWNLOAD_DIR']?.trim();
  const searchDir = env['STOWAWAY_SEARCH_DIR']?.trim();
  if (!downloadDir && !searchDir) return;

  const current = rawConfig['downloads'];
  const downloads: Record<string, unknown> = isRecord(current) ? { ...current } : {};
  if (downloadDir) downloads['base_dir'] = downloadDir;
  if (searchDir) downloads['search_dir'] = searchDir;
  rawConfig['downloads'] = downloads;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * Absolute download base directory for a loaded config.
 */
export function resolveBaseDir(config: Config): string {
  return resolvePath(config.downloads.base_dir);
}

/**
 * Absolute search directory; falls back to the download base directory.
 */
export function resolveSearchDir(config: Config, override?: string): string {
  const dir = override?.trim() || config.downloads.search_dir.trim();
  return dir ? resolvePath(dir) : resolveBaseDir(config);
}
