import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { SetupError } from './sync/errors.js';
import { DEFAULT_CACHE_FILE } from './sync/cache.js';
import { DEFAULT_DIR_MODE, DEFAULT_FILE_MODE } from './sync/metadata.js';
import { LOG_LEVELS, parseLogLevel, type LogLevel } from './utils/logger.js';

export interface CliConfig {
  region?: string;
  endpoint?: string;
  forcePathStyle: boolean;
  profile?: string;
  cacheEnabled: boolean;
  cacheDir: string;
  cacheFile: string;
  dirMode: number;
  fileMode: number;
  logLevel: LogLevel;
  logDir?: string;
}

export type ConfigKey = keyof CliConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'region',
  'endpoint',
  'forcePathStyle',
  'profile',
  'cacheEnabled',
  'cacheDir',
  'cacheFile',
  'dirMode',
  'fileMode',
  'logLevel',
  'logDir',
];

const fileConfigSchema = z.object({
  region: z.string().optional(),
  endpoint: z.string().optional(),
  forcePathStyle: z.boolean().optional(),
  profile: z.string().optional(),
  cacheEnabled: z.boolean().optional(),
  cacheDir: z.string().optional(),
  cacheFile: z.string().optional(),
  dirMode: z.number().int().nonnegative().optional(),
  fileMode: z.number().int().nonnegative().optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  logDir: z.string().optional(),
});

type FileConfig = z.infer<typeof fileConfigSchema>;

export function getConfigDir(): string {
  return process.env.METASYNC_CONFIG_DIR || path.join(os.homedir(), '.metasync');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

export function defaultConfig(): CliConfig {
  return {
    forcePathStyle: false,
    cacheEnabled: false,
    cacheDir: path.join(getConfigDir(), 'cache'),
    cacheFile: DEFAULT_CACHE_FILE,
    dirMode: DEFAULT_DIR_MODE,
    fileMode: DEFAULT_FILE_MODE,
    logLevel: 'info',
  };
}

function readRawConfig(): Record<string, unknown> {
  const file = getConfigPath();
  if (!fs.existsSync(file)) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    // Unreadable config falls back to defaults
    return {};
  }
}

/**
 * Read the persisted config file. Malformed files are ignored.
 */
export function loadFileConfig(): FileConfig {
  const result = fileConfigSchema.safeParse(readRawConfig());
  return result.success ? result.data : {};
}

/**
 * Resolve config from defaults, the config file and environment variables,
 * in increasing order of precedence. Command-line flags are applied on top
 * by the caller.
 */
export function loadConfig(): CliConfig {
  const config: CliConfig = { ...defaultConfig(), ...loadFileConfig() };

  if (process.env.METASYNC_REGION) config.region = process.env.METASYNC_REGION;
  if (process.env.METASYNC_ENDPOINT) config.endpoint = process.env.METASYNC_ENDPOINT;
  if (process.env.METASYNC_CACHE_DIR) config.cacheDir = process.env.METASYNC_CACHE_DIR;
  if (process.env.AWS_PROFILE) config.profile = process.env.AWS_PROFILE;
  if (process.env.METASYNC_LOG_LEVEL) {
    try {
      config.logLevel = parseLogLevel(process.env.METASYNC_LOG_LEVEL);
    } catch {
      // Keep the file/default level
    }
  }

  return config;
}

export function saveConfig(config: Partial<CliConfig>): void {
  const dir = getConfigDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const merged = { ...readRawConfig(), ...config };
  fs.writeFileSync(getConfigPath(), JSON.stringify(merged, null, 2) + '\n');
}

const CONFIG_KEY_SET: ReadonlySet<string> = new Set(CONFIG_KEYS);

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEY_SET.has(key);
}

function parseBoolean(key: string, value: string): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new SetupError(`${key} must be true or false, got "${value}"`);
}

function parseMode(key: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new SetupError(`${key} must be a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Convert a command-line string into the typed value stored under `key`.
 */
export function coerceConfigValue(key: ConfigKey, value: string): Partial<CliConfig> {
  switch (key) {
    case 'forcePathStyle':
      return { forcePathStyle: parseBoolean(key, value) };
    case 'cacheEnabled':
      return { cacheEnabled: parseBoolean(key, value) };
    case 'dirMode':
      return { dirMode: parseMode(key, value) };
    case 'fileMode':
      return { fileMode: parseMode(key, value) };
    case 'logLevel':
      try {
        return { logLevel: parseLogLevel(value) };
      } catch (err) {
        throw new SetupError(err instanceof Error ? err.message : String(err), err);
      }
    case 'region':
      return { region: value };
    case 'endpoint':
      return { endpoint: value };
    case 'profile':
      return { profile: value };
    case 'cacheDir':
      return { cacheDir: value };
    case 'cacheFile':
      return { cacheFile: value };
    case 'logDir':
      return { logDir: value };
  }
}

export function setConfigValue(key: string, value: string): void {
  if (!isConfigKey(key)) {
    throw new SetupError(`Unknown config key "${key}" (expected one of ${CONFIG_KEYS.join(', ')})`);
  }
  saveConfig(coerceConfigValue(key, value));
}
