import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { DEFAULT_CONTROL_PORT, DEFAULT_MAX_ATTEMPTS, DEFAULT_RECEIVE_TIMEOUT_MS } from '@tftpx/core';

export interface TftpxCliConfig {
  /** Default server host for get/put/delete/ping. */
  host?: string;
  /** Control port, for clients and for `serve`. */
  port?: number;
  /** Per-attempt wait in milliseconds. */
  timeout?: number;
  /** Attempts per block. */
  retries?: number;
  /** Directory `serve` shares. */
  root?: string;
}

export type ConfigKey = keyof TftpxCliConfig;

const DEFAULT_CONFIG: TftpxCliConfig = {
  host: undefined,
  port: DEFAULT_CONTROL_PORT,
  timeout: DEFAULT_RECEIVE_TIMEOUT_MS,
  retries: DEFAULT_MAX_ATTEMPTS,
  root: undefined,
};

const VALID_KEYS: readonly ConfigKey[] = ['host', 'port', 'timeout', 'retries', 'root'];

function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming'), 'tftpx');
  }
  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', 'tftpx');
  }
  return path.join(process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), 'tftpx');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/**
 * Keep only known keys with the right types; anything else in the file is ignored.
 */
function sanitize(raw: unknown): TftpxCliConfig {
  if (typeof raw !== 'object' || raw === null) return {};
  const out: TftpxCliConfig = {};
  const entries = new Map<string, unknown>(Object.entries(raw));

  const host = entries.get('host');
  if (typeof host === 'string' && host) out.host = host;
  const root = entries.get('root');
  if (typeof root === 'string' && root) out.root = root;

  for (const key of ['port', 'timeout', 'retries'] as const) {
    const value = entries.get(key);
    if (typeof value === 'number' && Number.isInteger(value)) out[key] = value;
  }
  return out;
}

/**
 * Values actually present in the config file, without defaults filled in.
 */
export function readStoredConfig(): TftpxCliConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(getConfigPath(), 'utf-8');
  } catch {
    return {};
  }
  try {
    return sanitize(JSON.parse(raw));
  } catch {
    // Unreadable JSON counts as empty; `config reset` rewrites the file.
    return {};
  }
}

export function readConfig(): TftpxCliConfig {
  return { ...DEFAULT_CONFIG, ...readStoredConfig() };
}

export function writeConfig(config: TftpxCliConfig): void {
  const configPath = getConfigPath();
  const dir = path.dirname(configPath);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

export function isConfigKey(key: string): key is ConfigKey {
  return VALID_KEYS.some((k) => k === key);
}

export function validateConfigKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: "${key}". Valid keys: ${VALID_KEYS.join(', ')}`);
  }
  return key;
}

export function getConfigValue(key: string): string | number | undefined {
  return readConfig()[validateConfigKey(key)];
}

function parseInteger(key: string, value: string, min: number, max: number): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || n < min || n > max) {
    throw new Error(`Invalid value for ${key}: "${value}". Must be an integer from ${min} to ${max}.`);
  }
  return n;
}

export function setConfigValue(key: string, value: string): void {
  const configKey = validateConfigKey(key);
  const config = readConfig();

  switch (configKey) {
    case 'port':
      config.port = parseInteger('port', value, 1, 65535);
      break;
    case 'timeout':
      config.timeout = parseInteger('timeout', value, 1, 600_000);
      break;
    case 'retries':
      config.retries = parseInteger('retries', value, 1, 100);
      break;
    case 'root':
      config.root = path.resolve(value);
      break;
    case 'host':
      if (/\s/.test(value)) {
        throw new Error(`Invalid value for host: "${value}". Must not contain whitespace.`);
      }
      config.host = value;
      break;
  }

  writeConfig(config);
}

/** Drop `key` from the file so its default applies again. */
export function unsetConfigValue(key: string): void {
  const configKey = validateConfigKey(key);
  const stored = readStoredConfig();
  delete stored[configKey];
  writeConfig(stored);
}

export type ConfigSource = 'file' | 'default' | 'unset';

export interface ConfigEntry {
  key: ConfigKey;
  value: string | number | undefined;
  source: ConfigSource;
  description: string;
}

const KEY_DESCRIPTIONS: Record<ConfigKey, string> = {
  host: 'Server for get, put, delete and ping',
  port: 'Control port (client and serve)',
  timeout: 'Wait per attempt in ms',
  retries: 'Attempts per block',
  root: 'Directory shared by serve',
};

/**
 * Every known key with its effective value and where that value comes from.
 */
export function describeConfig(): ConfigEntry[] {
  const stored = readStoredConfig();
  const defaults = getDefaults();
  return VALID_KEYS.map((key): ConfigEntry => {
    const fromFile = stored[key];
    const fallback = defaults[key];
    return {
      key,
      value: fromFile ?? fallback,
      source: fromFile !== undefined ? 'file' : fallback !== undefined ? 'default' : 'unset',
      description: KEY_DESCRIPTIONS[key],
    };
  });
}

export function resetConfig(): void {
  writeConfig({});
}

export function getDefaults(): TftpxCliConfig {
  return { ...DEFAULT_CONFIG };
}
