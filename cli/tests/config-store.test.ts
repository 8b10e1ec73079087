import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  readConfig,
  writeConfig,
  setConfigValue,
  getConfigValue,
  resetConfig,
  validateConfigKey,
  getConfigPath,
  getDefaults,
  readStoredConfig,
  unsetConfigValue,
  describeConfig,
} from '../src/lib/config-store.js';

// Use a temporary directory for config during tests
let tmpDir: string;
let originalEnv: NodeJS.ProcessEnv;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tftpx-test-'));
  originalEnv = { ...process.env };

  if (process.platform === 'win32') {
    process.env.APPDATA = tmpDir;
  } else if (process.platform === 'darwin') {
    // Override HOME for macOS config path
    vi.stubEnv('HOME', tmpDir);
  } else {
    process.env.XDG_CONFIG_HOME = tmpDir;
  }
});

afterEach(() => {
  process.env = originalEnv;
  vi.unstubAllEnvs();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('validateConfigKey', () => {
  it('accepts valid keys', () => {
    expect(validateConfigKey('host')).toBe('host');
    expect(validateConfigKey('port')).toBe('port');
    expect(validateConfigKey('timeout')).toBe('timeout');
    expect(validateConfigKey('retries')).toBe('retries');
    expect(validateConfigKey('root')).toBe('root');
  });

  it('rejects invalid keys', () => {
    expect(() => validateConfigKey('unknown')).toThrow('Unknown config key');
    expect(() => validateConfigKey('')).toThrow('Unknown config key');
    expect(() => validateConfigKey('Host')).toThrow('Unknown config key');
  });
});

describe('setConfigValue', () => {
  it('rejects invalid ports', () => {
    expect(() => setConfigValue('port', 'abc')).toThrow('Invalid value for port: "abc". Must be an integer from 1 to 65535.');
    expect(() => setConfigValue('port', '0')).toThrow('Invalid value for port');
    expect(() => setConfigValue('port', '65536')).toThrow('Invalid value for port');
  });

  it('rejects invalid retries and timeouts', () => {
    expect(() => setConfigValue('retries', '0')).toThrow('Invalid value for retries');
    expect(() => setConfigValue('timeout', '-5')).toThrow('Invalid value for timeout');
    expect(() => setConfigValue('timeout', '1.5')).toThrow('Invalid value for timeout');
  });

  it('rejects hosts with whitespace', () => {
    expect(() => setConfigValue('host', 'my host')).toThrow('Invalid value for host');
  });

  it('rejects unknown keys', () => {
    expect(() => setConfigValue('unknown', 'value')).toThrow('Unknown config key');
  });

  it('persists numeric values as numbers', () => {
    setConfigValue('port', '7070');
    setConfigValue('retries', '5');
    expect(getConfigValue('port')).toBe(7070);
    expect(getConfigValue('retries')).toBe(5);
  });

  it('persists host value', () => {
    setConfigValue('host', '192.168.1.20');
    expect(getConfigValue('host')).toBe('192.168.1.20');
  });

  it('stores root as an absolute path', () => {
    setConfigValue('root', 'shared');
    expect(getConfigValue('root')).toBe(path.resolve('shared'));
  });
});

describe('readConfig / writeConfig', () => {
  it('returns defaults when no config file exists', () => {
    const config = readConfig();
    expect(config.host).toBeUndefined();
    expect(config.port).toBe(6969);
    expect(config.timeout).toBe(3000);
    expect(config.retries).toBe(3);
  });

  it('reads back written config', () => {
    writeConfig({ host: 'files.local', port: 7000, timeout: 500, retries: 4, root: '/srv/files' });
    expect(readConfig()).toEqual({ host: 'files.local', port: 7000, timeout: 500, retries: 4, root: '/srv/files' });
  });

  it('merges with defaults', () => {
    writeConfig({ host: 'files.local' });
    const config = readConfig();
    expect(config.host).toBe('files.local');
    expect(config.port).toBe(6969); // default
  });

  it('ignores unknown keys and wrong types in the file', () => {
    fs.mkdirSync(path.dirname(getConfigPath()), { recursive: true });
    fs.writeFileSync(getConfigPath(), JSON.stringify({ host: 42, port: '7000', retries: 2, extra: true }));
    const config = readConfig();
    expect(config.host).toBeUndefined();
    expect(config.port).toBe(6969);
    expect(config.retries).toBe(2);
    expect(Object.keys(config)).not.toContain('extra');
  });

  it('falls back to defaults on invalid JSON', () => {
    fs.mkdirSync(path.dirname(getConfigPath()), { recursive: true });
    fs.writeFileSync(getConfigPath(), '{ not json');
    expect(readConfig()).toEqual(getDefaults());
  });
});

describe('resetConfig', () => {
  it('resets to defaults', () => {
    setConfigValue('host', 'files.local');
    resetConfig();
    const config = readConfig();
    expect(config.host).toBeUndefined();
    expect(config.port).toBe(6969);
  });
});

describe('unsetConfigValue', () => {
  it('removes a key so its default applies again', () => {
    setConfigValue('port', '7000');
    setConfigValue('host', 'files.local');
    unsetConfigValue('port');
    expect(readStoredConfig()).toEqual({ host: 'files.local' });
    expect(getConfigValue('port')).toBe(6969);
  });

  it('rejects unknown keys', () => {
    expect(() => unsetConfigValue('color')).toThrow('Unknown config key: "color"');
  });
});

describe('describeConfig', () => {
  it('reports where each value comes from', () => {
    setConfigValue('host', 'files.local');
    setConfigValue('retries', '5');
    expect(describeConfig().map(({ key, value, source }) => ({ key, value, source }))).toEqual([
      { key: 'host', value: 'files.local', source: 'file' },
      { key: 'port', value: 6969, source: 'default' },
      { key: 'timeout', value: 3000, source: 'default' },
      { key: 'retries', value: 5, source: 'file' },
      { key: 'root', value: undefined, source: 'unset' },
    ]);
  });

  it('shows everything as default after a reset', () => {
    setConfigValue('port', '7000');
    resetConfig();
    expect(readStoredConfig()).toEqual({});
    expect(describeConfig().find((e) => e.key === 'port')).toMatchObject({ value: 6969, source: 'default' });
  });
});

describe('getDefaults', () => {
  it('returns default config', () => {
    const defaults = getDefaults();
    expect(defaults.host).toBeUndefined();
    expect(defaults.port).toBe(6969);
    expect(defaults.timeout).toBe(3000);
    expect(defaults.retries).toBe(3);
  });

  it('returns a copy (not mutable reference)', () => {
    const d1 = getDefaults();
    d1.host = 'modified';
    const d2 = getDefaults();
    expect(d2.host).toBeUndefined();
  });
});

describe('getConfigPath', () => {
  it('returns a path string', () => {
    const p = getConfigPath();
    expect(p).toContain('tftpx');
    expect(p.endsWith('config.json')).toBe(true);
  });
});
