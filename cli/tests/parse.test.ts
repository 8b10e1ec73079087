import { describe, it, expect } from 'vitest';
import {
  parseArgs,
  getFlag,
  getFlagBool,
  hasFlag,
  parseIntegerFlag,
  parseHostPort,
} from '../src/lib/parse.js';

describe('parseArgs', () => {
  it('parses a simple command', () => {
    const result = parseArgs(['node', 'index.js', 'ping']);
    expect(result.command).toBe('ping');
    expect(result.args).toEqual([]);
    expect(result.flags).toEqual({});
  });

  it('parses command with positional args', () => {
    const result = parseArgs(['node', 'index.js', 'get', 'notes.txt', 'copy.txt']);
    expect(result.command).toBe('get');
    expect(result.args).toEqual(['notes.txt', 'copy.txt']);
  });

  it('parses long flags with values', () => {
    const result = parseArgs(['node', 'index.js', 'put', 'a.bin', '--host', '10.0.0.5']);
    expect(result.command).toBe('put');
    expect(result.args).toEqual(['a.bin']);
    expect(result.flags.host).toBe('10.0.0.5');
  });

  it('parses short flags with values', () => {
    const result = parseArgs(['node', 'index.js', 'get', 'a.bin', '-o', 'out.bin']);
    expect(result.flags.o).toBe('out.bin');
    expect(result.args).toEqual(['a.bin']);
  });

  it('parses boolean flags', () => {
    const result = parseArgs(['node', 'index.js', 'get', '--json', '--quiet']);
    expect(result.flags.json).toBe(true);
    expect(result.flags.quiet).toBe(true);
  });

  it('keeps a positional after a known boolean flag', () => {
    const result = parseArgs(['node', 'index.js', 'get', '--quiet', 'notes.txt']);
    expect(result.flags.quiet).toBe(true);
    expect(result.args).toEqual(['notes.txt']);
  });

  it('treats an unknown flag before a dash as boolean', () => {
    const result = parseArgs(['node', 'index.js', 'serve', '--trace', '--port', '7000']);
    expect(result.flags.trace).toBe(true);
    expect(result.flags.port).toBe('7000');
  });

  it('parses --no- prefixed flags as false', () => {
    const result = parseArgs(['node', 'index.js', 'ping', '--no-color']);
    expect(result.flags.color).toBe(false);
  });

  it('finds the command after global flags', () => {
    const result = parseArgs(['node', 'index.js', '--host', 'files.local', '--verbose', 'delete', 'old.log']);
    expect(result.command).toBe('delete');
    expect(result.args).toEqual(['old.log']);
    expect(result.flags).toEqual({ host: 'files.local', verbose: true });
  });

  it('collects repeated value flags into an array', () => {
    const result = parseArgs(['node', 'index.js', 'ping', '--host', 'a', '--host', 'b', '--host', 'c']);
    expect(result.flags.host).toEqual(['a', 'b', 'c']);
  });

  it('handles -- separator', () => {
    const result = parseArgs(['node', 'index.js', 'get', '--', '-odd-name', '--weird']);
    expect(result.command).toBe('get');
    expect(result.args).toEqual(['-odd-name', '--weird']);
  });

  it('returns empty command with no args', () => {
    const result = parseArgs(['node', 'index.js']);
    expect(result.command).toBe('');
    expect(result.args).toEqual([]);
  });
});

describe('getFlag', () => {
  it('returns string flag value', () => {
    expect(getFlag({ host: 'files.local' }, 'host')).toBe('files.local');
  });

  it('returns first matching key', () => {
    expect(getFlag({ o: 'x.bin' }, 'output', 'o')).toBe('x.bin');
  });

  it('returns the last value of a repeated flag', () => {
    expect(getFlag({ host: ['a', 'b'] }, 'host')).toBe('b');
  });

  it('ignores booleans', () => {
    expect(getFlag({ host: true }, 'host')).toBeUndefined();
  });
});

describe('getFlagBool', () => {
  it('returns boolean values only', () => {
    expect(getFlagBool({ color: false }, 'color')).toBe(false);
    expect(getFlagBool({ force: true }, 'force', 'f')).toBe(true);
    expect(getFlagBool({ color: 'yes' }, 'color')).toBeUndefined();
  });
});

describe('hasFlag', () => {
  it('checks any of the keys', () => {
    expect(hasFlag({ f: true }, 'force', 'f')).toBe(true);
    expect(hasFlag({}, 'force', 'f')).toBe(false);
  });
});

describe('parseIntegerFlag', () => {
  it('accepts integers in range', () => {
    expect(parseIntegerFlag('port', '6969', 1, 65535)).toBe(6969);
    expect(parseIntegerFlag('port', ' 0 ', 0, 65535)).toBe(0);
  });

  it('rejects other input', () => {
    expect(() => parseIntegerFlag('retries', '0', 1, 100)).toThrow(
      'Invalid --retries: "0". Must be an integer from 1 to 100.'
    );
    expect(() => parseIntegerFlag('port', '12ab', 1, 65535)).toThrow('Invalid --port');
    expect(() => parseIntegerFlag('port', '', 1, 65535)).toThrow('Invalid --port');
  });
});

describe('parseHostPort', () => {
  it('parses a bare host', () => {
    expect(parseHostPort('files.local')).toEqual({ host: 'files.local' });
  });

  it('splits host and port', () => {
    expect(parseHostPort('10.0.0.5:7000')).toEqual({ host: '10.0.0.5', port: 7000 });
  });

  it('unwraps bracketed IPv6 literals', () => {
    expect(parseHostPort('[::1]:6969')).toEqual({ host: '::1', port: 6969 });
    expect(parseHostPort('[fe80::1]')).toEqual({ host: 'fe80::1', port: undefined });
  });

  it('keeps unbracketed IPv6 literals whole', () => {
    expect(parseHostPort('::1')).toEqual({ host: '::1' });
  });

  it('rejects empty input and bad ports', () => {
    expect(() => parseHostPort('  ')).toThrow('Host must not be empty.');
    expect(() => parseHostPort(':7000')).toThrow('Invalid host: ":7000".');
    expect(() => parseHostPort('files.local:99999')).toThrow('Invalid --host');
  });
});
