export interface ParsedFlags {
  [key: string]: string | string[] | boolean | undefined;
}

export interface ParsedArgs {
  command: string;
  args: string[];
  flags: ParsedFlags;
}

/** Flags that never take a value, so the next token stays positional. */
const BOOLEAN_FLAGS = new Set(['help', 'version', 'quiet', 'json', 'verbose', 'force']);
const BOOLEAN_SHORT_FLAGS = new Set(['h', 'q', 'v', 'f']);

function isBooleanFlag(arg: string): boolean {
  if (arg.startsWith('--no-')) return true;
  if (arg.startsWith('--')) return BOOLEAN_FLAGS.has(arg.slice(2));
  return arg.length === 2 && BOOLEAN_SHORT_FLAGS.has(arg.slice(1));
}

function setFlag(flags: ParsedFlags, key: string, value: string): void {
  const existing = flags[key];
  if (existing === undefined || typeof existing === 'boolean') {
    flags[key] = value;
  } else if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    flags[key] = [existing, value];
  }
}

export function parseArgs(argv: string[]): ParsedArgs {
  // Skip node executable and script path
  const raw = argv.slice(2);

  // Find the command: first positional arg that isn't a flag or flag value
  let command = '';
  let commandIndex = -1;
  for (let i = 0; i < raw.length; i++) {
    const arg = raw[i];
    if (arg === '--') break;
    if (arg.startsWith('-')) {
      if (!isBooleanFlag(arg)) i++; // skip the value
      continue;
    }
    command = arg;
    commandIndex = i;
    break;
  }

  const rest = commandIndex >= 0
    ? [...raw.slice(0, commandIndex), ...raw.slice(commandIndex + 1)]
    : raw;

  const args: string[] = [];
  const flags: ParsedFlags = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg === '--') {
      args.push(...rest.slice(i + 1));
      break;
    }

    if (arg.startsWith('--no-')) {
      flags[arg.slice(5)] = false;
      continue;
    }

    const isLong = arg.startsWith('--');
    const isShort = !isLong && arg.startsWith('-') && arg.length === 2;
    if (!isLong && !isShort) {
      args.push(arg);
      continue;
    }

    const key = arg.slice(isLong ? 2 : 1);
    const next = rest[i + 1];

    // Boolean flags (no value follows)
    if (isBooleanFlag(arg) || next === undefined || next.startsWith('-')) {
      flags[key] = true;
      continue;
    }

    i++;
    setFlag(flags, key, next);
  }

  return { command, args, flags };
}

export function getFlag(flags: ParsedFlags, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const val = flags[key];
    if (typeof val === 'string') return val;
    if (Array.isArray(val)) return val[val.length - 1];
  }
  return undefined;
}

export function getFlagBool(flags: ParsedFlags, ...keys: string[]): boolean | undefined {
  for (const key of keys) {
    const val = flags[key];
    if (typeof val === 'boolean') return val;
  }
  return undefined;
}

export function hasFlag(flags: ParsedFlags, ...keys: string[]): boolean {
  return keys.some(k => flags[k] !== undefined);
}

/**
 * Parse a whole-number flag value.
 * @throws {Error} If the value is not an integer within [min, max].
 */
export function parseIntegerFlag(name: string, value: string, min: number, max: number): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || n < min || n > max) {
    throw new Error(`Invalid --${name}: "${value}". Must be an integer from ${min} to ${max}.`);
  }
  return n;
}

export interface HostPort {
  host: string;
  port?: number;
}

/**
 * Split `host[:port]`. Bracketed IPv6 literals (`[::1]:6969`) are unwrapped.
 */
export function parseHostPort(input: string): HostPort {
  const value = input.trim();
  if (!value) throw new Error('Host must not be empty.');

  const bracketed = value.match(/^\[([^\]]+)\](?::(\d+))?$/);
  if (bracketed) {
    return {
      host: bracketed[1],
      port: bracketed[2] !== undefined ? parseIntegerFlag('host', bracketed[2], 1, 65535) : undefined,
    };
  }

  const parts = value.split(':');
  if (parts.length === 2) {
    if (!parts[0]) throw new Error(`Invalid host: "${input}".`);
    return { host: parts[0], port: parseIntegerFlag('host', parts[1], 1, 65535) };
  }
  return { host: value };
}
