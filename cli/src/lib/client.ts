import { TftpxClient, type Logger } from '@tftpx/core';
import { readConfig } from './config-store.js';
import { createCliLogger } from './logger.js';
import { getFlag, parseHostPort, parseIntegerFlag, type ParsedFlags } from './parse.js';
import { exitError } from './errors.js';
import { isJson, isQuiet, isVerbose } from './output.js';

export interface ClientSettings {
  host: string;
  port: number;
  timeoutMs: number;
  maxAttempts: number;
}

/**
 * Merge flags over the saved configuration. `--host` may carry a port (`host:port`);
 * an explicit `--port` wins over it.
 */
export function resolveClientSettings(flags: ParsedFlags): ClientSettings | null {
  const config = readConfig();
  const hostInput = getFlag(flags, 'host', 'H') ?? config.host;
  if (!hostInput) return null;

  const { host, port: inlinePort } = parseHostPort(hostInput);
  const portFlag = getFlag(flags, 'port', 'p');
  const timeoutFlag = getFlag(flags, 'timeout');
  const retriesFlag = getFlag(flags, 'retries');

  return {
    host,
    port: portFlag !== undefined ? parseIntegerFlag('port', portFlag, 1, 65535) : inlinePort ?? config.port ?? 6969,
    timeoutMs: timeoutFlag !== undefined ? parseIntegerFlag('timeout', timeoutFlag, 1, 600_000) : config.timeout ?? 3000,
    maxAttempts: retriesFlag !== undefined ? parseIntegerFlag('retries', retriesFlag, 1, 100) : config.retries ?? 3,
  };
}

export function createClient(flags: ParsedFlags): TftpxClient {
  const settings = resolveClientSettings(flags);
  if (!settings) {
    exitError(
      'No host configured.\n  Run: tftpx config set host <address>  (or pass --host)',
    );
  }

  return new TftpxClient({
    ...settings,
    logger: createClientLogger(),
  });
}

/**
 * Protocol log for client commands. `--verbose` shows debug lines; `--quiet` and
 * `--json` keep stdout to the command's own output.
 */
export function createClientLogger(): Logger {
  return createCliLogger({ verbose: isVerbose(), quiet: isQuiet() || isJson() });
}
