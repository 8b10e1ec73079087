/**
 * Minimal logging surface used by the server, sessions and client.
 * Consumers (the CLI, tests) inject their own implementation.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines. Defaults to false. */
  verbose?: boolean;
}

/**
 * Console logger that prefixes every line with `[scope]`.
 */
export function createConsoleLogger(scope: string, opts: ConsoleLoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message) => {
      if (opts.verbose) console.debug(`${prefix} ${message}`);
    },
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
