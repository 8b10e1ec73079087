import type { Logger } from '@tftpx/core';
import { printLogLine } from './output.js';

export interface CliLoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Logger for the core library that prints through the CLI's output helpers.
 * `quiet` keeps warnings and errors only; `verbose` adds debug lines.
 */
export function createCliLogger(opts: CliLoggerOptions = {}): Logger {
  return {
    debug: (message) => {
      if (opts.verbose && !opts.quiet) printLogLine('debug', message);
    },
    info: (message) => {
      if (!opts.quiet) printLogLine('info', message);
    },
    warn: (message) => printLogLine('warn', message),
    error: (message) => printLogLine('error', message),
  };
}
