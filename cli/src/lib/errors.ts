import {
  TftpxError,
  TftpxValidationError,
  TftpxNetworkError,
  TftpxTimeoutError,
  TftpxRetryExhaustedError,
  TftpxRemoteError,
  TftpxFileNotFoundError,
  TftpxDeleteFailedError,
  TftpxAbortError,
} from '@tftpx/core';
import { printError, printHint, printWarning, printBlank } from './output.js';

export const EXIT_SUCCESS = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;
export const EXIT_NETWORK = 3;
export const EXIT_PROTOCOL = 4;
export const EXIT_FS = 5;
export const EXIT_CANCELLED = 130;

export function displayError(err: unknown): number {
  if (err instanceof TftpxAbortError) {
    printWarning('Operation cancelled.');
    return EXIT_CANCELLED;
  }

  if (err instanceof TftpxValidationError) {
    printError(err.message);
    return EXIT_USAGE;
  }

  if (err instanceof TftpxNetworkError) {
    printError(err.message);
    printHint('Check that the host is correct and the server is running.');
    return EXIT_NETWORK;
  }

  if (err instanceof TftpxTimeoutError) {
    printError('Server did not respond.');
    printHint('Check the host and port, or raise --timeout.');
    return EXIT_NETWORK;
  }

  if (err instanceof TftpxRetryExhaustedError) {
    printError(err.message);
    printHint('The transfer stalled. Try again or raise --retries.');
    return EXIT_NETWORK;
  }

  if (err instanceof TftpxFileNotFoundError || err instanceof TftpxDeleteFailedError) {
    printError(`Server replied: ${err.message}`);
    return EXIT_PROTOCOL;
  }

  if (err instanceof TftpxRemoteError) {
    printError(`Server replied: ${err.message} (code ${err.code ?? 0})`);
    return EXIT_PROTOCOL;
  }

  if (err instanceof TftpxError) {
    printError(err.message);
    return EXIT_ERROR;
  }

  if (err instanceof Error) {
    if (err.message.includes('ENOENT') || err.message.includes('EACCES') || err.message.includes('EPERM')) {
      printError(err.message);
      return EXIT_FS;
    }
    printError(err.message);
    return EXIT_ERROR;
  }

  printError(String(err));
  return EXIT_ERROR;
}

export function exitUsage(message: string): never {
  printError(message);
  printHint('Run "tftpx --help" for usage information.');
  printBlank();
  process.exit(EXIT_USAGE);
}

export function exitError(message: string, code = EXIT_ERROR): never {
  printError(message);
  printBlank();
  process.exit(code);
}
