import fs from 'node:fs';
import path from 'node:path';
import { NodeFileStore, TftpxServer, formatAddress } from '@tftpx/core';
import type { ParsedFlags } from '../lib/parse.js';
import { getFlag, parseIntegerFlag } from '../lib/parse.js';
import { readConfig } from '../lib/config-store.js';
import { createCliLogger } from '../lib/logger.js';
import { printHeader, printKeyValue, printBlank, dim, boldCyan, isQuiet, isVerbose } from '../lib/output.js';
import { exitUsage } from '../lib/errors.js';

export async function run(args: string[], flags: ParsedFlags): Promise<void> {
  const config = readConfig();
  const root = path.resolve(args[0] ?? getFlag(flags, 'root', 'r') ?? config.root ?? '.');
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    exitUsage(`Not a directory: ${root}`);
  }

  const portFlag = getFlag(flags, 'port', 'p');
  const sendTimeout = getFlag(flags, 'send-timeout');
  const receiveTimeout = getFlag(flags, 'receive-timeout');
  const retries = getFlag(flags, 'retries');
  const quiet = isQuiet();

  const store = new NodeFileStore({ root, backupDir: getFlag(flags, 'backup-dir') });
  const server = new TftpxServer({
    store,
    host: getFlag(flags, 'bind', 'b'),
    port: portFlag !== undefined ? parseIntegerFlag('port', portFlag, 0, 65535) : config.port,
    sendTimeoutMs: sendTimeout !== undefined ? parseIntegerFlag('send-timeout', sendTimeout, 1, 600_000) : undefined,
    receiveTimeoutMs: receiveTimeout !== undefined
      ? parseIntegerFlag('receive-timeout', receiveTimeout, 1, 600_000)
      : undefined,
    maxAttempts: retries !== undefined ? parseIntegerFlag('retries', retries, 1, 100) : config.retries,
    logger: createCliLogger({ verbose: isVerbose(), quiet }),
  });

  const address = await server.start();

  if (!quiet) {
    printHeader('tftpx Server');
    printKeyValue('Listening', boldCyan(formatAddress(address)));
    printKeyValue('Root', root);
    printKeyValue('Backups', store.backupDir);
    printKeyValue('Timeouts', `${server.sendTimeoutMs}ms send, ${server.receiveTimeoutMs}ms receive`);
    printKeyValue('Retries', String(server.maxAttempts));
    printBlank();
    console.log(`  ${dim('Press Ctrl+C to stop.')}`);
    printBlank();
  }

  await new Promise<void>((resolve, reject) => {
    let stopping = false;
    const shutdown = () => {
      if (stopping) {
        process.exit(130);
      }
      stopping = true;
      server.stop().then(resolve, reject);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

  if (!quiet) {
    printBlank();
    console.log(`  ${dim('Server stopped.')}`);
    printBlank();
  }
}
