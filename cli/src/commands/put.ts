import fs from 'node:fs';
import path from 'node:path';
import type { TransferProgressEvent } from '@tftpx/core';
import type { ParsedFlags } from '../lib/parse.js';
import { getFlag } from '../lib/parse.js';
import { createClient } from '../lib/client.js';
import { openLocalSource } from '../lib/file-source.js';
import { ProgressRenderer } from '../lib/progress.js';
import { formatBytes, formatBlocks, formatDuration, formatTransferSize } from '../lib/format.js';
import {
  printHeader,
  printKeyValue,
  printBlank,
  printSuccess,
  dim,
  isQuiet,
  isJson,
} from '../lib/output.js';
import { exitUsage } from '../lib/errors.js';

export async function run(args: string[], flags: ParsedFlags): Promise<void> {
  const localPath = args[0] ?? getFlag(flags, 'i', 'input');
  if (!localPath) {
    exitUsage('A local file is required. Usage: tftpx put <file> [remote-name]');
  }
  if (!fs.existsSync(localPath)) {
    exitUsage(`File not found: ${localPath}`);
  }

  const remoteName = getFlag(flags, 'as') ?? args[1] ?? path.basename(localPath);
  const source = await openLocalSource(localPath);

  const quiet = isQuiet();
  const json = isJson();
  const progress = new ProgressRenderer(remoteName);
  const abortController = new AbortController();

  // Graceful Ctrl+C
  let cancelCount = 0;
  const sigintHandler = () => {
    cancelCount++;
    if (cancelCount === 1) {
      abortController.abort();
    } else {
      process.exit(130);
    }
  };
  process.on('SIGINT', sigintHandler);

  try {
    const client = createClient(flags);

    if (!quiet && !json) {
      printHeader('tftpx Upload');
      printKeyValue('Server', `${client.host}:${client.port}`);
      printKeyValue('File', `${path.basename(localPath)} ${dim(`(${formatTransferSize(source.size)})`)}`);
      printKeyValue('Remote name', remoteName);
      printBlank();
    }

    const result = await client.upload(source, remoteName, {
      signal: abortController.signal,
      onProgress: (evt: TransferProgressEvent) => {
        if (!quiet && !json) progress.update(evt);
      },
    });
    progress.finish();

    if (json) {
      console.log(JSON.stringify({
        file: result.filename,
        bytes: result.bytes,
        blocks: result.blocks,
        elapsed: progress.getElapsedMs(),
      }, null, 2));
      return;
    }

    if (quiet) {
      console.log(result.filename);
      return;
    }

    printSuccess(`Uploaded ${formatBytes(result.bytes)} in ${formatBlocks(result.blocks)} ${dim(`(${formatDuration(progress.getElapsedMs())})`)}`);
    printBlank();
  } finally {
    progress.finish();
    process.removeListener('SIGINT', sigintHandler);
    await source.close();
  }
}
