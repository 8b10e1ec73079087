import type { TransferProgressEvent } from '@tftpx/core';
import type { ParsedFlags } from '../lib/parse.js';
import { getFlag, hasFlag } from '../lib/parse.js';
import { createClient } from '../lib/client.js';
import { discardPartial, openLocalSink, resolveLocalTarget } from '../lib/file-source.js';
import { ProgressRenderer } from '../lib/progress.js';
import { formatBytes, formatBlocks, formatDuration } from '../lib/format.js';
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
  const remoteName = args[0];
  if (!remoteName) {
    exitUsage('A remote file name is required.');
  }

  const target = resolveLocalTarget(remoteName, getFlag(flags, 'o', 'output') ?? args[1]);
  if (target.existed && !hasFlag(flags, 'force', 'f')) {
    exitUsage(`File already exists: ${target.path}. Use --force to overwrite.`);
  }

  const client = createClient(flags);
  const quiet = isQuiet();
  const json = isJson();

  if (!quiet && !json) {
    printHeader('tftpx Download');
    printKeyValue('Server', `${client.host}:${client.port}`);
    printKeyValue('File', remoteName);
    printKeyValue('Saving to', target.path);
    printBlank();
  }

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

  const sink = await openLocalSink(target.path);
  let completed = false;
  try {
    const result = await client.download(remoteName, sink, {
      signal: abortController.signal,
      onProgress: (evt: TransferProgressEvent) => {
        if (!quiet && !json) progress.update(evt);
      },
    });
    completed = true;
    progress.finish();

    if (json) {
      console.log(JSON.stringify({
        file: result.filename,
        path: target.path,
        bytes: result.bytes,
        blocks: result.blocks,
        elapsed: progress.getElapsedMs(),
      }, null, 2));
      return;
    }

    if (quiet) {
      console.log(target.path);
      return;
    }

    printSuccess(`Downloaded ${formatBytes(result.bytes)} in ${formatBlocks(result.blocks)} ${dim(`(${formatDuration(progress.getElapsedMs())})`)}`);
    printBlank();
  } finally {
    progress.finish();
    process.removeListener('SIGINT', sigintHandler);
    await sink.close();
    if (!completed) discardPartial(target.path);
  }
}
