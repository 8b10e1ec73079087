import { formatAddress, TftpxTimeoutError } from '@tftpx/core';
import type { ParsedFlags } from '../lib/parse.js';
import { getFlag, parseIntegerFlag } from '../lib/parse.js';
import { createClient } from '../lib/client.js';
import { printBlank, printSuccess, printWarning, dim, isJson, isQuiet } from '../lib/output.js';
import { formatDuration } from '../lib/format.js';

export async function run(_args: string[], flags: ParsedFlags): Promise<void> {
  const countFlag = getFlag(flags, 'count', 'c');
  const count = countFlag !== undefined ? parseIntegerFlag('count', countFlag, 1, 1000) : 1;
  const client = createClient(flags);
  const json = isJson();
  const quiet = isQuiet();

  const rtts: number[] = [];
  let lastError: unknown = null;
  if (!json && !quiet) printBlank();

  for (let i = 0; i < count; i++) {
    try {
      const { server, rttMs } = await client.ping();
      rtts.push(rttMs);
      if (!json && !quiet) {
        printSuccess(`Reply from ${formatAddress(server)} ${dim(`time=${formatDuration(rttMs)}`)}`);
      }
    } catch (err) {
      if (!(err instanceof TftpxTimeoutError)) throw err;
      lastError = err;
      if (!json && !quiet) printWarning(`No reply from ${client.host}:${client.port}`);
    }
  }

  if (json) {
    console.log(JSON.stringify({ host: client.host, port: client.port, sent: count, received: rtts.length, rttMs: rtts }, null, 2));
  } else if (!quiet) {
    printBlank();
  }

  // Every probe lost: report as a timeout so the exit code reflects it.
  if (rtts.length === 0 && lastError) throw lastError;
}
