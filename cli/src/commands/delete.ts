import type { ParsedFlags } from '../lib/parse.js';
import { createClient } from '../lib/client.js';
import { printBlank, printSuccess, isJson, isQuiet } from '../lib/output.js';
import { exitUsage } from '../lib/errors.js';

export async function run(args: string[], flags: ParsedFlags): Promise<void> {
  const remoteName = args[0];
  if (!remoteName) {
    exitUsage('A remote file name is required.');
  }

  const client = createClient(flags);
  const result = await client.delete(remoteName);

  if (isJson()) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }
  if (isQuiet()) return;

  printBlank();
  printSuccess(`${result.filename}: ${result.message}`);
  printBlank();
}
