import type { ParsedFlags } from '../lib/parse.js';
import {
  setConfigValue,
  unsetConfigValue,
  getConfigValue,
  resetConfig,
  getConfigPath,
  describeConfig,
} from '../lib/config-store.js';
import { printHeader, printKeyValue, printSuccess, dim, printBlank, isJson } from '../lib/output.js';
import { exitUsage } from '../lib/errors.js';

const ACTIONS = 'set, unset, get, list, reset, or path';

function listConfig(): void {
  const entries = describeConfig();

  if (isJson()) {
    console.log(JSON.stringify(Object.fromEntries(entries.map((e) => [e.key, { value: e.value ?? null, source: e.source }])), null, 2));
    return;
  }

  printHeader('tftpx Configuration');
  for (const entry of entries) {
    const shown = entry.value === undefined ? dim('(not set)') : String(entry.value);
    const note = entry.source === 'default' ? dim(' (default)') : '';
    printKeyValue(entry.key, `${shown}${note}  ${dim(entry.description)}`);
  }
  printBlank();
  console.log(`  ${dim(`Config file: ${getConfigPath()}`)}`);
  printBlank();
}

export async function run(args: string[], _flags: ParsedFlags): Promise<void> {
  const [action, key] = args;

  switch (action) {
    case 'set': {
      const value = args.slice(2).join(' ');
      if (!key || !value) exitUsage('Usage: tftpx config set <key> <value>');
      setConfigValue(key, value);
      printSuccess(`${key} = ${String(getConfigValue(key))}`);
      break;
    }

    case 'unset': {
      if (!key) exitUsage('Usage: tftpx config unset <key>');
      unsetConfigValue(key);
      const fallback = getConfigValue(key);
      printSuccess(fallback === undefined ? `${key} cleared.` : `${key} back to default (${String(fallback)}).`);
      break;
    }

    case 'get': {
      if (!key) exitUsage('Usage: tftpx config get <key>');
      const val = getConfigValue(key);
      console.log(val !== undefined ? String(val) : dim('(not set)'));
      break;
    }

    case 'list':
      listConfig();
      break;

    case 'reset':
      resetConfig();
      printSuccess('Configuration reset to defaults.');
      break;

    case 'path':
      console.log(getConfigPath());
      break;

    default:
      exitUsage(
        action
          ? `Unknown config action: "${action}". Use: ${ACTIONS}.`
          : 'Usage: tftpx config <set|unset|get|list|reset|path>',
      );
  }
}
