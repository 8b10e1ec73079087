import { parseArgs, hasFlag } from './lib/parse.js';
import type { ParsedFlags } from './lib/parse.js';
import { displayError, EXIT_SUCCESS, EXIT_USAGE } from './lib/errors.js';
import { printError, printHint, printBlank, bold, dim, cyan, showCursor } from './lib/output.js';

import * as serveCmd from './commands/serve.js';
import * as getCmd from './commands/get.js';
import * as putCmd from './commands/put.js';
import * as deleteCmd from './commands/delete.js';
import * as pingCmd from './commands/ping.js';
import * as configCmd from './commands/config.js';

const COMMANDS = ['serve', 'get', 'put', 'delete', 'ping', 'config'] as const;
type Command = typeof COMMANDS[number];

const commandMap: Record<Command, { run: (args: string[], flags: ParsedFlags) => Promise<void> }> = {
  serve: serveCmd,
  get: getCmd,
  put: putCmd,
  delete: deleteCmd,
  ping: pingCmd,
  config: configCmd,
};

const CLI_VERSION = process.env.TFTPX_CLI_VERSION || '1.0.0';

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function printVersion(): void {
  console.log(`tftpx v${CLI_VERSION}`);
}

function printHelp(): void {
  console.log();
  console.log(`  ${bold('tftpx')} ${dim(`v${CLI_VERSION}`)}`);
  console.log(`  ${dim('File transfers over UDP with per-block CRC-8 checks.')}`);
  console.log();
  console.log(`  ${bold('Usage:')}`);
  console.log(`    tftpx ${cyan('<command>')} [options]`);
  console.log();
  console.log(`  ${bold('Commands:')}`);
  console.log(`    ${cyan('serve')}      Share a directory`);
  console.log(`    ${cyan('get')}        Download a file from a server`);
  console.log(`    ${cyan('put')}        Upload a file to a server`);
  console.log(`    ${cyan('delete')}     Delete a file on a server`);
  console.log(`    ${cyan('ping')}       Check that a server is answering`);
  console.log(`    ${cyan('config')}     Manage CLI configuration`);
  console.log();
  console.log(`  ${bold('Global Options:')}`);
  console.log(`    --host <host[:port]>  Server to talk to (overrides config)`);
  console.log(`    --port <n>            Control port ${dim('default: 6969')}`);
  console.log(`    --timeout <ms>        Wait per attempt ${dim('default: 3000')}`);
  console.log(`    --retries <n>         Attempts per block ${dim('default: 3')}`);
  console.log(`    --no-color            Disable colored output`);
  console.log(`    --quiet               Suppress non-essential output`);
  console.log(`    --verbose             Show protocol debug output`);
  console.log(`    --json                Output results as JSON`);
  console.log(`    --version             Show CLI version`);
  console.log(`    --help                Show this help text`);
  console.log();
  console.log(`  ${bold('Examples:')}`);
  console.log(`    ${dim('# Share the current directory')}`);
  console.log(`    tftpx serve .`);
  console.log();
  console.log(`    ${dim('# Configure the default server')}`);
  console.log(`    tftpx config set host 192.168.1.20`);
  console.log();
  console.log(`    ${dim('# Upload and download')}`);
  console.log(`    tftpx put notes.txt`);
  console.log(`    tftpx get notes.txt -o copy.txt`);
  console.log();
}

function printCommandHelp(command: string): void {
  switch (command) {
    case 'serve':
      console.log();
      console.log(`  ${bold('tftpx serve')} - Share a directory`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    tftpx serve [dir] [options]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    -r, --root <dir>          Directory to share ${dim('default: config root or current dir')}`);
      console.log(`    -p, --port <n>            Control port, 0 for any ${dim('default: 6969')}`);
      console.log(`    -b, --bind <address>      Address to bind ${dim('default: 0.0.0.0')}`);
      console.log(`    --backup-dir <dir>        Where uploads are copied ${dim('default: <root>/backup')}`);
      console.log(`    --send-timeout <ms>       ACK wait per attempt ${dim('default: 1000')}`);
      console.log(`    --receive-timeout <ms>    DATA wait per attempt ${dim('default: 3000')}`);
      console.log(`    --retries <n>             Attempts per block ${dim('default: 3')}`);
      console.log(`    --verbose                 Log every session event`);
      console.log();
      break;

    case 'get':
      console.log();
      console.log(`  ${bold('tftpx get')} - Download a file`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    tftpx get <remote-name> [local-path] [options]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    -o, --output <path>       File or directory to save to ${dim('default: ./<remote-name>')}`);
      console.log(`    -f, --force               Overwrite an existing local file`);
      console.log(`    --host <host[:port]>      Server (overrides config)`);
      console.log(`    --quiet                   Only print the saved path`);
      console.log(`    --json                    Output result as JSON`);
      console.log();
      break;

    case 'put':
      console.log();
      console.log(`  ${bold('tftpx put')} - Upload a file`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    tftpx put <file> [remote-name] [options]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    --as <name>               Remote file name ${dim('default: local base name')}`);
      console.log(`    --host <host[:port]>      Server (overrides config)`);
      console.log(`    --quiet                   Only print the remote name`);
      console.log(`    --json                    Output result as JSON`);
      console.log();
      break;

    case 'delete':
      console.log();
      console.log(`  ${bold('tftpx delete')} - Delete a file on the server`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    tftpx delete <remote-name> [--host <host[:port]>]`);
      console.log();
      break;

    case 'ping':
      console.log();
      console.log(`  ${bold('tftpx ping')} - Check that a server is answering`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    tftpx ping [--host <host[:port]>] [options]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    -c, --count <n>           Number of probes ${dim('default: 1')}`);
      console.log(`    --timeout <ms>            Wait per probe ${dim('default: 3000')}`);
      console.log(`    --json                    Output as JSON`);
      console.log();
      break;

    case 'config':
      console.log();
      console.log(`  ${bold('tftpx config')} - Manage CLI configuration`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    tftpx config <action> [key] [value]`);
      console.log();
      console.log(`  ${bold('Actions:')}`);
      console.log(`    set <key> <value>         Set a configuration value`);
      console.log(`    unset <key>               Remove a value so its default applies`);
    console.log(`    get <key>                 Get a configuration value`);
      console.log(`    list                      Show every key and where its value comes from`);
      console.log(`    reset                     Reset to defaults`);
      console.log(`    path                      Show config file location`);
      console.log();
      console.log(`  ${bold('Keys:')}`);
      console.log(`    host                      Default server host`);
      console.log(`    port                      Control port (e.g. 6969)`);
      console.log(`    timeout                   Wait per attempt in ms (e.g. 3000)`);
      console.log(`    retries                   Attempts per block (e.g. 3)`);
      console.log(`    root                      Directory shared by serve`);
      console.log();
      break;

    default:
      printHelp();
  }
}

async function main(): Promise<void> {
  const { command, args, flags } = parseArgs(process.argv);

  // Global flags
  if (hasFlag(flags, 'version')) {
    printVersion();
    process.exit(EXIT_SUCCESS);
  }

  if (!command) {
    printHelp();
    process.exit(EXIT_SUCCESS);
  }

  // Command-level help
  if (hasFlag(flags, 'help', 'h')) {
    printCommandHelp(command);
    process.exit(EXIT_SUCCESS);
  }

  if (!isCommand(command)) {
    printError(`Unknown command: "${command}"`);
    printHint('Run "tftpx --help" to see available commands.');
    printBlank();
    process.exit(EXIT_USAGE);
  }

  try {
    await commandMap[command].run(args, flags);
  } catch (err) {
    showCursor(); // Ensure cursor is visible on error
    const exitCode = displayError(err);
    printBlank();
    process.exit(exitCode);
  }
}

// Ensure cursor is restored on exit
process.on('exit', () => showCursor());
process.on('uncaughtException', (err) => {
  showCursor();
  displayError(err);
  printBlank();
  process.exit(1);
});

main().catch((err: unknown) => {
  showCursor();
  displayError(err);
  printBlank();
  process.exit(1);
});
