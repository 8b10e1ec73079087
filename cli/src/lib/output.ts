const noColor = process.argv.includes('--no-color') || !process.stdout.isTTY || process.env.NO_COLOR !== undefined;

const esc = (code: string) => (text: string) => noColor ? text : `\x1b[${code}m${text}\x1b[0m`;

export const bold = esc('1');
export const dim = esc('2');
export const red = esc('31');
export const green = esc('32');
export const yellow = esc('33');
export const cyan = esc('36');
export const boldCyan = (text: string) => bold(cyan(text));

export function printHeader(title: string): void {
  console.log();
  console.log(` ${bold(title)}`);
  console.log();
}

export function printKeyValue(key: string, value: string, indent = 2): void {
  const pad = ' '.repeat(indent);
  console.log(`${pad}${dim(key.padEnd(16))}${value}`);
}

export function printSuccess(message: string): void {
  console.log(`  ${green('✔')} ${message}`);
}

export function printError(message: string): void {
  console.error();
  console.error(`  ${red('✘')} ${bold('Error:')} ${message}`);
}

export function printWarning(message: string): void {
  console.log(`  ${yellow('⚠')} ${message}`);
}

export function printHint(message: string): void {
  console.error(`  ${dim(message)}`);
}

export function printBlank(): void {
  console.log();
}

/** Timestamped line for long-running commands such as `serve`. */
export function printLogLine(level: 'debug' | 'info' | 'warn' | 'error', message: string): void {
  const time = dim(new Date().toISOString().slice(11, 19));
  switch (level) {
    case 'debug':
      console.log(`  ${time} ${dim(message)}`);
      break;
    case 'info':
      console.log(`  ${time} ${message}`);
      break;
    case 'warn':
      console.warn(`  ${time} ${yellow(message)}`);
      break;
    case 'error':
      console.error(`  ${time} ${red(message)}`);
      break;
  }
}

export function clearLine(): void {
  if (process.stdout.isTTY) {
    process.stdout.write('\x1b[2K\r');
  }
}

export function hideCursor(): void {
  if (process.stdout.isTTY) {
    process.stdout.write('\x1b[?25l');
  }
}

export function showCursor(): void {
  if (process.stdout.isTTY) {
    process.stdout.write('\x1b[?25h');
  }
}

export function isQuiet(): boolean {
  return process.argv.includes('--quiet') || process.argv.includes('-q');
}

export function isJson(): boolean {
  return process.argv.includes('--json');
}

export function isVerbose(): boolean {
  return process.argv.includes('--verbose') || process.argv.includes('-v');
}
