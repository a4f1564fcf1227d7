import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

let threshold: LogLevel = process.env.DEVLOG_DEBUG === '1' ? 'debug' : 'info';

/** Lowest level written to stderr; `--verbose`/`--quiet` set it per run. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function write(level: LogLevel, msg: string): void {
  if (SEVERITY[level] < SEVERITY[threshold]) return;
  console.error(STYLE[level](`[${level}] ${msg}`));
}

export function debug(msg: string): void {
  write('debug', msg);
}

export function info(msg: string): void {
  write('info', msg);
}

export function warn(msg: string): void {
  write('warn', msg);
}

export function error(msg: string): void {
  write('error', msg);
}
