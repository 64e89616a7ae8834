/**
 * Leveled stderr logger. stdout is reserved for exported documents, so every
 * level (including info) goes to stderr.
 */
import { format } from 'util';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('debug'),
  info: chalk.cyan('info'),
  warn: chalk.yellow('warn'),
  error: chalk.red('error'),
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  process.stderr.write(`${LABELS[level]} ${format(message, ...args)}\n`);
}

export const logger = {
  debug: (message: string, ...args: unknown[]): void => write('debug', message, args),
  info: (message: string, ...args: unknown[]): void => write('info', message, args),
  warn: (message: string, ...args: unknown[]): void => write('warn', message, args),
  error: (message: string, ...args: unknown[]): void => write('error', message, args),
};
