/**
 * Scoped console logger.
 *
 * Lines go to stderr so that `--format json` output on stdout stays parseable.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.blue('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/** `UI_PARITY_LOG_LEVEL` wins over the configured level. */
export function resolveLogLevel(configured?: LogLevel): LogLevel {
  const fromEnv = process.env.UI_PARITY_LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return configured ?? 'info';
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Output sink, defaults to console.error. */
  write?: (line: string) => void;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel();
  const write = options.write ?? ((line: string) => console.error(line));
  const threshold = LEVEL_ORDER[level];

  const emit = (lvl: Exclude<LogLevel, 'silent'>, message: string) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    write(`${LEVEL_TAGS[lvl]} ${chalk.cyan(`[${scope}]`)} ${message}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    child: (child) => createLogger(`${scope}:${child}`, { level, write }),
  };
}

export const silentLogger: Logger = createLogger('silent', { level: 'silent' });

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
