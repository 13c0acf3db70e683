// src/logger.ts
// Console logging with chalk colouring and key=value fields.
// Everything goes to stderr so stdout stays free for CSV/JSON output.

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const LEVEL_TAG: Record<LogLevel, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red.bold('ERROR'),
};

export type LogWriter = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  fields?: LogFields;
  /** Defaults to console.error. */
  write?: LogWriter;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) ? JSON.stringify(value) : value;
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minRank = LEVEL_RANK[options.level ?? 'info'];
  const write: LogWriter = options.write ?? ((line) => console.error(line));
  const baseFields = options.fields ?? {};
  const scope = options.scope ? chalk.magenta(`[${options.scope}]`) + ' ' : '';

  const log = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_RANK[level] < minRank) {
      return;
    }
    const rendered = formatFields({ ...baseFields, ...fields });
    const line = `${LEVEL_TAG[level]} ${scope}${message}${rendered ? ' ' + chalk.gray(rendered) : ''}`;
    write(line, level);
  };

  return {
    debug: (message, fields) => log('debug', message, fields),
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (message, fields) => log('error', message, fields),
    child: (fields) => createLogger({ ...options, fields: { ...baseFields, ...fields } }),
  };
}

/** Drops everything; for library callers that do not care. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
