/**
 * Structured logging for the engine.
 *
 * Lines look like `[2024-01-01T00:00:00.000Z] Executor:debug - executed [line="ls" duration=3]`
 * and go to stderr, so they never mix with captured command output.
 */

import { bold, cyan, dim, red, yellow } from './colors.js';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  error(component: string, message: string, context?: LogContext): void;
  warn(component: string, message: string, context?: LogContext): void;
  info(component: string, message: string, context?: LogContext): void;
  debug(component: string, message: string, context?: LogContext): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Defaults to process.stderr */
  stream?: { write(chunk: string): unknown; isTTY?: boolean };
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
};

const COLOR: Record<LogLevel, (s: string) => string> = {
  [LogLevel.ERROR]: red,
  [LogLevel.WARN]: yellow,
  [LogLevel.INFO]: cyan,
  [LogLevel.DEBUG]: dim,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'error': return LogLevel.ERROR;
    case 'warn':
    case 'warning': return LogLevel.WARN;
    case 'info': return LogLevel.INFO;
    case 'debug': return LogLevel.DEBUG;
    default: return undefined;
  }
}

/**
 * Format context object for readable output
 */
export function formatContext(context: LogContext): string {
  const entries = Object.entries(context);
  if (entries.length === 0) {
    return '';
  }

  const formatted = entries
    .map(([key, value]) => {
      if (typeof value === 'string') {
        return `${key}="${value}"`;
      }
      if (value instanceof Error) {
        return `${key}="${value.message}"`;
      }
      if (value !== null && typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` [${formatted}]`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? LogLevel.WARN];
  const stream = options.stream ?? process.stderr;
  const color = stream.isTTY === true;

  const log = (level: LogLevel, component: string, message: string, context?: LogContext): void => {
    if (SEVERITY[level] > threshold) return;
    const timestamp = new Date().toISOString();
    const tag = `${component}:${level}`;
    const contextStr = context ? formatContext(context) : '';
    const head = color ? `${dim(`[${timestamp}]`)} ${COLOR[level](bold(tag))}` : `[${timestamp}] ${tag}`;
    stream.write(`${head} - ${message}${contextStr}\n`);
  };

  return {
    error: (component, message, context) => log(LogLevel.ERROR, component, message, context),
    warn: (component, message, context) => log(LogLevel.WARN, component, message, context),
    info: (component, message, context) => log(LogLevel.INFO, component, message, context),
    debug: (component, message, context) => log(LogLevel.DEBUG, component, message, context),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
};
