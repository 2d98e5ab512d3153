/**
 * Leveled, module-tagged logging through the console.
 */

import { resolveLogLevel, type LogLevel } from './config.js';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(module: string, message: string, context?: LogContext): void;
  info(module: string, message: string, context?: LogContext): void;
  warn(module: string, message: string, context?: LogContext): void;
  error(module: string, message: string, error?: unknown, context?: LogContext): void;
}

type Sink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function formatLine(level: LogLevel, module: string, message: string, context?: LogContext): string {
  const line = `[${level}] [${module}] ${message}`;
  if (!context || Object.keys(context).length === 0) return line;
  return `${line} ${JSON.stringify(context)}`;
}

export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: Sink;

  constructor(minLevel: LogLevel = resolveLogLevel(), sink: Sink = console) {
    this.minLevel = minLevel;
    this.sink = sink;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel];
  }

  debug(module: string, message: string, context?: LogContext): void {
    if (this.enabled('debug')) this.sink.debug(formatLine('debug', module, message, context));
  }

  info(module: string, message: string, context?: LogContext): void {
    if (this.enabled('info')) this.sink.info(formatLine('info', module, message, context));
  }

  warn(module: string, message: string, context?: LogContext): void {
    if (this.enabled('warn')) this.sink.warn(formatLine('warn', module, message, context));
  }

  error(module: string, message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled('error')) return;
    const withError = error === undefined
      ? context
      : { ...context, error: error instanceof Error ? `${error.name}: ${error.message}` : String(error) };
    this.sink.error(formatLine('error', module, message, withError));
  }
}

/** Discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

let defaultLogger: Logger | null = null;

/**
 * Shared console logger, created on first use at the configured level.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) defaultLogger = new ConsoleLogger();
  return defaultLogger;
}
