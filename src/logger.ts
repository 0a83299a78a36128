/**
 * binrec — logging
 *
 * A thin winston wrapper. The writer and reader log block-level events at
 * `debug` and corruption at `warn`; a library consumer sees nothing unless
 * BINREC_LOG_LEVEL (or an explicit level) turns it up.
 */

import { createLogger as createWinston, format, transports, type Logger as Winston } from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export type LogFormat = 'human' | 'json';

export type Context =
  | string
  | number
  | boolean
  | bigint
  | null
  | readonly Context[]
  | { readonly [property: string]: Context };

export type LogHandler = (message: string, context?: Context) => void;

export interface Logger {
  error:   LogHandler;
  warn:    LogHandler;
  info:    LogHandler;
  verbose: LogHandler;
  debug:   LogHandler;
  /** A logger tagged with a sub-module name, sharing this logger's transport. */
  child(module: string): Logger;
}

export interface LoggerOptions {
  module?: string;
  level?:  LogLevel;
  format?: LogFormat;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug'];

function isLogLevel(s: string | undefined): s is LogLevel {
  return s !== undefined && (LOG_LEVELS as readonly string[]).includes(s);
}

const envLevel = process.env['BINREC_LOG_LEVEL'];

export const defaultLogLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

// ─── Formats ──────────────────────────────────────────────────────────────────

interface InfoArg {
  level:      string;
  message:    unknown;
  module?:    unknown;
  timestamp?: unknown;
  context?:   unknown;
}

function stringifyContext(context: unknown): string {
  if (context === undefined) return '';
  // bigint is not JSON-serializable; print it as a decimal literal.
  return JSON.stringify(context, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));
}

function humanTemplate(info: InfoArg): string {
  const module = typeof info.module === 'string' ? info.module : '';
  const parts = [
    typeof info.timestamp === 'string' ? info.timestamp : undefined,
    `[${module.toUpperCase()}]`,
    `${info.level}:`,
    String(info.message),
    stringifyContext(info.context),
  ];
  return parts.filter(s => s !== undefined && s !== '').join(' ');
}

function getFormat(fmt: LogFormat): ReturnType<typeof format.combine> {
  switch (fmt) {
    case 'json':
      return format.combine(
        format.timestamp(),
        format(info => {
          if (info['context'] !== undefined) info['context'] = stringifyContext(info['context']);
          return info;
        })(),
        format.json(),
      );
    case 'human':
      return format.combine(
        format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        format.printf(info => humanTemplate(info)),
      );
  }
}

// ─── Logger ───────────────────────────────────────────────────────────────────

class WinstonLogger implements Logger {
  constructor(private readonly winston: Winston) {}

  error(message: string, context?: Context): void {
    this.winston.log('error', message, { context });
  }

  warn(message: string, context?: Context): void {
    this.winston.log('warn', message, { context });
  }

  info(message: string, context?: Context): void {
    this.winston.log('info', message, { context });
  }

  verbose(message: string, context?: Context): void {
    this.winston.log('verbose', message, { context });
  }

  debug(message: string, context?: Context): void {
    this.winston.log('debug', message, { context });
  }

  child(module: string): Logger {
    return new WinstonLogger(this.winston.child({ module }));
  }
}

/** Create a logger writing to stderr through winston's console transport. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const winston = createWinston({
    level:       options.level ?? defaultLogLevel,
    defaultMeta: { module: options.module ?? 'binrec' },
    format:      getFormat(options.format ?? 'human'),
    transports:  [new transports.Console({ stderrLevels: [...LOG_LEVELS] })],
    exitOnError: false,
  });
  return new WinstonLogger(winston);
}

let sharedLogger: Logger | undefined;

/** The process-wide logger used when a writer or reader is given none. */
export function getDefaultLogger(): Logger {
  sharedLogger ??= createLogger();
  return sharedLogger;
}
