/**
 * Logger
 *
 * Console output for the operator plus an append-only log file that keeps
 * debug detail and rotates to <file>.1 at a fixed size.
 */

import { appendFileSync, mkdirSync, renameSync, statSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** 10 MiB */
export const DEFAULT_MAX_LOG_BYTES = 10 * 1024 * 1024;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  logFile?: string;
  maxBytes?: number;
  consoleLevel?: LogLevel;
  fileLevel?: LogLevel;
  /** Console sink, replaceable in tests */
  write?: (level: LogLevel, line: string) => void;
  now?: () => Date;
}

/**
 * Create a logger writing to the console and, when logFile is set, to a rotating file
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const consoleLevel = LEVEL_ORDER[options.consoleLevel ?? 'info'];
  const fileLevel = LEVEL_ORDER[options.fileLevel ?? 'debug'];
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_LOG_BYTES;
  const now = options.now ?? (() => new Date());
  const write = options.write ?? writeToConsole;

  if (options.logFile) {
    mkdirSync(dirname(options.logFile), { recursive: true });
  }

  const log = (level: LogLevel, message: string): void => {
    const line = `[${now().toISOString()}] [${level.toUpperCase()}] ${message}`;
    if (LEVEL_ORDER[level] >= consoleLevel) {
      write(level, line);
    }
    if (options.logFile && LEVEL_ORDER[level] >= fileLevel) {
      appendWithRotation(options.logFile, `${line}\n`, maxBytes);
    }
  };

  return {
    debug: message => log('debug', message),
    info: message => log('info', message),
    warn: message => log('warn', message),
    error: (message, error) => log('error', error === undefined ? message : `${message}\n${formatError(error)}`),
  };
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Append to the log file, first moving it to <file>.1 if the line would push it past maxBytes
 */
export function appendWithRotation(logFile: string, text: string, maxBytes: number): void {
  const size = statSync(logFile, { throwIfNoEntry: false })?.size ?? 0;
  if (size > 0 && size + Buffer.byteLength(text) > maxBytes) {
    renameSync(logFile, `${logFile}.1`);
  }
  appendFileSync(logFile, text, 'utf-8');
}

/**
 * Render an error with its context fields and stack trace
 *
 * @example
 * formatError(new ParseError('bad value', 4, 'X'))
 * // => 'ParseError: bad value {"row_number":4,"column":"X"}\n    at ...'
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const context: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    // Subclasses assign name in their constructors, which makes it enumerable
    if (key !== 'name' && value !== undefined) {
      context[key] = value;
    }
  }

  const header = `${error.name}: ${error.message}` +
    (Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '');
  // The first stack line repeats name and message
  const frames = error.stack?.split('\n').slice(1).join('\n');
  return frames ? `${header}\n${frames}` : header;
}
