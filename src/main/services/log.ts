/**
 * Log Service
 *
 * Tagged console logging ('[FFMPEG] ...', '[RENDER] ...') with an optional
 * file sink. The file sink prefixes every line with an ISO timestamp and is
 * truncated when it grew past MAX_LOG_SIZE_BYTES before the session started.
 */

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_LOG_SIZE_BYTES = 100 * 1024 * 1024;

export interface LoggingOptions {
  level?: LogLevel;
  /** absolute or relative path of a log file to append to */
  file?: string;
}

let minLevel: LogLevel = 'info';
let sink: fs.WriteStream | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export function configureLogging(options: LoggingOptions): void {
  if (options.level) minLevel = options.level;
  if (options.file && !sink) {
    const file = path.resolve(options.file);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    let flags = 'a';
    if (fs.existsSync(file) && fs.statSync(file).size > MAX_LOG_SIZE_BYTES) {
      flags = 'w';
    }
    sink = fs.createWriteStream(file, { flags });
    sink.write(`\n=== Session started at ${new Date().toISOString()} (${process.platform}) ===\n`);
  }
}

export function closeLogging(): Promise<void> {
  const current = sink;
  sink = null;
  if (!current) return Promise.resolve();
  return new Promise((resolve, reject) => {
    current.end(`=== Session ended at ${new Date().toISOString()} ===\n`, () => resolve());
    current.once('error', reject);
  });
}

function format(value: unknown): string {
  if (value instanceof Error) return value.stack ?? value.message;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export interface Logger {
  debug(message: string, ...data: unknown[]): void;
  info(message: string, ...data: unknown[]): void;
  warn(message: string, ...data: unknown[]): void;
  error(message: string, ...data: unknown[]): void;
}

/**
 * Create a logger whose lines start with `[TAG]`.
 *
 * @example
 * const log = createLogger('FFMPEG');
 * log.info('executing:', args.join(' '));
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const write = (level: LogLevel, message: string, data: unknown[]) => {
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return;
    const consoleFn =
      level === 'error' ? console.error : level === 'warn' ? console.warn : level === 'debug' ? console.debug : console.log;
    consoleFn(prefix, message, ...data);
    if (sink) {
      const extra = data.length > 0 ? ' ' + data.map(format).join(' ') : '';
      sink.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${prefix} ${message}${extra}\n`);
    }
  };

  return {
    debug: (message, ...data) => write('debug', message, data),
    info: (message, ...data) => write('info', message, data),
    warn: (message, ...data) => write('warn', message, data),
    error: (message, ...data) => write('error', message, data),
  };
}
