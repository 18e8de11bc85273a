import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let logFile = path.join(os.tmpdir(), 'aima.log');
let minLevel: LogLevel = 'info';

export function configureLogging(options: { file?: string; level?: LogLevel }): void {
  if (options.file) logFile = options.file;
  if (options.level) minLevel = options.level;
}

export function currentLogFile(): string {
  return logFile;
}

function sanitizeLogValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'symbol') return String(value);
  return value;
}

function stringifyLogData(data: unknown): string {
  if (typeof data === 'undefined') return '';
  const seen = new WeakSet<object>();
  try {
    return JSON.stringify(data, (_key, value: unknown) => {
      const sanitized = sanitizeLogValue(value);
      if (sanitized !== null && typeof sanitized === 'object') {
        if (seen.has(sanitized)) return '[circular]';
        seen.add(sanitized);
      }
      return sanitized;
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return JSON.stringify({
      logger_error: 'log_serialize_failed',
      message,
    });
  }
}

export function log(message: string, data?: unknown): void {
  try {
    const timestamp = new Date().toISOString();
    const payload = stringifyLogData(data);
    const logEntry = `[${timestamp}] ${message}${payload ? ` ${payload}` : ''}\n`;
    fs.appendFileSync(logFile, logEntry);
  } catch {
    // unwritable log file; the line is dropped
  }
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    log(`[${scope}] ${level}: ${message}`, data);
  };
  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}
