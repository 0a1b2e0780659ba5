import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

/**
 * Levelled logger writing to the console and, optionally, an append-only file.
 * Console output is suppressed during test runs.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  setLevel(level: LogLevel): void;
}

export interface LoggerOptions {
  name: string;
  level?: LogLevel;
  file?: string;
}

const isTestMode = (): boolean => {
  return process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';
};

export const formatLogLine = (name: string, level: LogLevel, message: string, at: Date = new Date()): string => {
  return `${at.toISOString()} - ${name} - ${level.toUpperCase()} - ${message}`;
};

export function createLogger(options: LoggerOptions): Logger {
  let threshold = LEVEL_ORDER[options.level ?? 'info'];
  let fileReady = false;

  const writeFile = (line: string): void => {
    if (!options.file) return;
    if (!fileReady) {
      mkdirSync(dirname(options.file), { recursive: true });
      fileReady = true;
    }
    appendFileSync(options.file, line + '\n');
  };

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = formatLogLine(options.name, level, message);
    writeFile(line);
    if (isTestMode()) return;
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    setLevel: (level) => {
      threshold = LEVEL_ORDER[level];
    },
  };
}
