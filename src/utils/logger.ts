import { appendFile, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { paths } from './paths.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const levelPriority: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LoggerSettings {
  level: LogLevel;
  /** Log files go to `<dataDir>/logs/relay-<date>.log` */
  dataDir: string;
}

let settings: LoggerSettings = { level: 'info', dataDir: paths.dataDir };

/** Apply validated settings; the server entry point calls this once config is loaded. */
export function configureLogger(next: Partial<LoggerSettings>): void {
  settings = { ...settings, ...next };
}

export function getLoggerSettings(): LoggerSettings {
  return { ...settings };
}

export type LogData = Record<string, unknown> & {
  /** A caught value; written as its message */
  error?: unknown;
};

function serialize(data: LogData | undefined): Record<string, unknown> | undefined {
  if (!data || !('error' in data)) return data;
  const { error } = data;
  return { ...data, error: error instanceof Error ? error.message : String(error) };
}

function write(level: LogLevel, message: string, data?: LogData): void {
  if (levelPriority[level] < levelPriority[settings.level]) return;

  const logDir = join(settings.dataDir, 'logs');
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const entry = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...serialize(data),
  });

  const date = new Date().toISOString().split('T')[0];
  appendFile(join(logDir, `relay-${date}.log`), entry + '\n', (err) => {
    if (err) {
      process.stderr.write(`Logger error: ${err.message}\n`);
    }
  });
}

export const logger = {
  debug: (message: string, data?: LogData) => write('debug', message, data),
  info: (message: string, data?: LogData) => write('info', message, data),
  warn: (message: string, data?: LogData) => write('warn', message, data),
  error: (message: string, data?: LogData) => write('error', message, data),
};

export type Logger = typeof logger;
