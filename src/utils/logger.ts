/**
 * Levelled console logging for the minute book splitter
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

let currentLogLevel: LogLevel = LogLevel.INFO;

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

/**
 * Parse a level name from the environment, falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').trim().toUpperCase();
  return LEVEL_ORDER.find(level => level === normalized) ?? LogLevel.INFO;
}

function stringifyData(data: unknown): string {
  if (data instanceof Error) {
    return data.message;
  }
  if (typeof data === 'object' && data !== null) {
    return JSON.stringify(data);
  }
  return String(data);
}

export function formatMessage(level: LogLevel, message: string, data?: unknown): string {
  const line = `[${new Date().toISOString()}] [${level}] ${message}`;
  return data !== undefined ? `${line} - ${stringifyData(data)}` : line;
}

const CONSOLE_METHODS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: line => console.debug(line),
  [LogLevel.INFO]: line => console.info(line),
  [LogLevel.WARN]: line => console.warn(line),
  [LogLevel.ERROR]: line => console.error(line),
};

function log(level: LogLevel, message: string, data?: unknown): void {
  if (LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(currentLogLevel)) {
    CONSOLE_METHODS[level](formatMessage(level, message, data));
  }
}

export const logger = {
  debug: (message: string, data?: unknown) => log(LogLevel.DEBUG, message, data),
  info: (message: string, data?: unknown) => log(LogLevel.INFO, message, data),
  warn: (message: string, data?: unknown) => log(LogLevel.WARN, message, data),
  error: (message: string, data?: unknown) => log(LogLevel.ERROR, message, data),
};
