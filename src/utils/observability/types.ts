export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Correlation fields carried on every record. `requestId` is set per HTTP
 * request, `runId` per analysis batch, `messageId` per analyzed email.
 */
export type LogContext = {
  requestId?: string;
  runId?: string;
  messageId?: string;
  domain?: string;
  [key: string]: unknown;
};

export type LogData = Record<string, unknown>;

export type AppLogRecord = {
  timestamp: string;
  level: LogLevel;
  event: string;
} & LogContext & LogData;

export interface AppLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  child(context: LogContext): AppLogger;
}
