import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getLogContext } from './context.js';
import { redactEmailAddress, redactSecrets } from './redaction.js';
import { isLogLevel, LOG_LEVELS, type AppLogger, type AppLogRecord, type LogContext, type LogData, type LogLevel } from './types.js';

let consoleMirroringInstalled = false;
let sinkHooksInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;


function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

function minimumLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  if (isLogLevel(raw)) {
    return raw;
  }
  return process.env.NODE_ENV === 'test' ? 'warn' : 'info';
}

function shouldWriteFileSink(): boolean {
  if (!isDevelopment()) return false;
  return process.env.APP_LOG_FILE !== 'off';
}

function resolveLogFilePath(): string {
  if (process.env.APP_LOG_FILE) return process.env.APP_LOG_FILE;

  const baseDir = process.env.APP_LOG_DIR || './logs';
  const dateDir = new Date().toISOString().slice(0, 10);
  return join(baseDir, dateDir, 'app.ndjson');
}

function closeFileSink(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  if (!shouldWriteFileSink()) return null;

  const filePath = resolveLogFilePath();
  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeFileSink();

  const dir = dirname(filePath);
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', (err) => {
      process.stderr.write(`log file sink disabled: ${err.message}\n`);
      fileSink = null;
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch (err) {
    process.stderr.write(`log file sink unavailable: ${err instanceof Error ? err.message : String(err)}\n`);
    return null;
  }
}

function writeLineToFile(line: string): void {
  const sink = ensureFileSink();
  if (!sink) return;
  sink.write(`${line}\n`);
}

function writeToStd(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'warn') {
    process.stderr.write(`${line}\n`);
    return;
  }
  process.stdout.write(`${line}\n`);
}

function toDisplayMessage(args: unknown[]): string {
  return args
    .map((arg) => {
      if (typeof arg === 'string') return arg;
      if (arg instanceof Error) return arg.message;
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    })
    .join(' ');
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  const mergedContext = { ...getLogContext(), ...baseContext };
  const payload = data ? redactSecrets(data) : {};
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...mergedContext,
    ...payload,
  };
}

function emitRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  if (LOG_LEVELS.indexOf(record.level) >= LOG_LEVELS.indexOf(minimumLevel())) {
    writeToStd(record.level, line);
  }
  writeLineToFile(line);
}

/**
 * Create a structured NDJSON logger. `baseContext` is merged into every
 * record, after the async context set by `withLogContext`.
 */
export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
    child: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}

export function initObservability(): void {
  if (!sinkHooksInstalled) {
    sinkHooksInstalled = true;
    process.once('exit', closeFileSink);
    process.once('SIGINT', closeFileSink);
    process.once('SIGTERM', closeFileSink);
  }

  if (consoleMirroringInstalled) return;
  if (!isDevelopment()) return;
  if (process.env.APP_MIRROR_CONSOLE === 'false') return;

  consoleMirroringInstalled = true;

  // Stray console output from libraries still lands in the dev log file.
  const install = (
    method: 'log' | 'info' | 'warn' | 'error' | 'debug',
    level: LogLevel,
  ): void => {
    const original = console[method].bind(console);
    console[method] = (...args: unknown[]) => {
      original(...args);

      const record: AppLogRecord = {
        timestamp: new Date().toISOString(),
        level,
        event: 'legacy_console',
        source: `console.${method}`,
        message: redactEmailAddress(toDisplayMessage(args)),
        ...getLogContext(),
      };
      writeLineToFile(JSON.stringify(record));
    };
  };

  install('log', 'info');
  install('info', 'info');
  install('warn', 'warn');
  install('error', 'error');
  install('debug', 'debug');
}
