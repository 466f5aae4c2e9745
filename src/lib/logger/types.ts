/**
 * Log level enum for filtering logs by severity
 * Lower numbers = more important/higher priority
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  NOTICE = 2, // Normal but significant condition
  SUCCESS = 3,
  // eslint-disable-next-line @typescript-eslint/no-duplicate-enum-values
  INFO = 3, // Same level as SUCCESS (routine operational info)
  DEBUG = 4,
  RAW = 99,
}

export type LogType =
  | 'error'
  | 'warn'
  | 'notice'
  | 'success'
  | 'info'
  | 'debug'
  | 'raw';

/**
 * Level names accepted from configuration (`STACKCTL_LOG_LEVEL`)
 */
export const LOG_LEVEL_NAMES = [
  'error',
  'warn',
  'notice',
  'info',
  'debug',
] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export function getLogLevel(type: LogType): LogLevel {
  switch (type) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'notice':
      return LogLevel.NOTICE;
    case 'success':
      return LogLevel.SUCCESS;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
    case 'raw':
      return LogLevel.RAW;
  }
}

export function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}

/**
 * Options for log methods
 */
export interface LogOptions {
  params?: Record<string, unknown>;
  tags?: string[];
  /** Param keys to redact, dot notation for nested keys (`env.PASSWORD`) */
  redactedKeys?: string[];
}

/**
 * Complete log entry that gets passed to sinks
 */
export interface LogEntry {
  timestamp: number;
  type: LogType;
  serviceName?: string; // Component scope, e.g. 'supervisor'
  entityName?: string; // Managed service the entry is about, e.g. 'db'
  template: string; // "Service {{name}} exited with code {{code}}"
  message: string; // Rendered from redactedParams, never from raw params
  params?: Record<string, unknown>;
  redactedParams?: Record<string, unknown>;
  redactedKeys?: string[];
  error?: unknown; // Original error object from errorObject() calls
  tags?: string[];
}

export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  close?(): void | Promise<void>;
}

export type RedactFunction = (keyName: string, value: unknown) => unknown;

/**
 * Receives a log entry and returns either a transformed entry or false to keep the original.
 */
export type ArrayLogTransformer = (entry: LogEntry) => LogEntry | false;

export interface LoggerOptions {
  sinks?: LogSink[];
  redactFunction?: RedactFunction;
  /** Keys redacted on every entry, in addition to the per-call `redactedKeys` */
  redactedKeys?: string[];
  onSinkError?: (
    error: Error,
    context: 'write' | 'close',
    sink: LogSink,
  ) => void;
}

/**
 * Options the logger and its scoped services pass to the shared log handler
 */
export interface HandleLogOptions extends LogOptions {
  serviceName?: string;
  entityName?: string;
  error?: unknown;
}

export type HandleLog = (
  type: LogType,
  template: string,
  options?: HandleLogOptions,
) => void;
