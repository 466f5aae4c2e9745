import { CurlyBrackets } from '../curly-brackets';
import { isPromise } from '../is-promise';
import type {
  HandleLogOptions,
  LogEntry,
  LogOptions,
  LogSink,
  LogType,
  LoggerOptions,
  RedactFunction,
} from './types';
import { ArraySink } from './sinks/array';
import { applyRedaction, defaultRedactFunction } from './utils/redaction';
import { prepareErrorObjectLog } from './utils/error-object';
import { LoggerService } from './logger-service';

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Sink-based logger. Every entry is rendered once and handed to each sink;
 * sinks decide themselves what to show (level filtering, colors).
 *
 * Templates use `{{param}}` placeholders. The rendered message is built from
 * the redacted params, so a secret passed as a param never reaches a sink in
 * clear text.
 */
export class Logger {
  private sinks: LogSink[];
  private redactFunction: RedactFunction;
  private redactedKeys: string[];
  private onSinkError?: LoggerOptions['onSinkError'];
  private _closed = false;

  constructor(options: LoggerOptions = {}) {
    this.sinks = options.sinks ?? [];
    this.redactFunction = options.redactFunction ?? defaultRedactFunction;
    this.redactedKeys = options.redactedKeys ?? [];
    this.onSinkError = options.onSinkError;
  }

  public get closed(): boolean {
    return this._closed;
  }

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  /**
   * Log an error object, rendered as a key/value table, with an optional prefix
   */
  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    this.handleLog('error', prepareErrorObjectLog(prefix, error), {
      ...options,
      error,
    });
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  /**
   * Log a raw message without any formatting
   */
  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  /**
   * Create a scoped logger with a service name
   */
  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), serviceName);
  }

  /**
   * Add keys redacted on every entry from now on
   */
  public addRedactedKeys(keys: string[]): void {
    for (const key of keys) {
      if (!this.redactedKeys.includes(key)) {
        this.redactedKeys.push(key);
      }
    }
  }

  public addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  /**
   * Returns true if the sink was found and removed
   */
  public removeSink(sink: LogSink): boolean {
    const index = this.sinks.indexOf(sink);

    if (index === -1) {
      return false;
    }

    this.sinks.splice(index, 1);
    return true;
  }

  public getSinks(): readonly LogSink[] {
    return [...this.sinks];
  }

  /**
   * Close all sinks. Entries logged after closing are dropped.
   */
  public async close(): Promise<void> {
    this._closed = true;

    await Promise.all(
      this.sinks.map(async (sink) => {
        try {
          await sink.close?.();
        } catch (error) {
          this.handleSinkError(toError(error), 'close', sink);
        }
      }),
    );

    this.sinks = [];
  }

  /**
   * Logger writing only to an ArraySink, for tests
   */
  public static createTestOptimizedLogger(
    options: Omit<LoggerOptions, 'sinks'> = {},
  ): { logger: Logger; arraySink: ArraySink } {
    const arraySink = new ArraySink();

    return {
      logger: new Logger({ ...options, sinks: [arraySink] }),
      arraySink,
    };
  }

  protected handleLog(
    type: LogType,
    template: string,
    options?: HandleLogOptions,
  ): void {
    if (this._closed) {
      return;
    }

    const serviceName = options?.serviceName?.trim() || undefined;
    const entityName = options?.entityName?.trim() || undefined;
    const params = options?.params;
    const tags = options?.tags;
    const redactedKeys = [...this.redactedKeys, ...(options?.redactedKeys ?? [])];

    const redactedParams = params
      ? applyRedaction(params, redactedKeys, this.redactFunction)
      : undefined;

    const message = redactedParams
      ? CurlyBrackets(template, redactedParams)
      : template;

    const entry: LogEntry = {
      timestamp: Date.now(),
      type,
      serviceName,
      entityName,
      template,
      message,
      params,
      redactedParams,
      redactedKeys:
        params && redactedKeys.length > 0 ? redactedKeys : undefined,
      error: options?.error,
      tags: tags && tags.length > 0 ? tags : undefined,
    };

    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);

        if (isPromise(result)) {
          result.catch((error: unknown) => {
            this.handleSinkError(toError(error), 'write', sink);
          });
        }
      } catch (error) {
        this.handleSinkError(toError(error), 'write', sink);
      }
    }
  }

  private handleSinkError(
    error: Error,
    context: 'write' | 'close',
    sink: LogSink,
  ): void {
    if (this.onSinkError) {
      try {
        this.onSinkError(error, context, sink);
        return;
      } catch {
        // Fall through to the console, the handler itself failed
      }
    }

    // eslint-disable-next-line no-console
    console.error(
      `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${error.message}`,
    );
  }
}

export * from './types';
export * from './sinks';
export { LoggerService } from './logger-service';
export { applyRedaction, defaultRedactFunction } from './utils/redaction';
