import type { ArrayLogTransformer, LogEntry, LogSink } from '../types';

/**
 * ArraySink keeps entries in memory, for tests and for `stackctl` commands
 * that want to inspect what happened during a run.
 */
export class ArraySink implements LogSink {
  public logs: LogEntry[] = [];
  private transformer?: ArrayLogTransformer;
  private closed = false;

  constructor(options?: { transformer?: ArrayLogTransformer }) {
    this.transformer = options?.transformer;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    const transformed = this.transformer?.(entry) ?? false;
    this.logs.push(transformed === false ? entry : transformed);
  }

  public clear(): void {
    this.logs = [];
  }

  /**
   * `type: message` lines, handy for exact assertions in tests
   */
  public getMessageLines(): string[] {
    return this.logs.map((log) => `${log.type}: ${log.message}`);
  }

  public close(): void {
    this.closed = true;
  }
}
