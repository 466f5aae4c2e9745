import {
  safeHandleCallback,
  type CallbackErrorReporter,
} from './safe-handle-callback';

/**
 * The shutdown signal types that can trigger the shutdown callback
 */
export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

const SHUTDOWN_SIGNALS: ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

/**
 * Anything signals can be subscribed on. `process` in production, a plain
 * `EventEmitter` in tests.
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface ProcessSignalManagerOptions {
  /**
   * Invoked on SIGINT / SIGTERM. `count` is 1 for the first signal, 2 for the
   * second and so on, so callers can force an exit on a repeated Ctrl+C.
   */
  onShutdownRequested?: (
    signal: ShutdownSignal,
    count: number,
  ) => void | Promise<void>;

  /**
   * Invoked on SIGUSR1. `stackctl up` prints the status table.
   */
  onInfoRequested?: () => void | Promise<unknown>;

  /** Where callback errors are reported */
  onCallbackError?: CallbackErrorReporter;

  /** @default process */
  source?: SignalSource;
}

/**
 * Routes process signals to callbacks while attached. Callbacks run through
 * `safeHandleCallback`, so a failing handler is reported instead of crashing
 * the process from inside a signal listener.
 */
export class ProcessSignalManager {
  private onShutdownRequested?: ProcessSignalManagerOptions['onShutdownRequested'];
  private onInfoRequested?: ProcessSignalManagerOptions['onInfoRequested'];
  private onCallbackError?: CallbackErrorReporter;
  private source: SignalSource;

  private shutdownSignalListeners = new Map<ShutdownSignal, () => void>();
  private infoSignalListener?: () => void;
  private shutdownRequests = 0;
  private isAttached = false;

  constructor(options: ProcessSignalManagerOptions) {
    this.onShutdownRequested = options.onShutdownRequested;
    this.onInfoRequested = options.onInfoRequested;
    this.onCallbackError = options.onCallbackError;
    this.source = options.source ?? process;

    const shutdownCallback = this.onShutdownRequested;

    if (shutdownCallback) {
      for (const signal of SHUTDOWN_SIGNALS) {
        this.shutdownSignalListeners.set(signal, () => {
          this.shutdownRequests++;

          safeHandleCallback(
            'onShutdownRequested',
            shutdownCallback,
            [signal, this.shutdownRequests],
            this.onCallbackError,
          );
        });
      }
    }

    const infoCallback = this.onInfoRequested;

    if (infoCallback) {
      this.infoSignalListener = (): void =>
        safeHandleCallback(
          'onInfoRequested',
          infoCallback,
          [],
          this.onCallbackError,
        );
    }
  }

  /**
   * Start listening. Idempotent.
   */
  public attach(): void {
    if (this.isAttached) {
      return;
    }

    for (const [signal, listener] of this.shutdownSignalListeners) {
      this.source.on(signal, listener);
    }

    if (this.infoSignalListener) {
      this.source.on('SIGUSR1', this.infoSignalListener);
    }

    this.shutdownRequests = 0;
    this.isAttached = true;
  }

  /**
   * Stop listening. Idempotent.
   */
  public detach(): void {
    if (!this.isAttached) {
      return;
    }

    for (const [signal, listener] of this.shutdownSignalListeners) {
      this.source.removeListener(signal, listener);
    }

    if (this.infoSignalListener) {
      this.source.removeListener('SIGUSR1', this.infoSignalListener);
    }

    this.isAttached = false;
  }
}
