/**
 * Extend `EventEmitterProtected` when only the owning class should emit,
 * or use `EventEmitter` when any holder of the emitter may emit.
 *
 * Both are typed by an event map (`{ 'event-name': PayloadType }`), so
 * subscribers get the payload type of the event they subscribe to.
 */

import {
  safeHandleCallback,
  type CallbackErrorReporter,
} from './safe-handle-callback';

type EventCallback<T> = (data: T) => void | Promise<void>;

type AnyEventCallback = (data: never) => void | Promise<void>;

export interface EventEmitterOptions {
  /** Where errors thrown by listeners are reported (default: process warning) */
  onListenerError?: CallbackErrorReporter;
}

export class EventEmitterProtected<TEventMap extends object> {
  private events: Map<keyof TEventMap, Set<AnyEventCallback>>;
  private onListenerError?: CallbackErrorReporter;

  constructor(options: EventEmitterOptions = {}) {
    this.events = new Map();
    this.onListenerError = options.onListenerError;
  }

  /**
   * Subscribe to an event
   * @returns A function to unsubscribe from the event
   */
  public on<K extends keyof TEventMap>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
  ): () => void {
    let callbacks = this.events.get(event);

    if (!callbacks) {
      callbacks = new Set();
      this.events.set(event, callbacks);
    }

    callbacks.add(callback);

    return () => {
      const current = this.events.get(event);
      if (current) {
        current.delete(callback);

        if (current.size === 0) {
          this.events.delete(event);
        }
      }
    };
  }

  /**
   * Subscribe to an event once - automatically unsubscribes after first emission
   * @returns A function to unsubscribe before it's called
   */
  public once<K extends keyof TEventMap>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
  ): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      return callback(data);
    });

    return unsubscribe;
  }

  public hasListeners(event: keyof TEventMap): boolean {
    const callbacks = this.events.get(event);
    return callbacks !== undefined && callbacks.size > 0;
  }

  public listenerCount(event: keyof TEventMap): number {
    return this.events.get(event)?.size ?? 0;
  }

  /**
   * Remove all event listeners, or only those of one event
   */
  public clear(event?: keyof TEventMap): void {
    if (event !== undefined) {
      this.events.delete(event);
    } else {
      this.events.clear();
    }
  }

  /**
   * Emit an event to every subscriber. Listener errors are reported, never thrown.
   */
  protected emit<K extends keyof TEventMap>(
    event: K,
    data: TEventMap[K],
  ): void {
    const callbacks = this.events.get(event);
    if (!callbacks) {
      return;
    }

    // Copy so listeners that unsubscribe while running don't skip their neighbours
    for (const callback of [...callbacks]) {
      safeHandleCallback(
        `event handler for ${String(event)}`,
        callback as EventCallback<TEventMap[K]>,
        [data],
        this.onListenerError,
      );
    }
  }
}

/**
 * Event emitter with a public emit method.
 */
export class EventEmitter<
  TEventMap extends object,
> extends EventEmitterProtected<TEventMap> {
  public emit<K extends keyof TEventMap>(event: K, data: TEventMap[K]): void {
    super.emit(event, data);
  }
}
