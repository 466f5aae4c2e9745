import { describe, expect, test, vi } from 'vitest';
import { EventEmitter, EventEmitterProtected } from './event-emitter';

interface TestEvents {
  'service:running': { name: string; pid: number };
  'service:stopped': { name: string };
}

describe('EventEmitter', () => {
  test('delivers the payload to every subscriber', () => {
    const emitter = new EventEmitter<TestEvents>();
    const first = vi.fn();
    const second = vi.fn();

    emitter.on('service:running', first);
    emitter.on('service:running', second);
    emitter.emit('service:running', { name: 'db', pid: 1000 });

    expect(first).toHaveBeenCalledWith({ name: 'db', pid: 1000 });
    expect(second).toHaveBeenCalledWith({ name: 'db', pid: 1000 });
  });

  test('unsubscribes', () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();

    const unsubscribe = emitter.on('service:stopped', listener);
    expect(emitter.listenerCount('service:stopped')).toBe(1);

    unsubscribe();
    emitter.emit('service:stopped', { name: 'db' });

    expect(listener).not.toHaveBeenCalled();
    expect(emitter.hasListeners('service:stopped')).toBe(false);
  });

  test('once fires a single time', () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();

    emitter.once('service:stopped', listener);
    emitter.emit('service:stopped', { name: 'db' });
    emitter.emit('service:stopped', { name: 'store' });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ name: 'db' });
  });

  test('a listener unsubscribing mid-emit does not skip the next one', () => {
    const emitter = new EventEmitter<TestEvents>();
    const calls: string[] = [];

    const unsubscribe = emitter.on('service:stopped', () => {
      calls.push('first');
      unsubscribe();
    });
    emitter.on('service:stopped', () => {
      calls.push('second');
    });

    emitter.emit('service:stopped', { name: 'db' });

    expect(calls).toEqual(['first', 'second']);
  });

  test('reports a throwing listener and keeps notifying the rest', () => {
    const onListenerError = vi.fn();
    const emitter = new EventEmitter<TestEvents>({ onListenerError });
    const after = vi.fn();

    emitter.on('service:stopped', () => {
      throw new Error('listener broke');
    });
    emitter.on('service:stopped', after);
    emitter.emit('service:stopped', { name: 'db' });

    expect(onListenerError).toHaveBeenCalledWith(
      new Error('listener broke'),
      'event handler for service:stopped',
    );
    expect(after).toHaveBeenCalled();
  });

  test('clear removes listeners of one event or all', () => {
    const emitter = new EventEmitter<TestEvents>();

    emitter.on('service:running', vi.fn());
    emitter.on('service:stopped', vi.fn());

    emitter.clear('service:running');
    expect(emitter.listenerCount('service:running')).toBe(0);
    expect(emitter.listenerCount('service:stopped')).toBe(1);

    emitter.clear();
    expect(emitter.listenerCount('service:stopped')).toBe(0);
  });
});

describe('EventEmitterProtected', () => {
  class Service extends EventEmitterProtected<TestEvents> {
    public stop(name: string): void {
      this.emit('service:stopped', { name });
    }
  }

  test('lets only the subclass emit', () => {
    const service = new Service();
    const listener = vi.fn();

    service.on('service:stopped', listener);
    service.stop('db');

    expect(listener).toHaveBeenCalledWith({ name: 'db' });
  });
});
