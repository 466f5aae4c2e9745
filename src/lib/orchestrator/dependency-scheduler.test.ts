import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { Logger } from '../logger';
import { DependencyScheduler } from './dependency-scheduler';
import {
  DependencyTimeoutError,
  DependencyUnhealthyError,
  LaunchError,
  ServiceNotFoundError,
  ServiceUnhealthyError,
  StartupCancelledError,
} from './errors';
import { HealthMonitor } from './health/health-monitor';
import { ProcessSupervisor } from './process-supervisor';
import { ServiceRegistry } from './service-registry';
import { defineService, type ServiceSpecInput } from './service-spec';
import { FakeLauncher, flushPromises } from './testing/fake-launcher';
import { ScriptedProbe } from './testing/scripted-probe';

function service(
  name: string,
  dependsOn: string[] = [],
  input: Partial<ServiceSpecInput> = {},
) {
  return defineService({
    name,
    launch: { kind: 'process', command: ['node', `${name}.js`] },
    dependsOn,
    ...input,
  });
}

const tcp = { type: 'tcp', host: '127.0.0.1', port: 27017 } as const;

function setup(
  specs: ReturnType<typeof service>[],
  probes: Record<string, ScriptedProbe> = {},
) {
  const registry = ServiceRegistry.fromSpecs(specs);
  const launcher = new FakeLauncher();
  const { logger } = Logger.createTestOptimizedLogger();

  const supervisor = new ProcessSupervisor({
    launcher,
    context: { project: 'demo' },
    logger: logger.service('supervisor'),
  });
  const healthMonitor = new HealthMonitor({ logger: logger.service('health') });
  const scheduler = new DependencyScheduler({
    registry,
    supervisor,
    healthMonitor,
    logger: logger.service('scheduler'),
  });

  supervisor.on('service:running', ({ name }) => {
    healthMonitor.watch(
      name,
      registry.require(name).healthCheck,
      probes[name]?.fn ?? null,
    );
  });

  for (const event of ['service:crashed', 'service:failed', 'service:stopping'] as const) {
    supervisor.on(event, ({ name }) => {
      healthMonitor.unwatch(name);
    });
  }

  return { launcher, supervisor, scheduler };
}

async function tick(ms: number): Promise<void> {
  await vi.advanceTimersByTimeAsync(ms);
  await flushPromises();
}

describe('DependencyScheduler', () => {
  const topology = [
    service('db'),
    service('cache'),
    service('store', ['db']),
    service('api', ['store', 'cache']),
    service('worker'),
  ];

  describe('startupOrder', () => {
    test('orders the whole topology by default', () => {
      const { scheduler } = setup(topology);

      expect(scheduler.startupOrder()).toEqual([
        'db',
        'cache',
        'store',
        'api',
        'worker',
      ]);
    });

    test('narrows to the named services and what they need', () => {
      const { scheduler } = setup(topology);

      expect(scheduler.startupOrder(['store'])).toEqual(['db', 'store']);
      expect(scheduler.startupOrder(['api'])).toEqual([
        'db',
        'cache',
        'store',
        'api',
      ]);
      expect(scheduler.startupOrder(['worker', 'store'])).toEqual([
        'db',
        'store',
        'worker',
      ]);
    });

    test('rejects an unknown service', () => {
      const { scheduler } = setup(topology);

      expect(() => scheduler.startupOrder(['ghost'])).toThrow(
        new ServiceNotFoundError({ serviceName: 'ghost' }),
      );
    });
  });

  test('shutdownOrder is the reverse of startupOrder', () => {
    const { scheduler } = setup(topology);

    expect(scheduler.shutdownOrder(['api'])).toEqual([
      'api',
      'store',
      'cache',
      'db',
    ]);
  });

  describe('advance', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    test('starts a dependent only once its dependency is healthy', async () => {
      const db = new ScriptedProbe([false, false, true]);
      const { launcher, scheduler } = setup(
        [service('db', [], { healthCheck: { probe: tcp } }), service('store', ['db'])],
        { db },
      );

      const advancing = scheduler.advance(['db', 'store'], new AbortController().signal);
      await flushPromises();
      await tick(1000);

      expect(launcher.launches).toEqual(['db']);

      await tick(1000);

      await expect(advancing).resolves.toEqual(['db', 'store']);
      expect(launcher.launches).toEqual(['db', 'store']);
    });

    test('fails when a dependency stops coming up', async () => {
      const db = new ScriptedProbe([false]);
      const { launcher, supervisor, scheduler } = setup(
        [
          service('db', [], { healthCheck: { probe: tcp, failureThreshold: 10 } }),
          service('store', ['db']),
        ],
        { db },
      );

      const advancing = scheduler.advance(['db', 'store'], new AbortController().signal);
      const outcome = expect(advancing).rejects.toThrow(
        new DependencyUnhealthyError({
          serviceName: 'store',
          dependency: 'db',
          reason: 'failed',
        }),
      );
      await flushPromises();
      launcher.latest('db').crash(1);
      await flushPromises();

      await outcome;
      expect(launcher.launchCount('store')).toBe(0);
      expect(supervisor.getState('db')).toBeUndefined();
    });

    test('gives up on a dependency after the startup timeout', async () => {
      const db = new ScriptedProbe([false]);
      const { launcher, scheduler } = setup(
        [
          service('db', [], { healthCheck: { probe: tcp, failureThreshold: 10 } }),
          service('store', ['db'], { startupTimeoutMS: 1500 }),
        ],
        { db },
      );

      const advancing = scheduler.advance(['db', 'store'], new AbortController().signal);
      const outcome = expect(advancing).rejects.toThrow(
        new DependencyTimeoutError({
          serviceName: 'store',
          dependency: 'db',
          timeoutMS: 1500,
        }),
      );
      await flushPromises();
      await tick(1500);

      await outcome;
      expect(launcher.launchCount('store')).toBe(0);
      expect(launcher.latest('db').signals).toEqual(['SIGTERM']);
    });

    test('bounds all dependency waits of a service by one startup timeout', async () => {
      const a = new ScriptedProbe([false, true]);
      const b = new ScriptedProbe([false, false, true]);
      const { launcher, scheduler } = setup(
        [
          service('a', [], { healthCheck: { probe: tcp, failureThreshold: 10 } }),
          service('b', [], { healthCheck: { probe: tcp, failureThreshold: 10 } }),
          service('c', ['a', 'b'], { startupTimeoutMS: 1500 }),
        ],
        { a, b },
      );

      const advancing = scheduler.advance(['a', 'b', 'c'], new AbortController().signal);
      const outcome = expect(advancing).rejects.toThrow(
        new DependencyTimeoutError({
          serviceName: 'c',
          dependency: 'b',
          timeoutMS: 1500,
        }),
      );
      await flushPromises();
      await tick(1500);

      await outcome;
      expect(launcher.launchCount('c')).toBe(0);
      expect(launcher.latest('a').signals).toEqual(['SIGTERM']);
      expect(launcher.latest('b').signals).toEqual(['SIGTERM']);
    });

    test('counts a leaf startup timeout from its own launch', async () => {
      const x = new ScriptedProbe([false, true]);
      const y = new ScriptedProbe([false, false, true]);
      const { scheduler } = setup(
        [
          service('x', [], {
            healthCheck: { probe: tcp, failureThreshold: 10 },
            startupTimeoutMS: 1500,
          }),
          service('y', [], {
            healthCheck: { probe: tcp, failureThreshold: 10 },
            startupTimeoutMS: 1500,
          }),
        ],
        { x, y },
      );

      const advancing = scheduler.advance(['x', 'y'], new AbortController().signal);
      const outcome = expect(advancing).rejects.toThrow(
        new ServiceUnhealthyError({
          serviceName: 'y',
          reason: 'not healthy within 1500ms',
          timeoutMS: 1500,
        }),
      );
      await flushPromises();
      await tick(1500);

      await outcome;
    });

    test('rolls back what it started when a launch fails', async () => {
      const { launcher, supervisor, scheduler } = setup([
        service('db'),
        service('cache'),
        service('store', ['db', 'cache']),
      ]);
      launcher.failNextLaunches('store');

      await expect(
        scheduler.advance(['db', 'cache', 'store'], new AbortController().signal),
      ).rejects.toBeInstanceOf(LaunchError);

      expect(launcher.latest('db').signals).toEqual(['SIGTERM']);
      expect(launcher.latest('cache').signals).toEqual(['SIGTERM']);
      expect(supervisor.getState('db')).toBeUndefined();
      expect(supervisor.getState('store')).toBe('failed');
    });

    test('stops without rolling back when cancelled', async () => {
      const db = new ScriptedProbe([false]);
      const controller = new AbortController();
      const { launcher, supervisor, scheduler } = setup(
        [
          service('db', [], { healthCheck: { probe: tcp, failureThreshold: 10 } }),
          service('store', ['db']),
        ],
        { db },
      );

      const advancing = scheduler.advance(['db', 'store'], controller.signal);
      await flushPromises();
      controller.abort();

      await expect(advancing).rejects.toThrow(
        new StartupCancelledError({ serviceName: 'store' }),
      );
      expect(launcher.launches).toEqual(['db']);
      expect(supervisor.getState('db')).toBe('running');
    });
  });

  test('rollback stops in reverse order and reports what it could not stop', async () => {
    const { launcher, supervisor, scheduler } = setup([service('db'), service('cache')]);
    const stopping: string[] = [];
    supervisor.on('service:stopping', ({ name }) => {
      stopping.push(name);
    });

    await supervisor.start(service('db'));
    await supervisor.start(service('cache'));

    await expect(scheduler.rollback(['db', 'cache'])).resolves.toEqual([]);
    expect(stopping).toEqual(['cache', 'db']);
    expect(launcher.latest('db').signals).toEqual(['SIGTERM']);
  });
});
