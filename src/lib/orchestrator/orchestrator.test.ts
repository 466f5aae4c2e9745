import { EventEmitter } from 'node:events';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { Logger } from '../logger';
import {
  CyclicDependencyError,
  DependencyTimeoutError,
  DependencyUnhealthyError,
  LaunchError,
  ServiceNotFoundError,
  ServiceUnhealthyError,
  StartupCancelledError,
  StopError,
} from './errors';
import { Orchestrator, blameFor } from './orchestrator';
import { ServiceRegistry } from './service-registry';
import { defineService, type ServiceSpecInput } from './service-spec';
import {
  FakeHandle,
  FakeLauncher,
  flushPromises,
} from './testing/fake-launcher';
import { ScriptedProbe } from './testing/scripted-probe';
import type { ServiceSpec } from './types';

const tcp = { type: 'tcp', host: '127.0.0.1', port: 27017 } as const;

function service(
  name: string,
  dependsOn: string[] = [],
  input: Partial<ServiceSpecInput> = {},
): ServiceSpec {
  return defineService({
    name,
    launch: { kind: 'process', command: ['node', `${name}.js`] },
    dependsOn,
    ...input,
  });
}

function setup(
  specs: ServiceSpec[],
  probes: Record<string, ScriptedProbe> = {},
) {
  const launcher = new FakeLauncher();
  const { logger } = Logger.createTestOptimizedLogger();
  const orchestrator = new Orchestrator({
    project: 'demo',
    registry: ServiceRegistry.fromSpecs(specs),
    launcher,
    logger,
    killGraceMS: 50,
    probeFactory: (spec) => probes[spec.name]?.fn ?? null,
  });

  return { launcher, orchestrator };
}

async function tick(ms: number): Promise<void> {
  await vi.advanceTimersByTimeAsync(ms);
  await flushPromises(100);
}

describe('Orchestrator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('up', () => {
    test('starts everything and reports success', async () => {
      const { launcher, orchestrator } = setup([
        service('db'),
        service('store', ['db']),
      ]);

      const report = await orchestrator.up();

      expect(report).toMatchObject({
        success: true,
        cancelled: false,
        failures: [],
        services: [
          { name: 'db', state: 'running', health: 'healthy' },
          { name: 'store', state: 'running', health: 'healthy' },
        ],
      });
      expect(launcher.launches).toEqual(['db', 'store']);
      expect(orchestrator.isStackUp).toBe(true);
    });

    test('never starts store when db fails its health checks', async () => {
      const db = new ScriptedProbe([false]);
      const { launcher, orchestrator } = setup(
        [
          service('db', [], { healthCheck: { probe: tcp, failureThreshold: 3 } }),
          service('store', ['db']),
        ],
        { db },
      );

      const upping = orchestrator.up();
      await flushPromises();
      await tick(2000);
      const report = await upping;

      expect(db.calls).toBe(3);
      expect(launcher.launchCount('store')).toBe(0);
      expect(report.success).toBe(false);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0]?.name).toBe('db');
      expect(report.failures[0]?.error).toEqual(
        new DependencyUnhealthyError({
          serviceName: 'store',
          dependency: 'db',
          reason: 'unhealthy',
        }),
      );
      expect(report.failures[0]?.error.message).toBe(
        'Service "store" cannot start, dependency "db" is unhealthy',
      );
      expect(report.services).toEqual([
        {
          name: 'db',
          state: 'stopped',
          health: 'unknown',
          error: report.failures[0]?.error,
        },
        { name: 'store', state: 'pending', health: 'unknown' },
      ]);
      expect(orchestrator.isStackUp).toBe(false);
    });

    test('starts a dependent only after its dependency turned healthy', async () => {
      const db = new ScriptedProbe([false, true]);
      const { orchestrator } = setup(
        [service('db', [], { healthCheck: { probe: tcp } }), service('store', ['db'])],
        { db },
      );
      const seen: string[] = [];

      orchestrator.on('service:starting', ({ name }) => {
        const health = orchestrator
          .status()
          .services.map((status) => `${status.name}=${status.health}`)
          .join(' ');
        seen.push(`${name}: ${health}`);
      });

      const upping = orchestrator.up();
      await flushPromises();
      await tick(1000);

      await expect(upping).resolves.toMatchObject({ success: true });
      expect(seen).toEqual([
        'db: db=unknown store=unknown',
        'store: db=healthy store=unknown',
      ]);
    });

    test('blames the dependency it timed out waiting for', async () => {
      const db = new ScriptedProbe([false]);
      const { orchestrator } = setup(
        [
          service('db', [], { healthCheck: { probe: tcp, failureThreshold: 10 } }),
          service('store', ['db'], { startupTimeoutMS: 1500 }),
        ],
        { db },
      );

      const upping = orchestrator.up();
      await flushPromises();
      await tick(1500);
      const report = await upping;

      expect(report.failures.map(({ name }) => name)).toEqual(['db']);
      expect(report.failures[0]?.error.message).toBe(
        'Service "store" gave up waiting for "db" to become healthy after 1500ms',
      );
      expect(report.failures[0]?.error).toBeInstanceOf(DependencyTimeoutError);
    });

    test('rolls back when a service fails to launch', async () => {
      const { launcher, orchestrator } = setup([
        service('db'),
        service('store', ['db']),
      ]);
      launcher.failNextLaunches('store');

      const report = await orchestrator.up();

      expect(report.failures.map(({ name }) => name)).toEqual(['store']);
      expect(report.failures[0]?.error).toBeInstanceOf(LaunchError);
      expect(report.services.map(({ name, state }) => `${name}=${state}`)).toEqual([
        'db=stopped',
        'store=failed',
      ]);
      expect(launcher.latest('db').signals).toEqual(['SIGTERM']);
    });

    test('fails when a service nothing depends on never turns healthy', async () => {
      const api = new ScriptedProbe([false]);
      const { orchestrator } = setup(
        [service('api', [], { healthCheck: { probe: tcp, failureThreshold: 1 } })],
        { api },
      );

      const report = await orchestrator.up();

      expect(report.failures).toEqual([
        {
          name: 'api',
          error: new ServiceUnhealthyError({
            serviceName: 'api',
            reason: 'health checks failed',
          }),
        },
      ]);
      expect(report.services[0]?.state).toBe('stopped');
    });

    test('starts only the named services and their dependencies', async () => {
      const { launcher, orchestrator } = setup([
        service('db'),
        service('cache'),
        service('store', ['db']),
      ]);

      const report = await orchestrator.up({ services: ['store'] });

      expect(report.success).toBe(true);
      expect(report.services.map(({ name }) => name)).toEqual(['db', 'store']);
      expect(launcher.launches).toEqual(['db', 'store']);
    });

    test('reports an unknown service without starting anything', async () => {
      const { launcher, orchestrator } = setup([service('db')]);

      const report = await orchestrator.up({ services: ['ghost'] });

      expect(report).toMatchObject({ success: false, services: [] });
      expect(report.failures).toEqual([
        { name: 'ghost', error: new ServiceNotFoundError({ serviceName: 'ghost' }) },
      ]);
      expect(launcher.launches).toEqual([]);
    });

    test('shares a running up() with a second caller', async () => {
      const { launcher, orchestrator } = setup([service('db')]);

      const first = orchestrator.up();
      const second = orchestrator.up();

      expect(second).toBe(first);
      await first;
      expect(launcher.launches).toEqual(['db']);
    });

    test('emits started and completed events', async () => {
      const { orchestrator } = setup([service('db')]);
      const events: string[] = [];

      orchestrator.on('orchestrator:up-started', ({ services }) => {
        events.push(`up-started ${services.join(',')}`);
      });
      orchestrator.on('orchestrator:up-completed', ({ success }) => {
        events.push(`up-completed ${String(success)}`);
      });

      await orchestrator.up();

      expect(events).toEqual(['up-started db', 'up-completed true']);
    });
  });

  describe('down', () => {
    test('stops in reverse dependency order and cleans up', async () => {
      const { launcher, orchestrator } = setup([
        service('db'),
        service('store', ['db']),
      ]);
      const stopping: string[] = [];
      orchestrator.on('service:stopping', ({ name }) => {
        stopping.push(name);
      });

      await orchestrator.up();
      const report = await orchestrator.down();

      expect(report).toMatchObject({
        success: true,
        stopped: ['store', 'db'],
        failures: [],
      });
      expect(stopping).toEqual(['store', 'db']);
      expect(launcher.cleanups).toEqual([['db', 'store']]);
      expect(orchestrator.isStackUp).toBe(false);
    });

    test('attempts every service even when one cannot be stopped', async () => {
      const { launcher, orchestrator } = setup([
        service('a'),
        service('b', [], { stopTimeoutMS: 100 }),
        service('c'),
      ]);
      launcher.ignoredSignals.set('b', ['SIGTERM', 'SIGKILL']);

      await orchestrator.up();
      const downing = orchestrator.down();
      await flushPromises();
      await tick(100);
      await tick(50);
      const report = await downing;

      expect(report.success).toBe(false);
      expect(report.stopped).toEqual(['c', 'a']);
      expect(report.failures.map(({ name }) => name)).toEqual(['b']);
      expect(report.failures[0]?.error).toBeInstanceOf(StopError);
      expect(launcher.latest('a').signals).toEqual(['SIGTERM']);
      expect(launcher.latest('c').signals).toEqual(['SIGTERM']);
    });

    test('cancels an up() that is waiting on a dependency', async () => {
      const db = new ScriptedProbe([false]);
      const { launcher, orchestrator } = setup(
        [
          service('db', [], { healthCheck: { probe: tcp, failureThreshold: 10 } }),
          service('store', ['db']),
        ],
        { db },
      );

      const upping = orchestrator.up();
      await flushPromises();
      const downing = orchestrator.down();

      const upReport = await upping;
      const downReport = await downing;

      expect(upReport).toMatchObject({ success: false, cancelled: true });
      expect(upReport.failures).toEqual([
        {
          name: 'store',
          error: new StartupCancelledError({ serviceName: 'store' }),
        },
      ]);
      expect(downReport).toMatchObject({ success: true, stopped: ['db'] });
      expect(launcher.launches).toEqual(['db']);
    });

    test('is a no-op for services that never started', async () => {
      const { launcher, orchestrator } = setup([service('db')]);

      await expect(orchestrator.down()).resolves.toMatchObject({
        success: true,
        stopped: [],
      });
      expect(launcher.cleanups).toEqual([['db']]);
    });
  });

  describe('status', () => {
    test('reports state, health, pid and uptime per service', async () => {
      const { orchestrator } = setup([service('db'), service('store', ['db'])]);

      await orchestrator.up();
      await tick(5000);

      const snapshot = orchestrator.status();

      expect(snapshot.project).toBe('demo');
      expect(snapshot.services).toEqual([
        {
          name: 'db',
          state: 'running',
          health: 'healthy',
          pid: 1000,
          ref: 'pid:1000',
          restartCount: 0,
          lastExit: null,
          uptimeMS: 5000,
        },
        {
          name: 'store',
          state: 'running',
          health: 'healthy',
          pid: 1001,
          ref: 'pid:1001',
          restartCount: 0,
          lastExit: null,
          uptimeMS: 5000,
        },
      ]);
    });

    test('keeps the final state and exit of stopped services', async () => {
      const { orchestrator } = setup([service('db')]);

      await orchestrator.up();
      await orchestrator.down();

      expect(orchestrator.status().services).toEqual([
        {
          name: 'db',
          state: 'stopped',
          health: 'unknown',
          pid: null,
          ref: null,
          restartCount: 0,
          lastExit: expect.objectContaining({ code: null, signal: 'SIGTERM' }),
          uptimeMS: null,
        },
      ]);
    });

    test('lists services that were never started as pending', () => {
      const { orchestrator } = setup([service('db')]);

      expect(orchestrator.status().services[0]).toMatchObject({
        state: 'pending',
        health: 'unknown',
        pid: null,
        uptimeMS: null,
      });
    });
  });

  test('restarts a service that turns unhealthy after up()', async () => {
    const api = new ScriptedProbe([true, false, true]);
    const { launcher, orchestrator } = setup(
      [
        service('api', [], {
          healthCheck: { probe: tcp, failureThreshold: 1 },
          restart: { policy: 'on-failure' },
        }),
      ],
      { api },
    );

    await orchestrator.up();
    await tick(1000);

    expect(launcher.launchCount('api')).toBe(2);
    expect(launcher.handles.get('api')?.[0]?.signals).toEqual(['SIGTERM']);
    expect(orchestrator.status().services[0]).toMatchObject({
      state: 'running',
      health: 'healthy',
      restartCount: 1,
    });
  });

  test('leaves an unhealthy service alone when its policy is never', async () => {
    const api = new ScriptedProbe([true, false]);
    const { launcher, orchestrator } = setup(
      [service('api', [], { healthCheck: { probe: tcp, failureThreshold: 1 } })],
      { api },
    );

    await orchestrator.up();
    await tick(1000);

    expect(launcher.launchCount('api')).toBe(1);
    expect(orchestrator.status().services[0]).toMatchObject({
      state: 'running',
      health: 'unhealthy',
    });
  });

  test('reclaims services left running by an earlier run', async () => {
    const { launcher, orchestrator } = setup([service('db'), service('store', ['db'])]);
    launcher.reclaimable.set('db', new FakeHandle({ pid: 7 }));

    await expect(orchestrator.reclaim()).resolves.toEqual(['db']);
    expect(orchestrator.status().services.map(({ name, state, pid }) => ({ name, state, pid }))).toEqual([
      { name: 'db', state: 'running', pid: 7 },
      { name: 'store', state: 'pending', pid: null },
    ]);
    expect(launcher.launches).toEqual([]);
  });

  test('release leaves services running', async () => {
    const { launcher, orchestrator } = setup([service('db')]);

    await orchestrator.up();
    await orchestrator.release();

    expect(launcher.latest('db').signals).toEqual([]);
    expect(launcher.latest('db').released).toBe(true);
  });

  describe('attachSignals', () => {
    test('tears down on the first signal and escalates on the second', async () => {
      const source = new EventEmitter();
      const forced: string[] = [];
      const { orchestrator } = setup([service('db')]);

      await orchestrator.up();
      orchestrator.attachSignals({
        source,
        onForcedShutdown: (signal) => forced.push(signal),
      });

      const shutdown = orchestrator.waitForShutdown();
      source.emit('SIGTERM');
      source.emit('SIGINT');

      await expect(shutdown).resolves.toMatchObject({
        success: true,
        stopped: ['db'],
      });
      expect(forced).toEqual(['SIGINT']);

      orchestrator.detachSignals();
      expect(source.listenerCount('SIGTERM')).toBe(0);
    });
  });

  test('hands secret keys to the logger for redaction', () => {
    const { logger, arraySink } = Logger.createTestOptimizedLogger();
    new Orchestrator({
      project: 'demo',
      registry: ServiceRegistry.fromSpecs([
        service('db', [], {
          environment: { MONGO_ROOT_PASSWORD: 'test-secret' },
          secretKeys: ['MONGO_ROOT_PASSWORD'],
        }),
      ]),
      launcher: new FakeLauncher(),
      logger,
    });

    logger.info('Environment {{MONGO_ROOT_PASSWORD}}', {
      params: { MONGO_ROOT_PASSWORD: 'test-secret' },
    });

    expect(arraySink.logs.at(-1)?.message).toBe('Environment ********');
  });
});

describe('blameFor', () => {
  test('blames the dependency of a dependency error', () => {
    expect(
      blameFor(
        new DependencyUnhealthyError({
          serviceName: 'store',
          dependency: 'db',
          reason: 'unhealthy',
        }),
        'demo',
      ),
    ).toBe('db');
  });

  test('blames the first service of a cycle', () => {
    expect(blameFor(new CyclicDependencyError({ cycle: ['a', 'b'] }), 'demo')).toBe('a');
  });

  test('falls back for errors without a service', () => {
    expect(blameFor(new Error('boom'), 'demo')).toBe('demo');
    expect(blameFor(new StartupCancelledError(), 'demo')).toBe('demo');
  });
});
