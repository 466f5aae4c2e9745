import {
  EventEmitterProtected,
  type EventEmitterOptions,
} from '../../event-emitter';
import type { LoggerService } from '../../logger';
import { sleep } from '../../sleep';
import type { HealthMonitorEventMap } from '../events';
import type {
  HealthCheckSpec,
  HealthSnapshot,
  HealthStatus,
  ProbeResult,
} from '../types';
import type { ProbeFn } from './probes';

export interface HealthMonitorOptions extends EventEmitterOptions {
  logger: LoggerService;
}

export type HealthWaitResult =
  | 'healthy'
  | 'unhealthy'
  /** Monitoring ended: the service crashed, failed or was stopped */
  | 'stopped'
  | 'timeout'
  | 'cancelled';

export interface WaitForHealthyOptions {
  timeoutMS: number;
  signal?: AbortSignal;
}

interface WatchEntry {
  name: string;
  healthCheck: HealthCheckSpec;
  probe: ProbeFn | null;
  startedAt: number;
  controller: AbortController;
  record: HealthSnapshot;
}

/**
 * Runs one probe bounded by `timeoutMS`. Never rejects: a throwing probe or a
 * timeout is a failed result.
 */
export async function runProbe(
  probe: ProbeFn,
  timeoutMS: number,
  outer: AbortSignal,
): Promise<ProbeResult> {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort();
  const startedAt = Date.now();
  let timeoutHandle: NodeJS.Timeout | undefined;

  outer.addEventListener('abort', onAbort, { once: true });

  const timeout = new Promise<ProbeResult>((resolve) => {
    timeoutHandle = setTimeout(() => {
      controller.abort();
      resolve({
        ok: false,
        durationMS: timeoutMS,
        message: `timed out after ${timeoutMS}ms`,
      });
    }, timeoutMS);
  });

  const attempt = probe(controller.signal).then(
    (outcome): ProbeResult => ({
      ...outcome,
      durationMS: Date.now() - startedAt,
    }),
    (error: unknown): ProbeResult => ({
      ok: false,
      durationMS: Date.now() - startedAt,
      message: error instanceof Error ? error.message : String(error),
    }),
  );

  try {
    return await Promise.race([attempt, timeout]);
  } finally {
    clearTimeout(timeoutHandle);
    outer.removeEventListener('abort', onAbort);
  }
}

function initialRecord(): HealthSnapshot {
  return {
    status: 'unknown',
    consecutiveSuccesses: 0,
    consecutiveFailures: 0,
    lastResult: null,
    lastCheckedAt: null,
  };
}

/**
 * Polls running services and turns probe results into a health status:
 * `successThreshold` successes in a row make a service healthy,
 * `failureThreshold` failures in a row make it unhealthy. Failures during
 * `startPeriodMS` after launch are not counted.
 *
 * Each watched service polls on its own; a slow probe never delays another
 * service's checks.
 */
export class HealthMonitor extends EventEmitterProtected<HealthMonitorEventMap> {
  private logger: LoggerService;
  private watches = new Map<string, WatchEntry>();

  constructor(options: HealthMonitorOptions) {
    super(options);
    this.logger = options.logger;
  }

  public isWatching(name: string): boolean {
    return this.watches.has(name);
  }

  public getHealth(name: string): HealthSnapshot | undefined {
    const entry = this.watches.get(name);
    return entry ? { ...entry.record } : undefined;
  }

  /**
   * Starts monitoring from `unknown`, replacing any earlier watch of `name`.
   * With no probe (`none`) the service is healthy right away.
   */
  public watch(
    name: string,
    healthCheck: HealthCheckSpec,
    probe: ProbeFn | null,
    startedAt = Date.now(),
  ): void {
    this.watches.get(name)?.controller.abort();

    const entry: WatchEntry = {
      name,
      healthCheck,
      probe,
      startedAt,
      controller: new AbortController(),
      record: initialRecord(),
    };

    this.watches.set(name, entry);

    if (probe === null) {
      this.setStatus(entry, 'healthy');
      return;
    }

    this.poll(entry, probe).catch((error: unknown) => {
      this.logger.entity(name).errorObject('Health polling stopped', error);
    });
  }

  /**
   * Stops monitoring `name` and forgets its health
   */
  public unwatch(name: string): void {
    const entry = this.watches.get(name);

    if (entry) {
      entry.controller.abort();
      this.watches.delete(name);
    }

    this.emit('health:unwatched', { name });
  }

  public stopAll(): void {
    for (const name of [...this.watches.keys()]) {
      this.unwatch(name);
    }
  }

  /**
   * Probes once now, outside the polling schedule
   */
  public async checkNow(name: string): Promise<HealthSnapshot | undefined> {
    const entry = this.watches.get(name);

    if (entry?.probe) {
      await this.check(entry, entry.probe);
    }

    return this.getHealth(name);
  }

  /**
   * Resolves once `name` is healthy or unhealthy (right away when it already
   * is), when monitoring of it ends, when `timeoutMS` passes, or when
   * `signal` aborts.
   */
  public waitForHealthy(
    name: string,
    options: WaitForHealthyOptions,
  ): Promise<HealthWaitResult> {
    const { timeoutMS, signal } = options;

    return new Promise<HealthWaitResult>((resolve) => {
      if (signal?.aborted) {
        resolve('cancelled');
        return;
      }

      const current = this.watches.get(name)?.record.status;

      if (current === 'healthy' || current === 'unhealthy') {
        resolve(current);
        return;
      }

      const cleanups: (() => void)[] = [];

      const finish = (result: HealthWaitResult): void => {
        for (const cleanup of cleanups) {
          cleanup();
        }

        resolve(result);
      };

      cleanups.push(
        this.on('health:changed', (event) => {
          if (
            event.name === name &&
            (event.to === 'healthy' || event.to === 'unhealthy')
          ) {
            finish(event.to);
          }
        }),
        this.on('health:unwatched', (event) => {
          if (event.name === name) {
            finish('stopped');
          }
        }),
      );

      const timeoutHandle = setTimeout(() => finish('timeout'), timeoutMS);
      cleanups.push(() => clearTimeout(timeoutHandle));

      if (signal) {
        const onAbort = (): void => finish('cancelled');
        signal.addEventListener('abort', onAbort, { once: true });
        cleanups.push(() => signal.removeEventListener('abort', onAbort));
      }
    });
  }

  private async poll(entry: WatchEntry, probe: ProbeFn): Promise<void> {
    const { signal } = entry.controller;

    while (!signal.aborted) {
      await this.check(entry, probe);

      if (!(await sleep(entry.healthCheck.intervalMS, signal))) {
        return;
      }
    }
  }

  private async check(entry: WatchEntry, probe: ProbeFn): Promise<void> {
    const { healthCheck, controller, record } = entry;
    const result = await runProbe(probe, healthCheck.timeoutMS, controller.signal);

    if (controller.signal.aborted || this.watches.get(entry.name) !== entry) {
      return;
    }

    const now = Date.now();

    record.lastResult = result;
    record.lastCheckedAt = now;

    this.emit('health:checked', { name: entry.name, result });

    if (result.ok) {
      record.consecutiveSuccesses++;
      record.consecutiveFailures = 0;

      if (
        record.status !== 'healthy' &&
        record.consecutiveSuccesses >= healthCheck.successThreshold
      ) {
        this.setStatus(entry, 'healthy');
      }

      return;
    }

    record.consecutiveSuccesses = 0;

    if (now - entry.startedAt < healthCheck.startPeriodMS) {
      return;
    }

    record.consecutiveFailures++;

    if (
      record.status !== 'unhealthy' &&
      record.consecutiveFailures >= healthCheck.failureThreshold
    ) {
      this.setStatus(entry, 'unhealthy');
    }
  }

  private setStatus(entry: WatchEntry, to: HealthStatus): void {
    const from = entry.record.status;
    entry.record.status = to;

    const logger = this.logger.entity(entry.name);
    const message = entry.record.lastResult?.message;

    if (to === 'healthy') {
      logger.success('Healthy');
    } else {
      logger.warn('Unhealthy after {{failures}} failed check(s): {{message}}', {
        params: { failures: entry.record.consecutiveFailures, message },
      });
    }

    this.emit('health:changed', {
      name: entry.name,
      from,
      to,
      health: { ...entry.record },
    });
  }
}
