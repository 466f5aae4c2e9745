import type { LoggerService } from '../logger';
import { transitiveDependencies } from './dependency-graph';
import {
  DependencyTimeoutError,
  DependencyUnhealthyError,
  ServiceNotFoundError,
  ServiceUnhealthyError,
  StartupCancelledError,
} from './errors';
import type { HealthMonitor } from './health/health-monitor';
import type { ProcessSupervisor } from './process-supervisor';
import type { ServiceRegistry } from './service-registry';
import type { ServiceSpec } from './types';

export interface DependencySchedulerOptions {
  registry: ServiceRegistry;
  supervisor: ProcessSupervisor;
  healthMonitor: HealthMonitor;
  logger: LoggerService;
}

type Readiness =
  | { outcome: 'healthy' | 'unhealthy' | 'timeout' | 'cancelled' }
  /** Not running and not coming back: failed, stopped or never started */
  | { outcome: 'gone'; state: string };

/**
 * Starts services one at a time in dependency order, each only once every
 * service it depends on is healthy.
 */
export class DependencyScheduler {
  private registry: ServiceRegistry;
  private supervisor: ProcessSupervisor;
  private healthMonitor: HealthMonitor;
  private logger: LoggerService;

  constructor(options: DependencySchedulerOptions) {
    this.registry = options.registry;
    this.supervisor = options.supervisor;
    this.healthMonitor = options.healthMonitor;
    this.logger = options.logger;
  }

  /**
   * Dependencies first, ties in registration order. With `services`, only
   * those and what they depend on.
   *
   * @throws ServiceNotFoundError for an unknown name in `services`
   */
  public startupOrder(services?: readonly string[]): string[] {
    const order = this.registry.startupOrder();

    if (services === undefined || services.length === 0) {
      return order;
    }

    const specs = this.registry.all();
    const wanted = new Set<string>();

    for (const name of services) {
      if (!this.registry.has(name)) {
        throw new ServiceNotFoundError({ serviceName: name });
      }

      wanted.add(name);

      for (const dependency of transitiveDependencies(specs, name)) {
        wanted.add(dependency);
      }
    }

    return order.filter((name) => wanted.has(name));
  }

  public shutdownOrder(services?: readonly string[]): string[] {
    return this.startupOrder(services).reverse();
  }

  /**
   * Starts `order` in sequence, then waits until every started service that
   * nothing else in `order` depends on is healthy too.
   *
   * A service's `startupTimeoutMS` bounds all of its dependency waits
   * together, and a leaf's own wait counts from its launch.
   *
   * On a failure the services started so far are stopped in reverse order
   * and the error rethrown. A cancellation skips that rollback; whoever
   * aborted is tearing down anyway.
   *
   * @returns the names started
   * @throws DependencyTimeoutError, DependencyUnhealthyError,
   * ServiceUnhealthyError, LaunchError, StartupCancelledError
   */
  public async advance(
    order: readonly string[],
    signal: AbortSignal,
  ): Promise<string[]> {
    const started: string[] = [];
    const startedAt = new Map<string, number>();

    try {
      for (const name of order) {
        const spec = this.registry.require(name);
        const deadline = Date.now() + spec.startupTimeoutMS;

        for (const dependency of spec.dependsOn) {
          await this.awaitDependency(spec, dependency, deadline, signal);
        }

        if (signal.aborted) {
          throw new StartupCancelledError({ serviceName: name });
        }

        await this.supervisor.start(spec);
        started.push(name);
        startedAt.set(name, Date.now());
      }

      await this.awaitLeaves(order, startedAt, signal);
    } catch (error) {
      if (!(error instanceof StartupCancelledError)) {
        await this.rollback(started);
      }

      throw error;
    }

    return started;
  }

  /**
   * Stops `started` in reverse order. Stop failures are logged and returned,
   * never thrown.
   */
  public async rollback(
    started: readonly string[],
  ): Promise<{ name: string; error: unknown }[]> {
    const failures: { name: string; error: unknown }[] = [];

    if (started.length > 0) {
      this.logger.warn('Rolling back {{services}}', {
        params: { services: [...started].reverse() },
      });
    }

    for (const name of [...started].reverse()) {
      try {
        await this.supervisor.stop(name);
      } catch (error) {
        this.logger.entity(name).errorObject('Rollback could not stop it', error);
        failures.push({ name, error });
      }
    }

    return failures;
  }

  private async awaitDependency(
    spec: ServiceSpec,
    dependency: string,
    deadline: number,
    signal: AbortSignal,
  ): Promise<void> {
    const logger = this.logger.entity(spec.name);

    logger.debug('Waiting for {{dependency}} to become healthy', {
      params: { dependency },
    });

    const readiness = await this.waitUntilReady(dependency, deadline, signal);

    switch (readiness.outcome) {
      case 'healthy':
        return;
      case 'cancelled':
        throw new StartupCancelledError({ serviceName: spec.name });
      case 'timeout':
        throw new DependencyTimeoutError({
          serviceName: spec.name,
          dependency,
          timeoutMS: spec.startupTimeoutMS,
        });
      case 'unhealthy':
        throw new DependencyUnhealthyError({
          serviceName: spec.name,
          dependency,
          reason: 'unhealthy',
        });
      case 'gone':
        throw new DependencyUnhealthyError({
          serviceName: spec.name,
          dependency,
          reason: readiness.state,
        });
    }
  }

  private async awaitLeaves(
    order: readonly string[],
    startedAt: ReadonlyMap<string, number>,
    signal: AbortSignal,
  ): Promise<void> {
    const dependedOn = new Set(
      order.flatMap((name) => this.registry.require(name).dependsOn),
    );

    for (const [name, launchedAt] of startedAt) {
      if (dependedOn.has(name)) {
        continue;
      }

      const { startupTimeoutMS } = this.registry.require(name);
      const readiness = await this.waitUntilReady(
        name,
        launchedAt + startupTimeoutMS,
        signal,
      );

      switch (readiness.outcome) {
        case 'healthy':
          continue;
        case 'cancelled':
          throw new StartupCancelledError({ serviceName: name });
        case 'gone':
          throw new ServiceUnhealthyError({
            serviceName: name,
            reason: `it is ${readiness.state}`,
          });
        case 'timeout':
          throw new ServiceUnhealthyError({
            serviceName: name,
            reason: `not healthy within ${startupTimeoutMS}ms`,
            timeoutMS: startupTimeoutMS,
          });
        case 'unhealthy':
          throw new ServiceUnhealthyError({
            serviceName: name,
            reason: 'health checks failed',
          });
      }
    }
  }

  /**
   * Waits for `name` to settle on a health status before `deadline` (epoch
   * ms). A service that crashed and is being restarted is waited for again.
   */
  private async waitUntilReady(
    name: string,
    deadline: number,
    signal: AbortSignal,
  ): Promise<Readiness> {
    for (;;) {
      if (!this.isComingUp(name)) {
        return { outcome: 'gone', state: this.supervisor.getState(name) ?? 'not running' };
      }

      const remainingMS = deadline - Date.now();

      if (remainingMS <= 0) {
        return { outcome: 'timeout' };
      }

      const result = await this.healthMonitor.waitForHealthy(name, {
        timeoutMS: remainingMS,
        signal,
      });

      if (result !== 'stopped') {
        return { outcome: result };
      }
    }
  }

  private isComingUp(name: string): boolean {
    const state = this.supervisor.getState(name);
    return state === 'starting' || state === 'running' || state === 'crashed';
  }
}
