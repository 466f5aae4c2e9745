import {
  EventEmitterProtected,
  type EventEmitterOptions,
} from '../event-emitter';
import type { Logger, LoggerService } from '../logger';
import {
  ProcessSignalManager,
  type ShutdownSignal,
  type SignalSource,
} from '../process-signal-manager';
import { DependencyScheduler } from './dependency-scheduler';
import {
  CyclicDependencyError,
  DependencyTimeoutError,
  DependencyUnhealthyError,
  StartupCancelledError,
  isStackctlError,
} from './errors';
import type { OrchestratorEventMap } from './events';
import { HealthMonitor } from './health/health-monitor';
import { createProbe, type ProbeFn } from './health/probes';
import type {
  LaunchContext,
  OutputStream,
  ServiceLauncher,
} from './launchers/types';
import { ProcessSupervisor } from './process-supervisor';
import type { ServiceRegistry } from './service-registry';
import type {
  DownReport,
  ExitInfo,
  ServiceReport,
  ServiceSpec,
  ServiceState,
  ServiceStatus,
  StatusSnapshot,
  UpReport,
} from './types';

export interface OrchestratorOptions extends EventEmitterOptions {
  /** Scopes container, network and volume names */
  project: string;
  registry: ServiceRegistry;
  launcher: ServiceLauncher;
  logger: Logger;
  /** Receives each line a service writes */
  onOutput?: (serviceName: string, line: string, stream: OutputStream) => void;
  killGraceMS?: number;
  /** Builds the health probe of a service (default: from its probe spec) */
  probeFactory?: (spec: ServiceSpec) => ProbeFn | null;
}

export interface UpOptions {
  /** Only these services and what they depend on (default: all) */
  services?: string[];
}

export interface DownOptions {
  /** Overrides each service's `stopTimeoutMS` before SIGKILL */
  stopTimeoutMS?: number;
}

export interface AttachSignalsOptions {
  /** Called on a second SIGINT/SIGTERM while `down()` is still running */
  onForcedShutdown?: (signal: ShutdownSignal) => void;
  /** Called on SIGUSR1 */
  onInfoRequested?: () => void;
  source?: SignalSource;
}

type Failure = { name: string; error: Error };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * The service a failure is reported against: dependency errors blame the
 * dependency, so `{ db, store -> db }` with an unhealthy db reports db.
 */
export function blameFor(error: unknown, fallback: string): string {
  if (
    error instanceof DependencyUnhealthyError ||
    error instanceof DependencyTimeoutError
  ) {
    return error.additionalInfo.dependency;
  }

  if (error instanceof CyclicDependencyError) {
    return error.additionalInfo.cycle[0] ?? fallback;
  }

  if (isStackctlError(error) && 'serviceName' in error.additionalInfo) {
    const { serviceName } = error.additionalInfo;

    if (typeof serviceName === 'string') {
      return serviceName;
    }
  }

  return fallback;
}

/**
 * Brings a whole topology up and down. One instance manages one project; it
 * owns the supervisor, health monitor and scheduler for it.
 *
 * ```typescript
 * const orchestrator = new Orchestrator({ project: 'demo', registry, launcher, logger });
 * const report = await orchestrator.up();
 *
 * if (!report.success) {
 *   console.log(report.failures.map(({ name, error }) => `${name}: ${error.message}`));
 * }
 *
 * await orchestrator.down();
 * ```
 */
export class Orchestrator extends EventEmitterProtected<OrchestratorEventMap> {
  public readonly project: string;
  private registry: ServiceRegistry;
  private launcher: ServiceLauncher;
  private context: LaunchContext;
  private logger: LoggerService;
  private supervisor: ProcessSupervisor;
  private healthMonitor: HealthMonitor;
  private scheduler: DependencyScheduler;
  private probeFactory: (spec: ServiceSpec) => ProbeFn | null;
  private signalManager: ProcessSignalManager | null = null;

  private upInFlight: Promise<UpReport> | null = null;
  private upController: AbortController | null = null;
  private downInFlight: Promise<DownReport> | null = null;
  private shutdown: Promise<DownReport> | null = null;
  private shutdownListeners: ((report: DownReport) => void)[] = [];
  private isUp = false;

  // Kept after an instance is dropped so status still shows how it ended
  private lastKnownStates = new Map<string, ServiceState>();
  private lastExits = new Map<string, ExitInfo>();

  constructor(options: OrchestratorOptions) {
    super(options);
    this.project = options.project;
    this.registry = options.registry;
    this.launcher = options.launcher;
    this.logger = options.logger.service('orchestrator');
    this.context = { project: options.project, onOutput: options.onOutput };
    this.probeFactory =
      options.probeFactory ??
      ((spec) =>
        createProbe(spec.healthCheck.probe, (command) =>
          this.launcher.probeCommand(spec, command, this.context),
        ));

    options.logger.addRedactedKeys([
      ...new Set(this.registry.all().flatMap((spec) => spec.secretKeys)),
    ]);

    this.supervisor = new ProcessSupervisor({
      launcher: options.launcher,
      context: this.context,
      logger: options.logger.service('supervisor'),
      killGraceMS: options.killGraceMS,
      onListenerError: options.onListenerError,
    });

    this.healthMonitor = new HealthMonitor({
      logger: options.logger.service('health'),
      onListenerError: options.onListenerError,
    });

    this.scheduler = new DependencyScheduler({
      registry: this.registry,
      supervisor: this.supervisor,
      healthMonitor: this.healthMonitor,
      logger: options.logger.service('scheduler'),
    });

    this.wireSupervisor();
    this.wireHealthMonitor();
  }

  /**
   * True once `up()` brought every service up healthy, until `down()`
   */
  public get isStackUp(): boolean {
    return this.isUp;
  }

  /**
   * Starts the topology in dependency order and reports how it went. Never
   * throws for a failing service. A call while another `up()` is running
   * shares its result.
   */
  public up(options: UpOptions = {}): Promise<UpReport> {
    if (this.upInFlight) {
      return this.upInFlight;
    }

    const controller = new AbortController();
    this.upController = controller;

    const running = this.runUp(options, controller.signal).finally(() => {
      this.upInFlight = null;
      this.upController = null;
    });

    this.upInFlight = running;
    return running;
  }

  /**
   * Cancels a running `up()`, then stops every service in reverse dependency
   * order. Every service is attempted even when others fail to stop. A call
   * while one is already running joins it, options included.
   */
  public down(options: DownOptions = {}): Promise<DownReport> {
    if (this.downInFlight) {
      return this.downInFlight;
    }

    const running = this.runDown(options).finally(() => {
      this.downInFlight = null;
    });

    this.downInFlight = running;
    return running;
  }

  /**
   * Per-service state, health, pid, restart count, last exit and uptime, in
   * registration order
   */
  public status(): StatusSnapshot {
    const takenAt = Date.now();

    const services = this.registry.names().map((name): ServiceStatus => {
      const instance = this.supervisor.getInstance(name);
      const state = this.stateOf(name);

      return {
        name,
        state,
        health: this.healthOf(name),
        pid: instance?.pid ?? null,
        ref: instance?.ref || null,
        restartCount: instance?.restartCount ?? 0,
        lastExit: instance?.lastExit ?? this.lastExits.get(name) ?? null,
        uptimeMS:
          state === 'running' && instance && instance.startedAt !== null
            ? Math.max(0, takenAt - instance.startedAt)
            : null,
      };
    });

    return { project: this.project, takenAt, services };
  }

  /**
   * Takes over services an earlier `up --detach` left running, so they can
   * be reported on and stopped
   *
   * @returns the names taken over
   */
  public async reclaim(): Promise<string[]> {
    const reclaimed: string[] = [];

    for (const spec of this.registry.all()) {
      const handle = await this.launcher.reclaim(spec, this.context);

      if (handle) {
        await this.supervisor.adopt(spec, handle);
        reclaimed.push(spec.name);
      }
    }

    if (reclaimed.length > 0) {
      this.logger.info('Reclaimed {{services}}', {
        params: { services: reclaimed },
      });
    }

    return reclaimed;
  }

  /**
   * Probes every monitored service once now
   */
  public async refreshHealth(): Promise<void> {
    await Promise.all(
      this.registry.names().map((name) => this.healthMonitor.checkNow(name)),
    );
  }

  /**
   * Stops supervising without stopping anything; the services keep running
   * after this process exits
   */
  public async release(): Promise<void> {
    this.detachSignals();
    this.healthMonitor.stopAll();
    await this.supervisor.releaseAll();
  }

  /**
   * SIGINT/SIGTERM run `down()`. A repeated signal while that is in progress
   * goes to `onForcedShutdown`.
   */
  public attachSignals(options: AttachSignalsOptions = {}): void {
    if (this.signalManager) {
      this.signalManager.attach();
      return;
    }

    this.signalManager = new ProcessSignalManager({
      source: options.source,
      onInfoRequested: options.onInfoRequested,
      onShutdownRequested: (signal, count) => {
        this.emit('orchestrator:shutdown-requested', { signal, count });

        if (this.shutdown) {
          this.logger.warn('Received {{signal}} again while shutting down', {
            params: { signal },
          });
          options.onForcedShutdown?.(signal);
          return;
        }

        this.logger.notice('Received {{signal}}, shutting down', {
          params: { signal },
        });

        this.shutdown = this.down();
        return this.shutdown.then((report) => {
          for (const listener of this.shutdownListeners.splice(0)) {
            listener(report);
          }
        });
      },
    });

    this.signalManager.attach();
  }

  public detachSignals(): void {
    this.signalManager?.detach();
  }

  /**
   * Resolves with the teardown report once a signal-triggered `down()` is done
   */
  public waitForShutdown(): Promise<DownReport> {
    if (this.shutdown) {
      return this.shutdown;
    }

    return new Promise<DownReport>((resolve) => {
      this.shutdownListeners.push(resolve);
    });
  }

  private async runUp(
    options: UpOptions,
    signal: AbortSignal,
  ): Promise<UpReport> {
    const startedAt = Date.now();
    const failures: Failure[] = [];
    let cancelled = false;
    let order: string[] = [];

    try {
      this.registry.validateAcyclic();
      order = this.scheduler.startupOrder(options.services);
    } catch (error) {
      failures.push({ name: blameFor(error, this.project), error: toError(error) });
    }

    if (failures.length === 0) {
      this.logger.info('Starting {{services}}', { params: { services: order } });
      this.emit('orchestrator:up-started', { services: order });

      try {
        await this.scheduler.advance(order, signal);
      } catch (error) {
        cancelled = error instanceof StartupCancelledError;
        failures.push({
          name: blameFor(error, this.project),
          error: toError(error),
        });
      }
    }

    const report: UpReport = {
      success: failures.length === 0,
      services: order.map((name) => this.serviceReport(name, failures)),
      failures,
      cancelled,
      durationMS: Date.now() - startedAt,
    };

    this.isUp = report.success;

    if (report.success) {
      this.logger.success('{{count}} service(s) up and healthy', {
        params: { count: order.length },
      });
    } else if (cancelled) {
      this.logger.notice('Startup cancelled');
    } else {
      for (const failure of failures) {
        this.logger
          .entity(failure.name)
          .errorObject('Startup failed', failure.error);
      }
    }

    this.emit('orchestrator:up-completed', report);
    return report;
  }

  private async runDown(options: DownOptions): Promise<DownReport> {
    const startedAt = Date.now();

    this.upController?.abort();

    if (this.upInFlight) {
      await this.upInFlight;
    }

    this.isUp = false;

    const order = this.scheduler.shutdownOrder();
    const stopped: string[] = [];
    const failures: Failure[] = [];

    this.emit('orchestrator:down-started', { services: order });

    for (const name of order) {
      if (this.supervisor.getState(name) === undefined) {
        continue;
      }

      try {
        await this.supervisor.stop(name, options.stopTimeoutMS);
        stopped.push(name);
      } catch (error) {
        failures.push({ name, error: toError(error) });
        this.logger.entity(name).errorObject('Could not stop', error);
      }
    }

    this.healthMonitor.stopAll();

    try {
      await this.launcher.cleanup(this.registry.all(), this.context);
    } catch (error) {
      this.logger.errorObject('Cleanup after teardown failed', error);
    }

    const report: DownReport = {
      success: failures.length === 0,
      stopped,
      failures,
      durationMS: Date.now() - startedAt,
    };

    this.logger.info('Stopped {{count}} service(s)', {
      params: { count: stopped.length },
    });

    this.emit('orchestrator:down-completed', report);
    return report;
  }

  private serviceReport(name: string, failures: Failure[]): ServiceReport {
    const failure = failures.find((candidate) => candidate.name === name);

    return {
      name,
      state: this.stateOf(name),
      health: this.healthOf(name),
      ...(failure ? { error: failure.error } : {}),
    };
  }

  private stateOf(name: string): ServiceState {
    return (
      this.supervisor.getState(name) ??
      this.lastKnownStates.get(name) ??
      'pending'
    );
  }

  private healthOf(name: string): ServiceReport['health'] {
    return this.healthMonitor.getHealth(name)?.status ?? 'unknown';
  }

  private wireSupervisor(): void {
    const supervisor = this.supervisor;

    supervisor.on('service:state-changed', (event) => {
      this.lastKnownStates.set(event.name, event.to);
      this.emit('service:state-changed', event);
    });

    supervisor.on('service:starting', (event) => {
      this.emit('service:starting', event);
    });

    supervisor.on('service:running', (event) => {
      const spec = this.registry.get(event.name);

      if (spec) {
        this.healthMonitor.watch(
          spec.name,
          spec.healthCheck,
          this.probeFactory(spec),
          event.startedAt,
        );
      }

      this.emit('service:running', event);
    });

    supervisor.on('service:crashed', (event) => {
      this.lastExits.set(event.name, event.exit);
      this.healthMonitor.unwatch(event.name);
      this.emit('service:crashed', event);
    });

    supervisor.on('service:restart-scheduled', (event) => {
      this.emit('service:restart-scheduled', event);
    });

    supervisor.on('service:failed', (event) => {
      this.healthMonitor.unwatch(event.name);
      this.emit('service:failed', event);
    });

    supervisor.on('service:exited', (event) => {
      this.healthMonitor.unwatch(event.name);
      this.emit('service:exited', event);
    });

    supervisor.on('service:stopping', (event) => {
      this.healthMonitor.unwatch(event.name);
      this.emit('service:stopping', event);
    });

    supervisor.on('service:stop-escalated', (event) => {
      this.emit('service:stop-escalated', event);
    });

    supervisor.on('service:stopped', (event) => {
      if (event.exit) {
        this.lastExits.set(event.name, event.exit);
      }

      this.emit('service:stopped', event);
    });
  }

  private wireHealthMonitor(): void {
    const healthMonitor = this.healthMonitor;

    healthMonitor.on('health:checked', (event) => {
      this.emit('health:checked', event);
    });

    healthMonitor.on('health:unwatched', (event) => {
      this.emit('health:unwatched', event);
    });

    healthMonitor.on('health:changed', (event) => {
      this.emit('health:changed', event);

      if (event.to === 'unhealthy') {
        this.restartUnhealthy(event.name);
      }
    });
  }

  /**
   * A service that turns unhealthy after `up()` completed is restarted, when
   * its policy allows restarts at all. During `up()` the scheduler handles it.
   */
  private restartUnhealthy(name: string): void {
    const spec = this.registry.get(name);

    if (!this.isUp || !spec || spec.restart.policy === 'never') {
      return;
    }

    this.logger.entity(name).warn('Unhealthy, restarting');

    this.supervisor.restart(name).catch((error: unknown) => {
      this.logger.entity(name).errorObject('Restart failed', error);
    });
  }
}
