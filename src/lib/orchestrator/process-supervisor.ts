import {
  EventEmitterProtected,
  type EventEmitterOptions,
} from '../event-emitter';
import type { LoggerService } from '../logger';
import { SerialLock } from '../serial-lock';
import {
  ServiceExitedError,
  ServiceNotFoundError,
  ServiceUnhealthyError,
  StopError,
} from './errors';
import type { SupervisorEventMap } from './events';
import type {
  LaunchContext,
  LaunchExit,
  ServiceHandle,
  ServiceLauncher,
} from './launchers/types';
import { ServiceInstance } from './service-instance';
import type {
  ExitInfo,
  RestartPolicy,
  ServiceInstanceSnapshot,
  ServiceSpec,
  ServiceState,
} from './types';

export interface ProcessSupervisorOptions extends EventEmitterOptions {
  launcher: ServiceLauncher;
  context: LaunchContext;
  logger: LoggerService;
  /** How long to wait for the exit after SIGKILL before giving up (default: 5000) */
  killGraceMS?: number;
}

export const DEFAULT_KILL_GRACE_MS = 5000;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isCleanExit(exit: LaunchExit): boolean {
  return exit.code === 0 && exit.signal === null;
}

function shouldRestart(policy: RestartPolicy, clean: boolean): boolean {
  return policy === 'always' || (policy === 'on-failure' && !clean);
}

/**
 * Resolves with the exit, or null when `timeoutMS` passes first
 */
async function waitForExit(
  handle: ServiceHandle,
  timeoutMS: number,
): Promise<LaunchExit | null> {
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeout = new Promise<null>((resolve) => {
    timeoutHandle = setTimeout(() => resolve(null), timeoutMS);
  });

  try {
    return await Promise.race([handle.exited, timeout]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

/**
 * Owns the instance table and every OS handle in it.
 *
 * Public operations and exit notifications all run through one serial lock:
 * a crash reported while a stop is in progress is handled after the stop and
 * then ignored, instead of racing it.
 *
 * ```typescript
 * const supervisor = new ProcessSupervisor({ launcher, context: { project: 'demo' }, logger });
 * supervisor.on('service:crashed', ({ name, exit }) => console.log(name, exit.code));
 * await supervisor.start(spec);
 * await supervisor.stop('db');
 * ```
 */
export class ProcessSupervisor extends EventEmitterProtected<SupervisorEventMap> {
  private launcher: ServiceLauncher;
  private context: LaunchContext;
  private logger: LoggerService;
  private killGraceMS: number;
  private instances = new Map<string, ServiceInstance>();
  private lock = new SerialLock();

  constructor(options: ProcessSupervisorOptions) {
    super(options);
    this.launcher = options.launcher;
    this.context = options.context;
    this.logger = options.logger;
    this.killGraceMS = options.killGraceMS ?? DEFAULT_KILL_GRACE_MS;
  }

  public get size(): number {
    return this.instances.size;
  }

  public getState(name: string): ServiceState | undefined {
    return this.instances.get(name)?.state;
  }

  public getInstance(name: string): ServiceInstanceSnapshot | undefined {
    return this.instances.get(name)?.snapshot();
  }

  public snapshots(): ServiceInstanceSnapshot[] {
    return [...this.instances.values()].map((instance) => instance.snapshot());
  }

  /**
   * Launches the service and resolves once the OS reports it spawned (it is
   * not health-checked yet). Starting a service that is already running is a
   * no-op.
   *
   * @throws LaunchError
   */
  public start(spec: ServiceSpec): Promise<ServiceInstanceSnapshot> {
    return this.lock.runExclusive(() => this.startInternal(spec));
  }

  /**
   * Stops the service gracefully, escalating to SIGKILL after `timeoutMS`
   * (its `stopTimeoutMS` when unset), cancels any pending restart and drops it
   * from the table. Resolves with null when there is nothing to stop.
   *
   * @throws StopError
   */
  public stop(
    name: string,
    timeoutMS?: number,
  ): Promise<ServiceInstanceSnapshot | null> {
    return this.lock.runExclusive(async () => {
      const instance = this.instances.get(name);

      if (!instance) {
        return null;
      }

      const snapshot = await this.stopInternal(instance, timeoutMS);
      this.instances.delete(name);

      return snapshot;
    });
  }

  /**
   * Stops and relaunches a running service right away. Each call uses up one
   * restart attempt; once they are exhausted the service is stopped and
   * marked failed instead.
   *
   * @throws ServiceNotFoundError
   */
  public restart(name: string): Promise<ServiceInstanceSnapshot> {
    return this.lock.runExclusive(async () => {
      const instance = this.instances.get(name);

      if (!instance) {
        throw new ServiceNotFoundError({ serviceName: name });
      }

      if (instance.state !== 'running') {
        return instance.snapshot();
      }

      const exhausted = instance.backoff.areAttemptsExhausted;

      if (!exhausted) {
        instance.backoff.recordAttempt();
      }

      await this.stopInternal(instance);

      if (exhausted) {
        this.fail(
          instance,
          new ServiceUnhealthyError({
            serviceName: name,
            reason: `still unhealthy after ${instance.restartCount} restart(s)`,
          }),
        );

        return instance.snapshot();
      }

      instance.restartCount++;
      await this.launchInstance(instance);

      return instance.snapshot();
    });
  }

  /**
   * Takes over a service an earlier invocation left running
   */
  public adopt(
    spec: ServiceSpec,
    handle: ServiceHandle,
  ): Promise<ServiceInstanceSnapshot> {
    return this.lock.runExclusive(() => {
      const existing = this.instances.get(spec.name);

      if (existing && existing.state === 'running') {
        return existing.snapshot();
      }

      const instance = new ServiceInstance(spec);
      this.instances.set(spec.name, instance);

      this.setState(instance, 'starting');
      this.markRunning(instance, handle);

      return instance.snapshot();
    });
  }

  /**
   * Forgets every instance without stopping it, so the services outlive this
   * process
   */
  public releaseAll(): Promise<void> {
    return this.lock.runExclusive(() => {
      for (const instance of this.instances.values()) {
        instance.clearRestartTimer();
        instance.handle?.release?.();
      }

      this.instances.clear();
    });
  }

  private async startInternal(
    spec: ServiceSpec,
  ): Promise<ServiceInstanceSnapshot> {
    const existing = this.instances.get(spec.name);

    if (existing?.state === 'running') {
      return existing.snapshot();
    }

    if (existing?.state === 'crashed') {
      // Bring it up now instead of after the backoff
      existing.clearRestartTimer();
      existing.restartCount++;
      await this.launchInstance(existing);
      return existing.snapshot();
    }

    const instance = new ServiceInstance(spec);
    this.instances.set(spec.name, instance);

    await this.launchInstance(instance);

    return instance.snapshot();
  }

  /**
   * Moves the instance to `starting` and launches it. On failure the
   * instance is marked failed and the LaunchError rethrown.
   */
  private async launchInstance(instance: ServiceInstance): Promise<void> {
    instance.stopRequested = false;
    this.setState(instance, 'starting');
    this.emit('service:starting', {
      name: instance.name,
      attempt: instance.restartCount,
    });

    let handle: ServiceHandle;

    try {
      handle = await this.launcher.launch(instance.spec, this.context);
    } catch (error) {
      this.fail(instance, toError(error));
      throw error;
    }

    this.markRunning(instance, handle);
  }

  private markRunning(instance: ServiceInstance, handle: ServiceHandle): void {
    const startedAt = Date.now();

    instance.handle = handle;
    instance.startedAt = startedAt;
    instance.stoppedAt = null;
    instance.lastError = null;
    this.setState(instance, 'running');

    this.logger.entity(instance.name).info('Running ({{ref}})', {
      params: { ref: handle.ref },
    });

    this.emit('service:running', {
      name: instance.name,
      pid: handle.pid,
      ref: handle.ref,
      startedAt,
    });

    this.watchExit(instance, handle);
  }

  private watchExit(instance: ServiceInstance, handle: ServiceHandle): void {
    handle.exited
      .then((exit) =>
        this.lock.runExclusive(() => this.onExit(instance, handle, exit)),
      )
      .catch((error: unknown) => {
        this.logger
          .entity(instance.name)
          .errorObject('Could not handle the exit', error);
      });
  }

  /**
   * Exit notification from the launcher. Exits of stopped, replaced or
   * released instances are ignored.
   */
  private onExit(
    instance: ServiceInstance,
    handle: ServiceHandle,
    exit: LaunchExit,
  ): void {
    if (
      this.instances.get(instance.name) !== instance ||
      instance.handle !== handle ||
      instance.stopRequested ||
      instance.state !== 'running'
    ) {
      return;
    }

    const exitInfo: ExitInfo = { ...exit, at: Date.now() };
    const uptimeMS = instance.uptimeMS(exitInfo.at);
    const clean = isCleanExit(exit);
    const logger = this.logger.entity(instance.name);

    instance.handle = null;
    instance.lastExit = exitInfo;
    instance.stoppedAt = exitInfo.at;
    this.setState(instance, 'crashed');

    logger.warn('Exited unexpectedly (code {{code}}, signal {{signal}})', {
      params: { code: exit.code, signal: exit.signal },
    });

    this.emit('service:crashed', { name: instance.name, exit: exitInfo, uptimeMS });

    if (instance.backoff.shouldResetAfter(uptimeMS)) {
      instance.backoff.reset();
    }

    if (shouldRestart(instance.spec.restart.policy, clean)) {
      if (this.scheduleRestart(instance)) {
        return;
      }

      logger.error('Giving up after {{restarts}} restart(s)', {
        params: { restarts: instance.restartCount },
      });
    }

    if (clean) {
      this.setState(instance, 'stopped');
      this.emit('service:exited', { name: instance.name, exit: exitInfo });
      return;
    }

    this.fail(
      instance,
      new ServiceExitedError({
        serviceName: instance.name,
        code: exit.code,
        signal: exit.signal,
        restarts: instance.restartCount,
      }),
      exitInfo,
    );
  }

  /**
   * @returns false when the restart attempts are used up
   */
  private scheduleRestart(instance: ServiceInstance): boolean {
    const { backoff } = instance;

    if (backoff.areAttemptsExhausted) {
      return false;
    }

    const delayMS = backoff.recordAttempt();
    const attempt = backoff.attempts;

    this.logger
      .entity(instance.name)
      .notice('Restarting in {{delayMS}}ms (attempt {{attempt}} of {{maxRetries}})', {
        params: {
          delayMS,
          attempt,
          maxRetries: instance.spec.restart.backoff.maxRetries,
        },
      });

    this.emit('service:restart-scheduled', {
      name: instance.name,
      attempt,
      delayMS,
    });

    instance.restartTimer = setTimeout(() => {
      instance.restartTimer = null;

      this.lock
        .runExclusive(() => this.relaunch(instance))
        .catch((error: unknown) => {
          this.logger
            .entity(instance.name)
            .errorObject('Restart failed', error);
        });
    }, delayMS);

    return true;
  }

  private async relaunch(instance: ServiceInstance): Promise<void> {
    if (
      this.instances.get(instance.name) !== instance ||
      instance.stopRequested ||
      instance.state !== 'crashed'
    ) {
      return;
    }

    instance.restartCount++;
    instance.stopRequested = false;
    this.setState(instance, 'starting');
    this.emit('service:starting', {
      name: instance.name,
      attempt: instance.restartCount,
    });

    let handle: ServiceHandle;

    try {
      handle = await this.launcher.launch(instance.spec, this.context);
    } catch (error) {
      const launchError = toError(error);

      instance.lastError = launchError;
      this.setState(instance, 'crashed');

      this.logger
        .entity(instance.name)
        .errorObject('Relaunch failed', error);

      if (!this.scheduleRestart(instance)) {
        this.fail(instance, launchError);
      }

      return;
    }

    this.markRunning(instance, handle);
  }

  private async stopInternal(
    instance: ServiceInstance,
    timeoutMS = instance.spec.stopTimeoutMS,
  ): Promise<ServiceInstanceSnapshot> {
    instance.stopRequested = true;
    instance.clearRestartTimer();

    const handle = instance.handle;

    if (instance.state !== 'running' || handle === null) {
      if (instance.state !== 'stopped') {
        this.setState(instance, 'stopped');
        instance.stoppedAt = Date.now();
        this.emit('service:stopped', {
          name: instance.name,
          exit: instance.lastExit,
        });
      }

      return instance.snapshot();
    }

    const { stopSignal } = instance.spec;
    const logger = this.logger.entity(instance.name);

    this.setState(instance, 'stopping');
    this.emit('service:stopping', { name: instance.name, signal: stopSignal });

    let exit: LaunchExit | null = null;
    let cause: unknown = new Error(
      `no exit ${this.killGraceMS}ms after SIGKILL`,
    );

    try {
      await handle.kill(stopSignal);
      exit = await waitForExit(handle, timeoutMS);

      if (exit === null) {
        logger.warn('No exit {{timeoutMS}}ms after {{signal}}, sending SIGKILL', {
          params: { timeoutMS, signal: stopSignal },
        });

        this.emit('service:stop-escalated', {
          name: instance.name,
          timeoutMS,
        });

        await handle.kill('SIGKILL');
        exit = await waitForExit(handle, this.killGraceMS);
      }
    } catch (error) {
      cause = error;
    }

    if (exit === null) {
      const error = new StopError(
        { serviceName: instance.name, timeoutMS },
        cause,
      );

      this.fail(instance, error);
      throw error;
    }

    const exitInfo: ExitInfo = { ...exit, at: Date.now() };

    instance.handle = null;
    instance.lastExit = exitInfo;
    instance.stoppedAt = exitInfo.at;
    this.setState(instance, 'stopped');

    logger.info('Stopped');
    this.emit('service:stopped', { name: instance.name, exit: exitInfo });

    return instance.snapshot();
  }

  private fail(instance: ServiceInstance, error: Error, exit?: ExitInfo): void {
    instance.lastError = error;
    instance.stoppedAt = Date.now();
    this.setState(instance, 'failed');

    this.logger.entity(instance.name).error('Failed: {{message}}', {
      params: { message: error.message },
    });

    this.emit('service:failed', { name: instance.name, error, exit });
  }

  private setState(instance: ServiceInstance, to: ServiceState): void {
    const from = instance.transition(to);
    this.emit('service:state-changed', { name: instance.name, from, to });
  }
}
