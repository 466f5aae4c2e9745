import { ulid } from 'ulid';
import type { ServiceHandle } from './launchers/types';
import { RestartBackoff } from './restart-backoff';
import type {
  ExitInfo,
  ServiceInstanceSnapshot,
  ServiceSpec,
  ServiceState,
} from './types';

/**
 * Allowed state changes. `stopped` and `failed` can start over when the
 * service is brought up again.
 */
export const SERVICE_STATE_TRANSITIONS: Readonly<
  Record<ServiceState, readonly ServiceState[]>
> = {
  pending: ['starting', 'failed', 'stopped'],
  // crashed: a relaunch that failed, retried like any other crash
  starting: ['running', 'failed', 'crashed'],
  running: ['stopping', 'crashed'],
  stopping: ['stopped', 'failed'],
  crashed: ['starting', 'failed', 'stopped'],
  stopped: ['starting', 'failed'],
  failed: ['starting', 'stopped'],
};

export function canTransition(from: ServiceState, to: ServiceState): boolean {
  return SERVICE_STATE_TRANSITIONS[from].includes(to);
}

/**
 * Runtime record of one supervised service. Mutated only by the supervisor,
 * under its lock.
 */
export class ServiceInstance {
  public readonly instanceID = ulid();
  public readonly spec: ServiceSpec;
  public readonly backoff: RestartBackoff;

  public handle: ServiceHandle | null = null;
  public restartCount = 0;
  public lastExit: ExitInfo | null = null;
  public lastError: Error | null = null;
  public startedAt: number | null = null;
  public stoppedAt: number | null = null;
  /** Set once a stop was asked for, so the exit is not treated as a crash */
  public stopRequested = false;
  public restartTimer: NodeJS.Timeout | null = null;

  private _state: ServiceState = 'pending';

  constructor(spec: ServiceSpec) {
    this.spec = spec;
    this.backoff = new RestartBackoff(spec.restart.backoff);
  }

  public get name(): string {
    return this.spec.name;
  }

  public get state(): ServiceState {
    return this._state;
  }

  /**
   * @returns the previous state
   * @throws Error when `to` is not reachable from the current state
   */
  public transition(to: ServiceState): ServiceState {
    const from = this._state;

    if (!canTransition(from, to)) {
      throw new Error(
        `Service "${this.name}" cannot go from ${from} to ${to}`,
      );
    }

    this._state = to;
    return from;
  }

  public uptimeMS(now = Date.now()): number {
    if (this._state !== 'running' || this.startedAt === null) {
      return 0;
    }

    return Math.max(0, now - this.startedAt);
  }

  public clearRestartTimer(): void {
    if (this.restartTimer !== null) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
  }

  public snapshot(): ServiceInstanceSnapshot {
    return {
      instanceID: this.instanceID,
      name: this.name,
      state: this._state,
      pid: this.handle?.pid ?? null,
      ref: this.handle?.ref ?? '',
      restartCount: this.restartCount,
      lastExit: this.lastExit,
      lastError: this.lastError,
      startedAt: this.startedAt,
      stoppedAt: this.stoppedAt,
    };
  }
}
