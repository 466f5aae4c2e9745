import { LaunchError } from '../errors';
import type {
  LaunchExit,
  ServiceHandle,
  ServiceLauncher,
} from '../launchers/types';
import type { ServiceSpec } from '../types';

export interface FakeHandleOptions {
  pid: number;
  /** Signals the fake process survives */
  ignoredSignals?: NodeJS.Signals[];
}

/**
 * In-memory stand-in for a launched process. It exits when a test calls
 * `exit()`, or when it receives a signal it does not ignore.
 */
export class FakeHandle implements ServiceHandle {
  public readonly pid: number;
  public readonly ref: string;
  public readonly exited: Promise<LaunchExit>;
  public readonly signals: NodeJS.Signals[] = [];
  public ignoredSignals: NodeJS.Signals[];
  public released = false;
  public launchedAt = Date.now();
  private resolveExit: (exit: LaunchExit) => void = () => {};
  private _hasExited = false;

  constructor(options: FakeHandleOptions) {
    this.pid = options.pid;
    this.ref = `pid:${options.pid}`;
    this.ignoredSignals = options.ignoredSignals ?? [];
    this.exited = new Promise<LaunchExit>((resolve) => {
      this.resolveExit = resolve;
    });
  }

  public get hasExited(): boolean {
    return this._hasExited;
  }

  public kill(signal: NodeJS.Signals): Promise<void> {
    this.signals.push(signal);

    if (!this.ignoredSignals.includes(signal)) {
      this.exit({ code: null, signal });
    }

    return Promise.resolve();
  }

  public release(): void {
    this.released = true;
  }

  public exit(exit: LaunchExit): void {
    if (this._hasExited) {
      return;
    }

    this._hasExited = true;
    this.resolveExit(exit);
  }

  public crash(code = 1): void {
    this.exit({ code, signal: null });
  }
}

/**
 * ServiceLauncher that launches FakeHandles and records what it was asked to do
 */
export class FakeLauncher implements ServiceLauncher {
  /** Service names in launch order, failed launches included */
  public readonly launches: string[] = [];
  public readonly handles = new Map<string, FakeHandle[]>();
  public readonly reclaimable = new Map<string, FakeHandle>();
  public readonly cleanups: string[][] = [];
  /** Signals every handle launched from now on ignores, per service */
  public readonly ignoredSignals = new Map<string, NodeJS.Signals[]>();
  private failures = new Map<string, number>();
  private nextPID = 1000;

  /**
   * Makes the next `count` launches of `name` fail with a LaunchError
   */
  public failNextLaunches(name: string, count = 1): void {
    this.failures.set(name, count);
  }

  public launch(spec: ServiceSpec): Promise<ServiceHandle> {
    this.launches.push(spec.name);

    const failures = this.failures.get(spec.name) ?? 0;

    if (failures > 0) {
      this.failures.set(spec.name, failures - 1);

      return Promise.reject(
        new LaunchError(
          { serviceName: spec.name, command: spec.name },
          new Error('exec format error'),
        ),
      );
    }

    const handle = new FakeHandle({
      pid: this.nextPID++,
      ignoredSignals: this.ignoredSignals.get(spec.name),
    });

    const handles = this.handles.get(spec.name) ?? [];
    handles.push(handle);
    this.handles.set(spec.name, handles);

    return Promise.resolve(handle);
  }

  /**
   * The most recent handle of `name`
   */
  public latest(name: string): FakeHandle {
    const handle = this.handles.get(name)?.at(-1);

    if (!handle) {
      throw new Error(`"${name}" was never launched`);
    }

    return handle;
  }

  public launchCount(name: string): number {
    return this.launches.filter((launched) => launched === name).length;
  }

  public probeCommand(spec: ServiceSpec, command: string[]): string[] {
    return ['fake-exec', spec.name, ...command];
  }

  public reclaim(spec: ServiceSpec): Promise<ServiceHandle | null> {
    return Promise.resolve(this.reclaimable.get(spec.name) ?? null);
  }

  public cleanup(specs: ServiceSpec[]): Promise<void> {
    this.cleanups.push(specs.map((spec) => spec.name));
    return Promise.resolve();
  }
}

/**
 * Lets pending promise chains (exit notifications, lock hand-offs) settle
 */
export async function flushPromises(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
