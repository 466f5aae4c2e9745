import type { ServiceSpec } from '../types';

export interface LaunchExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type OutputStream = 'stdout' | 'stderr';

export interface LaunchContext {
  /** Scopes container, network and volume names */
  project: string;
  /** Receives the service's output line by line */
  onOutput?: (serviceName: string, line: string, stream: OutputStream) => void;
}

/**
 * OS handle of one launched service. Owned by exactly one ServiceInstance.
 */
export interface ServiceHandle {
  /** OS pid, null for containers */
  readonly pid: number | null;
  /** `pid:<n>` for processes, the short container ID for containers */
  readonly ref: string;
  /** Resolves once the service exits. Never rejects. */
  readonly exited: Promise<LaunchExit>;
  /** Delivers a signal; resolves once it was handed to the OS or engine */
  kill(signal: NodeJS.Signals): Promise<void>;
  /**
   * Stop watching the service without stopping it, so this process can exit
   * and leave it running
   */
  release?(): void;
}

/**
 * The OS layer: turns a ServiceSpec into a running process or container.
 */
export interface ServiceLauncher {
  /**
   * Resolves once the OS reports the service spawned.
   *
   * @throws LaunchError when it cannot be spawned
   */
  launch(spec: ServiceSpec, context: LaunchContext): Promise<ServiceHandle>;

  /** argv an `exec` health check runs for this service */
  probeCommand(
    spec: ServiceSpec,
    command: string[],
    context: LaunchContext,
  ): string[];

  /**
   * Finds a service left running by an earlier invocation, or null
   */
  reclaim(
    spec: ServiceSpec,
    context: LaunchContext,
  ): Promise<ServiceHandle | null>;

  /** Releases shared resources once every service is down */
  cleanup(specs: ServiceSpec[], context: LaunchContext): Promise<void>;
}
