/**
 * How a service is launched.
 *
 * - `container`: an image run by the container engine, with optional args
 *   appended after the image and volumes mounted into it
 * - `process`: an executable run directly on the host
 */
export type LaunchSpec = ContainerLaunchSpec | ProcessLaunchSpec;

export interface ContainerLaunchSpec {
  kind: 'container';
  image: string;
  args: string[];
  volumes: VolumeMount[];
}

export interface ProcessLaunchSpec {
  kind: 'process';
  /** argv, the first entry is the executable */
  command: string[];
  workingDir?: string;
}

export interface VolumeMount {
  /** Named volume (already prefixed with the project) or absolute host path */
  source: string;
  target: string;
  readOnly: boolean;
}

export type PortProtocol = 'tcp' | 'udp';

export interface PortMapping {
  host: number;
  container: number;
  protocol: PortProtocol;
}

export type ProbeSpec =
  | { type: 'http'; url: string }
  | { type: 'tcp'; host: string; port: number }
  | { type: 'exec'; command: string[] }
  | { type: 'none' };

export interface HealthCheckSpec {
  probe: ProbeSpec;
  intervalMS: number;
  timeoutMS: number;
  /** Consecutive successes needed to become healthy */
  successThreshold: number;
  /** Consecutive failures needed to become unhealthy */
  failureThreshold: number;
  /** Failures during this window after launch are not counted */
  startPeriodMS: number;
}

export type RestartPolicy = 'never' | 'on-failure' | 'always';

export interface BackoffSpec {
  baseMS: number;
  maxMS: number;
  /** Restarts allowed before the service is marked failed */
  maxRetries: number;
  /** Uptime after which the restart attempt counter resets */
  resetAfterMS: number;
}

export interface RestartSpec {
  policy: RestartPolicy;
  backoff: BackoffSpec;
}

/**
 * Fully resolved description of one managed service. Every field is set;
 * defaults are applied by `defineService()` or the topology file loader.
 */
export interface ServiceSpec {
  name: string;
  launch: LaunchSpec;
  /** Passed through to the service untouched */
  environment: Record<string, string>;
  /** Keys of `environment` whose values are secret, redacted in logs */
  secretKeys: string[];
  ports: PortMapping[];
  dependsOn: string[];
  healthCheck: HealthCheckSpec;
  restart: RestartSpec;
  stopTimeoutMS: number;
  stopSignal: NodeJS.Signals;
  /** Upper bound for waiting on each dependency to become healthy */
  startupTimeoutMS: number;
}

export type ServiceState =
  | 'pending'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'crashed'
  | 'failed';

export type HealthStatus = 'unknown' | 'healthy' | 'unhealthy';

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Unix ms */
  at: number;
}

export interface ProbeResult {
  ok: boolean;
  durationMS: number;
  message?: string;
}

/**
 * Read-only view of a HealthRecord
 */
export interface HealthSnapshot {
  status: HealthStatus;
  consecutiveSuccesses: number;
  consecutiveFailures: number;
  lastResult: ProbeResult | null;
  lastCheckedAt: number | null;
}

/**
 * Read-only view of a ServiceInstance
 */
export interface ServiceInstanceSnapshot {
  instanceID: string;
  name: string;
  state: ServiceState;
  pid: number | null;
  /** Container ID or `pid:<n>` */
  ref: string;
  restartCount: number;
  lastExit: ExitInfo | null;
  lastError: Error | null;
  startedAt: number | null;
  stoppedAt: number | null;
}

export interface ServiceReport {
  name: string;
  state: ServiceState;
  health: HealthStatus;
  error?: Error;
}

export interface UpReport {
  success: boolean;
  services: ServiceReport[];
  failures: { name: string; error: Error }[];
  /** True when `down()` interrupted the startup */
  cancelled: boolean;
  durationMS: number;
}

export interface DownReport {
  success: boolean;
  stopped: string[];
  failures: { name: string; error: Error }[];
  durationMS: number;
}

export interface ServiceStatus {
  name: string;
  state: ServiceState;
  health: HealthStatus;
  pid: number | null;
  ref: string | null;
  restartCount: number;
  lastExit: ExitInfo | null;
  /** ms since the current run started, null when not running */
  uptimeMS: number | null;
}

export interface StatusSnapshot {
  project: string;
  takenAt: number;
  services: ServiceStatus[];
}
