import { InvalidSpecError } from './errors';
import type {
  BackoffSpec,
  HealthCheckSpec,
  LaunchSpec,
  PortMapping,
  ProbeSpec,
  RestartPolicy,
  ServiceSpec,
} from './types';

/**
 * Service names must be kebab-case: `/^[a-z][a-z0-9]*(-[a-z0-9]+)*$/`
 *
 * Valid: 'db', 'fhir-store', 'api-v2'. Invalid: 'DB', 'fhir_store', '', 'my store'
 */
export const SERVICE_NAME_PATTERN = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

export const DEFAULT_HEALTH_CHECK: Omit<HealthCheckSpec, 'probe'> = {
  intervalMS: 1000,
  timeoutMS: 1000,
  successThreshold: 1,
  failureThreshold: 3,
  startPeriodMS: 0,
};

export const DEFAULT_BACKOFF: BackoffSpec = {
  baseMS: 1000,
  maxMS: 30_000,
  maxRetries: 5,
  resetAfterMS: 60_000,
};

export const DEFAULT_RESTART_POLICY: RestartPolicy = 'never';
export const DEFAULT_STOP_TIMEOUT_MS = 10_000;
export const DEFAULT_STOP_SIGNAL: NodeJS.Signals = 'SIGTERM';
export const DEFAULT_STARTUP_TIMEOUT_MS = 60_000;

/** Longest delay a Node.js timer takes, larger values fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Input for `defineService()`: only the name and launch descriptor are required
 */
export interface ServiceSpecInput {
  name: string;
  launch: LaunchSpec;
  environment?: Record<string, string>;
  secretKeys?: string[];
  ports?: PortMapping[];
  dependsOn?: string[];
  healthCheck?: Partial<Omit<HealthCheckSpec, 'probe'>> & { probe?: ProbeSpec };
  restart?: {
    policy?: RestartPolicy;
    backoff?: Partial<BackoffSpec>;
  };
  stopTimeoutMS?: number;
  stopSignal?: NodeJS.Signals;
  startupTimeoutMS?: number;
}

/**
 * Fills every unset field with its default. Does not validate, the registry
 * does that on `register()`.
 *
 * ```typescript
 * const db = defineService({
 *   name: 'db',
 *   launch: { kind: 'container', image: 'mongo:7', args: [], volumes: [] },
 *   healthCheck: { probe: { type: 'tcp', host: '127.0.0.1', port: 27017 } },
 * });
 * ```
 */
export function defineService(input: ServiceSpecInput): ServiceSpec {
  return {
    name: input.name,
    launch: input.launch,
    environment: { ...input.environment },
    secretKeys: [...(input.secretKeys ?? [])],
    ports: [...(input.ports ?? [])],
    dependsOn: [...(input.dependsOn ?? [])],
    healthCheck: {
      ...DEFAULT_HEALTH_CHECK,
      ...input.healthCheck,
      probe: input.healthCheck?.probe ?? { type: 'none' },
    },
    restart: {
      policy: input.restart?.policy ?? DEFAULT_RESTART_POLICY,
      backoff: { ...DEFAULT_BACKOFF, ...input.restart?.backoff },
    },
    stopTimeoutMS: input.stopTimeoutMS ?? DEFAULT_STOP_TIMEOUT_MS,
    stopSignal: input.stopSignal ?? DEFAULT_STOP_SIGNAL,
    startupTimeoutMS: input.startupTimeoutMS ?? DEFAULT_STARTUP_TIMEOUT_MS,
  };
}

function isPort(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 65_535;
}

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Returns the first problem found with the spec, or null when it is valid.
 * Dependencies are only checked for shape here; whether they exist is up to
 * the registry.
 */
export function findSpecProblem(spec: ServiceSpec): string | null {
  if (!SERVICE_NAME_PATTERN.test(spec.name)) {
    return 'name must be kebab-case (lowercase letters, numbers and hyphens)';
  }

  const { launch } = spec;

  if (launch.kind === 'container') {
    if (launch.image.trim() === '') {
      return 'container image must not be empty';
    }

    for (const volume of launch.volumes) {
      if (volume.source === '' || !volume.target.startsWith('/')) {
        return `volume "${volume.source}:${volume.target}" needs a source and an absolute target`;
      }
    }
  } else if (launch.command.length === 0 || launch.command[0] === '') {
    return 'process command must not be empty';
  }

  for (const port of spec.ports) {
    if (!isPort(port.host) || !isPort(port.container)) {
      return `port mapping ${port.host}:${port.container} is out of range`;
    }
  }

  const seen = new Set<string>();

  for (const dependency of spec.dependsOn) {
    if (dependency === spec.name) {
      return 'a service cannot depend on itself';
    }

    if (seen.has(dependency)) {
      return `dependency "${dependency}" is listed twice`;
    }

    seen.add(dependency);
  }

  const health = spec.healthCheck;

  if (!isPositive(health.intervalMS) || !isPositive(health.timeoutMS)) {
    return 'health check intervalMS and timeoutMS must be greater than 0';
  }

  if (
    !Number.isInteger(health.successThreshold) ||
    health.successThreshold < 1 ||
    !Number.isInteger(health.failureThreshold) ||
    health.failureThreshold < 1
  ) {
    return 'health check thresholds must be integers of at least 1';
  }

  if (!isNonNegative(health.startPeriodMS)) {
    return 'health check startPeriodMS must not be negative';
  }

  if (health.probe.type === 'exec' && health.probe.command.length === 0) {
    return 'exec health check needs a command';
  }

  if (health.probe.type === 'tcp' && !isPort(health.probe.port)) {
    return `tcp health check port ${health.probe.port} is out of range`;
  }

  const { backoff } = spec.restart;

  if (!isPositive(backoff.baseMS) || backoff.maxMS < backoff.baseMS) {
    return 'restart backoff needs baseMS > 0 and maxMS >= baseMS';
  }

  if (!Number.isInteger(backoff.maxRetries) || backoff.maxRetries < 0) {
    return 'restart maxRetries must be a non-negative integer';
  }

  if (!isNonNegative(backoff.resetAfterMS)) {
    return 'restart resetAfterMS must not be negative';
  }

  if (!isNonNegative(spec.stopTimeoutMS) || !isPositive(spec.startupTimeoutMS)) {
    return 'stopTimeoutMS must not be negative and startupTimeoutMS must be greater than 0';
  }

  const durations = [
    health.intervalMS,
    health.timeoutMS,
    health.startPeriodMS,
    backoff.maxMS,
    backoff.resetAfterMS,
    spec.stopTimeoutMS,
    spec.startupTimeoutMS,
  ];

  if (durations.some((duration) => duration > MAX_TIMER_MS)) {
    return `durations must not exceed ${MAX_TIMER_MS}ms`;
  }

  for (const key of spec.secretKeys) {
    if (!(key in spec.environment)) {
      return `secret key "${key}" is not part of the environment`;
    }
  }

  return null;
}

/**
 * @throws InvalidSpecError
 */
export function assertValidSpec(spec: ServiceSpec): void {
  const problem = findSpecProblem(spec);

  if (problem !== null) {
    throw new InvalidSpecError({ serviceName: spec.name, reason: problem });
  }
}
