import { STACKCTL_ERR_PREFIX } from '../constants';

/**
 * Shape shared by every error this package throws or reports:
 * `errPrefix` / `errType` / `errCode` identify it, `additionalInfo` carries
 * the structured details rendered by `errorToString()`.
 */
export abstract class StackctlError<
  TInfo extends object = Record<string, unknown>,
> extends Error {
  public errPrefix = STACKCTL_ERR_PREFIX;
  public abstract readonly errType: string;
  public abstract readonly errCode: string;
  public additionalInfo: TInfo;

  constructor(message: string, additionalInfo: TInfo, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.additionalInfo = additionalInfo;
  }
}

export function isStackctlError(error: unknown): error is StackctlError<object> {
  return error instanceof StackctlError;
}

function causeSuffix(cause: unknown): string {
  return cause instanceof Error ? `: ${cause.message}` : '';
}

/**
 * A service spec is malformed or references an unknown dependency
 */
export class InvalidSpecError extends StackctlError<{
  serviceName: string;
  reason: string;
}> {
  public readonly errType = 'Spec';
  public readonly errCode = 'Invalid';

  constructor(additionalInfo: { serviceName: string; reason: string }) {
    super(
      `Invalid service "${additionalInfo.serviceName}": ${additionalInfo.reason}`,
      additionalInfo,
    );
  }
}

export class DuplicateServiceError extends StackctlError<{
  serviceName: string;
}> {
  public readonly errType = 'Registry';
  public readonly errCode = 'Duplicate';

  constructor(additionalInfo: { serviceName: string }) {
    super(
      `Service "${additionalInfo.serviceName}" is already registered`,
      additionalInfo,
    );
  }
}

/**
 * Example: a depends on b, b depends on a -> cycle ['a', 'b']
 */
export class CyclicDependencyError extends StackctlError<{ cycle: string[] }> {
  public readonly errType = 'Dependency';
  public readonly errCode = 'Cyclic';

  constructor(additionalInfo: { cycle: string[] }) {
    super(
      `Circular dependency detected: ${additionalInfo.cycle.join(' -> ')} -> ${additionalInfo.cycle[0]}`,
      additionalInfo,
    );
  }
}

export type TopologyFileErrorCode =
  | 'NotFound'
  | 'Unreadable'
  | 'InvalidYAML'
  | 'InvalidSchema';

export class TopologyFileError extends StackctlError<{
  path: string;
  issues?: string[];
}> {
  public readonly errType = 'Topology';
  public readonly errCode: TopologyFileErrorCode;

  constructor(
    errCode: TopologyFileErrorCode,
    message: string,
    additionalInfo: { path: string; issues?: string[] },
    cause?: unknown,
  ) {
    super(message, additionalInfo, cause);
    this.errCode = errCode;
  }
}

export class InvalidProjectNameError extends StackctlError<{
  project: string;
}> {
  public readonly errType = 'Topology';
  public readonly errCode = 'InvalidProjectName';

  constructor(additionalInfo: { project: string }) {
    super(
      `Invalid project name "${additionalInfo.project}": use lowercase letters, digits, "-" and "_", starting with a letter or digit`,
      additionalInfo,
    );
  }
}

/**
 * The launcher could not start the process or container
 */
export class LaunchError extends StackctlError<{
  serviceName: string;
  command: string;
}> {
  public readonly errType = 'Service';
  public readonly errCode = 'LaunchFailed';

  constructor(
    additionalInfo: { serviceName: string; command: string },
    cause?: unknown,
  ) {
    super(
      `Service "${additionalInfo.serviceName}" failed to launch${causeSuffix(cause)}`,
      additionalInfo,
      cause,
    );
  }
}

export class DependencyTimeoutError extends StackctlError<{
  serviceName: string;
  dependency: string;
  timeoutMS: number;
}> {
  public readonly errType = 'Dependency';
  public readonly errCode = 'Timeout';

  constructor(additionalInfo: {
    serviceName: string;
    dependency: string;
    timeoutMS: number;
  }) {
    super(
      `Service "${additionalInfo.serviceName}" gave up waiting for "${additionalInfo.dependency}" to become healthy after ${additionalInfo.timeoutMS}ms`,
      additionalInfo,
    );
  }
}

export class DependencyUnhealthyError extends StackctlError<{
  serviceName: string;
  dependency: string;
  reason: string;
}> {
  public readonly errType = 'Dependency';
  public readonly errCode = 'Unhealthy';

  constructor(additionalInfo: {
    serviceName: string;
    dependency: string;
    reason: string;
  }) {
    super(
      `Service "${additionalInfo.serviceName}" cannot start, dependency "${additionalInfo.dependency}" is ${additionalInfo.reason}`,
      additionalInfo,
    );
  }
}

/**
 * A started service never became healthy itself (no dependent was waiting on it)
 */
export class ServiceUnhealthyError extends StackctlError<{
  serviceName: string;
  reason: string;
  timeoutMS?: number;
}> {
  public readonly errType = 'Service';
  public readonly errCode = 'Unhealthy';

  constructor(additionalInfo: {
    serviceName: string;
    reason: string;
    timeoutMS?: number;
  }) {
    super(
      `Service "${additionalInfo.serviceName}" did not become healthy: ${additionalInfo.reason}`,
      additionalInfo,
    );
  }
}

export class StartupCancelledError extends StackctlError<{
  serviceName?: string;
}> {
  public readonly errType = 'Orchestrator';
  public readonly errCode = 'Cancelled';

  constructor(additionalInfo: { serviceName?: string } = {}) {
    super(
      additionalInfo.serviceName
        ? `Startup was cancelled while starting "${additionalInfo.serviceName}"`
        : 'Startup was cancelled',
      additionalInfo,
    );
  }
}

export class StopError extends StackctlError<{
  serviceName: string;
  timeoutMS: number;
}> {
  public readonly errType = 'Service';
  public readonly errCode = 'StopFailed';

  constructor(
    additionalInfo: { serviceName: string; timeoutMS: number },
    cause?: unknown,
  ) {
    super(
      `Service "${additionalInfo.serviceName}" could not be stopped${causeSuffix(cause)}`,
      additionalInfo,
      cause,
    );
  }
}

export class ServiceNotFoundError extends StackctlError<{
  serviceName: string;
}> {
  public readonly errType = 'Service';
  public readonly errCode = 'NotFound';

  constructor(additionalInfo: { serviceName: string }) {
    super(
      `Service "${additionalInfo.serviceName}" is not registered`,
      additionalInfo,
    );
  }
}

/**
 * A service exited on its own and will not be restarted
 */
export class ServiceExitedError extends StackctlError<{
  serviceName: string;
  code: number | null;
  signal: string | null;
  restarts: number;
}> {
  public readonly errType = 'Service';
  public readonly errCode = 'Exited';

  constructor(additionalInfo: {
    serviceName: string;
    code: number | null;
    signal: string | null;
    restarts: number;
  }) {
    const how =
      additionalInfo.signal !== null
        ? `was killed by ${additionalInfo.signal}`
        : `exited with code ${additionalInfo.code ?? 'unknown'}`;
    const restarts =
      additionalInfo.restarts > 0
        ? ` after ${additionalInfo.restarts} restart${additionalInfo.restarts === 1 ? '' : 's'}`
        : '';

    super(`Service "${additionalInfo.serviceName}" ${how}${restarts}`, additionalInfo);
  }
}
