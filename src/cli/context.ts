import path from 'node:path';
import {
  ConsoleSink,
  LogLevel,
  LOG_LEVEL_NAMES,
  Logger,
  getLogLevel,
  isLogLevelName,
} from '../lib/logger';
import {
  CompositeLauncher,
  ContainerLauncher,
  Orchestrator,
  ProcessLauncher,
  isStackctlError,
  type ServiceLauncher,
} from '../lib/orchestrator';
import type { ShutdownSignal, SignalSource } from '../lib/process-signal-manager';
import {
  findTopologyFile,
  loadTopologyFile,
  type Topology,
  type VariableLookup,
} from '../lib/topology';

/**
 * Everything a command reads from the outside world, so tests can swap the
 * launcher, signals and output for in-process ones
 */
export interface CLIContext {
  env: VariableLookup;
  cwd: string;
  logger: Logger;
  /** Builds the launcher (default: container engine plus local processes) */
  createLauncher?: (logger: Logger, env: VariableLookup) => ServiceLauncher;
  signalSource?: SignalSource;
  /** A second Ctrl+C while tearing down */
  onForcedShutdown?: (signal: ShutdownSignal) => void;
}

/** Options every command that reads the topology accepts */
export interface StackOptions {
  file?: string;
  project?: string;
}

export interface Stack {
  topology: Topology;
  orchestrator: Orchestrator;
}

function isSet(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

/**
 * `STACKCTL_LOG_LEVEL`, INFO when unset. Unknown names return null.
 */
export function resolveLogLevel(value: string | undefined): LogLevel | null {
  if (!isSet(value)) {
    return LogLevel.INFO;
  }

  const name = value.trim().toLowerCase();
  return isLogLevelName(name) ? getLogLevel(name) : null;
}

export function createCLILogger(env: VariableLookup): Logger {
  const minLevel = resolveLogLevel(env.STACKCTL_LOG_LEVEL);

  const logger = new Logger({
    sinks: [
      new ConsoleSink({
        colors: !isSet(env.STACKCTL_NO_COLOR) && !isSet(env.NO_COLOR),
        minLevel: minLevel ?? LogLevel.INFO,
      }),
    ],
  });

  if (minLevel === null) {
    logger.warn('Ignoring STACKCTL_LOG_LEVEL={{value}}, expected one of {{levels}}', {
      params: { value: env.STACKCTL_LOG_LEVEL, levels: LOG_LEVEL_NAMES.join(', ') },
    });
  }

  return logger;
}

export function createDefaultLauncher(
  logger: Logger,
  env: VariableLookup,
): ServiceLauncher {
  const engine = env.STACKCTL_ENGINE;

  return new CompositeLauncher({
    container: new ContainerLauncher({
      logger: logger.service('engine'),
      engine: isSet(engine) ? engine.trim() : undefined,
    }),
    process: new ProcessLauncher({ logger: logger.service('process') }),
  });
}

/**
 * `-f` > `STACKCTL_FILE` > `stackctl.yaml` / `stackctl.yml` in the working
 * directory. Falls back to `stackctl.yaml` so a missing file is reported
 * under the name it is expected at.
 */
export function resolveTopologyPath(
  file: string | undefined,
  context: Pick<CLIContext, 'env' | 'cwd'>,
): string {
  if (isSet(file)) {
    return path.resolve(context.cwd, file);
  }

  const fromEnv = context.env.STACKCTL_FILE;

  if (isSet(fromEnv)) {
    return path.resolve(context.cwd, fromEnv);
  }

  return findTopologyFile(context.cwd) ?? path.join(context.cwd, 'stackctl.yaml');
}

/**
 * Loads the topology and builds the Orchestrator for it. Service output is
 * logged under the service's name.
 *
 * @throws TopologyFileError, InvalidSpecError, CyclicDependencyError
 */
export async function openStack(
  options: StackOptions,
  context: CLIContext,
): Promise<Stack> {
  const { logger, env } = context;

  const topology = await loadTopologyFile(resolveTopologyPath(options.file, context), {
    project: options.project,
    env,
  });

  const launcher = (context.createLauncher ?? createDefaultLauncher)(logger, env);

  const orchestrator = new Orchestrator({
    project: topology.project,
    registry: topology.registry,
    launcher,
    logger,
    onOutput: (serviceName, line) => {
      logger.service(serviceName).info(line);
    },
  });

  return { topology, orchestrator };
}

/**
 * Known errors get their message, anything else the full error table
 */
export function reportError(logger: Logger, error: unknown): void {
  if (isStackctlError(error)) {
    logger.error(error.message);
    return;
  }

  logger.errorObject('Unexpected error', error);
}

export function reportFailures(
  logger: Logger,
  failures: { name: string; error: Error }[],
): void {
  for (const { name, error } of failures) {
    logger.error('{{name}}: {{reason}}', {
      params: { name, reason: error.message },
    });
  }
}
