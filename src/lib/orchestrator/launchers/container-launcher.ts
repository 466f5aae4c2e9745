import { spawn, type ChildProcess } from 'node:child_process';
import { runCommand, type RunCommandOptions, type RunCommandResult } from '../../run-command';
import { LaunchError } from '../errors';
import type { LoggerService } from '../../logger';
import type { ContainerLaunchSpec, ServiceSpec } from '../types';
import { forwardLines } from './process-launcher';
import type {
  LaunchContext,
  LaunchExit,
  ServiceHandle,
  ServiceLauncher,
} from './types';

export type CommandRunner = (
  argv: readonly string[],
  options?: RunCommandOptions,
) => Promise<RunCommandResult>;

export interface ContainerLauncherOptions {
  logger: LoggerService;
  /** Container engine binary, anything CLI-compatible with docker (default: docker) */
  engine?: string;
  runner?: CommandRunner;
  /** Follow `logs --follow` for services when the context wants output (default: true) */
  followLogs?: boolean;
}

export function containerName(project: string, serviceName: string): string {
  return `${project}-${serviceName}`;
}

export function networkName(project: string): string {
  return `${project}_default`;
}

/**
 * Arguments after the engine binary for `run -d`. Environment variables are
 * passed by name only; their values travel in the engine's own environment
 * so they never show up in a process listing.
 */
export function buildRunArgs(
  spec: ServiceSpec,
  launch: ContainerLaunchSpec,
  project: string,
): string[] {
  const args = [
    'run',
    '-d',
    '--name',
    containerName(project, spec.name),
    '--network',
    networkName(project),
    '--network-alias',
    spec.name,
    '--label',
    `stackctl.project=${project}`,
    '--label',
    `stackctl.service=${spec.name}`,
  ];

  for (const port of spec.ports) {
    args.push('-p', `${port.host}:${port.container}/${port.protocol}`);
  }

  for (const key of Object.keys(spec.environment)) {
    args.push('-e', key);
  }

  for (const volume of launch.volumes) {
    args.push(
      '-v',
      `${volume.source}:${volume.target}${volume.readOnly ? ':ro' : ''}`,
    );
  }

  args.push(launch.image, ...launch.args);

  return args;
}

/**
 * `wait` prints the exit code; engines report a signal death as 128 + signo
 */
export function parseWaitOutput(stdout: string): number | null {
  const code = Number.parseInt(stdout.trim(), 10);
  return Number.isNaN(code) ? null : code;
}

function describeFailure(result: RunCommandResult): Error {
  const stderr = result.stderr.trim();
  return new Error(stderr || `exited with code ${result.code ?? 'null'}`);
}

interface ContainerHandleOptions {
  engine: string;
  name: string;
  id: string;
  runner: CommandRunner;
  logger: LoggerService;
  logFollower: ChildProcess | null;
}

class ContainerHandle implements ServiceHandle {
  public readonly pid = null;
  public readonly ref: string;
  public readonly exited: Promise<LaunchExit>;
  private options: ContainerHandleOptions;
  private watcher = new AbortController();
  private released = false;

  constructor(options: ContainerHandleOptions) {
    this.options = options;
    this.ref = options.id.slice(0, 12);
    this.exited = this.watch();
  }

  public async kill(signal: NodeJS.Signals): Promise<void> {
    const { engine, name, runner, logger } = this.options;
    const result = await runner([engine, 'kill', '--signal', signal, name]);

    if (result.code !== 0) {
      // Usually the container already exited
      logger.debug('kill {{name}} failed: {{reason}}', {
        params: { name, reason: describeFailure(result).message },
      });
    }
  }

  public release(): void {
    this.released = true;
    this.watcher.abort();
    this.options.logFollower?.kill('SIGTERM');
  }

  private async watch(): Promise<LaunchExit> {
    const { engine, name, runner, logger } = this.options;

    let exit: LaunchExit;

    try {
      const result = await runner([engine, 'wait', name], {
        signal: this.watcher.signal,
      });

      exit = { code: parseWaitOutput(result.stdout), signal: null };
    } catch (error) {
      logger.errorObject(`Lost track of container ${name}`, error);
      exit = { code: null, signal: null };
    }

    this.options.logFollower?.kill('SIGTERM');

    if (!this.released) {
      await this.remove();
    }

    return exit;
  }

  private async remove(): Promise<void> {
    const { engine, name, runner, logger } = this.options;

    try {
      await runner([engine, 'rm', '-f', name]);
    } catch (error) {
      logger.errorObject(`Could not remove container ${name}`, error);
    }
  }
}

/**
 * Runs `container` services through a docker-compatible CLI. Every container
 * joins the project network under its service name, so services reach each
 * other by name.
 */
export class ContainerLauncher implements ServiceLauncher {
  private logger: LoggerService;
  private engine: string;
  private runner: CommandRunner;
  private followLogs: boolean;

  constructor(options: ContainerLauncherOptions) {
    this.logger = options.logger;
    this.engine = options.engine ?? 'docker';
    this.runner = options.runner ?? runCommand;
    this.followLogs = options.followLogs ?? true;
  }

  public async launch(
    spec: ServiceSpec,
    context: LaunchContext,
  ): Promise<ServiceHandle> {
    const { launch } = spec;
    const name = containerName(context.project, spec.name);

    if (launch.kind !== 'container') {
      throw new LaunchError(
        { serviceName: spec.name, command: '' },
        new Error('ContainerLauncher only runs container services'),
      );
    }

    const args = buildRunArgs(spec, launch, context.project);
    const command = `${this.engine} run ${launch.image}`;

    let result: RunCommandResult;

    try {
      await this.ensureNetwork(context.project);
      // A container left over from a crashed invocation holds the name
      await this.runner([this.engine, 'rm', '-f', name]);

      result = await this.runner([this.engine, ...args], {
        env: spec.environment,
      });
    } catch (error) {
      throw new LaunchError({ serviceName: spec.name, command }, error);
    }

    if (result.code !== 0) {
      throw new LaunchError(
        { serviceName: spec.name, command },
        describeFailure(result),
      );
    }

    const id = result.stdout.trim();

    this.logger.entity(spec.name).debug('Started container {{name}} ({{id}})', {
      params: { name, id: id.slice(0, 12) },
    });

    return this.createHandle(spec, name, id, context);
  }

  public probeCommand(
    spec: ServiceSpec,
    command: string[],
    context: LaunchContext,
  ): string[] {
    return [
      this.engine,
      'exec',
      containerName(context.project, spec.name),
      ...command,
    ];
  }

  public async reclaim(
    spec: ServiceSpec,
    context: LaunchContext,
  ): Promise<ServiceHandle | null> {
    const name = containerName(context.project, spec.name);
    const result = await this.runner([
      this.engine,
      'inspect',
      '--format',
      '{{.State.Running}} {{.Id}}',
      name,
    ]);

    if (result.code !== 0) {
      return null;
    }

    const [running, id] = result.stdout.trim().split(' ');

    if (running !== 'true' || !id) {
      return null;
    }

    return this.createHandle(spec, name, id, context);
  }

  /**
   * Removes containers of `specs` left behind (exited ones included), then
   * the project network
   */
  public async cleanup(
    specs: ServiceSpec[],
    context: LaunchContext,
  ): Promise<void> {
    for (const spec of specs) {
      await this.runner([
        this.engine,
        'rm',
        '-f',
        containerName(context.project, spec.name),
      ]);
    }

    const network = networkName(context.project);
    const result = await this.runner([this.engine, 'network', 'rm', network]);

    if (result.code !== 0) {
      this.logger.debug('Network {{network}} was not removed: {{reason}}', {
        params: { network, reason: describeFailure(result).message },
      });
    }
  }

  private async ensureNetwork(project: string): Promise<void> {
    const network = networkName(project);
    const inspect = await this.runner([
      this.engine,
      'network',
      'inspect',
      network,
    ]);

    if (inspect.code === 0) {
      return;
    }

    const create = await this.runner([
      this.engine,
      'network',
      'create',
      network,
    ]);

    // Another invocation may have created it in between
    if (create.code !== 0 && !create.stderr.includes('already exists')) {
      throw describeFailure(create);
    }
  }

  private createHandle(
    spec: ServiceSpec,
    name: string,
    id: string,
    context: LaunchContext,
  ): ContainerHandle {
    return new ContainerHandle({
      engine: this.engine,
      name,
      id,
      runner: this.runner,
      logger: this.logger.entity(spec.name),
      logFollower:
        this.followLogs && context.onOutput
          ? this.followContainerLogs(spec, name, context)
          : null,
    });
  }

  private followContainerLogs(
    spec: ServiceSpec,
    name: string,
    context: LaunchContext,
  ): ChildProcess {
    const follower = spawn(this.engine, ['logs', '--follow', name], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    follower.on('error', (error) => {
      this.logger.entity(spec.name).warn('Cannot follow logs: {{message}}', {
        params: { message: error.message },
      });
    });

    forwardLines(follower.stdout, spec.name, 'stdout', context);
    forwardLines(follower.stderr, spec.name, 'stderr', context);

    return follower;
  }
}
