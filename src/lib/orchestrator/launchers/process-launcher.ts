import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { LaunchError } from '../errors';
import type { LoggerService } from '../../logger';
import type { ServiceSpec } from '../types';
import type {
  LaunchContext,
  LaunchExit,
  OutputStream,
  ServiceHandle,
  ServiceLauncher,
} from './types';

export interface ProcessLauncherOptions {
  logger: LoggerService;
  /** Base environment the service environment is merged over (default: process.env) */
  baseEnvironment?: NodeJS.ProcessEnv;
}

/**
 * Forwards each line of `stream` to the context's output callback
 */
export function forwardLines(
  stream: Readable | null,
  serviceName: string,
  kind: OutputStream,
  context: LaunchContext,
): void {
  const onOutput = context.onOutput;

  if (!stream) {
    return;
  }

  if (!onOutput) {
    // Keep the pipe drained so the child never blocks on a full buffer
    stream.resume();
    return;
  }

  createInterface({ input: stream, crlfDelay: Infinity }).on('line', (line) =>
    onOutput(serviceName, line, kind),
  );
}

class ChildProcessHandle implements ServiceHandle {
  public readonly pid: number | null;
  public readonly ref: string;
  public readonly exited: Promise<LaunchExit>;
  private child: ChildProcess;

  constructor(child: ChildProcess) {
    this.child = child;
    this.pid = child.pid ?? null;
    this.ref = `pid:${child.pid ?? '?'}`;
    this.exited = new Promise<LaunchExit>((resolve) => {
      if (child.exitCode !== null || child.signalCode !== null) {
        resolve({ code: child.exitCode, signal: child.signalCode });
        return;
      }

      child.once('exit', (code, signal) => resolve({ code, signal }));
    });
  }

  public kill(signal: NodeJS.Signals): Promise<void> {
    if (this.child.exitCode === null && this.child.signalCode === null) {
      this.child.kill(signal);
    }

    return Promise.resolve();
  }
}

/**
 * Runs `process` services as child processes of stackctl, without a shell.
 * The service environment is merged over the base environment; values are
 * never logged.
 */
export class ProcessLauncher implements ServiceLauncher {
  private logger: LoggerService;
  private baseEnvironment: NodeJS.ProcessEnv;

  constructor(options: ProcessLauncherOptions) {
    this.logger = options.logger;
    this.baseEnvironment = options.baseEnvironment ?? process.env;
  }

  public launch(
    spec: ServiceSpec,
    context: LaunchContext,
  ): Promise<ServiceHandle> {
    const { launch } = spec;

    if (launch.kind !== 'process') {
      return Promise.reject(
        new LaunchError(
          { serviceName: spec.name, command: '' },
          new Error('ProcessLauncher only runs process services'),
        ),
      );
    }

    const [command, ...args] = launch.command;
    const commandLine = launch.command.join(' ');

    if (command === undefined) {
      return Promise.reject(
        new LaunchError(
          { serviceName: spec.name, command: commandLine },
          new Error('Empty command'),
        ),
      );
    }

    return new Promise<ServiceHandle>((resolve, reject) => {
      let child: ChildProcess;

      try {
        child = spawn(command, args, {
          cwd: launch.workingDir,
          env: { ...this.baseEnvironment, ...spec.environment },
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        reject(
          new LaunchError({ serviceName: spec.name, command: commandLine }, error),
        );
        return;
      }

      let spawned = false;

      child.once('spawn', () => {
        spawned = true;

        forwardLines(child.stdout, spec.name, 'stdout', context);
        forwardLines(child.stderr, spec.name, 'stderr', context);

        this.logger
          .entity(spec.name)
          .debug('Spawned {{command}} as pid {{pid}}', {
            params: { command, pid: child.pid },
          });

        resolve(new ChildProcessHandle(child));
      });

      child.on('error', (error) => {
        if (!spawned) {
          reject(
            new LaunchError(
              { serviceName: spec.name, command: commandLine },
              error,
            ),
          );
          return;
        }

        this.logger
          .entity(spec.name)
          .warn('Process error: {{message}}', {
            params: { message: error.message },
          });
      });
    });
  }

  public probeCommand(
    _spec: ServiceSpec,
    command: string[],
    _context: LaunchContext,
  ): string[] {
    return command;
  }

  /**
   * Processes die with the stackctl invocation that started them, there is
   * nothing to reclaim
   */
  public reclaim(): Promise<ServiceHandle | null> {
    return Promise.resolve(null);
  }

  public cleanup(): Promise<void> {
    return Promise.resolve();
  }
}
