import type { ServiceSpec } from '../types';
import type {
  LaunchContext,
  ServiceHandle,
  ServiceLauncher,
} from './types';

export interface CompositeLauncherOptions {
  container: ServiceLauncher;
  process: ServiceLauncher;
}

/**
 * Routes each service to the launcher for its `launch.kind`
 */
export class CompositeLauncher implements ServiceLauncher {
  private launchers: CompositeLauncherOptions;

  constructor(launchers: CompositeLauncherOptions) {
    this.launchers = launchers;
  }

  public launch(
    spec: ServiceSpec,
    context: LaunchContext,
  ): Promise<ServiceHandle> {
    return this.for(spec).launch(spec, context);
  }

  public probeCommand(
    spec: ServiceSpec,
    command: string[],
    context: LaunchContext,
  ): string[] {
    return this.for(spec).probeCommand(spec, command, context);
  }

  public reclaim(
    spec: ServiceSpec,
    context: LaunchContext,
  ): Promise<ServiceHandle | null> {
    return this.for(spec).reclaim(spec, context);
  }

  public async cleanup(
    specs: ServiceSpec[],
    context: LaunchContext,
  ): Promise<void> {
    const containers = specs.filter((spec) => spec.launch.kind === 'container');
    const processes = specs.filter((spec) => spec.launch.kind === 'process');

    if (containers.length > 0) {
      await this.launchers.container.cleanup(containers, context);
    }

    if (processes.length > 0) {
      await this.launchers.process.cleanup(processes, context);
    }
  }

  private for(spec: ServiceSpec): ServiceLauncher {
    return spec.launch.kind === 'container'
      ? this.launchers.container
      : this.launchers.process;
  }
}
