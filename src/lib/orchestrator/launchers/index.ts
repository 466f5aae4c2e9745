export * from './types';
export { ProcessLauncher, type ProcessLauncherOptions } from './process-launcher';
export {
  ContainerLauncher,
  buildRunArgs,
  containerName,
  networkName,
  parseWaitOutput,
  type CommandRunner,
  type ContainerLauncherOptions,
} from './container-launcher';
export {
  CompositeLauncher,
  type CompositeLauncherOptions,
} from './composite-launcher';
