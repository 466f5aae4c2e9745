/**
 * Service orchestration: a registry of service specs, a supervisor that
 * launches and restarts them, health monitoring and dependency-ordered
 * startup and teardown.
 *
 * @module orchestrator
 */

export {
  Orchestrator,
  blameFor,
  type AttachSignalsOptions,
  type OrchestratorOptions,
  type DownOptions,
  type UpOptions,
} from './orchestrator';
export { ServiceRegistry } from './service-registry';
export {
  DEFAULT_BACKOFF,
  DEFAULT_HEALTH_CHECK,
  DEFAULT_RESTART_POLICY,
  DEFAULT_STARTUP_TIMEOUT_MS,
  DEFAULT_STOP_SIGNAL,
  DEFAULT_STOP_TIMEOUT_MS,
  MAX_TIMER_MS,
  SERVICE_NAME_PATTERN,
  assertValidSpec,
  defineService,
  findSpecProblem,
  type ServiceSpecInput,
} from './service-spec';
export {
  DEFAULT_KILL_GRACE_MS,
  ProcessSupervisor,
  type ProcessSupervisorOptions,
} from './process-supervisor';
export {
  DependencyScheduler,
  type DependencySchedulerOptions,
} from './dependency-scheduler';
export {
  findDependencyCycle,
  topologicalOrder,
  transitiveDependencies,
  type DependencyNode,
} from './dependency-graph';
export { RestartBackoff, calculateExponentialDelay } from './restart-backoff';
export { SERVICE_STATE_TRANSITIONS, canTransition } from './service-instance';
export type {
  HealthMonitorEventMap,
  OrchestratorEventMap,
  SupervisorEventMap,
} from './events';

export * from './errors';
export * from './health';
export * from './launchers';
export * from './types';
