export {
  HealthMonitor,
  runProbe,
  type HealthMonitorOptions,
  type HealthWaitResult,
  type WaitForHealthyOptions,
} from './health-monitor';
export {
  createProbe,
  probeExec,
  probeHTTP,
  probeTCP,
  type ProbeFn,
  type ProbeOutcome,
} from './probes';
