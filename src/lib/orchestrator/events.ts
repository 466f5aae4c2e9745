import type {
  DownReport,
  ExitInfo,
  HealthSnapshot,
  HealthStatus,
  ProbeResult,
  ServiceState,
  UpReport,
} from './types';
import type { ShutdownSignal } from '../process-signal-manager';

export interface SupervisorEventMap {
  'service:starting': { name: string; attempt: number };
  'service:running': {
    name: string;
    pid: number | null;
    ref: string;
    startedAt: number;
  };
  'service:crashed': { name: string; exit: ExitInfo; uptimeMS: number };
  'service:restart-scheduled': {
    name: string;
    attempt: number;
    delayMS: number;
  };
  /** Gave up: launch failure, retries exhausted, or an unclean exit with no restart */
  'service:failed': { name: string; error: Error; exit?: ExitInfo };
  /** Exited cleanly on its own and is not restarted */
  'service:exited': { name: string; exit: ExitInfo };
  'service:stopping': { name: string; signal: NodeJS.Signals };
  'service:stop-escalated': { name: string; timeoutMS: number };
  'service:stopped': { name: string; exit: ExitInfo | null };
  'service:state-changed': {
    name: string;
    from: ServiceState;
    to: ServiceState;
  };
}

export interface HealthMonitorEventMap {
  'health:checked': { name: string; result: ProbeResult };
  'health:changed': {
    name: string;
    from: HealthStatus;
    to: HealthStatus;
    health: HealthSnapshot;
  };
  'health:unwatched': { name: string };
}

export interface OrchestratorEventMap
  extends SupervisorEventMap,
    HealthMonitorEventMap {
  'orchestrator:up-started': { services: string[] };
  'orchestrator:up-completed': UpReport;
  'orchestrator:down-started': { services: string[] };
  'orchestrator:down-completed': DownReport;
  'orchestrator:shutdown-requested': { signal: ShutdownSignal; count: number };
}
