// module entry point

// Orchestration: registry, supervisor, health, scheduler, launchers, errors
export * from './lib/orchestrator/index';

// Topology files
export * from './lib/topology/index';

// Logging
export {
  Logger,
  LoggerService,
  ConsoleSink,
  ArraySink,
  LogLevel,
  type LogEntry,
  type LogSink,
  type LoggerOptions,
} from './lib/logger';

// Status rendering
export { renderStatusTable, formatUptime } from './cli/status-table';
export {
  MultiColumnASCIITable,
  type MultiColumnASCIITableOptions,
} from './lib/ascii-tables';

// Process signals
export {
  ProcessSignalManager,
  type ShutdownSignal,
  type SignalSource,
} from './lib/process-signal-manager';

// Event handling
export { EventEmitter, EventEmitterProtected } from './lib/event-emitter';
