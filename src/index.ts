export { Runner, exitCodeFor } from "./execution/runner";
export { Orchestrator, DEFAULT_GRACE_PERIOD_MS } from "./execution/orchestrator";
export { ProcessSupervisor, spawnProcess } from "./execution/supervisor";
export { EventQueue } from "./execution/event-queue";
export { TaskGraph } from "./core/task-graph";
export {
  ReadinessDetector,
  initialReadiness,
  scanLine,
  scanSpawn,
} from "./core/readiness";
export { TaskSelector } from "./core/task-selector";
export { Parser, parseCommand } from "./core/parser";
export { loadConfig, parseConfig, DEFAULT_CONFIG_FILE } from "./core/config-loader";
export {
  ReadyrunError,
  GraphError,
  DuplicateTaskError,
  UnknownDependencyError,
  CyclicDependencyError,
  UnknownTaskError,
  ConfigError,
  SpawnError,
} from "./core/errors";
export { Logger, describeOutcome } from "./utils/logger";

export type {
  TaskDefinition,
  TaskState,
  OutputSource,
  OutputEvent,
  ExitOutcome,
  LifecycleEvent,
  BlockedTask,
  OutputSink,
  DisplayConfig,
  RunOptions,
  ParsedCommand,
  TaskSummary,
  RunSummary,
} from "./types";
export type { ReadinessState, ScanResult } from "./core/readiness";
export type {
  SupervisedProcess,
  SupervisorHandlers,
  SupervisorOptions,
  SpawnProcess,
} from "./execution/supervisor";
export type { OrchestratorOptions } from "./execution/orchestrator";
export type { ErrorCode } from "./core/errors";
