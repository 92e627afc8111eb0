export type TaskDefinition = {
  name: string;
  command: string;
  cwd?: string;
  dependsOn: readonly string[];
  readyMarker?: string;
};

export type TaskState =
  | "pending"
  | "starting"
  | "running"
  | "ready"
  | "succeeded"
  | "failed"
  | "killed";

export type OutputSource = "stdout" | "stderr";

export type OutputEvent = {
  task: string;
  source: OutputSource;
  text: string;
};

export type ExitOutcome =
  | { kind: "exited"; code: number }
  | { kind: "signaled"; signal: string }
  | { kind: "spawn-error"; message: string };

export type LifecycleEvent =
  | { type: "started"; task: string; pid?: number }
  | { type: "ready"; task: string }
  | { type: "succeeded"; task: string }
  | { type: "failed"; task: string; outcome: ExitOutcome }
  | { type: "killed"; task: string; outcome: ExitOutcome }
  | { type: "spawn-failed"; task: string; message: string }
  | { type: "stalled"; blocked: BlockedTask[] };

export type BlockedTask = {
  task: string;
  waitingOn: string[];
};

export interface OutputSink {
  output(event: OutputEvent): void;
  lifecycle(event: LifecycleEvent): void;
}

export type DisplayConfig = {
  quiet?: boolean;
  prefix?: boolean | string;
};

export interface RunOptions extends DisplayConfig {
  cwd?: string;
  env?: Record<string, string>;
  gracePeriodMs?: number;
  exitOnStall?: boolean;
}

export type ParsedCommand = {
  configPath?: string;
  patterns: string[];
  options: RunOptions;
  help: boolean;
};

export type TaskSummary = {
  name: string;
  state: TaskState;
  everReady: boolean;
  outcome?: ExitOutcome;
  durationMs?: number;
};

export type RunSummary = {
  tasks: TaskSummary[];
  shutdownRequested: boolean;
  stalled: boolean;
};
