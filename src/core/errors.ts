export type ErrorCode =
  | "DUPLICATE_TASK"
  | "UNKNOWN_DEPENDENCY"
  | "CYCLIC_DEPENDENCY"
  | "UNKNOWN_TASK"
  | "CONFIG"
  | "SPAWN";

export class ReadyrunError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReadyrunError";
    this.code = code;
  }
}

export class GraphError extends ReadyrunError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "GraphError";
  }
}

export class DuplicateTaskError extends GraphError {
  readonly task: string;

  constructor(task: string) {
    super("DUPLICATE_TASK", `Duplicate task name: ${task}`);
    this.name = "DuplicateTaskError";
    this.task = task;
  }
}

export class UnknownDependencyError extends GraphError {
  readonly task: string;
  readonly missing: string;

  constructor(task: string, missing: string) {
    super(
      "UNKNOWN_DEPENDENCY",
      `Task "${task}" depends on unknown task "${missing}"`
    );
    this.name = "UnknownDependencyError";
    this.task = task;
    this.missing = missing;
  }
}

export class CyclicDependencyError extends GraphError {
  /** Path through the cycle; the first task is repeated at the end. */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("CYCLIC_DEPENDENCY", `Circular dependency detected: ${cycle.join(" -> ")}`);
    this.name = "CyclicDependencyError";
    this.cycle = cycle;
  }
}

export class UnknownTaskError extends GraphError {
  readonly task: string;

  constructor(task: string) {
    super("UNKNOWN_TASK", `Unknown task: ${task}`);
    this.name = "UnknownTaskError";
    this.task = task;
  }
}

export class ConfigError extends ReadyrunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
    this.name = "ConfigError";
  }
}

export class SpawnError extends ReadyrunError {
  readonly task: string;

  constructor(task: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("SPAWN", `Failed to spawn "${task}": ${reason}`, { cause });
    this.name = "SpawnError";
    this.task = task;
  }
}
