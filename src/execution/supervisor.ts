import { join, resolve } from "node:path";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import debug from "debug";
import { type ExecaChildProcess, execa } from "execa";
import { SpawnError } from "../core/errors";
import type {
  ExitOutcome,
  OutputEvent,
  OutputSource,
  TaskDefinition,
} from "../types";

const log = debug("readyrun:supervisor");

// A detached child leads its own process group on Unix, so a signal sent to
// the group also reaches whatever the shell started.
const USE_PROCESS_GROUP = process.platform !== "win32";

const OUTPUT_DRAIN_MS = 200;

export type SupervisorHandlers = {
  onOutput: (event: OutputEvent) => void;
};

export type SupervisorOptions = {
  cwd?: string;
  env?: Record<string, string>;
};

/**
 * A live child process owned by exactly one task.
 */
export interface SupervisedProcess {
  readonly pid: number | undefined;
  readonly exited: boolean;
  /**
   * Settles once the process exited and its output drained, or after a short
   * window if something else still holds the pipes open.
   */
  wait(): Promise<ExitOutcome>;
  /**
   * SIGTERM, then SIGKILL once `gracePeriodMs` passed without an exit.
   * Repeated calls share the first call's promise.
   */
  terminate(gracePeriodMs: number): Promise<ExitOutcome>;
}

export type SpawnProcess = (
  definition: TaskDefinition,
  handlers: SupervisorHandlers
) => Promise<SupervisedProcess>;

export class ProcessSupervisor implements SupervisedProcess {
  private readonly task: string;
  private readonly child: ExecaChildProcess;
  private readonly done: Promise<ExitOutcome>;
  private outcome: ExitOutcome | undefined;
  private termination: Promise<ExitOutcome> | undefined;

  private constructor(
    task: string,
    child: ExecaChildProcess,
    exited: Promise<ExitOutcome>,
    readers: LineReader[]
  ) {
    this.task = task;
    this.child = child;
    // A descendant outside the process group may hold the pipes open long
    // after the shell is gone; output gets a short window to drain, then the
    // pipes are closed from this side.
    this.done = exited.then(async (outcome) => {
      await settleWithin(
        Promise.all(readers.map((reader) => reader.closed)),
        OUTPUT_DRAIN_MS
      );
      for (const reader of readers) {
        reader.close();
      }
      this.outcome = outcome;
      log(`${task} exited:`, outcome);
      return outcome;
    });
  }

  /**
   * Start `definition.command` through the shell. Resolves once the OS has
   * confirmed the spawn; rejects with a `SpawnError` otherwise.
   */
  static async spawn(
    definition: TaskDefinition,
    handlers: SupervisorHandlers,
    options: SupervisorOptions = {}
  ): Promise<ProcessSupervisor> {
    const baseDir = options.cwd ?? process.cwd();
    const cwd = definition.cwd ? resolve(baseDir, definition.cwd) : baseDir;
    const npmBinPath = join(baseDir, "node_modules", ".bin");
    const pathSeparator = process.platform === "win32" ? ";" : ":";
    // biome-ignore lint/complexity/useLiteralKeys: ts
    const enhancedPath = npmBinPath + pathSeparator + process.env["PATH"];

    log(`Spawning ${definition.name} in ${cwd}: ${definition.command}`);

    // Uses /bin/sh on Unix, cmd.exe on Windows
    const child = execa(definition.command, {
      buffer: false,
      cwd,
      detached: USE_PROCESS_GROUP,
      env: {
        ...process.env,
        ...options.env,
        PATH: enhancedPath,
      },
      reject: false,
      shell: true,
      stdin: "ignore",
      windowsHide: true,
    });

    const exited = waitForExit(child);
    const emit = (source: OutputSource) => (text: string) =>
      handlers.onOutput({ source, task: definition.name, text });
    const readers = [
      readLines(child.stdout, emit("stdout")),
      readLines(child.stderr, emit("stderr")),
    ];

    try {
      await confirmSpawn(child, definition.name);
    } catch (error) {
      for (const reader of readers) {
        reader.close();
      }
      throw error;
    }
    log(`${definition.name} spawned with pid ${child.pid}`);
    return new ProcessSupervisor(definition.name, child, exited, readers);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exited(): boolean {
    return this.outcome !== undefined;
  }

  wait(): Promise<ExitOutcome> {
    return this.done;
  }

  terminate(gracePeriodMs: number): Promise<ExitOutcome> {
    if (this.termination) {
      return this.termination;
    }
    if (this.outcome) {
      this.termination = Promise.resolve(this.outcome);
      return this.termination;
    }

    this.signal("SIGTERM");
    const timer = setTimeout(() => {
      log(`${this.task} ignored SIGTERM for ${gracePeriodMs}ms`);
      this.signal("SIGKILL");
    }, gracePeriodMs);
    this.termination = this.done.finally(() => clearTimeout(timer));
    return this.termination;
  }

  private signal(signal: NodeJS.Signals): void {
    const pid = this.child.pid;
    if (this.outcome || pid === undefined) {
      return;
    }
    log(`Sending ${signal} to ${this.task} (pid ${pid})`);
    try {
      if (USE_PROCESS_GROUP) {
        process.kill(-pid, signal);
      } else {
        this.child.kill(signal, { forceKillAfterTimeout: false });
      }
    } catch (error) {
      // ESRCH: every process of the group has already exited
      log(`Could not send ${signal} to ${this.task}:`, error);
    }
  }
}

export const spawnProcess =
  (options: SupervisorOptions = {}): SpawnProcess =>
  (definition, handlers) =>
    ProcessSupervisor.spawn(definition, handlers, options);

function confirmSpawn(child: ExecaChildProcess, task: string): Promise<void> {
  return new Promise((resolvePromise, rejectPromise) => {
    child.once("spawn", () => resolvePromise());
    // Settles before "spawn" only when the process never started. Once
    // "spawn" fired the outcome is reported through wait() instead.
    void child.then(
      (result) => rejectPromise(new SpawnError(task, failureMessage(result))),
      (error: unknown) => rejectPromise(new SpawnError(task, error))
    );
  });
}

function waitForExit(child: ExecaChildProcess): Promise<ExitOutcome> {
  return new Promise((resolvePromise) => {
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      resolvePromise(
        signal ? { kind: "signaled", signal } : { code: code ?? 1, kind: "exited" }
      );
    });
  });
}

function settleWithin(promise: Promise<unknown>, ms: number): Promise<void> {
  return new Promise((resolvePromise) => {
    const timer = setTimeout(resolvePromise, ms);
    const settle = () => {
      clearTimeout(timer);
      resolvePromise();
    };
    void promise.then(settle, settle);
  });
}

// With `reject: false` a failed start resolves to an error object carrying the
// system message.
function failureMessage(result: object): string {
  if ("originalMessage" in result && typeof result.originalMessage === "string") {
    return result.originalMessage;
  }
  if ("message" in result && typeof result.message === "string") {
    return result.message;
  }
  return "process did not start";
}

type LineReader = {
  /** Resolves once the stream ended or the reader was closed. */
  closed: Promise<void>;
  close(): void;
};

/**
 * Emit every line of `stream`, including a last unterminated one.
 */
function readLines(
  stream: Readable | null,
  onLine: (line: string) => void
): LineReader {
  if (!stream) {
    return { close: () => undefined, closed: Promise.resolve() };
  }
  const reader = createInterface({ crlfDelay: Number.POSITIVE_INFINITY, input: stream });
  reader.on("line", onLine);
  const closed = new Promise<void>((resolvePromise) => {
    reader.once("close", () => resolvePromise());
  });
  return {
    close: () => {
      reader.close();
      stream.destroy();
    },
    closed,
  };
}
