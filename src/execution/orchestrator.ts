import debug from "debug";
import { ReadinessDetector } from "../core/readiness";
import type { TaskGraph } from "../core/task-graph";
import type {
  BlockedTask,
  ExitOutcome,
  OutputEvent,
  OutputSink,
  RunSummary,
  TaskDefinition,
  TaskState,
} from "../types";
import { EventQueue } from "./event-queue";
import {
  type SpawnProcess,
  type SupervisedProcess,
  type SupervisorHandlers,
  spawnProcess,
} from "./supervisor";

const log = debug("readyrun:orchestrator");

export const DEFAULT_GRACE_PERIOD_MS = 5000;

const LIVE_STATES: ReadonlySet<TaskState> = new Set([
  "starting",
  "running",
  "ready",
]);

type Message =
  | { type: "output"; task: string; event: OutputEvent }
  | { type: "spawned"; task: string; child: SupervisedProcess }
  | { type: "spawn-failed"; task: string; error: unknown }
  | { type: "exited"; task: string; outcome: ExitOutcome }
  | { type: "shutdown" };

type RuntimeTask = {
  definition: TaskDefinition;
  state: TaskState;
  detector: ReadinessDetector;
  everReady: boolean;
  terminateRequested: boolean;
  process?: SupervisedProcess;
  outcome?: ExitOutcome;
  startedAt?: number;
  finishedAt?: number;
};

export type OrchestratorOptions = {
  sink: OutputSink;
  spawn?: SpawnProcess;
  cwd?: string;
  env?: Record<string, string>;
  gracePeriodMs?: number;
  exitOnStall?: boolean;
};

/**
 * Starts each task once all of its dependencies are ready and drives every
 * task through its lifecycle. All state changes happen in `run()`, which
 * consumes one message at a time from the supervisors and from
 * `requestShutdown()`.
 */
export class Orchestrator {
  private readonly graph: TaskGraph;
  private readonly sink: OutputSink;
  private readonly spawn: SpawnProcess;
  private readonly gracePeriodMs: number;
  private readonly exitOnStall: boolean;
  private readonly tasks = new Map<string, RuntimeTask>();
  private readonly queue = new EventQueue<Message>();
  private started = false;
  private shutdownRequested = false;
  private shuttingDown = false;
  private stalled = false;

  constructor(graph: TaskGraph, options: OrchestratorOptions) {
    this.graph = graph;
    this.sink = options.sink;
    this.spawn =
      options.spawn ?? spawnProcess({ cwd: options.cwd, env: options.env });
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.exitOnStall = options.exitOnStall ?? false;

    for (const name of graph.names()) {
      const definition = graph.get(name);
      this.tasks.set(name, {
        definition,
        detector: new ReadinessDetector(definition.readyMarker),
        everReady: false,
        state: "pending",
        terminateRequested: false,
      });
    }
  }

  get isShuttingDown(): boolean {
    return this.shutdownRequested;
  }

  stateOf(name: string): TaskState {
    return this.task(name).state;
  }

  /**
   * Stop every live task. Later calls are no-ops.
   */
  requestShutdown(): void {
    if (this.shutdownRequested) {
      log("Shutdown already requested");
      return;
    }
    this.shutdownRequested = true;
    this.queue.push({ type: "shutdown" });
  }

  async run(): Promise<RunSummary> {
    if (this.started) {
      throw new Error("Orchestrator.run() can only be called once");
    }
    this.started = true;
    log("=== Starting run ===");

    this.schedule(this.graph.names());
    while (!this.isFinished()) {
      const message = await this.queue.next();
      log("Message:", message.type, "task" in message ? message.task : "");
      this.handle(message);
    }

    log("=== Run finished ===");
    return this.summary();
  }

  private handle(message: Message): void {
    switch (message.type) {
      case "output":
        this.onOutput(message.task, message.event);
        break;
      case "spawned":
        this.onSpawned(message.task, message.child);
        break;
      case "spawn-failed":
        this.onSpawnFailed(message.task, message.error);
        break;
      case "exited":
        this.onExited(message.task, message.outcome);
        break;
      case "shutdown":
        this.onShutdown();
        break;
    }
    this.detectStall();
  }

  /**
   * Start each of `names` that is pending and whose dependencies have all
   * been ready at some point. Nothing starts once shutdown began.
   */
  private schedule(names: readonly string[]): void {
    if (this.shutdownRequested) {
      return;
    }
    for (const name of names) {
      const runtime = this.task(name);
      if (runtime.state !== "pending") {
        continue;
      }
      const deps = this.graph.dependenciesOf(name);
      if (deps.every((dep) => this.task(dep).everReady)) {
        this.start(runtime);
      } else {
        log(`${name} waiting for`, deps.filter((dep) => !this.task(dep).everReady));
      }
    }
  }

  private start(runtime: RuntimeTask): void {
    const { definition } = runtime;
    const name = definition.name;
    log(`Starting ${name}`);
    runtime.state = "starting";
    runtime.startedAt = Date.now();

    const handlers: SupervisorHandlers = {
      onOutput: (event) => this.queue.push({ event, task: name, type: "output" }),
    };

    void Promise.resolve()
      .then(() => this.spawn(definition, handlers))
      .then(
        (child) => this.queue.push({ child, task: name, type: "spawned" }),
        (error: unknown) =>
          this.queue.push({ error, task: name, type: "spawn-failed" })
      );
  }

  /**
   * Forward a line to the sink, then scan it for the ready marker.
   */
  private onOutput(name: string, event: OutputEvent): void {
    const runtime = this.task(name);
    this.sink.output(event);
    if (runtime.detector.feed(event.text)) {
      this.markReady(runtime);
    }
  }

  private onSpawned(name: string, child: SupervisedProcess): void {
    const runtime = this.task(name);
    runtime.process = child;
    runtime.state = "running";
    this.sink.lifecycle({ pid: child.pid, task: name, type: "started" });

    void child.wait().then(
      (outcome) => this.queue.push({ outcome, task: name, type: "exited" }),
      (error: unknown) =>
        this.queue.push({
          outcome: { kind: "spawn-error", message: String(error) },
          task: name,
          type: "exited",
        })
    );

    if (runtime.terminateRequested) {
      this.terminate(runtime);
      return;
    }
    // Output queued ahead of the spawn confirmation may already have matched
    // the marker; a task without a marker is ready as soon as it runs.
    if (runtime.detector.isReady || runtime.detector.fireOnSpawn()) {
      this.markReady(runtime);
    }
  }

  private onSpawnFailed(name: string, error: unknown): void {
    const runtime = this.task(name);
    const message = error instanceof Error ? error.message : String(error);
    log(`${name} failed to spawn: ${message}`);
    runtime.state = "failed";
    runtime.outcome = { kind: "spawn-error", message };
    runtime.finishedAt = Date.now();
    this.sink.lifecycle({ message, task: name, type: "spawn-failed" });
  }

  private markReady(runtime: RuntimeTask): void {
    if (runtime.state !== "running") {
      return;
    }
    const name = runtime.definition.name;
    runtime.state = "ready";
    runtime.everReady = true;
    log(`${name} is ready`);
    this.sink.lifecycle({ task: name, type: "ready" });
    this.schedule(this.graph.dependentsOf(name));
  }

  private onExited(name: string, outcome: ExitOutcome): void {
    const runtime = this.task(name);
    runtime.process = undefined;
    runtime.outcome = outcome;
    runtime.finishedAt = Date.now();

    if (runtime.terminateRequested) {
      runtime.state = "killed";
      this.sink.lifecycle({ outcome, task: name, type: "killed" });
    } else if (outcome.kind === "exited" && outcome.code === 0) {
      runtime.state = "succeeded";
      this.sink.lifecycle({ task: name, type: "succeeded" });
    } else {
      runtime.state = "failed";
      this.sink.lifecycle({ outcome, task: name, type: "failed" });
    }
    if (!runtime.everReady && runtime.detector.hasMarker) {
      log(`${name} exited before printing its ready marker`);
    }
  }

  private onShutdown(): void {
    this.shuttingDown = true;
    log("Shutting down");
    for (const runtime of this.tasks.values()) {
      if (!LIVE_STATES.has(runtime.state) || runtime.terminateRequested) {
        continue;
      }
      runtime.terminateRequested = true;
      // A task still starting is terminated once its spawn is confirmed.
      if (runtime.process) {
        this.terminate(runtime);
      }
    }
  }

  private terminate(runtime: RuntimeTask): void {
    const name = runtime.definition.name;
    runtime.process?.terminate(this.gracePeriodMs).catch((error: unknown) => {
      log(`Terminating ${name} failed:`, error);
    });
  }

  private detectStall(): void {
    if (this.stalled || this.shuttingDown || this.liveCount() > 0) {
      return;
    }
    const blocked: BlockedTask[] = [];
    for (const runtime of this.tasks.values()) {
      if (runtime.state === "pending") {
        blocked.push({
          task: runtime.definition.name,
          waitingOn: runtime.definition.dependsOn.filter(
            (dep) => !this.task(dep).everReady
          ),
        });
      }
    }
    if (blocked.length === 0) {
      return;
    }
    this.stalled = true;
    log("Stalled:", blocked);
    this.sink.lifecycle({ blocked, type: "stalled" });
  }

  private isFinished(): boolean {
    const live = this.liveCount();
    if (this.shuttingDown) {
      return live === 0;
    }
    if (this.stalled && this.exitOnStall) {
      return true;
    }
    return [...this.tasks.values()].every(
      (runtime) => runtime.state !== "pending" && !LIVE_STATES.has(runtime.state)
    );
  }

  private liveCount(): number {
    let count = 0;
    for (const runtime of this.tasks.values()) {
      if (LIVE_STATES.has(runtime.state)) {
        count++;
      }
    }
    return count;
  }

  private task(name: string): RuntimeTask {
    const runtime = this.tasks.get(name);
    if (!runtime) {
      // The graph guarantees every name; reaching this is a programming error.
      throw new Error(`Unknown task: ${name}`);
    }
    return runtime;
  }

  private summary(): RunSummary {
    return {
      shutdownRequested: this.shutdownRequested,
      stalled: this.stalled,
      tasks: this.graph.names().map((name) => {
        const runtime = this.task(name);
        return {
          durationMs:
            runtime.startedAt !== undefined && runtime.finishedAt !== undefined
              ? runtime.finishedAt - runtime.startedAt
              : undefined,
          everReady: runtime.everReady,
          name,
          outcome: runtime.outcome,
          state: runtime.state,
        };
      }),
    };
  }
}
