import debug from "debug";
import { DEFAULT_CONFIG_FILE, loadConfig } from "../core/config-loader";
import { ReadyrunError } from "../core/errors";
import { parseCommand } from "../core/parser";
import { TaskGraph } from "../core/task-graph";
import { TaskSelector } from "../core/task-selector";
import type { RunOptions, RunSummary, TaskDefinition } from "../types";
import { showHelp } from "../utils/help";
import { Logger } from "../utils/logger";
import { Orchestrator } from "./orchestrator";
import type { SpawnProcess } from "./supervisor";

const log = debug("readyrun:runner");

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM", "SIGHUP"] as const;

/**
 * 0 when every task succeeded, or when the run was stopped on request and
 * nothing failed; 1 otherwise.
 */
export function exitCodeFor(summary: RunSummary): number {
  if (summary.tasks.some((task) => task.state === "failed")) {
    return 1;
  }
  if (summary.shutdownRequested) {
    return 0;
  }
  return summary.tasks.every((task) => task.state === "succeeded") ? 0 : 1;
}

export class Runner {
  private readonly selector = new TaskSelector();
  private readonly spawn: SpawnProcess | undefined;
  private orchestrator: Orchestrator | undefined;
  private shutdownRequested = false;

  constructor(spawn?: SpawnProcess) {
    this.spawn = spawn;
  }

  /**
   * Run from command line arguments, or print help when asked. Returns the
   * process exit code.
   */
  async run(args: string[], options: RunOptions = {}): Promise<number> {
    try {
      const parsed = parseCommand(args);
      if (parsed.help) {
        showHelp();
        return 0;
      }
      const config = { ...parsed.options, ...options };
      const definitions = await loadConfig(parsed.configPath ?? DEFAULT_CONFIG_FILE);
      const selected = this.selector.select(parsed.patterns, definitions);
      const summary = await this.runTasks(selected, config);
      return exitCodeFor(summary);
    } catch (error) {
      if (!(error instanceof ReadyrunError)) {
        throw error;
      }
      console.error("Error:", error.message);
      return 1;
    }
  }

  /**
   * Validate the graph, then run every task until all are done or shutdown
   * completes. SIGINT, SIGTERM and SIGHUP request shutdown meanwhile.
   */
  async runTasks(
    definitions: readonly TaskDefinition[],
    options: RunOptions = {}
  ): Promise<RunSummary> {
    const graph = TaskGraph.build(definitions);
    const logger = new Logger(options);
    for (const name of graph.names()) {
      logger.registerTask(name);
    }

    const orchestrator = new Orchestrator(graph, {
      cwd: options.cwd,
      env: options.env,
      exitOnStall: options.exitOnStall,
      gracePeriodMs: options.gracePeriodMs,
      sink: logger,
      spawn: this.spawn,
    });
    this.orchestrator = orchestrator;

    const onSignal = (signal: NodeJS.Signals) => {
      log(`Received ${signal}`);
      if (!orchestrator.isShuttingDown) {
        logger.info("Shutting down...");
      }
      orchestrator.requestShutdown();
    };
    for (const signal of SHUTDOWN_SIGNALS) {
      process.on(signal, onSignal);
    }
    if (this.shutdownRequested) {
      orchestrator.requestShutdown();
    }

    try {
      const summary = await orchestrator.run();
      logger.printSummary(summary);
      return summary;
    } finally {
      for (const signal of SHUTDOWN_SIGNALS) {
        process.off(signal, onSignal);
      }
      this.orchestrator = undefined;
    }
  }

  requestShutdown(): void {
    this.shutdownRequested = true;
    this.orchestrator?.requestShutdown();
  }
}
