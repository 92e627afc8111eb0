import ansis from "ansis";
import type {
  DisplayConfig,
  ExitOutcome,
  LifecycleEvent,
  OutputEvent,
  OutputSink,
  RunSummary,
  TaskState,
} from "../types";

const colors = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.red,
  ansis.gray,
  ansis.white,
] as const;

const stateColors: Record<TaskState, (text: string) => string> = {
  failed: ansis.red,
  killed: ansis.yellow,
  pending: ansis.gray,
  ready: ansis.cyan,
  running: ansis.blue,
  starting: ansis.blue,
  succeeded: ansis.green,
};

export function describeOutcome(outcome: ExitOutcome): string {
  switch (outcome.kind) {
    case "exited":
      return `exit code ${outcome.code}`;
    case "signaled":
      return `signal ${outcome.signal}`;
    case "spawn-error":
      return outcome.message;
  }
}

/**
 * Prints task output with a colored `[name] |` prefix, and task status lines.
 */
export class Logger implements OutputSink {
  private readonly colorMap = new Map<string, (typeof colors)[number]>();
  private colorIndex = 0;
  private maxPrefixLength = 0;
  private readonly config: DisplayConfig;

  constructor(config: DisplayConfig = {}) {
    this.config = {
      prefix: true, // Default to true
      quiet: false,
      ...config,
    };
  }

  registerTask(taskName: string): void {
    if (!this.colorMap.has(taskName)) {
      const color = colors[this.colorIndex % colors.length];
      if (color) {
        this.colorMap.set(taskName, color);
      }
      this.colorIndex++;
      this.maxPrefixLength = Math.max(this.maxPrefixLength, taskName.length);
    }
  }

  output(event: OutputEvent): void {
    if (event.source === "stderr") {
      this.error(event.task, event.text);
    } else {
      this.log(event.task, event.text);
    }
  }

  lifecycle(event: LifecycleEvent): void {
    switch (event.type) {
      case "started":
        this.info(`Running: ${event.task}`);
        break;
      case "ready":
        this.info(`Ready: ${event.task}`);
        break;
      case "succeeded":
        this.success(`Completed: ${event.task}`);
        break;
      case "failed":
        this.fail(`Failed: ${event.task} (${describeOutcome(event.outcome)})`);
        break;
      case "killed":
        this.info(`Stopped: ${event.task}`);
        break;
      case "spawn-failed":
        this.fail(`Failed to start: ${event.task} (${event.message})`);
        break;
      case "stalled":
        for (const blocked of event.blocked) {
          this.warn(
            `Blocked: ${blocked.task} is waiting for ${blocked.waitingOn.join(", ")} to become ready`
          );
        }
        break;
    }
  }

  log(taskName: string, message: string): void {
    if (this.config.quiet) {
      return;
    }

    const lines = message.split("\n");
    for (const line of lines) {
      if (!line.trim()) {
        continue;
      }

      const output = this.formatLine(taskName, line);
      console.log(output);
    }
  }

  error(taskName: string, message: string): void {
    if (this.config.quiet) {
      return;
    }

    const lines = message.split("\n");
    for (const line of lines) {
      if (!line.trim()) {
        continue;
      }

      const output = this.formatLine(taskName, ansis.red(line));
      console.error(output);
    }
  }

  info(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.blue("ℹ")} ${message}`);
  }

  success(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.green("✓")} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  fail(message: string): void {
    console.error(`${ansis.red("✗")} ${message}`);
  }

  printSummary(summary: RunSummary): void {
    if (summary.tasks.length === 0) {
      return;
    }
    const width = Math.max(...summary.tasks.map((task) => task.name.length));
    console.log(ansis.bold("Summary:"));
    for (const task of summary.tasks) {
      const details: string[] = [];
      if (task.outcome) {
        details.push(describeOutcome(task.outcome));
      }
      if (task.durationMs !== undefined) {
        details.push(`${task.durationMs}ms`);
      }
      if (!task.everReady && task.state !== "pending") {
        details.push("never ready");
      }
      const state = stateColors[task.state](task.state.padEnd("succeeded".length));
      const suffix = details.length > 0 ? ` ${ansis.gray(details.join(", "))}` : "";
      console.log(`  ${task.name.padEnd(width)}  ${state}${suffix}`);
    }
  }

  private formatLine(taskName: string, line: string): string {
    if (this.config.prefix === false) {
      return line;
    }

    this.registerTask(taskName);
    const color = this.colorMap.get(taskName) ?? ansis.white;

    if (typeof this.config.prefix === "string") {
      // Custom prefix
      return `${color(this.config.prefix)} ${line}`;
    }
    // Default prefix format - pad to align with pipe separator
    const prefix = `[${taskName}]`;
    const paddedPrefix = prefix.padEnd(this.maxPrefixLength + 2); // +2 for brackets
    return `${color(paddedPrefix)} ${ansis.gray("|")} ${line}`;
  }
}
