import debug from "debug";
import micromatch from "micromatch";
import type { TaskDefinition } from "../types";
import { ConfigError } from "./errors";

const log = debug("readyrun:select");

export class TaskSelector {
  /**
   * Resolves patterns to task names. Inclusions and `!` exclusions apply
   * left to right; a leading exclusion starts from every task.
   */
  resolvePatterns(patterns: string[], taskNames: string[]): string[] {
    let result: string[] = patterns[0]?.startsWith("!") ? [...taskNames] : [];

    for (const pattern of patterns) {
      result = pattern.startsWith("!")
        ? this.processExclusion(pattern.slice(1), result)
        : [...result, ...this.findMatches(pattern, taskNames)];
    }

    // Remove duplicates while preserving order
    return [...new Set(result)];
  }

  /**
   * The tasks named by `patterns` plus everything they transitively depend
   * on, in definition order. No patterns selects every task.
   */
  select(
    patterns: string[],
    definitions: readonly TaskDefinition[]
  ): TaskDefinition[] {
    if (patterns.length === 0) {
      return [...definitions];
    }

    const byName = new Map(definitions.map((d) => [d.name, d]));
    const selected = new Set<string>();
    const pending = this.resolvePatterns(patterns, [...byName.keys()]);
    log("Patterns", patterns, "resolved to", pending);

    while (pending.length > 0) {
      const name = pending.pop();
      if (name === undefined || selected.has(name)) {
        continue;
      }
      selected.add(name);
      // Unknown dependencies are left for the graph to report.
      for (const dep of byName.get(name)?.dependsOn ?? []) {
        if (byName.has(dep)) {
          pending.push(dep);
        }
      }
    }

    log("Selected tasks:", [...selected]);
    return definitions.filter((d) => selected.has(d.name));
  }

  private processExclusion(excludePattern: string, result: string[]): string[] {
    if (this.isGlobPattern(excludePattern)) {
      const toRemove = micromatch(result, excludePattern);
      return result.filter((name) => !toRemove.includes(name));
    }
    return result.filter((name) => name !== excludePattern);
  }

  private findMatches(pattern: string, taskNames: string[]): string[] {
    if (taskNames.includes(pattern)) {
      return [pattern];
    }
    if (this.isGlobPattern(pattern)) {
      return micromatch(taskNames, pattern);
    }
    throw new ConfigError(`Task not found: ${pattern}`);
  }

  private isGlobPattern(pattern: string): boolean {
    return (
      pattern.includes("*") ||
      pattern.includes("?") ||
      pattern.includes("[") ||
      pattern.includes("{")
    );
  }
}
