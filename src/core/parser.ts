import type { ParsedCommand } from "../types";
import { ConfigError } from "./errors";

export class Parser {
  parse(args: string[]): ParsedCommand {
    const result: ParsedCommand = {
      help: false,
      options: {},
      patterns: [],
    };

    for (const arg of args) {
      this.processArg(arg, result);
    }

    return result;
  }

  private processArg(arg: string, result: ParsedCommand): void {
    if (arg.startsWith("[") && arg.endsWith("]")) {
      result.patterns.push(...this.parsePatternGroup(arg));
    } else if (arg.startsWith("--")) {
      this.processLongFlag(arg.substring(2), result);
    } else if (arg.startsWith("-") && arg.length > 1) {
      this.processShortFlags(arg.substring(1), result);
    } else if (result.configPath === undefined) {
      result.configPath = arg;
    } else {
      console.warn(`Unexpected argument: ${arg}`);
    }
  }

  private processLongFlag(flag: string, result: ParsedCommand): void {
    if (flag === "quiet") {
      result.options.quiet = true;
    } else if (flag === "help") {
      result.help = true;
    } else if (flag === "no-prefix") {
      result.options.prefix = false;
    } else if (flag === "exit-on-stall") {
      result.options.exitOnStall = true;
    } else if (flag.startsWith("prefix=")) {
      const PREFIX_LENGTH = "prefix=".length;
      result.options.prefix = flag.substring(PREFIX_LENGTH);
    } else if (flag.startsWith("grace=")) {
      const GRACE_LENGTH = "grace=".length;
      result.options.gracePeriodMs = this.parseGrace(flag.substring(GRACE_LENGTH));
    } else {
      console.warn(`Unknown flag: --${flag}`);
    }
  }

  private processShortFlags(flags: string, result: ParsedCommand): void {
    for (const flag of flags) {
      if (flag === "q") {
        result.options.quiet = true;
      } else if (flag === "h") {
        result.help = true;
      } else {
        console.warn(`Unknown flag: -${flag}`);
      }
    }
  }

  private parseGrace(value: string): number {
    const ms = Number(value);
    if (value.trim() === "" || !Number.isInteger(ms) || ms < 0) {
      throw new ConfigError(
        `Invalid grace period: ${value} (expected a whole number of milliseconds)`
      );
    }
    return ms;
  }

  private parsePatternGroup(input: string): string[] {
    // Remove [ and ]
    const content = input.slice(1, -1);

    // Split by comma, keeping commas inside {a,b} globs
    const patterns: string[] = [];
    let current = "";
    let depth = 0;

    for (const char of content) {
      if (char === "{") {
        depth++;
      } else if (char === "}") {
        depth--;
      }

      if (char === "," && depth === 0) {
        if (current.trim()) {
          patterns.push(current.trim());
        }
        current = "";
      } else {
        current += char;
      }
    }

    if (current.trim()) {
      patterns.push(current.trim());
    }

    return patterns;
  }
}

export function parseCommand(args: string[]): ParsedCommand {
  const parser = new Parser();
  return parser.parse(args);
}
