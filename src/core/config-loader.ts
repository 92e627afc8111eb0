import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import debug from "debug";
import ini from "ini";
import { type ZodIssue, z } from "zod";
import type { TaskDefinition } from "../types";
import { ConfigError } from "./errors";

const log = debug("readyrun:config");

export const DEFAULT_CONFIG_FILE = "tasks.ini";

// `ini` turns true/false values into booleans; every key here is text.
const Scalar = z.preprocess(
  (value) =>
    typeof value === "boolean" || typeof value === "number"
      ? String(value)
      : value,
  z.string()
);

const TaskSectionSchema = z.object({
  command: Scalar.refine((value) => value.trim().length > 0, {
    message: "must not be empty",
  }),
  depends_on: z.union([Scalar, z.array(Scalar)]).optional(),
  ready_check: Scalar.optional(),
  work_dir: Scalar.optional(),
});

type TaskSection = z.infer<typeof TaskSectionSchema>;

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      if (issue.code === "invalid_type" && issue.received === "undefined") {
        return `${location}: Required`;
      }
      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Collect task sections. `ini` nests a section named `a.b` under `a`; such
 * sections are flattened back to their dotted name. Keys outside any section
 * are ignored.
 */
function collectSections(
  doc: Record<string, unknown>,
  parent?: string
): [string, Record<string, unknown>][] {
  const sections: [string, Record<string, unknown>][] = [];
  for (const [key, value] of Object.entries(doc)) {
    if (!isRecord(value)) {
      if (parent === undefined) {
        log(`Ignoring key outside of a section: ${key}`);
      }
      continue;
    }
    const name = parent === undefined ? key : `${parent}.${key}`;
    const ownKeys = Object.entries(value).filter(([, v]) => !isRecord(v));
    if (ownKeys.length > 0) {
      sections.push([name, Object.fromEntries(ownKeys)]);
    }
    sections.push(...collectSections(value, name));
  }
  return sections;
}

function splitDependencies(value: TaskSection["depends_on"]): string[] {
  const raw = Array.isArray(value) ? value : (value ?? "").split(",");
  return raw.map((dep) => dep.trim()).filter((dep) => dep.length > 0);
}

function toDefinition(
  name: string,
  section: TaskSection,
  baseDir: string
): TaskDefinition {
  const definition: TaskDefinition = {
    command: section.command.trim(),
    dependsOn: splitDependencies(section.depends_on),
    name,
  };
  if (section.work_dir?.trim()) {
    definition.cwd = resolve(baseDir, section.work_dir.trim());
  }
  if (section.ready_check) {
    definition.readyMarker = section.ready_check;
  }
  return definition;
}

/**
 * Parse INI text into task definitions, in section order. Each section is a
 * task: `command` is required; `work_dir`, `depends_on` (comma-separated)
 * and `ready_check` are optional. Relative `work_dir` values resolve against
 * `baseDir`.
 */
export function parseConfig(text: string, baseDir: string): TaskDefinition[] {
  const doc: unknown = ini.parse(text);
  if (!isRecord(doc)) {
    throw new ConfigError("Config is not a set of INI sections");
  }

  const definitions: TaskDefinition[] = [];
  for (const [name, raw] of collectSections(doc)) {
    const parsed = TaskSectionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid task "${name}":\n${formatIssues(parsed.error.issues)}`,
        { cause: parsed.error }
      );
    }
    definitions.push(toDefinition(name, parsed.data, baseDir));
  }

  log("Parsed tasks:", definitions.map((d) => d.name));
  return definitions;
}

export async function loadConfig(configPath: string): Promise<TaskDefinition[]> {
  const absolutePath = resolve(configPath);

  let text: string;
  try {
    text = await readFile(absolutePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file at ${absolutePath}`, {
      cause: error,
    });
  }

  const definitions = parseConfig(text, dirname(absolutePath));
  if (definitions.length === 0) {
    throw new ConfigError(`No tasks found in ${absolutePath}`);
  }
  return definitions;
}
