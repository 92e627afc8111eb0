import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, parseConfig } from "../../core/config-loader";
import { ConfigError } from "../../core/errors";

describe("parseConfig", () => {
  it("parses every section as a task in order", () => {
    const text = [
      "[build]",
      "command = npm run build",
      "",
      "[serve]",
      "command = npm run dev",
      "work_dir = packages/app",
      "depends_on = build",
      "ready_check = listening on port",
      "",
      "[test]",
      "command = npm test",
      "depends_on = build, serve",
    ].join("\n");

    expect(parseConfig(text, "/repo")).toEqual([
      { command: "npm run build", dependsOn: [], name: "build" },
      {
        command: "npm run dev",
        cwd: "/repo/packages/app",
        dependsOn: ["build"],
        name: "serve",
        readyMarker: "listening on port",
      },
      { command: "npm test", dependsOn: ["build", "serve"], name: "test" },
    ]);
  });

  it("keeps an absolute work_dir", () => {
    const [definition] = parseConfig("[a]\ncommand = ls\nwork_dir = /srv/www\n", "/repo");

    expect(definition?.cwd).toBe("/srv/www");
  });

  it("keeps equals signs inside the command", () => {
    const [definition] = parseConfig("[a]\ncommand = PORT=3000 node server.js\n", "/repo");

    expect(definition?.command).toBe("PORT=3000 node server.js");
  });

  it("drops empty entries from depends_on", () => {
    const text = "[a]\ncommand = x\n[b]\ncommand = y\n[c]\ncommand = z\ndepends_on = a,, b ,\n";

    expect(parseConfig(text, "/repo")[2]?.dependsOn).toEqual(["a", "b"]);
  });

  it("accepts depends_on written as an array", () => {
    const text = "[a]\ncommand = x\n[b]\ncommand = y\ndepends_on[] = a\n";

    expect(parseConfig(text, "/repo")[1]?.dependsOn).toEqual(["a"]);
  });

  it("reads a boolean-looking marker as text", () => {
    const [definition] = parseConfig("[a]\ncommand = x\nready_check = true\n", "/repo");

    expect(definition?.readyMarker).toBe("true");
  });

  it("flattens dotted section names", () => {
    const text = "[api.server]\ncommand = node server.js\n[api.worker]\ncommand = node worker.js\n";

    expect(parseConfig(text, "/repo").map((d) => d.name)).toEqual([
      "api.server",
      "api.worker",
    ]);
  });

  it("skips empty sections and keys outside sections", () => {
    const text = "root = 1\n[empty]\n[a]\ncommand = x\n";

    expect(parseConfig(text, "/repo").map((d) => d.name)).toEqual(["a"]);
  });

  it("returns nothing for an empty document", () => {
    expect(parseConfig("", "/repo")).toEqual([]);
  });

  it("rejects a section without a command", () => {
    const parse = () => parseConfig("[a]\nwork_dir = src\n", "/repo");

    expect(parse).toThrow(ConfigError);
    expect(parse).toThrow('Invalid task "a":\ncommand: Required');
  });

  it("rejects an empty command", () => {
    expect(() => parseConfig("[a]\ncommand =\n", "/repo")).toThrow(
      'Invalid task "a":\ncommand: must not be empty'
    );
  });
});

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(os.tmpdir(), "readyrun-config-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { force: true, recursive: true });
  });

  it("resolves work_dir against the config file's directory", async () => {
    const configPath = join(tmpDir, "tasks.ini");
    writeFileSync(configPath, "[web]\ncommand = npm start\nwork_dir = web\n");

    const definitions = await loadConfig(configPath);

    expect(definitions).toEqual([
      { command: "npm start", cwd: join(tmpDir, "web"), dependsOn: [], name: "web" },
    ]);
  });

  it("fails when the file cannot be read", async () => {
    const configPath = join(tmpDir, "missing.ini");

    await expect(loadConfig(configPath)).rejects.toThrow(
      `Failed to read config file at ${configPath}`
    );
  });

  it("fails when the file defines no tasks", async () => {
    const configPath = join(tmpDir, "tasks.ini");
    writeFileSync(configPath, "; nothing here\n");

    await expect(loadConfig(configPath)).rejects.toThrow(`No tasks found in ${configPath}`);
  });
});
