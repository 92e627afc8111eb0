import { mkdtempSync, realpathSync, rmSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SpawnError } from "../../core/errors";
import { ProcessSupervisor, spawnProcess } from "../../execution/supervisor";
import type { OutputEvent } from "../../types";
import { task } from "../helpers/fakes";

function collect() {
  const events: OutputEvent[] = [];
  const handlers = { onOutput: (event: OutputEvent) => events.push(event) };
  const texts = (source: OutputEvent["source"]) =>
    events.filter((event) => event.source === source).map((event) => event.text);
  return { events, handlers, texts };
}

describe("ProcessSupervisor", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(os.tmpdir(), "readyrun-supervisor-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { force: true, recursive: true });
  });

  it("streams stdout and stderr as separate line events", async () => {
    const { handlers, texts } = collect();
    const supervisor = await ProcessSupervisor.spawn(
      task("print", {
        command: "printf 'one\\ntwo\\n'; printf 'oops\\n' >&2; printf 'tail'",
      }),
      handlers
    );

    const outcome = await supervisor.wait();

    expect(outcome).toEqual({ code: 0, kind: "exited" });
    expect(texts("stdout")).toEqual(["one", "two", "tail"]);
    expect(texts("stderr")).toEqual(["oops"]);
  });

  it("tags every event with the task name", async () => {
    const { events, handlers } = collect();
    const supervisor = await ProcessSupervisor.spawn(
      task("named", { command: "echo hi" }),
      handlers
    );
    await supervisor.wait();

    expect(events).toEqual([{ source: "stdout", task: "named", text: "hi" }]);
  });

  it("runs the command through the shell", async () => {
    const { handlers, texts } = collect();
    const supervisor = await ProcessSupervisor.spawn(
      task("pipeline", { command: "echo alpha beta | tr a-z A-Z" }),
      handlers
    );
    await supervisor.wait();

    expect(texts("stdout")).toEqual(["ALPHA BETA"]);
  });

  it("applies the working directory", async () => {
    const { handlers, texts } = collect();
    const supervisor = await ProcessSupervisor.spawn(
      task("where", { command: "pwd", cwd: tmpDir }),
      handlers
    );
    await supervisor.wait();

    expect(texts("stdout")).toEqual([realpathSync(tmpDir)]);
  });

  it("resolves a relative working directory against the run directory", async () => {
    const { handlers, texts } = collect();
    const supervisor = await ProcessSupervisor.spawn(
      task("where", { command: "pwd", cwd: "." }),
      handlers,
      { cwd: tmpDir }
    );
    await supervisor.wait();

    expect(texts("stdout")).toEqual([realpathSync(tmpDir)]);
  });

  it("passes extra environment variables", async () => {
    const { handlers, texts } = collect();
    const spawn = spawnProcess({ env: { READYRUN_GREETING: "hello" } });
    const supervisor = await spawn(
      task("env", { command: 'echo "$READYRUN_GREETING"' }),
      handlers
    );
    await supervisor.wait();

    expect(texts("stdout")).toEqual(["hello"]);
  });

  it("reports a nonzero exit code", async () => {
    const { handlers } = collect();
    const supervisor = await ProcessSupervisor.spawn(task("fail", { command: "exit 3" }), handlers);

    expect(await supervisor.wait()).toEqual({ code: 3, kind: "exited" });
    expect(supervisor.exited).toBe(true);
  });

  it("rejects with a SpawnError when the working directory does not exist", async () => {
    const { handlers } = collect();

    await expect(
      ProcessSupervisor.spawn(
        task("lost", { command: "echo never", cwd: join(tmpDir, "missing") }),
        handlers
      )
    ).rejects.toBeInstanceOf(SpawnError);
  });

  it("terminates a running process with SIGTERM", async () => {
    const { handlers } = collect();
    const supervisor = await ProcessSupervisor.spawn(task("sleepy", { command: "sleep 30" }), handlers);

    expect(supervisor.pid).toEqual(expect.any(Number));
    expect(supervisor.exited).toBe(false);

    const outcome = await supervisor.terminate(2000);

    expect(outcome).toEqual({ kind: "signaled", signal: "SIGTERM" });
    expect(supervisor.exited).toBe(true);
  });

  it("force-kills a process that ignores SIGTERM after the grace period", async () => {
    let armed: () => void = () => undefined;
    const trapSet = new Promise<void>((resolve) => {
      armed = resolve;
    });
    const supervisor = await ProcessSupervisor.spawn(
      task("stubborn", { command: "trap '' TERM; echo armed; sleep 30" }),
      {
        onOutput: (event) => {
          if (event.text === "armed") {
            armed();
          }
        },
      }
    );
    await trapSet;

    const startedAt = Date.now();
    const outcome = await supervisor.terminate(300);
    const elapsed = Date.now() - startedAt;

    expect(outcome).toEqual({ kind: "signaled", signal: "SIGKILL" });
    expect(elapsed).toBeGreaterThanOrEqual(250);
    expect(elapsed).toBeLessThan(5000);
  });

  it("settles at exit while a background process still holds the pipes", async () => {
    const { handlers, texts } = collect();
    const supervisor = await ProcessSupervisor.spawn(
      task("daemon", { command: "sleep 5 & echo started" }),
      handlers
    );

    const startedAt = Date.now();
    const outcome = await supervisor.wait();
    const elapsed = Date.now() - startedAt;

    expect(outcome).toEqual({ code: 0, kind: "exited" });
    expect(texts("stdout")).toEqual(["started"]);
    expect(elapsed).toBeLessThan(2000);

    const pid = supervisor.pid;
    if (pid !== undefined) {
      try {
        process.kill(-pid, "SIGKILL");
      } catch {
        // the background sleep already finished
      }
    }
  });

  it("finishes terminating when a descendant left the process group", async () => {
    let up: () => void = () => undefined;
    const printedUp = new Promise<void>((resolve) => {
      up = resolve;
    });
    const supervisor = await ProcessSupervisor.spawn(
      task("escaped", { command: "setsid sleep 3 & echo up; sleep 30" }),
      {
        onOutput: (event) => {
          if (event.text === "up") {
            up();
          }
        },
      }
    );
    await printedUp;

    const startedAt = Date.now();
    const outcome = await supervisor.terminate(200);
    const elapsed = Date.now() - startedAt;

    expect(outcome).toEqual({ kind: "signaled", signal: "SIGTERM" });
    expect(elapsed).toBeLessThan(2000);
  });

  it("returns the same promise when terminated twice", async () => {
    const { handlers } = collect();
    const supervisor = await ProcessSupervisor.spawn(task("sleepy", { command: "sleep 30" }), handlers);

    const first = supervisor.terminate(2000);
    const second = supervisor.terminate(2000);

    expect(second).toBe(first);
    await first;
  });

  it("treats terminating an exited process as a no-op", async () => {
    const { handlers } = collect();
    const supervisor = await ProcessSupervisor.spawn(task("quick", { command: "true" }), handlers);
    const outcome = await supervisor.wait();

    await expect(supervisor.terminate(1000)).resolves.toEqual(outcome);
  });
});
