import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { formatTimestamp, stripAnsi, ToolRunner } from "../runner.js";
import type { AppSpec, RunnerStatus } from "../types.js";
import {
  isAlive,
  makeToolDir,
  PACKAGE_ROOT,
  toolSpec,
} from "./tool-scripts.spec-helper.js";

const BANNER_TIME = "\\d{4}-\\d{2}-\\d{2} \\d{2}:\\d{2}:\\d{2}";

describe("ToolRunner", () => {
  let dir: string;
  let output: string[];
  let names: Set<string>;
  let statuses: RunnerStatus[];
  let runners: ToolRunner[];

  function runner(spec: AppSpec, baseDir: string = dir): ToolRunner {
    const created = new ToolRunner(spec, {
      baseDir,
      onLog: (name, text) => {
        names.add(name);
        output.push(text);
      },
      onStatus: (_spec, status) => statuses.push(status),
    });
    runners.push(created);
    return created;
  }

  const joined = () => output.join("");

  beforeEach(() => {
    dir = makeToolDir();
    output = [];
    names = new Set();
    statuses = [];
    runners = [];
  });

  afterEach(async () => {
    for (const r of runners) {
      r.stop();
      await r.waitForExit();
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("runs a script to completion and relays its output", async () => {
    const r = runner(
      toolSpec(dir, "hello.mjs", {
        moonrakerUrl: "http://printer.local:7125/printer/objects/query",
        dashboardPort: 5050,
      }),
    );

    expect(r.start()).toEqual({ started: true });
    await r.waitForExit(10000);

    const text = joined();
    expect(text).toContain("hello green\n");
    expect(text).toContain("to stderr\n");
    expect(text).toContain("label=Test Tool\n");
    expect(text).toContain(
      "moonraker=http://printer.local:7125/printer/objects/query\n",
    );
    expect(text).toContain("force_color=0\n");
    expect(text).toContain(`args=--port 5050\n`);
    expect(text).toMatch(new RegExp(`==== ${BANNER_TIME} EXIT code=0 ====`));
    expect(statuses).toEqual(["starting", "running", "stopped"]);
    expect(r.isRunning()).toBe(false);
    expect(r.pid).toBeNull();
  });

  it("writes a start banner and tags output with the tool name", async () => {
    const r = runner(toolSpec(dir, "hello.mjs"));
    r.start();
    await r.waitForExit(10000);

    expect([...names]).toEqual(["Test Tool"]);
    expect(output[0]).toMatch(new RegExp(`^\\n==== ${BANNER_TIME} START ====\\n$`));
    expect(output[1]).toBe(`[launcher] Using: ${process.execPath}\n`);
    expect(output[2]).toBe(`[launcher] Working dir: ${dir}\n`);
    expect(output[3]).toBe(`[launcher] Script: ${path.join(dir, "hello.mjs")}\n`);
    expect(joined()).toContain("moonraker=unset\n");
    expect(joined()).not.toContain("[launcher] Dashboard port:");
  });

  it("appends ANSI-free output to the log file", async () => {
    const r = runner(toolSpec(dir, "hello.mjs"));
    r.start();
    await r.waitForExit(10000);

    expect(r.logPath).toBe(path.join(dir, "launcher_test_tool.log"));
    const log = fs.readFileSync(r.logPath, "utf-8");
    expect(log).toContain("hello green\n");
    expect(log).not.toContain(String.fromCharCode(27));
  });

  it("reports a non-zero exit code", async () => {
    const r = runner(toolSpec(dir, "fail.mjs"));
    r.start();
    await r.waitForExit(10000);

    expect(joined()).toMatch(new RegExp(`==== ${BANNER_TIME} EXIT code=3 ====`));
    expect(r.status).toBe("stopped");
  });

  it("refuses a second start while running", async () => {
    const r = runner(toolSpec(dir, "serve.mjs"));
    r.start();
    expect(r.start()).toEqual({ started: false, message: "Already running" });
  });

  it("stops a running tool with SIGTERM", async () => {
    const r = runner(toolSpec(dir, "serve.mjs"));
    r.start();
    await vi.waitFor(() => expect(joined()).toContain("ready"), { timeout: 10000 });
    expect(r.status).toBe("running");
    expect(r.pid).toBeTypeOf("number");

    r.stop();
    expect(r.status).toBe("stopping");
    await r.waitForExit();

    expect(joined()).toMatch(new RegExp(`==== ${BANNER_TIME} STOP requested ====`));
    expect(joined()).toContain("EXIT code=SIGTERM ====");
    expect(joined()).not.toContain("Force-killing");
    expect(r.status).toBe("stopped");
  });

  it("force-kills a tool that ignores SIGTERM", async () => {
    const r = runner(toolSpec(dir, "stubborn.mjs"));
    r.start();
    await vi.waitFor(() => expect(joined()).toContain("ready"), { timeout: 10000 });

    r.stop();
    await r.waitForExit();

    expect(joined()).toContain("ignoring SIGTERM");
    expect(joined()).toContain("[launcher] Force-killing process.\n");
    expect(joined()).toContain("EXIT code=SIGKILL ====");
    expect(r.isRunning()).toBe(false);
  });

  it("does nothing when stopping an idle tool", () => {
    const r = runner(toolSpec(dir, "serve.mjs"));
    r.stop();
    expect(output).toEqual([]);
    expect(r.status).toBe("stopped");
  });

  describe("TypeScript tools", () => {
    const tsx = path.join(PACKAGE_ROOT, "node_modules", ".bin", "tsx");

    async function readyPid(): Promise<number> {
      let pid = 0;
      await vi.waitFor(
        () => {
          const match = /ready (\d+)/.exec(joined());
          expect(match).not.toBeNull();
          pid = Number(match?.[1]);
        },
        { timeout: 20000 },
      );
      return pid;
    }

    it("runs a script through tsx", async () => {
      const r = runner(toolSpec(dir, "hello.ts"), PACKAGE_ROOT);

      expect(r.start()).toEqual({ started: true });
      await r.waitForExit(20000);

      expect(output[1]).toBe(`[launcher] Using: ${tsx}\n`);
      expect(joined()).toContain("hello from ts\n");
      expect(joined()).toMatch(new RegExp(`==== ${BANNER_TIME} EXIT code=0 ====`));
      expect(r.status).toBe("stopped");
    }, 30000);

    it("stops the script together with the tsx wrapper", async () => {
      const r = runner(toolSpec(dir, "serve.ts"), PACKAGE_ROOT);
      r.start();
      const pid = await readyPid();
      expect(isAlive(pid)).toBe(true);

      r.stop();
      await r.waitForExit();

      expect(r.status).toBe("stopped");
      expect(r.isRunning()).toBe(false);
      await vi.waitFor(() => expect(isAlive(pid)).toBe(false), { timeout: 5000 });
    }, 30000);

    it("force-kills a script that ignores SIGTERM", async () => {
      const r = runner(toolSpec(dir, "stubborn.ts"), PACKAGE_ROOT);
      r.start();
      const pid = await readyPid();

      r.stop();
      await r.waitForExit();

      expect(joined()).toContain("ignoring SIGTERM");
      expect(joined()).toContain("[launcher] Force-killing process.\n");
      expect(joined()).toMatch(new RegExp(`==== ${BANNER_TIME} EXIT code=\\S+ ====`));
      expect(r.status).toBe("stopped");
      expect(r.isRunning()).toBe(false);
      await vi.waitFor(() => expect(isAlive(pid)).toBe(false), { timeout: 5000 });
    }, 30000);
  });

  describe("validation", () => {
    it("requires the project dir", () => {
      const missing = path.join(dir, "missing");
      const r = runner(toolSpec(missing, "hello.mjs"));

      expect(r.start()).toEqual({
        started: false,
        message: `Project dir not found:\n${missing}`,
      });
      expect(r.status).toBe("error");
      expect(output).toEqual([
        `[launcher] Project dir not found:\n${missing}\n`,
      ]);
      expect(fs.existsSync(missing)).toBe(false);
    });

    it("requires the runtime", () => {
      const r = runner(toolSpec(dir, "main.ts"));
      const tsx = path.join(dir, "node_modules", ".bin", "tsx");

      expect(r.validate()).toEqual({
        ok: false,
        message: `Runtime not found:\n${tsx}`,
      });
    });

    it("requires the script", () => {
      const r = runner(toolSpec(dir, "nope.mjs"));

      expect(r.validate()).toEqual({
        ok: false,
        message: `Script not found:\n${path.join(dir, "nope.mjs")}`,
      });
    });

    it("passes for a runnable tool", () => {
      expect(runner(toolSpec(dir, "hello.mjs")).validate()).toEqual({
        ok: true,
        message: "",
      });
    });
  });
});

describe("runner helpers", () => {
  it("strips ANSI escape sequences", () => {
    const esc = String.fromCharCode(27);
    expect(stripAnsi(`${esc}[1;31mERROR${esc}[0m done${esc}[2K`)).toBe("ERROR done");
  });

  it("formats local timestamps", () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 7, 8, 9))).toBe(
      "2024-01-05 07:08:09",
    );
  });
});
