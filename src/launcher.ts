/**
 * Launcher — supervises one ToolRunner per enabled tool and keeps the
 * combined live output of all of them.
 */

import * as fs from "fs";
import { buildSpecs } from "./app-spec.js";
import { ensureConfigExists, loadToolsConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { STATUS_LABELS, ToolRunner, type StartResult } from "./runner.js";
import type { AppSpec, RunnerStatus, ToolKind } from "./types.js";

const log = createLogger("launcher");

export interface LauncherOptions {
  baseDir: string;
  maxOutputEntries?: number;
  env?: NodeJS.ProcessEnv;
}

export interface ToolState {
  id: string;
  label: string;
  kind: ToolKind;
  status: RunnerStatus;
  statusText: string;
  pid: number | null;
  logPath: string;
  moonrakerUrl: string | null;
  dashboardPort: number | null;
}

/**
 * One entry of the live output panel. Single-line chunks read as
 * `[name] text`; anything longer gets the name on its own line.
 */
export function formatOutputEntry(name: string, text: string): string {
  const inner = text.replace(/^\n+|\n+$/g, "");
  const line =
    text.trim() && !inner.includes("\n")
      ? `[${name}] ${text}`
      : `[${name}]\n${text}`;
  return line.replace(/\n+$/, "");
}

export class Launcher {
  private options: LauncherOptions;
  private runners: ToolRunner[] = [];
  private output: string[] = [];
  // Stopped on reload but possibly still exiting; shutdown waits for them too.
  private retiring = new Set<ToolRunner>();

  constructor(options: LauncherOptions) {
    this.options = options;
  }

  get baseDir(): string {
    return this.options.baseDir;
  }

  /**
   * (Re)build runners from the tools config. Runners whose spec is unchanged
   * are kept, so a running tool survives unrelated edits; runners for
   * removed or changed tools are stopped.
   */
  reload(): void {
    ensureConfigExists(this.baseDir);
    const specs = buildSpecs(loadToolsConfig(this.baseDir), this.baseDir);

    const previous = new Map(this.runners.map((r) => [r.spec.id, r]));
    const next: ToolRunner[] = [];

    for (const spec of specs) {
      const existing = previous.get(spec.id);
      if (existing && sameSpec(existing.spec, spec)) {
        next.push(existing);
        previous.delete(spec.id);
      } else {
        next.push(this.createRunner(spec));
      }
    }

    for (const stale of previous.values()) {
      if (stale.isRunning()) {
        log.info({ tool: stale.spec.id }, "Stopping tool removed from config");
        stale.stop();
        this.retiring.add(stale);
        void stale.waitForExit().then(() => this.retiring.delete(stale));
      }
    }

    this.runners = next;
    log.info({ tools: next.map((r) => r.spec.id) }, "Tools loaded");
  }

  list(): ToolState[] {
    return this.runners.map((runner) => ({
      id: runner.spec.id,
      label: runner.spec.name,
      kind: runner.spec.kind,
      status: runner.status,
      statusText: STATUS_LABELS[runner.status],
      pid: runner.pid,
      logPath: runner.logPath,
      moonrakerUrl: runner.spec.moonrakerUrl,
      dashboardPort: runner.spec.dashboardPort,
    }));
  }

  get(id: string): ToolRunner | undefined {
    return this.runners.find((runner) => runner.spec.id === id);
  }

  require(id: string): ToolRunner {
    const runner = this.get(id);
    if (!runner) {
      throw new Error(`Unknown or disabled tool: ${id}`);
    }
    return runner;
  }

  start(id: string): StartResult {
    return this.require(id).start();
  }

  stop(id: string): void {
    this.require(id).stop();
  }

  startAll(): Record<string, StartResult> {
    const results: Record<string, StartResult> = {};
    for (const runner of this.runners) {
      results[runner.spec.id] = runner.start();
    }
    return results;
  }

  stopAll(): void {
    for (const runner of this.runners) runner.stop();
  }

  /** Some tool is not running, so "Start all" has work to do. */
  canStartAll(): boolean {
    return this.runners.some((runner) => !runner.isRunning());
  }

  /** Some tool is running, so "Stop all" has work to do. */
  canStopAll(): boolean {
    return this.runners.some((runner) => runner.isRunning());
  }

  // ===== Live Output =====

  appendLog(name: string, text: string): void {
    this.output.push(formatOutputEntry(name, text));
    const max = this.options.maxOutputEntries ?? 2000;
    if (this.output.length > max) {
      this.output.splice(0, this.output.length - max);
    }
  }

  getOutput(limit?: number): string {
    const entries =
      limit !== undefined && limit > 0 ? this.output.slice(-limit) : this.output;
    return entries.join("\n");
  }

  clearOutput(): void {
    this.output = [];
  }

  /**
   * Contents of a tool's log file; the file is created when missing.
   */
  readLogFile(id: string, maxBytes = 64 * 1024): string {
    const file = this.require(id).logPath;
    fs.closeSync(fs.openSync(file, "a"));

    const size = fs.statSync(file).size;
    const start = Math.max(0, size - maxBytes);
    const fd = fs.openSync(file, "r");
    try {
      const buffer = Buffer.alloc(size - start);
      fs.readSync(fd, buffer, 0, buffer.length, start);

      // Don't start the tail inside a multi-byte character.
      let first = 0;
      if (start > 0) {
        while (first < buffer.length && (buffer[first] & 0xc0) === 0x80) first++;
      }
      return buffer.subarray(first).toString("utf-8");
    } finally {
      fs.closeSync(fd);
    }
  }

  /**
   * Stop every running tool and wait for them to exit.
   */
  async shutdown(timeoutMs = 5000): Promise<void> {
    const running = [...this.runners, ...this.retiring].filter((runner) =>
      runner.isRunning(),
    );
    for (const runner of running) runner.stop();
    await Promise.all(running.map((runner) => runner.waitForExit(timeoutMs)));
  }

  private createRunner(spec: AppSpec): ToolRunner {
    return new ToolRunner(spec, {
      baseDir: this.baseDir,
      env: this.options.env,
      onLog: (name, text) => this.appendLog(name, text),
      onStatus: (changed, status) =>
        log.debug({ tool: changed.id, status }, "Tool status changed"),
    });
  }
}

function sameSpec(a: AppSpec, b: AppSpec): boolean {
  return (
    a.name === b.name &&
    a.projectDir === b.projectDir &&
    a.script === b.script &&
    a.kind === b.kind &&
    a.moonrakerUrl === b.moonrakerUrl &&
    a.dashboardPort === b.dashboardPort
  );
}
