/**
 * Tool Runner — process controller for one launcher tool.
 *
 * Spawns the tool's script under the shared runtime, relays its merged
 * stdout/stderr to a log sink and to a per-tool log file, and stops it with
 * a terminate-then-kill escalation so a dashboard never keeps its port
 * bound after Stop.
 */

import { spawn, type ChildProcess } from "child_process";
import * as fs from "fs";
import type { Logger } from "pino";
import { logPath, resolveInterpreter, scriptPath } from "./app-spec.js";
import { createLogger } from "./logger.js";
import type { AppSpec, RunnerStatus, ValidationResult } from "./types.js";

// ANSI colour / control sequences (web servers, ssh sessions, remote shells)
const ANSI_ESCAPE_RE = /\x1B\[[0-?]*[ -/]*[@-~]/g;

const KILL_DELAY_MS = { normal: 500, oneshot: 2000 } as const;

export const STATUS_LABELS: Record<RunnerStatus, string> = {
  stopped: "Stopped",
  starting: "Starting…",
  running: "Running",
  stopping: "Stopping…",
  error: "Error",
};

export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE_RE, "");
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export type LogSink = (name: string, text: string) => void;

export interface RunnerOptions {
  baseDir: string;
  onLog: LogSink;
  onStatus?: (spec: AppSpec, status: RunnerStatus) => void;
  env?: NodeJS.ProcessEnv;
}

export interface StartResult {
  started: boolean;
  message?: string;
}

export class ToolRunner {
  readonly spec: AppSpec;
  private options: RunnerOptions;
  private child: ChildProcess | null = null;
  private killTimer: ReturnType<typeof setTimeout> | null = null;
  private exitWaiters: Array<() => void> = [];
  private currentStatus: RunnerStatus = "stopped";
  private logFileFailed = false;
  private log: Logger;

  constructor(spec: AppSpec, options: RunnerOptions) {
    this.spec = spec;
    this.options = options;
    this.log = createLogger("runner").child({ tool: spec.id });
  }

  get status(): RunnerStatus {
    return this.currentStatus;
  }

  get pid(): number | null {
    return this.child?.pid ?? null;
  }

  get interpreter(): string {
    return resolveInterpreter(this.spec, this.options.baseDir);
  }

  get logPath(): string {
    return logPath(this.spec);
  }

  isRunning(): boolean {
    return this.child !== null;
  }

  validate(): ValidationResult {
    if (!fs.existsSync(this.spec.projectDir)) {
      return {
        ok: false,
        message: `Project dir not found:\n${this.spec.projectDir}`,
      };
    }
    if (!fs.existsSync(this.interpreter)) {
      return { ok: false, message: `Runtime not found:\n${this.interpreter}` };
    }
    if (!fs.existsSync(scriptPath(this.spec))) {
      return {
        ok: false,
        message: `Script not found:\n${scriptPath(this.spec)}`,
      };
    }
    return { ok: true, message: "" };
  }

  start(): StartResult {
    if (this.isRunning()) return { started: false, message: "Already running" };

    const check = this.validate();
    if (!check.ok) {
      this.setStatus("error");
      this.write(`[launcher] ${check.message}\n`);
      return { started: false, message: check.message };
    }

    const interpreter = this.interpreter;
    const script = scriptPath(this.spec);
    const args = [script];
    if (this.spec.dashboardPort) {
      args.push("--port", String(this.spec.dashboardPort));
    }

    const env: NodeJS.ProcessEnv = {
      ...(this.options.env ?? process.env),
      FORCE_COLOR: "0",
      LAUNCHER_TOOL_LABEL: this.spec.name,
    };
    if (this.spec.moonrakerUrl) {
      env.MOONRAKER_API_URL = this.spec.moonrakerUrl;
    }

    this.write(`\n==== ${formatTimestamp()} START ====\n`);
    this.write(`[launcher] Using: ${interpreter}\n`);
    this.write(`[launcher] Working dir: ${this.spec.projectDir}\n`);
    this.write(`[launcher] Script: ${script}\n`);
    if (this.spec.moonrakerUrl) {
      this.write(`[launcher] Moonraker URL: ${this.spec.moonrakerUrl}\n`);
    }
    if (this.spec.dashboardPort) {
      this.write(`[launcher] Dashboard port: ${this.spec.dashboardPort}\n`);
    }

    this.setStatus("starting");

    const child = spawn(interpreter, args, {
      cwd: this.spec.projectDir,
      env,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
      // Own process group, so wrappers such as tsx go down with their child.
      detached: process.platform !== "win32",
    });
    this.child = child;

    child.stdout?.setEncoding("utf-8");
    child.stderr?.setEncoding("utf-8");
    child.stdout?.on("data", (chunk: string) => this.write(chunk));
    child.stderr?.on("data", (chunk: string) => this.write(chunk));

    child.on("spawn", () => {
      this.setStatus("running");
      if (child.pid) this.write(`[launcher] PID: ${child.pid}\n`);
    });

    child.on("error", (error) => {
      this.write(`\n[launcher] Process error: ${error.message}\n`);
      this.setStatus("error");
      // A child that never got a pid will not report an exit.
      if (child.pid === undefined) this.detach(child);
    });

    child.on("close", (code, signal) => {
      if (this.child !== child) return;
      const exitCode = code ?? (signal ? `${signal}` : "unknown");
      this.write(`\n==== ${formatTimestamp()} EXIT code=${exitCode} ====\n`);
      this.setStatus("stopped");
      this.detach(child);
    });

    return { started: true };
  }

  stop(): void {
    const child = this.child;
    if (!child) return;

    this.write(`\n==== ${formatTimestamp()} STOP requested ====\n`);
    this.setStatus("stopping");
    this.signal(child, "SIGTERM");

    if (this.killTimer) clearTimeout(this.killTimer);
    this.killTimer = setTimeout(() => {
      this.killTimer = null;
      if (this.child === child) {
        this.write("[launcher] Force-killing process.\n");
        this.signal(child, "SIGKILL");
      }
    }, KILL_DELAY_MS[this.spec.kind]);
  }

  /**
   * Resolve once the child has exited, or after `timeoutMs` regardless.
   */
  waitForExit(timeoutMs = 5000): Promise<void> {
    if (!this.child) return Promise.resolve();
    return new Promise((resolve) => {
      const timer = setTimeout(resolve, timeoutMs);
      this.exitWaiters.push(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }

  /**
   * Signal the child's whole process group where there is one, falling back
   * to the child alone.
   */
  private signal(child: ChildProcess, signal: NodeJS.Signals): void {
    if (process.platform !== "win32" && child.pid !== undefined) {
      try {
        process.kill(-child.pid, signal);
        return;
      } catch (error) {
        this.log.debug({ err: error, signal }, "Process group signal failed");
      }
    }
    child.kill(signal);
  }

  private detach(child: ChildProcess): void {
    if (this.child !== child) return;
    this.child = null;
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }
    const waiters = this.exitWaiters;
    this.exitWaiters = [];
    for (const done of waiters) done();
  }

  private setStatus(status: RunnerStatus): void {
    this.currentStatus = status;
    this.options.onStatus?.(this.spec, status);
  }

  private write(text: string): void {
    const clean = stripAnsi(text);

    try {
      fs.appendFileSync(this.logPath, clean, "utf-8");
    } catch (error) {
      // Report once per runner; the live output keeps flowing either way.
      if (!this.logFileFailed) {
        this.logFileFailed = true;
        this.log.warn({ err: error, file: this.logPath }, "Cannot write log file");
      }
    }

    this.options.onLog(this.spec.name, clean);
  }
}
