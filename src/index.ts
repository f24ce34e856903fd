#!/usr/bin/env node
/**
 * Printer Launcher MCP Server
 *
 * Supervises the local printer tools (Moonraker dashboards, the webcam
 * restart one-shot) and exposes them as MCP tools:
 * - Start / stop single tools or everything at once
 * - Combined live output and per-tool log files
 * - Add / edit / remove tools in `tools_config.json`
 * - Webcam SSH password storage
 *
 * Shutting the server down stops every tool it started.
 */

import * as path from "path";
import { fileURLToPath } from "url";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { loadToolsConfig, resolveBaseDir } from "./config.js";
import { Launcher } from "./launcher.js";
import { createLogger } from "./logger.js";
import {
  applyToolForm,
  isWebcamRestartTool,
  newToolEntry,
  readWebcamPassword,
  saveTools,
  toolToForm,
  writeWebcamPassword,
  type ToolForm,
} from "./tool-management.js";
import type { ToolEntry } from "./types.js";

const log = createLogger("mcp");

const SERVER_NAME = "printer-launcher";
const SERVER_VERSION = "1.0.0";

// ===== Helpers =====

function ok(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function err(message: string, details?: string): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(
          { error: message, ...(details ? { details } : {}) },
          null,
          2,
        ),
      },
    ],
    isError: true,
  };
}

// ===== Argument Schemas =====

const portField = z.union([z.number().int(), z.string()]).transform(String);

const toolFields = z.object({
  label: z.string().optional(),
  project_dir: z.string().optional(),
  script: z.string().optional(),
  moonraker_host: z.string().optional(),
  moonraker_api_port: portField.optional(),
  dashboard_port: portField.optional(),
  kind: z.enum(["normal", "oneshot"]).optional(),
  enabled: z.boolean().optional(),
});

const idArgs = z.object({ id: z.string().min(1) });
const updateArgs = toolFields.extend({ id: z.string().min(1) });
const outputArgs = z.object({ lines: z.number().int().positive().optional() });
const logArgs = z.object({
  id: z.string().min(1),
  max_bytes: z.number().int().positive().optional(),
});
const passwordArgs = z.object({ password: z.string() });

type ToolFields = z.infer<typeof toolFields>;

function parseArgs<T extends z.ZodTypeAny>(
  schema: T,
  args: Record<string, unknown> | undefined,
): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid arguments: ${details}`);
  }
  return parsed.data;
}

/** Overlay the fields a caller sent onto a tool's current form view. */
function mergeForm(base: ToolForm, fields: ToolFields): ToolForm {
  return {
    label: fields.label ?? base.label,
    projectDir: fields.project_dir ?? base.projectDir,
    script: fields.script ?? base.script,
    moonrakerHost: fields.moonraker_host ?? base.moonrakerHost,
    moonrakerApiPort: fields.moonraker_api_port ?? base.moonrakerApiPort,
    dashboardPort: fields.dashboard_port ?? base.dashboardPort,
    kind: fields.kind ?? base.kind,
    enabled: fields.enabled ?? base.enabled,
  };
}

// ===== MCP Server =====

export class PrinterLauncherMCP {
  private server: Server;
  readonly launcher: Launcher;

  constructor(launcher: Launcher) {
    this.launcher = launcher;
    this.server = new Server(
      { name: SERVER_NAME, version: SERVER_VERSION },
      { capabilities: { tools: {} } },
    );

    this.setupHandlers();
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.getTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  /**
   * Run one tool call; failures come back as `isError` results.
   */
  async callTool(
    name: string,
    args?: Record<string, unknown>,
  ): Promise<CallToolResult> {
    try {
      return await this.dispatch(name, args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ tool: name, err: error }, "Tool call failed");
      return err(message);
    }
  }

  private async dispatch(
    name: string,
    args: Record<string, unknown> | undefined,
  ): Promise<CallToolResult> {
    // Runners
    if (name === "list_tools") return this.listTools();
    if (name === "start_tool") return this.startTool(parseArgs(idArgs, args));
    if (name === "stop_tool") return this.stopTool(parseArgs(idArgs, args));
    if (name === "start_all") return this.startAll();
    if (name === "stop_all") return this.stopAll();

    // Output
    if (name === "get_output") return this.getOutput(parseArgs(outputArgs, args));
    if (name === "clear_output") return this.clearOutput();
    if (name === "read_tool_log") return this.readToolLog(parseArgs(logArgs, args));

    // Configuration
    if (name === "list_config") return this.listConfig();
    if (name === "add_tool") return this.addTool(parseArgs(toolFields, args));
    if (name === "update_tool")
      return this.updateTool(parseArgs(updateArgs, args));
    if (name === "remove_tool") return this.removeTool(parseArgs(idArgs, args));
    if (name === "set_webcam_password")
      return this.setWebcamPassword(parseArgs(passwordArgs, args));
    if (name === "reload_tools") return this.reloadTools();

    return err(`Unknown tool: ${name}`);
  }

  // ===== Tool Definitions =====

  getTools(): Tool[] {
    const toolProperties = {
      label: { type: "string", description: "Name shown in output and logs" },
      project_dir: {
        type: "string",
        description:
          "Tool folder, absolute or relative to the launcher base directory",
      },
      script: {
        type: "string",
        description: "Script inside the folder, e.g. main.ts",
      },
      moonraker_host: {
        type: "string",
        description: "Printer IP or hostname (blank for none)",
      },
      moonraker_api_port: {
        type: ["integer", "string"],
        description: "Moonraker API port (default 7125)",
      },
      dashboard_port: {
        type: ["integer", "string"],
        description: "Local port the dashboard listens on (blank for none)",
      },
      kind: {
        type: "string",
        enum: ["normal", "oneshot"],
        description: "normal = long-running, oneshot = runs once and exits",
      },
      enabled: { type: "boolean", description: "Launch with the others" },
    };

    return [
      // --- Runners ---
      {
        name: "list_tools",
        description:
          "List enabled tools with their status (Stopped, Starting…, Running, Stopping…, Error), PID and log file",
        inputSchema: { type: "object", properties: {} },
      },
      {
        name: "start_tool",
        description:
          "Start one tool. One-shot tools run once and exit. Fails if the folder, runtime or script is missing.",
        inputSchema: {
          type: "object",
          properties: { id: { type: "string", description: "Tool id" } },
          required: ["id"],
        },
      },
      {
        name: "stop_tool",
        description:
          "Stop a running tool (terminate, then force-kill if it does not exit)",
        inputSchema: {
          type: "object",
          properties: { id: { type: "string", description: "Tool id" } },
          required: ["id"],
        },
      },
      {
        name: "start_all",
        description: "Start every enabled tool that is not already running",
        inputSchema: { type: "object", properties: {} },
      },
      {
        name: "stop_all",
        description: "Stop every running tool",
        inputSchema: { type: "object", properties: {} },
      },

      // --- Output ---
      {
        name: "get_output",
        description: "Combined live output of all tools, tagged by tool name",
        inputSchema: {
          type: "object",
          properties: {
            lines: {
              type: "integer",
              description: "Only the most recent N entries",
            },
          },
        },
      },
      {
        name: "clear_output",
        description: "Clear the combined live output",
        inputSchema: { type: "object", properties: {} },
      },
      {
        name: "read_tool_log",
        description:
          "Read the end of a tool's log file (launcher_<name>.log in its folder)",
        inputSchema: {
          type: "object",
          properties: {
            id: { type: "string", description: "Tool id" },
            max_bytes: {
              type: "integer",
              description: "Bytes from the end of the file (default 65536)",
            },
          },
          required: ["id"],
        },
      },

      // --- Configuration ---
      {
        name: "list_config",
        description:
          "Show every configured tool, disabled ones included, as editable fields",
        inputSchema: { type: "object", properties: {} },
      },
      {
        name: "add_tool",
        description:
          "Add a tool (defaults to a new dashboard entry), save the config and reload",
        inputSchema: { type: "object", properties: toolProperties },
      },
      {
        name: "update_tool",
        description:
          "Edit a tool's fields, save the config and reload. Fields left out keep their value.",
        inputSchema: {
          type: "object",
          properties: {
            id: { type: "string", description: "Tool id" },
            ...toolProperties,
          },
          required: ["id"],
        },
      },
      {
        name: "remove_tool",
        description:
          "Remove a tool, save the config and reload. The last tool cannot be removed.",
        inputSchema: {
          type: "object",
          properties: { id: { type: "string", description: "Tool id" } },
          required: ["id"],
        },
      },
      {
        name: "set_webcam_password",
        description:
          "Store the SSH password used by the webcam restart tool (blank removes it)",
        inputSchema: {
          type: "object",
          properties: { password: { type: "string" } },
          required: ["password"],
        },
      },
      {
        name: "reload_tools",
        description:
          "Re-read tools_config.json. Running tools whose entry is unchanged keep running.",
        inputSchema: { type: "object", properties: {} },
      },
    ];
  }

  // ===== Runners =====

  private listTools(): CallToolResult {
    return ok({
      tools: this.launcher.list(),
      can_start_all: this.launcher.canStartAll(),
      can_stop_all: this.launcher.canStopAll(),
    });
  }

  private startTool(args: { id: string }): CallToolResult {
    const runner = this.launcher.require(args.id);
    const result = runner.start();
    if (!result.started) {
      return err(`${runner.spec.name} - cannot start`, result.message);
    }
    return ok({
      message: `Started ${runner.spec.name}`,
      status: runner.status,
      pid: runner.pid,
    });
  }

  private async stopTool(args: { id: string }): Promise<CallToolResult> {
    const runner = this.launcher.require(args.id);
    if (!runner.isRunning()) {
      return ok({ message: `${runner.spec.name} is not running` });
    }
    runner.stop();
    await runner.waitForExit();
    return ok({ message: `Stopped ${runner.spec.name}`, status: runner.status });
  }

  private startAll(): CallToolResult {
    const results = this.launcher.startAll();
    const failed = Object.entries(results)
      .filter(([, result]) => !result.started && result.message !== "Already running")
      .map(([id, result]) => ({ id, message: result.message }));
    return ok({
      started: Object.keys(results).filter((id) => results[id]?.started),
      failed,
    });
  }

  private async stopAll(): Promise<CallToolResult> {
    await this.launcher.shutdown();
    return ok({ message: "All tools stopped", tools: this.launcher.list() });
  }

  // ===== Output =====

  private getOutput(args: { lines?: number }): CallToolResult {
    return {
      content: [{ type: "text", text: this.launcher.getOutput(args.lines) }],
    };
  }

  private clearOutput(): CallToolResult {
    this.launcher.clearOutput();
    return ok({ message: "Output cleared" });
  }

  private readToolLog(args: { id: string; max_bytes?: number }): CallToolResult {
    const runner = this.launcher.require(args.id);
    const text = this.launcher.readLogFile(args.id, args.max_bytes);
    return {
      content: [{ type: "text", text: text || `(empty) ${runner.logPath}` }],
    };
  }

  // ===== Configuration =====

  private listConfig(): CallToolResult {
    const tools = loadToolsConfig(this.launcher.baseDir);
    return ok({
      base_dir: this.launcher.baseDir,
      tools: tools.map((tool) => ({
        id: tool.id,
        ...toolToForm(tool),
        webcam_restart: isWebcamRestartTool(tool),
      })),
      webcam_password_set: readWebcamPassword(this.launcher.baseDir) !== "",
    });
  }

  private addTool(fields: ToolFields): CallToolResult {
    const tools = loadToolsConfig(this.launcher.baseDir);
    const fresh = newToolEntry(tools);
    const form = applyToolForm(fresh, mergeForm(toolToForm(fresh), fields));
    if (!form.ok) return err(form.message);

    const saved = this.save([...tools, form.tool]);
    if (saved) return saved;
    return ok({ message: `Added ${form.tool.label}`, tool: form.tool });
  }

  private updateTool(fields: ToolFields & { id: string }): CallToolResult {
    const tools = loadToolsConfig(this.launcher.baseDir);
    const index = tools.findIndex((tool) => tool.id === fields.id);
    const original = tools[index];
    if (index < 0 || !original) return err(`Unknown tool: ${fields.id}`);

    const form = applyToolForm(original, mergeForm(toolToForm(original), fields));
    if (!form.ok) return err(form.message);

    const next = [...tools];
    next[index] = form.tool;
    const saved = this.save(next);
    if (saved) return saved;
    return ok({ message: `Updated ${form.tool.label}`, tool: form.tool });
  }

  private removeTool(args: { id: string }): CallToolResult {
    const tools = loadToolsConfig(this.launcher.baseDir);
    const remaining = tools.filter((tool) => tool.id !== args.id);
    if (remaining.length === tools.length) {
      return err(`Unknown tool: ${args.id}`);
    }

    const saved = this.save(remaining);
    if (saved) return saved;
    return ok({ message: `Removed ${args.id}` });
  }

  private setWebcamPassword(args: { password: string }): CallToolResult {
    writeWebcamPassword(this.launcher.baseDir, args.password);
    return ok({
      message: args.password.trim()
        ? "Webcam password saved"
        : "Webcam password removed",
    });
  }

  private reloadTools(): CallToolResult {
    this.launcher.reload();
    return ok({ tools: this.launcher.list() });
  }

  /** Save and reload; returns an error result when nothing was saved. */
  private save(tools: ToolEntry[]): CallToolResult | null {
    const saved = saveTools(this.launcher.baseDir, tools);
    if (!saved.ok) return err(saved.message);
    this.launcher.reload();
    return null;
  }

  // ===== Server Lifecycle =====

  async run() {
    const transport = new StdioServerTransport();

    let closing = false;
    const shutdown = (reason: string) => {
      if (closing) return;
      closing = true;
      log.info({ reason }, "Stopping tools before exit");
      this.launcher.shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          log.error({ err: error }, "Shutdown failed");
          process.exit(1);
        },
      );
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    this.server.onclose = () => shutdown("transport closed");

    await this.server.connect(transport);

    log.info(
      {
        version: SERVER_VERSION,
        baseDir: this.launcher.baseDir,
        tools: this.launcher.list().map((tool) => tool.id),
      },
      "Printer launcher MCP server running on stdio",
    );
  }
}

if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  const launcher = new Launcher({ baseDir: resolveBaseDir() });
  launcher.reload();
  new PrinterLauncherMCP(launcher).run().catch((error: unknown) => {
    log.fatal({ err: error }, "MCP server failed to start");
    process.exit(1);
  });
}
