/**
 * Add / edit / remove launcher tools.
 *
 * Edits arrive as form-like string fields (host, ports as text) and are
 * validated into ToolEntry values here. Moonraker is addressed by host and
 * API port; the full query URL is built behind the scenes.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import {
  DASHBOARD_DIR,
  saveToolsConfig,
  WEBCAMD_RESTART_DIR,
} from "./config.js";
import { ConfigError, type ToolEntry, type ToolKind } from "./types.js";

export const DEFAULT_MOONRAKER_API_PORT = 7125;
const MOONRAKER_QUERY_PATH = "/printer/objects/query";

export interface ToolForm {
  label: string;
  projectDir: string;
  script: string;
  moonrakerHost: string;
  moonrakerApiPort: string;
  dashboardPort: string;
  kind: string;
  enabled: boolean;
}

export type FormResult =
  | { ok: true; tool: ToolEntry }
  | { ok: false; message: string };

export function buildMoonrakerUrl(
  host: string,
  apiPort: number | null,
): string | null {
  const trimmed = host.trim();
  if (!trimmed) return null;
  return `http://${trimmed}:${apiPort || DEFAULT_MOONRAKER_API_PORT}${MOONRAKER_QUERY_PATH}`;
}

export function hostFromMoonrakerUrl(url: string | null): string {
  if (!url) return "";
  try {
    return new URL(url).hostname || url;
  } catch {
    return url;
  }
}

function parseDigits(text: string): number | null {
  const trimmed = text.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

export function toolToForm(tool: ToolEntry): ToolForm {
  return {
    label: tool.label,
    projectDir: tool.projectDir,
    script: tool.script,
    moonrakerHost: hostFromMoonrakerUrl(tool.moonrakerUrl),
    moonrakerApiPort: String(tool.moonrakerApiPort || DEFAULT_MOONRAKER_API_PORT),
    dashboardPort:
      tool.dashboardPort !== null ? String(tool.dashboardPort) : "",
    kind: tool.kind,
    enabled: tool.enabled,
  };
}

export function applyToolForm(original: ToolEntry, form: ToolForm): FormResult {
  const label = form.label.trim();
  const projectDir = form.projectDir.trim();
  const script = form.script.trim();

  if (!label || !projectDir || !script) {
    return {
      ok: false,
      message: "Label, project directory and script are all required.",
    };
  }

  const moonrakerApiPort =
    parseDigits(form.moonrakerApiPort) ?? DEFAULT_MOONRAKER_API_PORT;
  const kind: ToolKind = form.kind.trim() === "oneshot" ? "oneshot" : "normal";

  return {
    ok: true,
    tool: {
      ...original,
      label,
      projectDir,
      script,
      kind,
      enabled: form.enabled,
      moonrakerUrl: buildMoonrakerUrl(form.moonrakerHost, moonrakerApiPort),
      moonrakerApiPort,
      dashboardPort: parseDigits(form.dashboardPort),
    },
  };
}

/**
 * A fresh dashboard entry with an id not already in use.
 */
export function newToolEntry(existing: ToolEntry[]): ToolEntry {
  const ids = new Set(existing.map((tool) => tool.id));
  let n = existing.length + 1;
  while (ids.has(`printer-${n}`)) n++;

  return {
    id: `printer-${n}`,
    label: "New printer",
    projectDir: DASHBOARD_DIR,
    script: "main.ts",
    kind: "normal",
    enabled: true,
    moonrakerUrl: null,
    moonrakerApiPort: null,
    dashboardPort: null,
  };
}

/**
 * Drop entries that could never launch; refuse to leave nothing behind.
 */
export function cleanTools(
  tools: ToolEntry[],
): { ok: true; tools: ToolEntry[] } | { ok: false; message: string } {
  const cleaned = tools.filter(
    (tool) => tool.label && tool.projectDir && tool.script,
  );
  if (cleaned.length === 0) {
    return {
      ok: false,
      message: "At least one valid printer/tool must be defined.",
    };
  }
  return { ok: true, tools: cleaned };
}

// ===== Webcam Credentials =====

const credentialsSchema = z.object({ password: z.string().min(1) });

export function isWebcamRestartTool(tool: ToolEntry): boolean {
  return tool.projectDir === WEBCAMD_RESTART_DIR && tool.script === "main.ts";
}

export function credentialsPath(baseDir: string): string {
  return path.join(baseDir, WEBCAMD_RESTART_DIR, "credentials.json");
}

/**
 * Stored webcam password, or "" when there is none or the file is unusable.
 */
export function readWebcamPassword(baseDir: string): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(credentialsPath(baseDir), "utf-8"),
    );
    const parsed = credentialsSchema.safeParse(raw);
    return parsed.success ? parsed.data.password : "";
  } catch {
    return "";
  }
}

/**
 * Store the webcam password. A blank password removes the credentials file
 * so the restart tool fails clearly instead of using stale data.
 */
export function writeWebcamPassword(baseDir: string, password: string): void {
  const file = credentialsPath(baseDir);

  if (!password.trim()) {
    fs.rmSync(file, { force: true });
    return;
  }

  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ password }, null, 2), "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot write ${file}`, { cause: error });
  }
}

// ===== Persistence =====

/**
 * Clean and persist the tool list.
 */
export function saveTools(
  baseDir: string,
  tools: ToolEntry[],
): { ok: true; tools: ToolEntry[] } | { ok: false; message: string } {
  const cleaned = cleanTools(tools);
  if (cleaned.ok) saveToolsConfig(baseDir, cleaned.tools);
  return cleaned;
}
