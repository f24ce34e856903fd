/**
 * Tools configuration
 *
 * The launcher's tool list lives in `tools_config.json` in the base directory.
 * The file is user-editable, so loading is lenient: bad entries are skipped,
 * and a missing, corrupt or empty file falls back to the built-in defaults
 * without overwriting what is on disk.
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { createLogger } from "./logger.js";
import type { ToolEntry, ToolKind } from "./types.js";

const log = createLogger("config");

export const CONFIG_FILENAME = "tools_config.json";

export const DASHBOARD_DIR = "src/dashboard";
export const WEBCAMD_RESTART_DIR = "src/webcamd-restart";
export const BUILTIN_TOOL_DIRS = [DASHBOARD_DIR, WEBCAMD_RESTART_DIR];

const PACKAGE_ROOT = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
);

// ===== Base Directory =====

/**
 * Directory the tool folders and `tools_config.json` are resolved against.
 *
 * `LAUNCHER_BASE_DIR` wins when set. Otherwise the package root and the
 * working directory are probed in turn, and the first one containing every
 * built-in tool folder is used; the package root is the fallback so paths
 * stay predictable even if the layout changes.
 */
export function resolveBaseDir(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const override = env.LAUNCHER_BASE_DIR?.trim();
  if (override) return path.resolve(override);

  for (const base of [PACKAGE_ROOT, cwd]) {
    if (BUILTIN_TOOL_DIRS.every((dir) => fs.existsSync(path.join(base, dir)))) {
      return base;
    }
  }
  return PACKAGE_ROOT;
}

export function configPath(baseDir: string): string {
  return path.join(baseDir, CONFIG_FILENAME);
}

// ===== Defaults =====

export function defaultTools(): ToolEntry[] {
  return [
    {
      id: "qidi-temps",
      label: "Qidi Temps",
      projectDir: DASHBOARD_DIR,
      script: "main.ts",
      kind: "normal",
      enabled: true,
      moonrakerUrl: null,
      moonrakerApiPort: null,
      dashboardPort: 5001,
    },
    {
      id: "qidi-webcamd-restart",
      label: "Qidi Webcamd restart",
      projectDir: WEBCAMD_RESTART_DIR,
      script: "main.ts",
      kind: "oneshot",
      enabled: true,
      moonrakerUrl: null,
      moonrakerApiPort: null,
      dashboardPort: null,
    },
    {
      id: "voron-temps",
      label: "Voron Temps",
      projectDir: DASHBOARD_DIR,
      script: "main.ts",
      kind: "normal",
      enabled: true,
      moonrakerUrl: null,
      moonrakerApiPort: null,
      dashboardPort: 5000,
    },
  ];
}

// ===== Parsing =====

const text = z
  .unknown()
  .transform((value) => (value ? String(value).trim() : ""));

const port = z
  .union([
    z.number().int(),
    z
      .string()
      .trim()
      .regex(/^\d+$/)
      .transform((value) => parseInt(value, 10)),
  ])
  .nullable()
  .catch(null);

const storedToolSchema = z.object({
  id: text,
  label: text,
  project_dir: text,
  script: text,
  kind: text.transform((value): ToolKind =>
    value === "oneshot" ? "oneshot" : "normal",
  ),
  enabled: z
    .unknown()
    .transform((value) => (value === undefined ? true : Boolean(value))),
  moonraker_url: z
    .unknown()
    .transform((value) =>
      typeof value === "string" && value.trim() ? value.trim() : null,
    ),
  moonraker_api_port: port,
  moonraker_port: port,
});

const storedFileSchema = z.union([
  z.object({ tools: z.array(z.unknown()) }).transform((file) => file.tools),
  z.array(z.unknown()),
]);

/**
 * Parse the decoded contents of a tools file. Returns null when the overall
 * shape is unusable.
 */
export function parseToolsConfig(raw: unknown): ToolEntry[] | null {
  const file = storedFileSchema.safeParse(raw);
  if (!file.success) return null;

  const tools: ToolEntry[] = [];
  for (const item of file.data) {
    const parsed = storedToolSchema.safeParse(item);
    if (!parsed.success) continue;

    const entry = parsed.data;
    if (!entry.id || !entry.label || !entry.project_dir || !entry.script) {
      continue;
    }

    tools.push({
      id: entry.id,
      label: entry.label,
      projectDir: entry.project_dir,
      script: entry.script,
      kind: entry.kind,
      enabled: entry.enabled,
      moonrakerUrl: entry.moonraker_url,
      moonrakerApiPort: entry.moonraker_api_port,
      dashboardPort: entry.moonraker_port,
    });
  }
  return tools;
}

export function loadToolsConfig(baseDir: string): ToolEntry[] {
  const file = configPath(baseDir);
  if (!fs.existsSync(file)) return defaultTools();

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (error) {
    log.warn({ err: error, file }, "Unreadable tools config, using defaults");
    return defaultTools();
  }

  const tools = parseToolsConfig(raw);
  if (!tools || tools.length === 0) {
    log.warn({ file }, "No usable tools in config, using defaults");
    return defaultTools();
  }
  return tools;
}

// ===== Saving =====

/**
 * Snake-case record with keys in sorted order, matching what hand-edited
 * files look like.
 */
export function serializeTool(tool: ToolEntry): Record<string, unknown> {
  return {
    enabled: tool.enabled,
    id: tool.id,
    kind: tool.kind,
    label: tool.label,
    moonraker_api_port: tool.moonrakerApiPort,
    moonraker_port: tool.dashboardPort,
    moonraker_url: tool.moonrakerUrl,
    project_dir: tool.projectDir,
    script: tool.script,
  };
}

export function saveToolsConfig(baseDir: string, tools: ToolEntry[]): void {
  const payload = { tools: tools.map(serializeTool) };
  fs.writeFileSync(
    configPath(baseDir),
    JSON.stringify(payload, null, 2),
    "utf-8",
  );
}

export function ensureConfigExists(baseDir: string): void {
  if (fs.existsSync(configPath(baseDir))) return;
  saveToolsConfig(baseDir, defaultTools());
  log.info({ file: configPath(baseDir) }, "Wrote default tools config");
}
