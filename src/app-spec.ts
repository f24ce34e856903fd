import * as fs from "fs";
import * as path from "path";
import type { AppSpec, ToolEntry } from "./types.js";

export function specFromEntry(entry: ToolEntry, baseDir: string): AppSpec {
  return {
    id: entry.id,
    name: entry.label,
    projectDir: path.resolve(baseDir, entry.projectDir),
    script: entry.script,
    kind: entry.kind,
    moonrakerUrl: entry.moonrakerUrl,
    dashboardPort: entry.dashboardPort,
  };
}

/**
 * Launchable specs for every enabled tool, in config order.
 */
export function buildSpecs(tools: ToolEntry[], baseDir: string): AppSpec[] {
  return tools
    .filter((tool) => tool.enabled)
    .map((tool) => specFromEntry(tool, baseDir));
}

export function scriptPath(spec: AppSpec): string {
  return path.join(spec.projectDir, spec.script);
}

export function logPath(spec: AppSpec): string {
  const safe = spec.name.toLowerCase().replace(/[^A-Za-z0-9\-_.]/g, "_");
  return path.join(spec.projectDir, `launcher_${safe}.log`);
}

/**
 * Runtime used to launch a tool's script.
 *
 * TypeScript tools run through the shared `tsx` install in the base
 * directory's node_modules; the first candidate that exists wins. When none
 * does, the most likely path for the platform is returned so validation can
 * name it. Anything else runs on the current Node executable.
 */
export function resolveInterpreter(
  spec: AppSpec,
  baseDir: string,
  platform: NodeJS.Platform = process.platform,
  exists: (file: string) => boolean = fs.existsSync,
): string {
  if (!/\.[cm]?ts$/i.test(spec.script)) {
    return process.execPath;
  }

  const binDir = path.join(baseDir, "node_modules", ".bin");
  const candidates = [path.join(binDir, "tsx"), path.join(binDir, "tsx.cmd")];
  for (const candidate of candidates) {
    if (exists(candidate)) return candidate;
  }

  return platform === "win32" ? candidates[1] : candidates[0];
}
