/**
 * Temperature dashboard — re-serves Moonraker data as JSON plus a small
 * HTML page that polls it. One instance runs per printer, each on its own
 * local port, so OBS or a browser can show several printers side by side.
 */

import Fastify from "fastify";
import * as fs from "fs";
import * as path from "path";
import type { Logger } from "pino";
import { fileURLToPath } from "url";
import { z } from "zod";
import { createLogger } from "../logger.js";
import type { DashboardDataSource } from "./fetcher.js";

export const DEFAULT_MOONRAKER_URL =
  "http://192.168.1.226:7125/printer/objects/query";
export const DEFAULT_PRINTER_LABEL = "Voron";

const TEMPLATE_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
  "templates",
  "dashboard.html",
);

// ===== Moonraker URL =====

const localConfigSchema = z.object({
  moonraker_url: z.string().optional(),
  url: z.string().optional(),
});

/**
 * Moonraker URL from a `config.json` in `dir`, if there is a usable one.
 */
export function loadMoonrakerUrlFromConfig(dir: string): string | null {
  const file = path.join(dir, "config.json");
  if (!fs.existsSync(file)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch {
    return null;
  }

  const parsed = localConfigSchema.safeParse(raw);
  if (!parsed.success) return null;
  const url = parsed.data.moonraker_url?.trim() || parsed.data.url?.trim();
  return url || null;
}

/**
 * First non-blank of: the CLI argument, MOONRAKER_API_URL, config.json next
 * to the dashboard, the built-in default.
 */
export function resolveMoonrakerUrl(
  cliArg: string | undefined,
  options: { env?: NodeJS.ProcessEnv; configDir: string },
): string {
  const fromCli = cliArg?.trim();
  if (fromCli) return fromCli;

  const fromEnv = (options.env ?? process.env).MOONRAKER_API_URL?.trim();
  if (fromEnv) return fromEnv;

  return loadMoonrakerUrlFromConfig(options.configDir) ?? DEFAULT_MOONRAKER_URL;
}

/**
 * `host:port` of the Moonraker URL for display, or the raw string when it
 * has no host.
 */
export function moonrakerHostLabel(apiUrl: string): string {
  try {
    const url = new URL(apiUrl);
    if (!url.hostname) return apiUrl;
    return url.port ? `${url.hostname}:${url.port}` : url.hostname;
  } catch {
    return apiUrl;
  }
}

// ===== HTML =====

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function renderTemplate(
  template: string,
  values: Record<string, string>,
): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (match, key: string) =>
    key in values ? escapeHtml(values[key]) : match,
  );
}

// ===== App =====

export interface DashboardOptions {
  source: DashboardDataSource;
  moonrakerUrl: string;
  label?: string;
  template?: string;
  logger?: Logger;
}

export function buildDashboardApp(options: DashboardOptions) {
  const app = Fastify({
    loggerInstance: options.logger ?? createLogger("dashboard"),
    disableRequestLogging: true,
  });

  const label = options.label?.trim() || DEFAULT_PRINTER_LABEL;
  const host = moonrakerHostLabel(options.moonrakerUrl);
  let template = options.template ?? null;

  app.get("/temperatures", async () => options.source.fetchTemperatureData());

  app.get("/progress", async () => options.source.fetchProgressData());

  app.get("/fan", async () => options.source.fetchFanData());

  // Does not wait on Moonraker; the page polls the JSON endpoints itself.
  app.get("/", async (_request, reply) => {
    template ??= fs.readFileSync(TEMPLATE_PATH, "utf-8");
    reply.type("text/html; charset=utf-8");
    return renderTemplate(template, {
      printer_label: label,
      moonraker_host: host,
    });
  });

  return app;
}
