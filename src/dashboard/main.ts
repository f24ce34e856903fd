#!/usr/bin/env node
/**
 * Klipper / Moonraker temperature dashboard.
 *
 * Usage: main.ts [--moonraker-url URL] [--host 127.0.0.1] [--port 5000]
 *
 * The launcher starts one of these per printer, passing `--port` and the
 * MOONRAKER_API_URL / LAUNCHER_TOOL_LABEL environment variables.
 */

import * as path from "path";
import { fileURLToPath } from "url";
import { parseArgs } from "util";
import { createLogger } from "../logger.js";
import { PrinterDataFetcher } from "./fetcher.js";
import { probeMoonraker } from "./probe.js";
import { buildDashboardApp, resolveMoonrakerUrl } from "./server.js";

const log = createLogger("dashboard");
const HERE = path.dirname(fileURLToPath(import.meta.url));

export interface DashboardArgs {
  moonrakerUrl?: string;
  host: string;
  port: number;
}

export function parseDashboardArgs(argv: string[]): DashboardArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      "moonraker-url": { type: "string" },
      host: { type: "string", default: "127.0.0.1" },
      port: { type: "string", default: "5000" },
    },
    strict: true,
  });

  const port = Number(values.port);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid --port: ${values.port}`);
  }

  return {
    moonrakerUrl: values["moonraker-url"],
    host: values.host ?? "127.0.0.1",
    port,
  };
}

async function main(): Promise<void> {
  const args = parseDashboardArgs(process.argv.slice(2));
  const moonrakerUrl = resolveMoonrakerUrl(args.moonrakerUrl, {
    configDir: HERE,
  });
  log.info({ moonrakerUrl }, "Using Moonraker API URL");

  // Diagnostics only: the dashboard binds its port either way.
  const reachable = await probeMoonraker(moonrakerUrl);
  if (!reachable) {
    log.warn(
      { moonrakerUrl },
      "Moonraker appears unreachable (probe failed). Dashboard will still start.",
    );
  }

  const app = buildDashboardApp({
    source: new PrinterDataFetcher(moonrakerUrl),
    moonrakerUrl,
    label: process.env.LAUNCHER_TOOL_LABEL,
    logger: log,
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "Shutting down dashboard");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error({ err: error }, "Error while closing dashboard");
        process.exit(1);
      },
    );
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  await app.listen({ host: args.host, port: args.port });
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    log.fatal({ err: error }, "Dashboard failed to start");
    process.exit(1);
  });
}
