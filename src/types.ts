// TypeScript type definitions for the printer launcher

/**
 * How the launcher drives a tool. `oneshot` tools get a single Run action,
 * no Stop, and a longer grace period before a forced kill.
 */
export type ToolKind = "normal" | "oneshot";

/**
 * Persistent configuration for one launcher tool/printer, as stored in
 * `tools_config.json`.
 */
export interface ToolEntry {
  id: string;
  label: string;
  /** Relative to the launcher base directory. */
  projectDir: string;
  script: string;
  kind: ToolKind;
  enabled: boolean;
  /** Full Moonraker query URL, exposed to the child as MOONRAKER_API_URL. */
  moonrakerUrl: string | null;
  /** TCP port Moonraker listens on; kept so the host/port pair can be edited. */
  moonrakerApiPort: number | null;
  /** Local port for a dashboard, passed to the child as `--port`. */
  dashboardPort: number | null;
}

/**
 * A tool resolved against the base directory, ready to launch.
 */
export interface AppSpec {
  id: string;
  name: string;
  projectDir: string;
  script: string;
  kind: ToolKind;
  moonrakerUrl: string | null;
  dashboardPort: number | null;
}

export type RunnerStatus =
  | "stopped"
  | "starting"
  | "running"
  | "stopping"
  | "error";

export interface ValidationResult {
  ok: boolean;
  message: string;
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
