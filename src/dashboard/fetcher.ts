/**
 * Moonraker data fetcher
 *
 * Polls Klipper's Moonraker `printer/objects/query` endpoint for the values
 * a temperature dashboard shows. Requests are short and best-effort:
 *
 * - each POST has a 2s total timeout;
 * - a configured URL with the wrong scheme (https:// for a plain-http
 *   Moonraker, or the reverse) is retried with the other scheme, and the
 *   last URL that worked is tried first next time;
 * - https skips certificate checks, as Moonraker commonly runs self-signed;
 * - every fetch keeps its last good value, so a brief hiccup does not blank
 *   the dashboard.
 *
 * Moonraker API: https://moonraker.readthedocs.io/en/latest/web_api/#query-printer-object-status
 */

import * as https from "https";
import fetch, { type Response } from "node-fetch";
import type { Logger } from "pino";
import { z } from "zod";
import { createLogger } from "../logger.js";

export type SensorValue = number | string | null;
export type SensorReading = Record<string, SensorValue>;
export type TemperatureMap = Record<string, SensorReading>;

export interface ProgressData {
  progress_percentage: number;
  file_path?: SensorValue;
  is_active?: boolean;
  file_position?: number;
  file_size?: number;
}

export interface FanData {
  fan_speed: number;
}

export interface DashboardDataSource {
  fetchTemperatureData(): Promise<TemperatureMap>;
  fetchProgressData(): Promise<ProgressData>;
  fetchFanData(): Promise<FanData>;
}

export type ObjectsQuery = Record<string, string[]>;

export interface FetcherOptions {
  timeoutMs?: number;
  logger?: Logger;
}

// Objects with their attributes; the key doubles as the Moonraker object name.
const STANDARD_SENSORS: ObjectsQuery = {
  extruder: ["temperature", "target"],
  heater_bed: ["temperature", "target"],
  "temperature_fan MCU_Fans": ["temperature"],
};

const SENSOR_VARIABLES = ["CHAMBER", "Internals", "NucBox", "NH36", "Cartographer"];

const queryResponseSchema = z.object({
  result: z
    .object({
      status: z.record(z.unknown()).default({}),
    })
    .default({}),
});

type QueryStatus = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Attributes of one queried object; `{}` when Moonraker left it out. An
 * entry that is not an object fails the read it belongs to.
 */
function objectStatus(status: QueryStatus, name: string): Record<string, unknown> {
  const entry = status[name];
  if (entry === undefined) return {};
  if (!isRecord(entry)) {
    throw new Error(`Unexpected status for ${name}: ${JSON.stringify(entry)}`);
  }
  return entry;
}

const insecureAgent = new https.Agent({ rejectUnauthorized: false });

export function swapScheme(url: string): string | null {
  const match = /^(https?):/i.exec(url);
  if (!match) return null;
  const swapped = match[1].toLowerCase() === "https" ? "http" : "https";
  return swapped + url.slice(match[1].length);
}

/**
 * `extruder` → `Extruder`, `heater_bed` → `Heater Bed`; the MCU fan sensor
 * shows as `MCU`.
 */
export function displayName(sensor: string): string {
  if (sensor === "temperature_fan MCU_Fans") return "MCU";
  return sensor
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_m, before: string, letter: string) =>
      before + letter.toUpperCase(),
    )
    .replace(/_/g, " ");
}

function sensorValue(value: unknown): SensorValue {
  if (value === undefined) return "N/A";
  if (value === null || typeof value === "number" || typeof value === "string") {
    return value;
  }
  return "N/A";
}

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

export function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

/**
 * POST a JSON payload; any non-2xx status throws.
 */
export async function post(
  url: string,
  payload: unknown,
  timeoutMs: number,
): Promise<Response> {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
    agent: url.toLowerCase().startsWith("https:") ? insecureAgent : undefined,
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status}`);
  }
  return response;
}

export async function postJson(
  url: string,
  payload: unknown,
  timeoutMs: number,
): Promise<unknown> {
  const response = await post(url, payload, timeoutMs);
  return await response.json();
}

export class PrinterDataFetcher implements DashboardDataSource {
  readonly apiUrl: string;
  private working: string;
  private timeoutMs: number;
  private log: Logger;

  private lastTemperatures: TemperatureMap = {};
  private lastProgress: ProgressData = { progress_percentage: 0 };
  private lastFan: FanData = { fan_speed: 0 };

  constructor(apiUrl: string, options: FetcherOptions = {}) {
    this.apiUrl = apiUrl;
    this.working = apiUrl;
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.log = options.logger ?? createLogger("moonraker");
  }

  get workingUrl(): string {
    return this.working;
  }

  /**
   * Last working URL, configured URL, then both with the scheme swapped.
   */
  candidateUrls(): string[] {
    const urls: string[] = [];
    for (const url of [
      this.working,
      this.apiUrl,
      swapScheme(this.working),
      swapScheme(this.apiUrl),
    ]) {
      if (url && !urls.includes(url)) urls.push(url);
    }
    return urls;
  }

  /**
   * POST to the first candidate that answers. Returns null when none does.
   */
  async moonrakerPost(payload: unknown): Promise<unknown> {
    const tried: string[] = [];
    let lastError: unknown = null;

    for (const url of this.candidateUrls()) {
      tried.push(url);
      try {
        const data = await postJson(url, payload, this.timeoutMs);
        this.working = url;
        return data;
      } catch (error) {
        lastError = error;
      }
    }

    this.log.error(
      { configured: this.apiUrl, tried, err: lastError },
      "Moonraker request failed",
    );
    return null;
  }

  /**
   * Query some objects and return their `result.status`, or null on failure.
   * A response that is not a query result throws.
   */
  private async queryObjects(objects: ObjectsQuery): Promise<QueryStatus | null> {
    const data = await this.moonrakerPost({ objects });
    if (!data || (typeof data === "object" && Object.keys(data).length === 0)) {
      return null;
    }
    return queryResponseSchema.parse(data).result.status;
  }

  async fetchTemperatureData(): Promise<TemperatureMap> {
    try {
      const standard = await this.queryObjects(STANDARD_SENSORS);
      if (!standard) return this.lastTemperatures;

      const temperatures: TemperatureMap = {};
      for (const [sensor, attributes] of Object.entries(STANDARD_SENSORS)) {
        const values = objectStatus(standard, sensor);
        const reading: SensorReading = {};
        for (const attr of attributes) {
          reading[attr] = sensorValue(values[attr]);
        }
        temperatures[displayName(sensor)] = reading;
      }

      const variableObjects: ObjectsQuery = {};
      for (const sensor of SENSOR_VARIABLES) {
        variableObjects[`temperature_sensor ${sensor}`] = ["temperature"];
      }
      const variables = await this.queryObjects(variableObjects);
      if (!variables) {
        // Keep the standard temps we already have
        if (Object.keys(temperatures).length > 0) {
          this.lastTemperatures = temperatures;
        }
        return this.lastTemperatures;
      }

      for (const sensor of SENSOR_VARIABLES) {
        const values = objectStatus(variables, `temperature_sensor ${sensor}`);
        temperatures[sensor] = {
          temperature: sensorValue(values.temperature),
          target: "N/A",
        };
      }

      this.lastTemperatures = temperatures;
      return temperatures;
    } catch (error) {
      this.log.error({ err: error }, "Error fetching temperature data");
      return this.lastTemperatures;
    }
  }

  async fetchProgressData(): Promise<ProgressData> {
    try {
      const status = await this.queryObjects({
        virtual_sdcard: [
          "file_path",
          "progress",
          "is_active",
          "file_position",
          "file_size",
        ],
      });
      if (!status) return this.lastProgress;

      this.log.debug({ status }, "Moonraker progress response");

      const sd = objectStatus(status, "virtual_sdcard");
      const progress: ProgressData = {
        progress_percentage: roundOne(
          (typeof sd.progress === "number" ? sd.progress : 0) * 100,
        ),
        file_path: sensorValue(sd.file_path),
        is_active: typeof sd.is_active === "boolean" ? sd.is_active : false,
        file_position: typeof sd.file_position === "number" ? sd.file_position : 0,
        file_size: typeof sd.file_size === "number" ? sd.file_size : 0,
      };
      this.lastProgress = progress;
      return progress;
    } catch (error) {
      this.log.error({ err: error }, "Error fetching progress data");
      return this.lastProgress;
    }
  }

  /**
   * Part-cooling fan speed as a percentage (0-100).
   */
  async fetchFanData(): Promise<FanData> {
    try {
      const status = await this.queryObjects({ fan: ["speed"] });
      if (!status) return this.lastFan;

      const speed = objectStatus(status, "fan").speed;
      if (typeof speed !== "number") {
        this.log.warn({ speed }, "Moonraker returned no fan speed");
        return this.lastFan;
      }

      const fan: FanData = { fan_speed: roundOne(speed * 100) };
      this.lastFan = fan;
      return fan;
    } catch (error) {
      this.log.error({ err: error }, "Error fetching fan data");
      return this.lastFan;
    }
  }
}
