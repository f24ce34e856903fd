import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { DashboardDataSource } from "../dashboard/fetcher.js";
import { parseDashboardArgs } from "../dashboard/main.js";
import {
  buildDashboardApp,
  DEFAULT_MOONRAKER_URL,
  escapeHtml,
  loadMoonrakerUrlFromConfig,
  moonrakerHostLabel,
  renderTemplate,
  resolveMoonrakerUrl,
} from "../dashboard/server.js";

const MOONRAKER_URL = "http://10.0.0.5:7125/printer/objects/query";

const fakeSource: DashboardDataSource = {
  fetchTemperatureData: async () => ({
    Extruder: { temperature: 210, target: 210 },
    CHAMBER: { temperature: "N/A", target: "N/A" },
  }),
  fetchProgressData: async () => ({
    progress_percentage: 12.5,
    file_path: "cube.gcode",
    is_active: true,
    file_position: 10,
    file_size: 80,
  }),
  fetchFanData: async () => ({ fan_speed: 40 }),
};

describe("dashboard server", () => {
  it("serves the data endpoints as JSON", async () => {
    const app = buildDashboardApp({ source: fakeSource, moonrakerUrl: MOONRAKER_URL });

    const temperatures = await app.inject({ method: "GET", url: "/temperatures" });
    expect(temperatures.statusCode).toBe(200);
    expect(temperatures.json()).toEqual({
      Extruder: { temperature: 210, target: 210 },
      CHAMBER: { temperature: "N/A", target: "N/A" },
    });

    const progress = await app.inject({ method: "GET", url: "/progress" });
    expect(progress.json()).toEqual({
      progress_percentage: 12.5,
      file_path: "cube.gcode",
      is_active: true,
      file_position: 10,
      file_size: 80,
    });

    const fan = await app.inject({ method: "GET", url: "/fan" });
    expect(fan.json()).toEqual({ fan_speed: 40 });

    await app.close();
  });

  it("renders the page with the escaped label and Moonraker host", async () => {
    const app = buildDashboardApp({
      source: fakeSource,
      moonrakerUrl: MOONRAKER_URL,
      label: "Qidi <Q1>",
      template: "<h1>{{ printer_label }}</h1><p>{{moonraker_host}}</p>{{ other }}",
    });

    const page = await app.inject({ method: "GET", url: "/" });
    expect(page.statusCode).toBe(200);
    expect(page.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(page.body).toBe("<h1>Qidi &lt;Q1&gt;</h1><p>10.0.0.5:7125</p>{{ other }}");

    await app.close();
  });

  it("falls back to the default label and the bundled template", async () => {
    const app = buildDashboardApp({
      source: fakeSource,
      moonrakerUrl: MOONRAKER_URL,
      label: "  ",
    });

    const page = await app.inject({ method: "GET", url: "/" });
    expect(page.body).toContain("<title>Voron temperatures</title>");
    expect(page.body).toContain("<span>Moonraker 10.0.0.5:7125</span>");

    await app.close();
  });
});

describe("dashboard helpers", () => {
  it("escapes HTML", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;",
    );
  });

  it("fills known placeholders only", () => {
    expect(renderTemplate("{{a}}-{{ b }}-{{c}}", { a: "1", b: "2" })).toBe("1-2-{{c}}");
  });

  it("labels the Moonraker host", () => {
    expect(moonrakerHostLabel(MOONRAKER_URL)).toBe("10.0.0.5:7125");
    expect(moonrakerHostLabel("http://printer.local/printer/objects/query")).toBe(
      "printer.local",
    );
    expect(moonrakerHostLabel("not a url")).toBe("not a url");
  });

  describe("Moonraker URL resolution", () => {
    let configDir: string;

    beforeEach(() => {
      configDir = fs.mkdtempSync(path.join(os.tmpdir(), "dashboard-config-"));
    });

    afterEach(() => {
      fs.rmSync(configDir, { recursive: true, force: true });
    });

    const writeConfig = (content: string) =>
      fs.writeFileSync(path.join(configDir, "config.json"), content, "utf-8");

    it("prefers the command line, then the environment", () => {
      const env = { MOONRAKER_API_URL: " http://env:7125/printer/objects/query " };
      writeConfig(JSON.stringify({ moonraker_url: "http://file/printer/objects/query" }));

      expect(resolveMoonrakerUrl(" http://cli/q ", { env, configDir })).toBe("http://cli/q");
      expect(resolveMoonrakerUrl(undefined, { env, configDir })).toBe(
        "http://env:7125/printer/objects/query",
      );
    });

    it("reads config.json next, then uses the default", () => {
      expect(resolveMoonrakerUrl("", { env: {}, configDir })).toBe(DEFAULT_MOONRAKER_URL);

      writeConfig(JSON.stringify({ url: "http://file/printer/objects/query" }));
      expect(resolveMoonrakerUrl(undefined, { env: {}, configDir })).toBe(
        "http://file/printer/objects/query",
      );
    });

    it("ignores a broken or empty config.json", () => {
      writeConfig("{ nope");
      expect(loadMoonrakerUrlFromConfig(configDir)).toBeNull();

      writeConfig(JSON.stringify({ moonraker_url: "  " }));
      expect(loadMoonrakerUrlFromConfig(configDir)).toBeNull();
    });
  });
});

describe("parseDashboardArgs", () => {
  it("uses local defaults", () => {
    expect(parseDashboardArgs([])).toEqual({
      moonrakerUrl: undefined,
      host: "127.0.0.1",
      port: 5000,
    });
  });

  it("reads the launcher's arguments", () => {
    expect(
      parseDashboardArgs(["--port", "5001", "--moonraker-url", MOONRAKER_URL, "--host", "0.0.0.0"]),
    ).toEqual({ moonrakerUrl: MOONRAKER_URL, host: "0.0.0.0", port: 5001 });
  });

  it("rejects a bad port or unknown options", () => {
    expect(() => parseDashboardArgs(["--port", "99999"])).toThrow("Invalid --port: 99999");
    expect(() => parseDashboardArgs(["--port", "web"])).toThrow("Invalid --port: web");
    expect(() => parseDashboardArgs(["--verbose"])).toThrow();
  });
});
