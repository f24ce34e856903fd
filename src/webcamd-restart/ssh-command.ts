/**
 * Scripted SSH command against a printer's host.
 *
 * The printer firmware's shell only behaves under an interactive session,
 * so the command is typed into a shell with fixed pauses instead of going
 * through an exec channel.
 */

import * as fs from "fs";
import ssh2 from "ssh2";
import type { Client, ClientChannel, ConnectConfig } from "ssh2";
import { ConfigError } from "../types.js";

export interface SshCommandOptions {
  host: string;
  port?: number;
  username: string;
  password: string;
  command: string;
  /** Pauses in ms: before typing, after the command, after `exit`. */
  delays?: { prompt: number; command: number; exit: number };
  maxOutputBytes?: number;
  readyTimeoutMs?: number;
}

const DEFAULT_DELAYS = { prompt: 1000, command: 1000, exit: 500 };

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

/**
 * Read the SSH password from a `credentials.json` of the form
 * `{"password": "..."}`. The file is kept out of version control.
 */
export function loadPassword(file: string): string {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Missing credentials file: ${file}. Create it with e.g. {"password": "<printer password>"}.`,
      { cause: error },
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse ${file}: ${reason}`, {
      cause: error,
    });
  }

  const password =
    typeof data === "object" && data !== null && "password" in data
      ? data.password
      : undefined;
  if (typeof password !== "string" || !password) {
    throw new ConfigError(
      `Invalid password in ${file}: expected non-empty 'password' field.`,
    );
  }
  return password;
}

function connect(client: Client, config: ConnectConfig): Promise<void> {
  return new Promise((resolve, reject) => {
    client.once("ready", () => resolve());
    client.once("error", reject);
    client.connect(config);
  });
}

function openShell(client: Client): Promise<ClientChannel> {
  return new Promise((resolve, reject) => {
    client.shell((err, channel) => {
      if (err) reject(err);
      else resolve(channel);
    });
  });
}

/**
 * Run one command in an interactive shell and return what the session
 * printed (up to `maxOutputBytes`). The connection is always closed.
 */
export async function sshCommand(options: SshCommandOptions): Promise<string> {
  const delays = options.delays ?? DEFAULT_DELAYS;
  const maxBytes = options.maxOutputBytes ?? 5000;
  const client = new ssh2.Client();

  try {
    await connect(client, {
      host: options.host,
      port: options.port ?? 22,
      username: options.username,
      password: options.password,
      readyTimeout: options.readyTimeoutMs ?? 10000,
      // Printers regenerate host keys on reflash; accept whatever is offered.
      hostVerifier: () => true,
    });

    const channel = await openShell(client);
    const chunks: Buffer[] = [];
    channel.on("data", (chunk: Buffer) => chunks.push(chunk));

    await sleep(delays.prompt);
    channel.write(`${options.command}\n`);
    await sleep(delays.command);
    channel.write("exit\n");
    await sleep(delays.exit);

    return Buffer.concat(chunks).subarray(0, maxBytes).toString("utf-8");
  } finally {
    client.end();
  }
}
