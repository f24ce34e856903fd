#!/usr/bin/env node
/**
 * Restart the webcam service on a Qidi printer over SSH.
 *
 * One-shot: connects, runs `sudo service webcamd restart`, prints the shell
 * output and exits. The password comes from `credentials.json` next to this
 * script (written by the launcher's `set_webcam_password` tool).
 */

import * as path from "path";
import { fileURLToPath } from "url";
import { createLogger } from "../logger.js";
import { loadPassword, sshCommand } from "./ssh-command.js";

const log = createLogger("webcamd-restart");
const HERE = path.dirname(fileURLToPath(import.meta.url));

const DEFAULT_HOST = "192.168.1.120";
const DEFAULT_USER = "root";
const RESTART_COMMAND = "sudo service webcamd restart";

async function main(): Promise<void> {
  const host = process.env.WEBCAMD_HOST?.trim() || DEFAULT_HOST;
  const username = process.env.WEBCAMD_USER?.trim() || DEFAULT_USER;
  const password = loadPassword(path.join(HERE, "credentials.json"));

  log.info({ host, username }, "Restarting webcamd");
  const output = await sshCommand({
    host,
    username,
    password,
    command: RESTART_COMMAND,
  });
  process.stdout.write(output.endsWith("\n") ? output : `${output}\n`);
}

main().catch((error: unknown) => {
  log.error({ err: error }, "webcamd restart failed");
  process.exitCode = 1;
});
