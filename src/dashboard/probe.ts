import type { Logger } from "pino";
import { createLogger } from "../logger.js";
import { isTimeoutError, post } from "./fetcher.js";

/**
 * One-off connectivity check against Moonraker, run when a dashboard
 * starts. Any 2xx answer counts as reachable. A timeout only warns and
 * reports reachable, since a slow printer should still get a dashboard;
 * other failures report unreachable.
 */
export async function probeMoonraker(
  url: string,
  timeoutMs = 5000,
  log: Logger = createLogger("probe"),
): Promise<boolean> {
  try {
    const response = await post(url, { objects: {} }, timeoutMs);
    await response.text();
    return true;
  } catch (error) {
    if (isTimeoutError(error)) {
      log.warn(
        { url, err: error },
        "Moonraker probe timed out, allowing dashboard to start",
      );
      return true;
    }
    log.error({ url, err: error }, "Moonraker probe failed");
    return false;
  }
}
