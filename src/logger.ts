import pino, { type Logger } from "pino";

// stdout carries the MCP transport and child-process output, so logs go to stderr.
const logger = pino(
  {
    level: process.env.LOG_LEVEL || "info",
    base: { service: "printer-launcher" },
  },
  pino.destination(2),
);

export function createLogger(component: string): Logger {
  return logger.child({ component });
}

export default logger;
