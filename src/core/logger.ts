import pino, { type Logger } from "pino";
import { resolveLogLevel } from "./config/index.js";

/**
 * Named pino logger writing to stderr.
 * stdout is reserved for the MCP stdio transport and CLI output.
 */
export function createLogger(name: string): Logger {
  return pino(
    { name, level: resolveLogLevel(process.env["LOG_LEVEL"]) },
    pino.destination(2),
  );
}
