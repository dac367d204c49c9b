/**
 * Logging
 *
 * Everything goes to stderr: stdout carries the MCP protocol.
 */

import pino from "pino";

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export function createLogger(level: LogLevel = "info"): Logger {
  return pino(
    {
      name: "local-memory-store",
      level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true })
  );
}

export const silentLogger: Logger = pino({ level: "silent" });
