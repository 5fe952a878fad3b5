import pino, { type Logger } from "pino";
import type { LogLevel } from "../config/settings.js";

export type { Logger };

/**
 * JSON lines on stderr. stdout belongs to the MCP stdio transport and to CLI
 * results. LOG_LEVEL overrides the configured level.
 */
export function createLogger(opts: { level?: LogLevel; name?: string } = {}): Logger {
  const level = process.env.LOG_LEVEL ?? opts.level ?? "info";
  return pino(
    {
      name: opts.name ?? "ribotree",
      level,
      base: { pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination({ dest: 2, sync: true })
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
