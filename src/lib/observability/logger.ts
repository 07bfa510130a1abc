import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "@/lib/config";
import { getReportId, getRequestId } from "./request-context";

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

// level comes from LOG_LEVEL directly, never through getConfig()
const LogLevelSchema = z.enum(LOG_LEVELS).catch("INFO");

let minLevel: LogLevel | null = null;

export function resolveLogLevel(raw: string | undefined): LogLevel {
  return LogLevelSchema.parse(raw);
}

/** Called once at startup with the parsed config. */
export function setLogLevel(level: LogLevel) {
  minLevel = level;
}

function threshold(): LogLevel {
  minLevel ??= resolveLogLevel(process.env.LOG_LEVEL);
  return minLevel;
}

export function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
) {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold()]) return;

  const entry = {
    level,
    message,
    ts: Date.now(),
    requestId: getRequestId() ?? null,
    reportId: getReportId() ?? null,
    ...meta,
  };

  // JSON-only output (log aggregation safe)
  const line = JSON.stringify(entry);
  if (level === "ERROR") {
    console.error(line);
  } else {
    console.log(line);
  }
}
