/**
 * Structured console logger.
 *
 * Usage:
 *   const log = createLogger("query-router");
 *   log.info("fragment collected", { label: "retrieval", chars: 4200 });
 *
 * Every line is one JSON object so log shippers can parse it without a format
 * string. `LOG_LEVEL` filters output; `silent` turns it off (tests).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogEntry = {
  level: LogLevel;
  service: string;
  message: string;
  data?: unknown;
  timestamp: string;
};

export type Logger = {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogThreshold(value: string | undefined): number {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "silent" || normalized === "off") return Number.POSITIVE_INFINITY;
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return LEVEL_ORDER[normalized];
  }
  return LEVEL_ORDER.info;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  if (!data || typeof data !== "object" || Array.isArray(data)) return data;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

export function formatLogEntry(entry: LogEntry): string {
  return JSON.stringify(entry);
}

export function createLogger(service: string, sink: Pick<Console, "log" | "warn" | "error"> = console): Logger {
  function log(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < parseLogThreshold(process.env.LOG_LEVEL)) return;

    const entry: LogEntry = {
      level,
      service,
      message,
      timestamp: new Date().toISOString(),
    };
    if (data !== undefined) {
      entry.data = serializeData(data);
    }

    const output = formatLogEntry(entry);
    switch (level) {
      case "error":
        sink.error(output);
        break;
      case "warn":
        sink.warn(output);
        break;
      default:
        sink.log(output);
    }
  }

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
  };
}
