import type { LogEntry, Logger, LogLevel, LogThreshold } from "./types";

export type LogFormat = "json" | "dev";

export interface LoggerOptions {
  logLevel?: string;
  logFormat?: string;
  nodeEnv?: string;
  write?: (line: string) => void;
  now?: () => Date;
}

const LEVEL_PRIORITY: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const THRESHOLDS: readonly LogThreshold[] = ["debug", "info", "warn", "error", "silent"];

function isThreshold(value: string): value is LogThreshold {
  return THRESHOLDS.some((threshold) => threshold === value);
}

function parseThreshold(value: string | undefined): LogThreshold {
  if (value === undefined) {
    return "info";
  }

  const normalized = value.trim().toLowerCase();
  return isThreshold(normalized) ? normalized : "info";
}

function parseLogFormat(value: string | undefined, nodeEnv: string | undefined): LogFormat {
  if (value === "json" || (value === undefined && nodeEnv === "production")) {
    return "json";
  }

  return "dev";
}

function normalizeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }

  return value;
}

function normalizeData(data: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    normalized[key] = normalizeValue(value);
  }

  return normalized;
}

function formatValue(value: unknown): string {
  const normalized = normalizeValue(value);

  if (typeof normalized === "string") {
    return normalized.includes(" ") ? JSON.stringify(normalized) : normalized;
  }

  if (typeof normalized === "number" || typeof normalized === "boolean" || normalized === null) {
    return String(normalized);
  }

  return JSON.stringify(normalized);
}

function formatData(data: Record<string, unknown> | undefined): string {
  if (data === undefined) {
    return "";
  }

  const pairs = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return pairs.length > 0 ? ` ${pairs.join(" ")}` : "";
}

export function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  if (format === "json") {
    const payload: LogEntry = entry.data === undefined ? entry : { ...entry, data: normalizeData(entry.data) };
    return JSON.stringify(payload);
  }

  const level = entry.level.toUpperCase().padEnd(5, " ");
  return `${entry.timestamp} [${level}] [${entry.module}] ${entry.message}${formatData(entry.data)}`;
}

function emitLog(entry: LogEntry, options: LoggerOptions): void {
  const threshold = parseThreshold(options.logLevel ?? process.env.PROMPT_ENGINE_LOG_LEVEL);
  if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[threshold]) {
    return;
  }

  const format = parseLogFormat(
    options.logFormat ?? process.env.PROMPT_ENGINE_LOG_FORMAT,
    options.nodeEnv ?? process.env.NODE_ENV,
  );
  const writeLine = options.write ?? ((line: string) => process.stderr.write(line));
  writeLine(`${formatLogEntry(entry, format)}\n`);
}

function buildLogger(module: string, options: LoggerOptions, context: Record<string, unknown> | undefined): Logger {
  const now = options.now ?? (() => new Date());

  function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const merged = context === undefined ? data : { ...context, ...data };
    emitLog({
      timestamp: now().toISOString(),
      level,
      module,
      message,
      data: merged,
    }, options);
  }

  return {
    debug(message, data) {
      log("debug", message, data);
    },
    info(message, data) {
      log("info", message, data);
    },
    warn(message, data) {
      log("warn", message, data);
    },
    error(message, data) {
      log("error", message, data);
    },
    withContext(data) {
      return buildLogger(module, options, { ...context, ...data });
    },
  };
}

export function createLogger(module: string, options: LoggerOptions = {}): Logger {
  return buildLogger(module, options, undefined);
}

export type { Logger, LogLevel, LogEntry, LogThreshold } from "./types";
