export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * Where formatted log lines go. Defaults to the console method matching the level.
 */
export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

export interface DebugOptions {
  enabled?: boolean;
  level?: LogLevel;
  /** Log capability parameters (sanitized) */
  includeParameters?: boolean;
  /** Log capability outputs and response summaries */
  includeOutputs?: boolean;
  /** Mirror every EventLog entry to the logger at debug level */
  logEvents?: boolean;
  prefix?: string;
  sink?: LogSink;
}

export interface ResolvedDebugOptions {
  enabled: boolean;
  level: LogLevel;
  includeParameters: boolean;
  includeOutputs: boolean;
  logEvents: boolean;
  prefix: string;
}

export interface Logger {
  options: ResolvedDebugOptions;
  isEnabled(level: LogLevel): boolean;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  trace(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
    default:
      console.log(line);
      break;
  }
};

export function createLogger(options: DebugOptions = {}): Logger {
  const resolved = resolveDebugOptions(options);
  const sink = options.sink ?? consoleSink;

  const isEnabled = (level: LogLevel): boolean =>
    resolved.enabled &&
    level !== "silent" &&
    LEVEL_ORDER[level] <= LEVEL_ORDER[resolved.level];

  const log = (
    level: Exclude<LogLevel, "silent">,
    message: string,
    meta?: Record<string, unknown>,
  ) => {
    if (!isEnabled(level)) return;
    const metaText = meta ? ` ${safeStringify(dropUndefined(meta), 1000)}` : "";
    sink(level, `[${resolved.prefix}] [${level.toUpperCase()}] ${message}${metaText}`);
  };

  return {
    options: resolved,
    isEnabled,
    error: (message, meta) => log("error", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    info: (message, meta) => log("info", message, meta),
    debug: (message, meta) => log("debug", message, meta),
    trace: (message, meta) => log("trace", message, meta),
  };
}

export function resolveDebugOptions(options: DebugOptions = {}): ResolvedDebugOptions {
  const envLevel = parseEnvLogLevel();
  const enabled = options.enabled ?? (envLevel !== undefined && envLevel !== "silent");
  const level = options.level ?? envLevel ?? (enabled ? "info" : "silent");

  return {
    enabled,
    level,
    includeParameters: options.includeParameters ?? false,
    includeOutputs: options.includeOutputs ?? false,
    logEvents: options.logEvents ?? false,
    prefix: options.prefix ?? "agent-job-runtime",
  };
}

/**
 * Stringify for logs with credential-looking fields redacted.
 */
export function sanitizeForLog(value: unknown, maxLen = 500): string {
  const redacted = safeStringify(value, Number.POSITIVE_INFINITY).replace(
    /"(password|token|secret|api_?key|authorization|auth)":\s*"(?:[^"\\]|\\.)*"/gi,
    "\"$1\":\"[REDACTED]\"",
  );
  return truncate(redacted, maxLen);
}

/**
 * Short shape-only description of a value.
 */
export function summarizeForLog(value: unknown, maxLen = 200): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    return value.length > maxLen ? `${value.slice(0, maxLen)}...` : value;
  }
  if (Array.isArray(value)) return `Array(${value.length})`;
  if (typeof value === "object") {
    const keys = Object.keys(value);
    const shown = keys.slice(0, 5).join(", ");
    return `Object(keys: ${shown}${keys.length > 5 ? ", ..." : ""})`;
  }
  return String(value);
}

function dropUndefined(meta: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(meta).filter(([, v]) => v !== undefined));
}

function safeStringify(value: unknown, maxLen: number): string {
  let text: string;
  try {
    text = JSON.stringify(value) ?? String(value);
  } catch {
    text = String(value);
  }
  return truncate(text, maxLen);
}

function truncate(text: string, maxLen: number): string {
  return text.length > maxLen ? `${text.slice(0, maxLen)}...` : text;
}

function parseEnvLogLevel(): LogLevel | undefined {
  const raw = process.env.JOB_RUNTIME_LOG_LEVEL ?? process.env.DEBUG;
  if (!raw) return undefined;

  const value = raw.trim().toLowerCase();
  if (!value || value === "0" || value === "false" || value === "off") {
    return "silent";
  }
  if (value.includes("trace")) return "trace";
  if (value.includes("debug") || value === "1" || value === "true" || value === "yes") {
    return "debug";
  }
  if (value.includes("info")) return "info";
  if (value.includes("warn")) return "warn";
  if (value.includes("error")) return "error";
  if (value.includes("silent")) return "silent";
  return "debug";
}
