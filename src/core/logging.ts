import { randomUUID } from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error" | "audit";

export type LogEnvelope = {
  ts: string;
  level: LogLevel;
  module: string;
  event: string;
  requestId: string;
  nodeId?: string;
  traceId?: string;
  data?: unknown;
};

export type LogFields = {
  requestId?: string;
  nodeId?: string;
  traceId?: string;
  data?: unknown;
};

export type LogSink = (entry: LogEnvelope) => void;

export type Logger = {
  debug: (event: string, fields?: LogFields) => LogEnvelope;
  info: (event: string, fields?: LogFields) => LogEnvelope;
  warn: (event: string, fields?: LogFields) => LogEnvelope;
  error: (event: string, fields?: LogFields) => LogEnvelope;
  audit: (event: string, fields?: LogFields) => LogEnvelope;
  child: (moduleName: string) => Logger;
};

export type LoggerOptions = {
  sink?: LogSink;
  minLevel?: LogLevel;
};

// audit entries are never filtered out
const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  audit: 100
};

// storage payloads carry session cookies and whatever the page kept in localStorage
const REDACTED_KEYS = new Set(["authorization", "cookie", "cookies", "set-cookie", "password", "storagestate", "localstorage"]);
const SECRET_KEY_SUFFIX = /(token|secret|password)$/i;
const BEARER_PATTERN = /bearer\s+[a-z0-9._~+/-]+=*/gi;
const URL_USERINFO_PATTERN = /(\/\/)[^\s/@:]+:[^\s/@]+@/g;
const URL_SECRET_PARAM_PATTERN = /([?&](?:access_token|token|code|sig|signature|api_key)=)[^&#\s]+/gi;

function isSecretKey(key: string): boolean {
  return REDACTED_KEYS.has(key.toLowerCase()) || SECRET_KEY_SUFFIX.test(key);
}

// navigation urls are logged as-is, so strip credentials they embed
function redactString(value: string): string {
  return value
    .replace(BEARER_PATTERN, "[REDACTED]")
    .replace(URL_USERINFO_PATTERN, "$1[REDACTED]@")
    .replace(URL_SECRET_PARAM_PATTERN, "$1[REDACTED]");
}

export function redactSensitive(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === "string") {
    return redactString(value);
  }
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item, seen));
  }
  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message) };
  }

  const output: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isSecretKey(key)) {
      output[key] = "[REDACTED]";
      continue;
    }
    output[key] = redactSensitive(entry, seen);
  }
  return output;
}

export function createRequestId(): string {
  return randomUUID();
}

const defaultSink: LogSink = (entry) => {
  const payload = JSON.stringify(entry);
  if (entry.level === "error") {
    console.error(payload);
    return;
  }
  if (entry.level === "warn") {
    console.warn(payload);
    return;
  }
  console.log(payload);
};

/** Sink that drops everything; the default for library consumers that never configured logging. */
export const silentSink: LogSink = () => {};

export function createLogger(moduleName: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? defaultSink;
  const threshold = LEVEL_RANK[options.minLevel ?? "debug"];

  const emit = (level: LogLevel, event: string, fields: LogFields = {}): LogEnvelope => {
    const entry: LogEnvelope = {
      ts: new Date().toISOString(),
      level,
      module: moduleName,
      event,
      requestId: fields.requestId ?? createRequestId(),
      ...(fields.nodeId ? { nodeId: fields.nodeId } : {}),
      ...(fields.traceId ? { traceId: fields.traceId } : {}),
      ...(typeof fields.data === "undefined" ? {} : { data: redactSensitive(fields.data) })
    };
    if (LEVEL_RANK[level] >= threshold) {
      sink(entry);
    }
    return entry;
  };

  return {
    debug: (event, fields) => emit("debug", event, fields),
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields),
    audit: (event, fields) => emit("audit", event, fields),
    child: (childModule) => createLogger(`${moduleName}.${childModule}`, options)
  };
}

export const __test__ = {
  redactString,
  defaultSink
};
