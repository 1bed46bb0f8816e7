export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
}

export interface LoggerContext {
  job_title?: string;
  company?: string;
  job_key?: string;
  stage?: string;
  dimension?: string;
  prompt_name?: string;
  model_name?: string;
  latency_ms?: number;
  used_oracle?: boolean;
  cache_hit?: boolean;
  ok?: boolean;
  error_code?: string;
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

function formatLine(level: LogLevel, message: string, meta: Record<string, unknown> | undefined): string {
  const payload: Record<string, unknown> = { timestamp: new Date().toISOString(), level, message };
  if (meta) {
    payload.meta = redactMeta(meta);
  }
  return `${safeJson(payload)}\n`;
}

/** JSON-lines logger. Entries below `minLevel` are dropped; output goes to stdout unless `write` is given. */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const minLevel = options.minLevel ?? "info";
  const write = options.write ?? ((line: string) => process.stdout.write(line));
  const at =
    (level: LogLevel) =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel]) {
        write(formatLine(level, message, meta));
      }
    };
  return { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
}

/** Logs with the scoring context fields merged ahead of call-specific fields. */
export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields: Record<string, unknown> = {},
): void {
  logger[level](message, { ...context, ...fields });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (
      lowerKey.includes("secret") ||
      lowerKey.includes("apikey") ||
      lowerKey.includes("api_key") ||
      lowerKey.includes("authorization")
    ) {
      output[key] = "[REDACTED]";
      continue;
    }
    // Resumes end up in meta on debug paths; keep lines bounded.
    if (typeof value === "string" && value.length > 500) {
      output[key] = `${value.slice(0, 500)}...`;
      continue;
    }
    output[key] = value;
  }
  return output;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}
