export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHTS;
}

// Tests only see errors unless LOG_LEVEL says otherwise
function resolveLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return process.env.NODE_ENV === "test" ? "error" : "info";
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Console logger with a `[scope]` prefix, e.g. `[ingest] start { ... }`.
 * The level is read on every call so LOG_LEVEL can change at runtime.
 */
export function createLogger(scope: string): Logger {
  const enabled = (level: LogLevel) => LEVEL_WEIGHTS[resolveLevel()] <= LEVEL_WEIGHTS[level];
  const prefix = `[${scope}]`;

  return {
    debug: (message, ...args) => {
      if (enabled("debug")) console.debug(prefix, message, ...args);
    },
    info: (message, ...args) => {
      if (enabled("info")) console.log(prefix, message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled("warn")) console.warn(prefix, message, ...args);
    },
    error: (message, ...args) => {
      if (enabled("error")) console.error(prefix, message, ...args);
    },
  };
}
