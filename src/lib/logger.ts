export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function configuredLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return process.env.NODE_ENV === "test" ? "warn" : "info";
}

const enabled = (level: LogLevel) => LEVELS[level] >= LEVELS[configuredLevel()];

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(prefix, ...args);
    },
  };
}
