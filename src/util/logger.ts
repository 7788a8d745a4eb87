export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  throw new Error(`Unsupported log level: ${value}`);
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatEntry(
  level: LogLevel,
  component: string,
  message: string,
  data?: Record<string, unknown>,
  timestamp: Date = new Date(),
): string {
  const base = `[${timestamp.toISOString()}] [${level.toUpperCase()}] [${component}] ${message}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

// stdout carries command output; logs go to stderr.
function write(
  level: LogLevel,
  component: string,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (shouldLog(level)) {
    process.stderr.write(formatEntry(level, component, message, data) + "\n");
  }
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function createLogger(component: string): Logger {
  return {
    debug(message, data) {
      write("debug", component, message, data);
    },
    info(message, data) {
      write("info", component, message, data);
    },
    warn(message, data) {
      write("warn", component, message, data);
    },
    error(message, data) {
      write("error", component, message, data);
    },
  };
}
