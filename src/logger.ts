// Console-backed leveled logger. Output format: `[LEVEL] [Component] message`.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let globalLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[globalLevel];
}

export function createLogger(component: string): Logger {
  const prefix = (level: string) => `[${level}] [${component}]`;
  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.log(`${prefix("DEBUG")} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`${prefix("INFO")} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`${prefix("WARN")} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`${prefix("ERROR")} ${msg}`, ...args);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
