export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogData = Record<string, unknown>;

export type Logger = {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  /** Logger whose lines carry `[scope]` after the level. */
  child(scope: string): Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMsg(level: LogLevel, msg: string, data?: LogData, scope?: string): string {
  const ts = new Date().toISOString();
  const tag = scope ? ` [${scope}]` : "";
  const base = `${ts} [${level.toUpperCase()}]${tag} ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

export function createLogger(scope?: string): Logger {
  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(formatMsg("debug", msg, data, scope));
    },
    info(msg, data) {
      if (shouldLog("info")) console.info(formatMsg("info", msg, data, scope));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(formatMsg("warn", msg, data, scope));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(formatMsg("error", msg, data, scope));
    },
    child(name) {
      return createLogger(scope ? `${scope}:${name}` : name);
    },
  };
}

export const log: Logger = createLogger();
