export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

export type Logger = {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  /** Logger that adds `context` to every line it writes. */
  child(context: LogData): Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMsg(level: LogLevel, msg: string, data?: LogData): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}] ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function createLogger(context: LogData): Logger {
  const merge = (data?: LogData): LogData | undefined =>
    Object.keys(context).length > 0 ? { ...context, ...data } : data;

  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(formatMsg("debug", msg, merge(data)));
    },
    info(msg, data) {
      if (shouldLog("info")) console.info(formatMsg("info", msg, merge(data)));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(formatMsg("warn", msg, merge(data)));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(formatMsg("error", msg, merge(data)));
    },
    child(extra) {
      return createLogger({ ...context, ...extra });
    },
  };
}

export const log: Logger = createLogger({});
