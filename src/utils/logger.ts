export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogData = Record<string, unknown>;

export type Logger = {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.SECTIONFLOW_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "info";
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, scope: string | undefined, msg: string, data?: LogData): string {
  const ts = new Date().toISOString();
  const prefix = scope ? `[${scope}] ` : "";
  const base = `${ts} [${level.toUpperCase()}] ${prefix}${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

/** Logger whose lines carry a `[scope]` tag, e.g. the run id or component name. */
export function createLogger(scope?: string): Logger {
  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(formatMsg("debug", scope, msg, data));
    },
    info(msg, data) {
      if (shouldLog("info")) console.info(formatMsg("info", scope, msg, data));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(formatMsg("warn", scope, msg, data));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(formatMsg("error", scope, msg, data));
    },
  };
}

export const log: Logger = createLogger();
