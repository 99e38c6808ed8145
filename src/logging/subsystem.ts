import { Logger, type ILogObj } from "tslog";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type LogStyle = "pretty" | "json" | "hidden";

export type LoggingSettings = {
  level?: LogLevel;
  style?: LogStyle;
};

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

const LOG_LEVEL_IDS: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const ROOT_NAME = "presence";

let rootLogger: Logger<ILogObj> | null = null;
const subLoggers = new Map<string, Logger<ILogObj>>();

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_IDS, value);
}

function isLogStyle(value: string): value is LogStyle {
  return value === "pretty" || value === "json" || value === "hidden";
}

function createRootLogger(settings: LoggingSettings): Logger<ILogObj> {
  const envStyle = process.env.PRESENCE_LOG_STYLE ?? "";
  const envLevel = process.env.PRESENCE_LOG_LEVEL ?? "";
  const style = settings.style ?? (isLogStyle(envStyle) ? envStyle : "pretty");
  const level = settings.level ?? (isLogLevel(envLevel) ? envLevel : "info");
  return new Logger<ILogObj>({
    name: ROOT_NAME,
    type: style,
    minLevel: LOG_LEVEL_IDS[level],
  });
}

function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    rootLogger = createRootLogger({});
  }
  return rootLogger;
}

/**
 * Replaces the root logger settings. Existing subsystem loggers pick up the
 * new settings on their next call.
 */
export function configureLogging(settings: LoggingSettings): void {
  rootLogger = createRootLogger(settings);
  subLoggers.clear();
}

function resolveSubLogger(subsystem: string): Logger<ILogObj> {
  let logger = subLoggers.get(subsystem);
  if (!logger) {
    logger = getRootLogger().getSubLogger({ name: subsystem });
    subLoggers.set(subsystem, logger);
  }
  return logger;
}

/**
 * Creates a logger tagged with a subsystem name, e.g. "presence/tail-reader".
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (
    level: "debug" | "info" | "warn" | "error",
    message: string,
    meta?: Record<string, unknown>,
  ) => {
    const logger = resolveSubLogger(subsystem);
    if (meta) {
      logger[level](message, meta);
    } else {
      logger[level](message);
    }
  };

  return {
    subsystem,
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}
