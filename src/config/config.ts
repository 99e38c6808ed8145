import path from "node:path";
import { isLogLevel, type LogLevel } from "../logging/subsystem.js";

export type PresenceConfig = {
  /** Root of history replay and home of the active log file */
  logDir: string;
  /** File-name glob matched by log files */
  logPattern: string;
  pollIntervalMs: number;
  notifyDisconnects: boolean;
  /** Wake the loop on file writes in addition to the timer */
  watchFiles: boolean;
  /** Poll file stats in the watcher instead of native events */
  watchPolling: boolean;
  logLevel: LogLevel;
};

export const DEFAULT_LOG_PATTERN = "*user.txt";
export const DEFAULT_POLL_INTERVAL_MS = 2000;

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, reason: string) {
    super(`Invalid ${variable}: ${reason}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

function readString(env: NodeJS.ProcessEnv, variable: string): string | undefined {
  const value = env[variable]?.trim();
  return value ? value : undefined;
}

function readBoolean(env: NodeJS.ProcessEnv, variable: string, fallback: boolean): boolean {
  const raw = readString(env, variable);
  if (raw === undefined) {
    return fallback;
  }
  const normalized = raw.toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  throw new ConfigError(variable, `expected a boolean, got "${raw}"`);
}

function readPositiveInt(env: NodeJS.ProcessEnv, variable: string, fallback: number): number {
  const raw = readString(env, variable);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(variable, `expected a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

/**
 * Reads the monitor configuration from environment variables.
 *
 * @throws ConfigError when a variable is missing or has an unusable value
 */
export function resolvePresenceConfig(env: NodeJS.ProcessEnv = process.env): PresenceConfig {
  const logDir = readString(env, "PRESENCE_LOG_DIR");
  if (!logDir) {
    throw new ConfigError("PRESENCE_LOG_DIR", "not set");
  }

  const logLevel = readString(env, "PRESENCE_LOG_LEVEL") ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("PRESENCE_LOG_LEVEL", `unknown level "${logLevel}"`);
  }

  return {
    logDir: path.resolve(logDir),
    logPattern: readString(env, "PRESENCE_LOG_PATTERN") ?? DEFAULT_LOG_PATTERN,
    pollIntervalMs: readPositiveInt(env, "PRESENCE_POLL_INTERVAL_MS", DEFAULT_POLL_INTERVAL_MS),
    notifyDisconnects: readBoolean(env, "PRESENCE_NOTIFY_DISCONNECTS", true),
    watchFiles: readBoolean(env, "PRESENCE_WATCH_FILES", false),
    watchPolling: readBoolean(env, "PRESENCE_WATCH_POLLING", false),
    logLevel,
  };
}
