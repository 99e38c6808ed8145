/**
 * Player presence reconstruction from a game server's user log.
 *
 * History files under the log directory are replayed once at startup, then
 * the active file is read backwards on every tick down to the watermark, so
 * each cycle only touches lines written since the previous one.
 *
 * @example
 * ```ts
 * import { createPresenceMonitor } from "presence-tail";
 *
 * const monitor = createPresenceMonitor({
 *   logDir: "/srv/game/Logs",
 *   onNotification: (n) => channel.send(n.text),
 *   onPresence: (count) => setActivity(count),
 * });
 *
 * monitor.start();
 * console.log(monitor.query.listEntities());
 *
 * await monitor.stop();
 * ```
 */

// Monitor
export {
  PresenceMonitor,
  createPresenceMonitor,
  createPresenceMonitorFromEnv,
  type PresenceMonitorOptions,
  type PresenceMonitorStatus,
} from "./monitor.js";

// Reconciliation
export {
  ReconciliationLoop,
  formatDisconnectNotice,
  runCycle,
  type CycleInput,
  type CycleResult,
  type LoopState,
  type NotificationSink,
  type PresenceNotification,
  type PresenceSink,
  type ReconciliationLoopOptions,
  type TickResult,
} from "./reconciler.js";

// State
export {
  EntityStateStore,
  type EntityState,
  type EntityView,
  type PresenceQuery,
} from "./store.js";

// History
export {
  loadHistory,
  resolveHistoryFiles,
  type HistoryLoadOptions,
  type HistoryLoadSummary,
} from "./history.js";

// Tail reading
export { findActiveLogFile, scanNewLines, type TailScanResult } from "./tail-reader.js";
export {
  readLinesBackward,
  reverseLinesFrom,
  type ReadBackwardOptions,
  type ReverseLineOpener,
  type ReverseLineSource,
} from "./reverse-lines.js";

// Watcher
export {
  createLogFileWatcher,
  findFilesRecursive,
  matchesFileName,
  type LogFileChangeCallback,
  type LogFileChangeEvent,
  type WatcherOptions,
} from "./watcher.js";

// Parsing
export {
  MIN_TIMESTAMP,
  classifyLogLine,
  classifyLogMessage,
  parseLogLine,
  parseLogTimestamp,
  splitLogLine,
  timestampToDate,
  type Location,
  type LogEntry,
  type LogEvent,
  type LogLine,
  type ParseResult,
  type Timestamp,
} from "./parser.js";

// Errors
export {
  FileAccessError,
  HistoryLoadError,
  MalformedEventError,
  MalformedLineError,
} from "./errors.js";

// Configuration
export {
  ConfigError,
  DEFAULT_LOG_PATTERN,
  DEFAULT_POLL_INTERVAL_MS,
  resolvePresenceConfig,
  type PresenceConfig,
} from "../config/config.js";
