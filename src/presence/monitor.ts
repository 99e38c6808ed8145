import type { FSWatcher } from "chokidar";
import {
  DEFAULT_LOG_PATTERN,
  DEFAULT_POLL_INTERVAL_MS,
  resolvePresenceConfig,
  type PresenceConfig,
} from "../config/config.js";
import { configureLogging, createSubsystemLogger } from "../logging/subsystem.js";
import { loadHistory, type HistoryLoadSummary } from "./history.js";
import { timestampToDate, type Timestamp } from "./parser.js";
import {
  ReconciliationLoop,
  type NotificationSink,
  type PresenceSink,
  type TickResult,
} from "./reconciler.js";
import type { ReverseLineOpener } from "./reverse-lines.js";
import { EntityStateStore, type PresenceQuery } from "./store.js";
import { createLogFileWatcher } from "./watcher.js";

const log = createSubsystemLogger("presence/monitor");

export type PresenceMonitorOptions = {
  logDir: string;
  logPattern?: string;
  pollIntervalMs?: number;
  notifyDisconnects?: boolean;
  watchFiles?: boolean;
  /** Have the watcher poll file stats instead of using native events */
  watchPolling?: boolean;
  onNotification?: NotificationSink;
  onPresence?: PresenceSink;
  initialWatermark?: Timestamp;
  openLines?: ReverseLineOpener;
};

export type PresenceMonitorStatus = {
  running: boolean;
  watching: boolean;
  watermark: string | null;
  onlineCount: number;
  entities: number;
  history: HistoryLoadSummary | null;
};

/**
 * Replays the log history into an entity store, then keeps it current by
 * tailing the active log file.
 */
export class PresenceMonitor {
  private readonly store = new EntityStateStore();
  private readonly loop: ReconciliationLoop;
  private readonly logDir: string;
  private readonly logPattern: string;
  private readonly watchFiles: boolean;
  private readonly watchPolling: boolean;
  private watcher: FSWatcher | null = null;
  private history: HistoryLoadSummary | null = null;
  private closed = false;

  constructor(options: PresenceMonitorOptions) {
    this.logDir = options.logDir;
    this.logPattern = options.logPattern ?? DEFAULT_LOG_PATTERN;
    this.watchFiles = options.watchFiles ?? false;
    this.watchPolling = options.watchPolling ?? false;
    // Constructed before history replay so the watermark marks process start.
    this.loop = new ReconciliationLoop({
      logDir: this.logDir,
      pattern: this.logPattern,
      store: this.store,
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      notifyDisconnects: options.notifyDisconnects ?? true,
      onNotification: options.onNotification,
      onPresence: options.onPresence,
      initialWatermark: options.initialWatermark,
      openLines: options.openLines,
    });
  }

  get query(): PresenceQuery {
    return this.store;
  }

  /**
   * Loads history, then starts the polling loop (and the file watcher when
   * enabled).
   */
  start(): HistoryLoadSummary {
    if (this.closed) {
      throw new Error("Presence monitor is closed");
    }
    if (this.history) {
      log.warn("Presence monitor already started");
      return this.history;
    }

    this.history = loadHistory(this.store, { root: this.logDir, pattern: this.logPattern });
    this.loop.start();

    if (this.watchFiles) {
      this.watcher = createLogFileWatcher(
        this.logDir,
        this.logPattern,
        () => this.loop.requestTick(),
        { usePolling: this.watchPolling },
      );
      log.info("Watching log directory", {
        dir: this.logDir,
        pattern: this.logPattern,
        polling: this.watchPolling,
      });
    }
    return this.history;
  }

  /**
   * Runs one cycle now. Resolves to null once the monitor is stopped.
   */
  tick(): Promise<TickResult | null> {
    return this.loop.tick();
  }

  status(): PresenceMonitorStatus {
    return {
      running: this.loop.isScheduled,
      watching: this.watcher !== null,
      watermark: Number.isFinite(this.loop.currentWatermark)
        ? timestampToDate(this.loop.currentWatermark).toISOString()
        : null,
      onlineCount: this.store.onlineCount(),
      entities: this.store.size,
      history: this.history,
    };
  }

  async stop(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.loop.stop();
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    log.info("Presence monitor stopped");
  }
}

export function createPresenceMonitor(options: PresenceMonitorOptions): PresenceMonitor {
  return new PresenceMonitor(options);
}

/**
 * Builds a monitor from environment configuration and applies its log level.
 */
export function createPresenceMonitorFromEnv(
  sinks: { onNotification?: NotificationSink; onPresence?: PresenceSink } = {},
  env: NodeJS.ProcessEnv = process.env,
): PresenceMonitor {
  const config: PresenceConfig = resolvePresenceConfig(env);
  configureLogging({ level: config.logLevel });
  return createPresenceMonitor({
    logDir: config.logDir,
    logPattern: config.logPattern,
    pollIntervalMs: config.pollIntervalMs,
    notifyDisconnects: config.notifyDisconnects,
    watchFiles: config.watchFiles,
    watchPolling: config.watchPolling,
    ...sinks,
  });
}
