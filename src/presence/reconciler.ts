import { createSubsystemLogger } from "../logging/subsystem.js";
import { FileAccessError } from "./errors.js";
import { classifyLogLine, type Timestamp } from "./parser.js";
import {
  readLinesBackward,
  type ReverseLineOpener,
  type ReverseLineSource,
} from "./reverse-lines.js";
import type { EntityStateStore } from "./store.js";
import { findActiveLogFile, scanNewLines } from "./tail-reader.js";

const log = createSubsystemLogger("presence/reconciler");

export type PresenceNotification = {
  timestamp: Timestamp;
  name: string;
  text: string;
};

/** Receives one notification per new disconnect. Not awaited. */
export type NotificationSink = (notification: PresenceNotification) => void | Promise<void>;

/** Receives the online count whenever it changes. Not awaited. */
export type PresenceSink = (onlineCount: number) => void | Promise<void>;

export type CycleInput = {
  /** Lines of the active file, newest first; null when there is no active file */
  source: ReverseLineSource | null;
  watermark: Timestamp;
  store: EntityStateStore;
  notifyDisconnects: boolean;
};

export type CycleResult = {
  watermark: Timestamp;
  notifications: PresenceNotification[];
  /** Lines newer than the input watermark */
  processed: number;
  skipped: number;
};

export type LoopState = "idle" | "running";

export type ReconciliationLoopOptions = {
  /** Directory holding the active log file */
  logDir: string;
  /** File-name glob of log files */
  pattern: string;
  store: EntityStateStore;
  pollIntervalMs: number;
  notifyDisconnects: boolean;
  onNotification?: NotificationSink;
  onPresence?: PresenceSink;
  /** Defaults to the current time so earlier lines are never notified */
  initialWatermark?: Timestamp;
  /** Defaults to reading the file backwards from disk */
  openLines?: ReverseLineOpener;
};

export type TickResult = {
  file: string | null;
  watermark: Timestamp;
  notifications: PresenceNotification[];
  processed: number;
  skipped: number;
  onlineCount: number;
  presenceChanged: boolean;
};

export function formatDisconnectNotice(name: string): string {
  return `:person_running: ${name} has left`;
}

function nowTimestamp(): Timestamp {
  return Date.now() * 1000;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/**
 * Runs one reconciliation cycle: scans the source down to the watermark,
 * applies the new lines oldest first and collects disconnect notifications.
 */
export async function runCycle(input: CycleInput): Promise<CycleResult> {
  if (!input.source) {
    return { watermark: input.watermark, notifications: [], processed: 0, skipped: 0 };
  }

  const scan = await scanNewLines(input.source, input.watermark);
  const notifications: PresenceNotification[] = [];
  let skipped = scan.skipped;

  for (let i = scan.lines.length - 1; i >= 0; i--) {
    const result = classifyLogLine(scan.lines[i]);
    if (!result.ok) {
      skipped += 1;
      log.warn(result.error.message);
      continue;
    }

    const { event, timestamp, message } = result.entry;
    switch (event.kind) {
      case "connected":
        input.store.applyConnected(event.name, timestamp, event.location);
        log.info(`${event.name} connected`);
        break;
      case "disconnected":
        input.store.applyDisconnected(event.name, timestamp, event.location);
        log.info(`${event.name} disconnected`);
        if (input.notifyDisconnects) {
          notifications.push({
            timestamp,
            name: event.name,
            text: formatDisconnectNotice(event.name),
          });
        }
        break;
      case "other":
        log.debug(`Ignored: ${message}`);
        break;
    }
  }

  return {
    watermark: Math.max(input.watermark, scan.watermark),
    notifications,
    processed: scan.lines.length,
    skipped,
  };
}

/**
 * Periodic driver around {@link runCycle}. Owns the watermark and serializes
 * ticks: a tick requested while another is running is dropped.
 */
export class ReconciliationLoop {
  private readonly options: ReconciliationLoopOptions;
  private readonly openLines: ReverseLineOpener;
  private watermark: Timestamp;
  private state: LoopState = "idle";
  private lastOnlineCount: number | null = null;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<TickResult> | null = null;
  private scheduled = false;
  private closed = false;

  constructor(options: ReconciliationLoopOptions) {
    this.options = options;
    this.openLines = options.openLines ?? ((file) => readLinesBackward(file));
    this.watermark = options.initialWatermark ?? nowTimestamp();
  }

  get currentWatermark(): Timestamp {
    return this.watermark;
  }

  get currentState(): LoopState {
    return this.state;
  }

  get isScheduled(): boolean {
    return this.scheduled;
  }

  /**
   * Starts ticking: once immediately, then `pollIntervalMs` after each tick
   * settles.
   */
  start(): void {
    if (this.closed) {
      log.warn("Reconciliation loop is stopped");
      return;
    }
    if (this.scheduled) {
      log.warn("Reconciliation loop already running");
      return;
    }
    this.scheduled = true;
    log.info("Starting reconciliation loop", { intervalMs: this.options.pollIntervalMs });
    void this.runScheduled();
  }

  /**
   * Cancels the schedule and waits for a tick in flight to finish. A cycle
   * that completes after stop delivers nothing to the sinks.
   */
  async stop(): Promise<void> {
    this.closed = true;
    this.scheduled = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight.catch((err: unknown) => {
        log.error(`Reconciliation tick failed during stop: ${String(err)}`);
      });
    }
  }

  /**
   * Fires a tick now without waiting for the timer.
   */
  requestTick(): void {
    void this.safeTick();
  }

  /**
   * Runs one cycle against the active log file.
   *
   * @returns the cycle outcome, or null when another tick is in flight or
   * the loop is stopped
   */
  async tick(): Promise<TickResult | null> {
    if (this.closed) {
      return null;
    }
    if (this.state === "running") {
      log.debug("Tick skipped: previous cycle still running");
      return null;
    }
    this.state = "running";
    this.inFlight = this.runTick();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
      this.state = "idle";
    }
  }

  private async runTick(): Promise<TickResult> {
    const { logDir, pattern, store, notifyDisconnects } = this.options;
    let file: string | null = null;
    let cycle: CycleResult = {
      watermark: this.watermark,
      notifications: [],
      processed: 0,
      skipped: 0,
    };

    try {
      file = await findActiveLogFile(logDir, pattern);
      if (file) {
        cycle = await runCycle({
          source: this.openLines(file),
          watermark: this.watermark,
          store,
          notifyDisconnects,
        });
      }
    } catch (err) {
      if (err instanceof FileAccessError) {
        log.warn(`${err.message}; retrying next tick`);
      } else if (isErrnoException(err)) {
        log.warn(`${new FileAccessError(file ?? logDir, err).message}; retrying next tick`);
      } else {
        log.error(`Reconciliation cycle failed: ${String(err)}`);
      }
    }

    this.watermark = Math.max(this.watermark, cycle.watermark);

    const onlineCount = store.onlineCount();
    const presenceChanged = onlineCount !== this.lastOnlineCount;
    if (this.closed) {
      log.debug("Loop stopped during cycle; dropping deliveries", {
        notifications: cycle.notifications.length,
      });
    } else {
      for (const notification of cycle.notifications) {
        this.deliver("notification", this.options.onNotification, notification);
      }
    }
    if (presenceChanged && !this.closed) {
      this.lastOnlineCount = onlineCount;
      this.deliver("presence", this.options.onPresence, onlineCount);
    }

    return {
      file,
      watermark: this.watermark,
      notifications: cycle.notifications,
      processed: cycle.processed,
      skipped: cycle.skipped,
      onlineCount,
      presenceChanged,
    };
  }

  private deliver<T>(
    label: string,
    sink: ((value: T) => void | Promise<void>) | undefined,
    value: T,
  ): void {
    if (!sink) {
      return;
    }
    try {
      const pending = sink(value);
      void Promise.resolve(pending).catch((err: unknown) => {
        log.error(`${label} sink failed: ${String(err)}`);
      });
    } catch (err) {
      log.error(`${label} sink failed: ${String(err)}`);
    }
  }

  private async safeTick(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      log.error(`Reconciliation tick failed: ${String(err)}`);
    }
  }

  private async runScheduled(): Promise<void> {
    await this.safeTick();
    if (this.scheduled && !this.timer) {
      this.timer = setTimeout(() => {
        this.timer = null;
        void this.runScheduled();
      }, this.options.pollIntervalMs);
    }
  }
}
