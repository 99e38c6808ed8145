import chokidar, { type FSWatcher } from "chokidar";
import fs, { type Dirent } from "node:fs";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("presence/watcher");

/**
 * Event emitted when the active log file changes.
 */
export type LogFileChangeEvent = {
  path: string;
  eventType: "add" | "change";
};

export type LogFileChangeCallback = (event: LogFileChangeEvent) => void;

export type WatcherOptions = {
  /** Use stat polling instead of native events (network mounts, containers) */
  usePolling?: boolean;
};

const POLL_INTERVAL_MS = 500;

/**
 * Watches the top level of the log directory and reports writes to files
 * whose name matches the log pattern.
 */
export function createLogFileWatcher(
  dir: string,
  pattern: string,
  onFileChange: LogFileChangeCallback,
  options: WatcherOptions = {},
): FSWatcher {
  const watcher = chokidar.watch(dir, {
    ignoreInitial: true,
    depth: 0,
    usePolling: options.usePolling ?? false,
    interval: POLL_INTERVAL_MS,
  });

  const emitEvent = (eventType: "add" | "change", filePath: string) => {
    if (!matchesFileName(path.basename(filePath), pattern)) {
      return;
    }
    log.debug(`Log file ${eventType}: ${filePath}`);
    onFileChange({ path: filePath, eventType });
  };

  watcher.on("add", (filePath) => emitEvent("add", filePath));
  watcher.on("change", (filePath) => emitEvent("change", filePath));
  watcher.on("error", (error) => {
    log.error(`Watcher error: ${String(error)}`);
  });

  return watcher;
}

/**
 * Matches a bare file name against a glob supporting `*` and `?`.
 */
export function matchesFileName(fileName: string, pattern: string): boolean {
  const regexPattern = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*")
    .replace(/\?/g, ".");
  return new RegExp(`^${regexPattern}$`).test(fileName);
}

/**
 * Recursively walks a directory and returns every file whose name matches
 * the pattern. Unreadable subdirectories are skipped.
 */
export function findFilesRecursive(dir: string, pattern: string): string[] {
  const files: string[] = [];

  let entries: Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    log.warn(`Skipping unreadable directory ${dir}: ${String(err)}`);
    return files;
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...findFilesRecursive(fullPath, pattern));
    } else if (entry.isFile() && matchesFileName(entry.name, pattern)) {
      files.push(fullPath);
    }
  }

  return files;
}
