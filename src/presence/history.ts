import fs from "node:fs";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { HistoryLoadError } from "./errors.js";
import { parseLogLine } from "./parser.js";
import type { EntityStateStore } from "./store.js";
import { findFilesRecursive } from "./watcher.js";

const log = createSubsystemLogger("presence/history");

export type HistoryLoadOptions = {
  /** Root directory searched recursively for log files */
  root: string;
  /** File-name glob, e.g. "*user.txt" */
  pattern: string;
};

export type HistoryLoadSummary = {
  files: number;
  lines: number;
  applied: number;
  skipped: number;
  failedFiles: string[];
};

/**
 * Lists every log file under `root`, oldest modification time first.
 * File names are not assumed to sort chronologically.
 */
export function resolveHistoryFiles(root: string, pattern: string): string[] {
  const dated: Array<{ file: string; mtimeMs: number }> = [];
  for (const file of findFilesRecursive(root, pattern)) {
    try {
      dated.push({ file, mtimeMs: fs.statSync(file).mtimeMs });
    } catch (err) {
      log.warn(new HistoryLoadError(file, err).message);
    }
  }
  dated.sort((a, b) => a.mtimeMs - b.mtimeMs || (a.file < b.file ? -1 : a.file > b.file ? 1 : 0));
  return dated.map((entry) => entry.file);
}

/**
 * Replays every historical log file into the store. Runs synchronously so it
 * completes before the first reconciliation tick; it never moves the
 * watermark and never produces notifications.
 */
export function loadHistory(
  store: EntityStateStore,
  options: HistoryLoadOptions,
): HistoryLoadSummary {
  log.info("Loading user history...", { root: options.root, pattern: options.pattern });
  const files = resolveHistoryFiles(options.root, options.pattern);
  const summary: HistoryLoadSummary = {
    files: files.length,
    lines: 0,
    applied: 0,
    skipped: 0,
    failedFiles: [],
  };

  for (const file of files) {
    let content: string;
    try {
      content = fs.readFileSync(file, "utf8");
    } catch (err) {
      log.warn(new HistoryLoadError(file, err).message);
      summary.failedFiles.push(file);
      continue;
    }

    for (const line of content.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      summary.lines += 1;
      const result = parseLogLine(line);
      if (!result.ok) {
        summary.skipped += 1;
        log.debug(result.error.message, { file });
        continue;
      }
      if (store.apply(result.entry)) {
        summary.applied += 1;
      }
    }
  }

  log.info("User history loaded", {
    files: summary.files,
    lines: summary.lines,
    applied: summary.applied,
    skipped: summary.skipped,
    failed: summary.failedFiles.length,
  });
  return summary;
}
