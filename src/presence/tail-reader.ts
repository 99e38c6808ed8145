import fs from "node:fs/promises";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { FileAccessError, MalformedLineError } from "./errors.js";
import { splitLogLine, type LogLine, type Timestamp } from "./parser.js";
import type { ReverseLineSource } from "./reverse-lines.js";
import { matchesFileName } from "./watcher.js";

const log = createSubsystemLogger("presence/tail-reader");

/**
 * Result of a backward scan down to the watermark.
 */
export type TailScanResult = {
  /** Lines newer than the watermark, newest first */
  lines: LogLine[];
  /** max(watermark, newest timestamp read) */
  watermark: Timestamp;
  /** Lines skipped because they could not be split */
  skipped: number;
};

/**
 * Finds the log file currently being written: the most recently modified
 * top-level file in `dir` whose name matches `pattern`.
 *
 * @returns the file path, or null when nothing matches
 * @throws FileAccessError when the directory cannot be listed
 */
export async function findActiveLogFile(dir: string, pattern: string): Promise<string | null> {
  let names: string[];
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    names = entries
      .filter((entry) => entry.isFile() && matchesFileName(entry.name, pattern))
      .map((entry) => entry.name);
  } catch (err) {
    throw new FileAccessError(dir, err);
  }

  let active: { file: string; mtimeMs: number } | null = null;
  for (const name of names) {
    const file = path.join(dir, name);
    const stat = await fs.stat(file).catch((err: unknown) => {
      log.debug(`Log file vanished before stat: ${file}`, { error: String(err) });
      return null;
    });
    if (!stat) {
      continue;
    }
    if (
      !active ||
      stat.mtimeMs > active.mtimeMs ||
      (stat.mtimeMs === active.mtimeMs && file > active.file)
    ) {
      active = { file, mtimeMs: stat.mtimeMs };
    }
  }

  return active?.file ?? null;
}

/**
 * Reads a reverse line source until the first line at or before the
 * watermark. Blank and malformed lines are skipped without ending the scan.
 */
export async function scanNewLines(
  source: ReverseLineSource,
  watermark: Timestamp,
): Promise<TailScanResult> {
  const lines: LogLine[] = [];
  let newest = watermark;
  let skipped = 0;

  for await (const raw of source) {
    if (!raw.trim()) {
      continue;
    }
    let line: LogLine;
    try {
      line = splitLogLine(raw);
    } catch (err) {
      if (!(err instanceof MalformedLineError)) {
        throw err;
      }
      skipped += 1;
      log.debug(err.message);
      continue;
    }
    if (line.timestamp <= watermark) {
      break;
    }
    if (line.timestamp > newest) {
      newest = line.timestamp;
    }
    lines.push(line);
  }

  return { lines, watermark: newest, skipped };
}
