/**
 * A line that is not of the form `[DD-MM-YY HH:MM:SS.ffffff]<message>`.
 */
export class MalformedLineError extends Error {
  readonly line: string;

  constructor(line: string, reason: string) {
    super(`Malformed log line (${reason}): ${line}`);
    this.name = "MalformedLineError";
    this.line = line;
  }
}

/**
 * A message that was classified as a connect/disconnect but whose name or
 * coordinates could not be extracted.
 */
export class MalformedEventError extends Error {
  readonly kind: "connected" | "disconnected";
  readonly logMessage: string;

  constructor(kind: "connected" | "disconnected", logMessage: string) {
    super(`Malformed ${kind} event: ${logMessage}`);
    this.name = "MalformedEventError";
    this.kind = kind;
    this.logMessage = logMessage;
  }
}

export class FileAccessError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Cannot access ${path}: ${String(cause)}`, { cause });
    this.name = "FileAccessError";
    this.path = path;
  }
}

export class HistoryLoadError extends Error {
  readonly file: string;

  constructor(file: string, cause: unknown) {
    super(`Failed to load history from ${file}: ${String(cause)}`, { cause });
    this.name = "HistoryLoadError";
    this.file = file;
  }
}
