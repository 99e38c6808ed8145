import { MalformedEventError, MalformedLineError } from "./errors.js";

/**
 * Microseconds since the Unix epoch, read from the log's local wall-clock time.
 */
export type Timestamp = number;

/** Timestamp of an entity that has never been seen. */
export const MIN_TIMESTAMP: Timestamp = Number.NEGATIVE_INFINITY;

export type Location = {
  x: number;
  y: number;
};

export type LogEvent =
  | { kind: "connected"; name: string; location: Location }
  | { kind: "disconnected"; name: string; location: Location }
  | { kind: "other" };

/**
 * A log line split into its timestamp and the message after the closing bracket.
 */
export type LogLine = {
  timestamp: Timestamp;
  message: string;
};

export type LogEntry = LogLine & {
  event: LogEvent;
};

export type ParseResult =
  | { ok: true; entry: LogEntry }
  | { ok: false; error: MalformedLineError | MalformedEventError };

const TIMESTAMP_PATTERN = /^(\d{2})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})\.(\d{1,6})$/;

// x and y only; the third coordinate is the floor level.
const DISCONNECTED_PATTERN = /"(.*)".*\((\d+),(\d+),\d+\)/;
const CONNECTED_PATTERN = /"(.*)".*\((\d+),(\d+)/;

const DISCONNECTED_MARKER = "disconnected";
const CONNECTED_MARKER = "fully connected";

function expandYear(twoDigits: number): number {
  return twoDigits >= 69 ? 1900 + twoDigits : 2000 + twoDigits;
}

/**
 * Parses `DD-MM-YY HH:MM:SS.ffffff` as local time. The fraction may have one
 * to six digits and is read as a decimal fraction of a second.
 *
 * @returns the timestamp, or null when the text is not a valid date and time
 */
export function parseLogTimestamp(text: string): Timestamp | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const [, dd, mm, yy, hh, mi, ss, fraction] = match;
  const day = Number(dd);
  const month = Number(mm);
  const year = expandYear(Number(yy));
  const hour = Number(hh);
  const minute = Number(mi);
  const second = Number(ss);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const daysInMonth = new Date(year, month, 0).getDate();
  if (day < 1 || day > daysInMonth) {
    return null;
  }

  const micros = Number((fraction ?? "0").padEnd(6, "0"));
  const millis = new Date(year, month - 1, day, hour, minute, second).getTime();
  return millis * 1000 + micros;
}

export function timestampToDate(timestamp: Timestamp): Date {
  return new Date(Math.floor(timestamp / 1000));
}

/**
 * Splits `[<timestamp>]<message>` into its parts.
 *
 * @throws MalformedLineError when a bracket is missing or the timestamp is invalid
 */
export function splitLogLine(line: string): LogLine {
  const trimmed = line.trim();
  if (!trimmed.startsWith("[")) {
    throw new MalformedLineError(line, "missing opening bracket");
  }
  const close = trimmed.indexOf("]");
  if (close < 0) {
    throw new MalformedLineError(line, "missing closing bracket");
  }
  const timestamp = parseLogTimestamp(trimmed.slice(1, close));
  if (timestamp === null) {
    throw new MalformedLineError(line, "invalid timestamp");
  }
  return { timestamp, message: trimmed.slice(close + 1) };
}

/**
 * Classifies a log message. Pure: never touches entity state.
 *
 * @throws MalformedEventError when a connect/disconnect message lacks a quoted
 * name or coordinates
 */
export function classifyLogMessage(message: string): LogEvent {
  if (message.includes(DISCONNECTED_MARKER)) {
    const match = DISCONNECTED_PATTERN.exec(message);
    if (!match) {
      throw new MalformedEventError("disconnected", message);
    }
    return {
      kind: "disconnected",
      name: match[1] ?? "",
      location: { x: Number(match[2]), y: Number(match[3]) },
    };
  }

  if (message.includes(CONNECTED_MARKER)) {
    const match = CONNECTED_PATTERN.exec(message);
    if (!match) {
      throw new MalformedEventError("connected", message);
    }
    return {
      kind: "connected",
      name: match[1] ?? "",
      location: { x: Number(match[2]), y: Number(match[3]) },
    };
  }

  return { kind: "other" };
}

/**
 * Parses and classifies a whole line without throwing.
 */
export function parseLogLine(line: string): ParseResult {
  try {
    const { timestamp, message } = splitLogLine(line);
    return { ok: true, entry: { timestamp, message, event: classifyLogMessage(message) } };
  } catch (err) {
    if (err instanceof MalformedLineError || err instanceof MalformedEventError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Classifies a line already split by {@link splitLogLine}.
 */
export function classifyLogLine(line: LogLine): ParseResult {
  try {
    return { ok: true, entry: { ...line, event: classifyLogMessage(line.message) } };
  } catch (err) {
    if (err instanceof MalformedEventError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
