import { describe, expect, it } from "vitest";
import { MalformedEventError, MalformedLineError } from "./errors.js";
import {
  classifyLogMessage,
  parseLogLine,
  parseLogTimestamp,
  splitLogLine,
  timestampToDate,
} from "./parser.js";

function localMicros(...fields: [number, number, number, number, number, number]): number {
  const [year, month, day, hour, minute, second] = fields;
  return new Date(year, month - 1, day, hour, minute, second).getTime() * 1000;
}

describe("parser", () => {
  describe("parseLogTimestamp", () => {
    it("parses day-month-year with a millisecond fraction as local time", () => {
      expect(parseLogTimestamp("01-01-24 10:00:00.000")).toBe(localMicros(2024, 1, 1, 10, 0, 0));
    });

    it("keeps microsecond precision", () => {
      const base = localMicros(2024, 3, 15, 23, 59, 58);
      expect(parseLogTimestamp("15-03-24 23:59:58.000123")).toBe(base + 123);
      expect(parseLogTimestamp("15-03-24 23:59:58.5")).toBe(base + 500_000);
    });

    it("pivots two-digit years at 69", () => {
      expect(parseLogTimestamp("01-01-69 00:00:00.0")).toBe(localMicros(1969, 1, 1, 0, 0, 0));
      expect(parseLogTimestamp("31-12-68 00:00:00.0")).toBe(localMicros(2068, 12, 31, 0, 0, 0));
    });

    it("rejects impossible dates and times", () => {
      expect(parseLogTimestamp("31-02-24 10:00:00.000")).toBeNull();
      expect(parseLogTimestamp("01-13-24 10:00:00.000")).toBeNull();
      expect(parseLogTimestamp("00-01-24 10:00:00.000")).toBeNull();
      expect(parseLogTimestamp("01-01-24 24:00:00.000")).toBeNull();
      expect(parseLogTimestamp("01-01-24 10:60:00.000")).toBeNull();
    });

    it("rejects other layouts", () => {
      expect(parseLogTimestamp("01-01-24 10:00:00")).toBeNull();
      expect(parseLogTimestamp("1-01-24 10:00:00.000")).toBeNull();
      expect(parseLogTimestamp("2024-01-01 10:00:00.000")).toBeNull();
      expect(parseLogTimestamp("01-01-24 10:00:00.0000000")).toBeNull();
    });

    it("round-trips through timestampToDate to the millisecond", () => {
      const ts = parseLogTimestamp("01-01-24 10:00:00.250999");
      expect(ts).not.toBeNull();
      const expected = new Date(2024, 0, 1, 10, 0, 0, 250).getTime();
      expect(timestampToDate(ts ?? 0).getTime()).toBe(expected);
    });
  });

  describe("splitLogLine", () => {
    it("splits the bracketed timestamp from the message", () => {
      const line = splitLogLine('[01-01-24 10:00:00.000]"Alice" fully connected (5,5,0)\n');
      expect(line.timestamp).toBe(localMicros(2024, 1, 1, 10, 0, 0));
      expect(line.message).toBe('"Alice" fully connected (5,5,0)');
    });

    it("keeps text after the first closing bracket intact", () => {
      const line = splitLogLine("[01-01-24 10:00:00.000] [note] ok");
      expect(line.message).toBe(" [note] ok");
    });

    it("throws MalformedLineError without a closing bracket", () => {
      expect(() => splitLogLine("[01-01-24 10:00:00.000 Alice")).toThrow(MalformedLineError);
    });

    it("throws MalformedLineError without an opening bracket", () => {
      expect(() => splitLogLine('01-01-24 10:00:00.000]"Alice"')).toThrow(MalformedLineError);
    });

    it("throws MalformedLineError for an unparseable timestamp", () => {
      expect(() => splitLogLine("[yesterday]hello")).toThrow(/invalid timestamp/);
    });
  });

  describe("classifyLogMessage", () => {
    it("extracts name and x,y from a disconnect", () => {
      expect(classifyLogMessage('"Alice" disconnected (6,6,0)')).toEqual({
        kind: "disconnected",
        name: "Alice",
        location: { x: 6, y: 6 },
      });
    });

    it("extracts name and x,y from a full connect", () => {
      expect(
        classifyLogMessage(' 76561198000000001 "Bob Smith" fully connected (10917,9549,0).'),
      ).toEqual({
        kind: "connected",
        name: "Bob Smith",
        location: { x: 10917, y: 9549 },
      });
    });

    it("checks the disconnect marker first", () => {
      expect(classifyLogMessage('"Carol" disconnected after fully connected (1,2,3)')).toEqual({
        kind: "disconnected",
        name: "Carol",
        location: { x: 1, y: 2 },
      });
    });

    it("ignores other messages", () => {
      expect(classifyLogMessage('"Alice" attempting to join.')).toEqual({ kind: "other" });
      expect(classifyLogMessage('"Alice" connected (1,1,0)')).toEqual({ kind: "other" });
    });

    it("throws MalformedEventError when a disconnect has no coordinates", () => {
      expect(() => classifyLogMessage('"Alice" disconnected')).toThrow(MalformedEventError);
    });

    it("throws MalformedEventError when a connect has no quoted name", () => {
      expect(() => classifyLogMessage("Alice fully connected (5,5,0)")).toThrow(
        MalformedEventError,
      );
    });
  });

  describe("parseLogLine", () => {
    it("returns the classified entry", () => {
      const result = parseLogLine('[01-01-24 10:05:00.000]"Alice" disconnected (6,6,0)');
      expect(result).toEqual({
        ok: true,
        entry: {
          timestamp: localMicros(2024, 1, 1, 10, 5, 0),
          message: '"Alice" disconnected (6,6,0)',
          event: { kind: "disconnected", name: "Alice", location: { x: 6, y: 6 } },
        },
      });
    });

    it("reports malformed lines instead of throwing", () => {
      const result = parseLogLine("garbage");
      expect(result.ok).toBe(false);
      expect(result.ok ? null : result.error).toBeInstanceOf(MalformedLineError);
    });

    it("reports malformed events instead of throwing", () => {
      const result = parseLogLine("[01-01-24 10:05:00.000]player disconnected");
      expect(result.ok).toBe(false);
      expect(result.ok ? null : result.error).toBeInstanceOf(MalformedEventError);
    });
  });
});
