import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  createLogFileWatcher,
  findFilesRecursive,
  matchesFileName,
  type LogFileChangeEvent,
} from "./watcher.js";

describe("matchesFileName", () => {
  it("matches a star prefix", () => {
    expect(matchesFileName("01-01-24_10-00_user.txt", "*user.txt")).toBe(true);
    expect(matchesFileName("user.txt", "*user.txt")).toBe(true);
  });

  it("anchors both ends", () => {
    expect(matchesFileName("user.txt.bak", "*user.txt")).toBe(false);
    expect(matchesFileName("01_chat.txt", "*user.txt")).toBe(false);
  });

  it("treats dots literally and ? as one character", () => {
    expect(matchesFileName("userXtxt", "user.txt")).toBe(false);
    expect(matchesFileName("log1.txt", "log?.txt")).toBe(true);
    expect(matchesFileName("log12.txt", "log?.txt")).toBe(false);
  });
});

describe("findFilesRecursive", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "presence-walk-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("finds matches at every depth", () => {
    fs.mkdirSync(path.join(dir, "logs", "old"), { recursive: true });
    fs.writeFileSync(path.join(dir, "a_user.txt"), "");
    fs.writeFileSync(path.join(dir, "logs", "old", "b_user.txt"), "");
    fs.writeFileSync(path.join(dir, "logs", "c_chat.txt"), "");

    expect(findFilesRecursive(dir, "*user.txt").sort()).toEqual([
      path.join(dir, "a_user.txt"),
      path.join(dir, "logs", "old", "b_user.txt"),
    ]);
  });

  it("returns nothing for a missing root", () => {
    expect(findFilesRecursive(path.join(dir, "missing"), "*user.txt")).toEqual([]);
  });
});

describe("createLogFileWatcher", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "presence-watch-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports new files that match the pattern", async () => {
    const onFileChange = vi.fn<(event: LogFileChangeEvent) => void>();
    const watcher = createLogFileWatcher(dir, "*user.txt", onFileChange, { usePolling: true });
    try {
      await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
      const file = path.join(dir, "server_user.txt");
      fs.writeFileSync(path.join(dir, "chat.txt"), "hello\n");
      fs.writeFileSync(file, "hello\n");

      await vi.waitFor(
        () => expect(onFileChange).toHaveBeenCalledWith({ path: file, eventType: "add" }),
        { timeout: 5_000 },
      );
      expect(onFileChange.mock.calls.map(([event]) => event.path)).not.toContain(
        path.join(dir, "chat.txt"),
      );
    } finally {
      await watcher.close();
    }
  });
});
