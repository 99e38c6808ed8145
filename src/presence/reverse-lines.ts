import fs from "node:fs/promises";

/**
 * Lines of a log, newest first.
 */
export type ReverseLineSource = AsyncIterable<string>;

export type ReverseLineOpener = (file: string) => ReverseLineSource;

export type ReadBackwardOptions = {
  /** Bytes read per step from the end of the file */
  chunkSize?: number;
};

const DEFAULT_CHUNK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;

function previousNewline(buffer: Buffer, end: number): number {
  return end > 0 ? buffer.lastIndexOf(NEWLINE, end - 1) : -1;
}

function decodeLine(bytes: Buffer): string {
  const text = bytes.toString("utf8");
  return text.endsWith("\r") ? text.slice(0, -1) : text;
}

/**
 * Yields a file's lines from last to first, reading fixed-size chunks
 * backwards from the size observed at open.
 *
 * The bytes after the final newline are a line still being written and are
 * never yielded. The file handle is closed when iteration ends, including
 * when the consumer stops early.
 */
export async function* readLinesBackward(
  file: string,
  options: ReadBackwardOptions = {},
): AsyncGenerator<string, void, undefined> {
  const chunkSize = Math.max(1, Math.floor(options.chunkSize ?? DEFAULT_CHUNK_SIZE));
  const handle = await fs.open(file, "r");
  try {
    const { size } = await handle.stat();
    let position = size;
    let pending = Buffer.alloc(0);
    let unterminated = true;

    while (position > 0) {
      const length = Math.min(chunkSize, position);
      position -= length;
      const chunk = Buffer.alloc(length);
      const { bytesRead } = await handle.read(chunk, 0, length, position);
      pending = Buffer.concat([chunk.subarray(0, bytesRead), pending]);

      let end = pending.length;
      let newline = previousNewline(pending, end);
      while (newline >= 0) {
        if (unterminated) {
          unterminated = false;
        } else {
          yield decodeLine(pending.subarray(newline + 1, end));
        }
        end = newline;
        newline = previousNewline(pending, end);
      }
      pending = pending.subarray(0, end);
    }

    // First line of the file, unless no newline was ever found.
    if (!unterminated) {
      yield decodeLine(pending);
    }
  } finally {
    await handle.close();
  }
}

/**
 * In-memory source over lines given oldest first.
 */
export async function* reverseLinesFrom(
  lines: readonly string[],
): AsyncGenerator<string, void, undefined> {
  for (let i = lines.length - 1; i >= 0; i--) {
    yield lines[i];
  }
}
