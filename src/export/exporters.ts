import * as fs from "node:fs";
import * as path from "node:path";
import { IoError } from "../errors";
import type { SortedCount } from "./sort";

export const STDOUT = "<stdout>";

export type CountSink = {
  fd: number;
  /** File path, or STDOUT. */
  path: string;
  /** Whether closeSink should close the descriptor. */
  owned: boolean;
};

// One "item\tcount" per line.
export function renderTsv(rows: SortedCount[]): string {
  return rows.map((r) => `${r.item}\t${r.count}\n`).join("");
}

export function ensureDir(p: string) {
  fs.mkdirSync(p, { recursive: true });
}

/**
 * Creates (or truncates) the destination right away, so an unwritable path
 * fails before any input is read. No path means stdout.
 */
export function openSink(filePath?: string): CountSink {
  if (filePath === undefined) return { fd: process.stdout.fd, path: STDOUT, owned: false };

  try {
    ensureDir(path.dirname(filePath));
    return { fd: fs.openSync(filePath, "w"), path: filePath, owned: true };
  } catch (err) {
    throw new IoError("Can't create output file", filePath, err);
  }
}

export function closeSink(sink: CountSink) {
  if (!sink.owned) return;
  try {
    fs.closeSync(sink.fd);
  } catch (err) {
    throw new IoError("Can't close output file", sink.path, err);
  }
}

function isRetryable(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EAGAIN";
}

// A closed pipe throws EPIPE here.
function writeAll(fd: number, text: string) {
  const buf = Buffer.from(text, "utf8");
  let offset = 0;
  while (offset < buf.length) {
    try {
      offset += fs.writeSync(fd, buf, offset, buf.length - offset);
    } catch (err) {
      // non-blocking stdout pipe is full
      if (!isRetryable(err)) throw err;
    }
  }
}

export function writeCounts(sink: CountSink, rows: SortedCount[]) {
  try {
    writeAll(sink.fd, renderTsv(rows));
  } catch (err) {
    throw new IoError("Can't write counts", sink.path, err);
  }
}
