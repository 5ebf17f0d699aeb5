import * as fs from "node:fs";
import { IoError } from "../errors";

export const STDIN = "<stdin>";

/** Reads the whole corpus as UTF-8; no path means stdin. */
export function readCorpus(filePath?: string): string {
  try {
    // fd 0 is stdin
    return fs.readFileSync(filePath ?? 0, "utf8");
  } catch (err) {
    throw new IoError("Can't open corpus for reading", filePath ?? STDIN, err);
  }
}
