import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { parseArgs } from "../src/config/options";
import { IoError, ConfigurationError, exitCodeFor } from "../src/errors";
import { readCorpus } from "../src/ingest/readCorpus";
import { runCorpusCount, summarize } from "../src/jobs/runCorpusCount";
import type { PipelineStage } from "../src/pipeline/countCorpus";

describe("runCorpusCount", () => {
  let dir: string;
  let corpus: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "corpus-count-"));
    corpus = path.join(dir, "corpus.txt");
    fs.writeFileSync(corpus, "a b a\nc b a\n", "utf8");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes token and n-gram counts", () => {
    const tokens = path.join(dir, "tokens.tsv");
    const ngrams = path.join(dir, "ngrams.tsv");
    const result = runCorpusCount(
      parseArgs(["-c", corpus, "-t", tokens, "-n", ngrams, "--min_n", "1", "--max_n", "1", "--no_bracket"])
    );

    expect(fs.readFileSync(tokens, "utf8")).toBe("a\t3\nb\t2\nc\t1\n");
    expect(fs.readFileSync(ngrams, "utf8")).toBe("a\t3\nb\t2\nc\t1\n");
    expect(summarize(result)).toEqual([
      "Counted 6 tokens (3 distinct, 3 kept)",
      "Counted 3 distinct n-grams (3 kept)",
    ]);
  });

  it("never writes bracketed tokens to the token output", () => {
    const tokens = path.join(dir, "tokens.tsv");
    const ngrams = path.join(dir, "ngrams.tsv");
    runCorpusCount(parseArgs(["-c", corpus, "-t", tokens, "-n", ngrams, "--min_n", "3", "--max_n", "3"]));

    expect(fs.readFileSync(tokens, "utf8")).toBe("a\t3\nb\t2\nc\t1\n");
    expect(fs.readFileSync(ngrams, "utf8")).toBe("<a>\t3\n<b>\t2\n<c>\t1\n");
  });

  it("skips n-grams without an n-gram destination", () => {
    const tokens = path.join(dir, "tokens.tsv");
    const result = runCorpusCount(parseArgs(["-c", corpus, "-t", tokens, "--token_min", "2"]));

    expect(fs.readFileSync(tokens, "utf8")).toBe("a\t3\nb\t2\n");
    expect(result.ngrams).toBeUndefined();
    expect(summarize(result)).toEqual(["Counted 6 tokens (3 distinct, 2 kept)"]);
  });

  it("checks the n-gram destination before reading the corpus", () => {
    const tokens = path.join(dir, "tokens.tsv");
    const missing = path.join(dir, "missing.txt");
    const stages: PipelineStage[] = [];

    expect(() =>
      runCorpusCount(parseArgs(["-c", missing, "-t", tokens, "-n", dir]), (s) => stages.push(s))
    ).toThrow(`Can't create output file: ${dir}`);
    expect(stages).toEqual([]);
    expect(fs.readFileSync(tokens, "utf8")).toBe("");
  });

  it("reports ReadInput before the counting stages", () => {
    const stages: PipelineStage[] = [];
    runCorpusCount(parseArgs(["-c", corpus, "-t", path.join(dir, "tokens.tsv")]), (s) => stages.push(s));
    expect(stages.slice(0, 2)).toEqual(["ReadInput", "TokenizeAndCountTokens"]);
  });

  it("fails with an IoError for a missing corpus", () => {
    const missing = path.join(dir, "missing.txt");
    expect(() => runCorpusCount(parseArgs(["-c", missing, "-t", path.join(dir, "tokens.tsv")]))).toThrow(IoError);
    expect(() => readCorpus(missing)).toThrow(`Can't open corpus for reading: ${missing}`);
  });
});

describe("exitCodeFor", () => {
  it("maps configuration errors to 2 and everything else to 1", () => {
    expect(exitCodeFor(new ConfigurationError("bad"))).toBe(2);
    expect(exitCodeFor(new IoError("Can't open", "/x"))).toBe(1);
    expect(exitCodeFor(new Error("boom"))).toBe(1);
  });

  it("includes the cause in IoError messages", () => {
    const err = new IoError("Can't open", "/x", new Error("boom"));
    expect(err.message).toBe("Can't open: /x (boom)");
    expect(err.name).toBe("IoError");
  });
});
