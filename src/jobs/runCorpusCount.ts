import type { CountConfig } from "../config/options";
import { closeSink, openSink, writeCounts, type CountSink } from "../export/exporters";
import { readCorpus } from "../ingest/readCorpus";
import { tokenize } from "../nlp/tokenize";
import { countCorpus, type CountResult, type PipelineStage } from "../pipeline/countCorpus";

export function runCorpusCount(config: CountConfig, onStage?: (stage: PipelineStage) => void): CountResult {
  // Both destinations are opened before the corpus is read, as the original tool does.
  const sinks: CountSink[] = [];
  try {
    const tokenSink = openSink(config.tokenCounts);
    sinks.push(tokenSink);
    const ngramSink = config.ngramCounts !== undefined ? openSink(config.ngramCounts) : undefined;
    if (ngramSink) sinks.push(ngramSink);

    onStage?.("ReadInput");
    const text = readCorpus(config.corpus);
    const result = countCorpus(tokenize(text), {
      tokenMin: config.tokenMin,
      ngramMin: config.ngramMin,
      filterFirst: config.filterFirst,
      tieBreak: config.tieBreak,
      ngrams: ngramSink ? { minN: config.minN, maxN: config.maxN, bracket: config.bracket } : undefined,
      onStage,
    });

    writeCounts(tokenSink, result.tokens);
    if (ngramSink && result.ngrams) writeCounts(ngramSink, result.ngrams);

    return result;
  } finally {
    for (const sink of sinks) closeSink(sink);
  }
}

export function summarize(result: CountResult): string[] {
  const { stats } = result;
  const lines = [
    `Counted ${stats.tokenOccurrences} tokens (${stats.distinctTokens} distinct, ${stats.keptTokens} kept)`,
  ];
  if (stats.distinctNgrams !== undefined) {
    lines.push(`Counted ${stats.distinctNgrams} distinct n-grams (${stats.keptNgrams ?? 0} kept)`);
  }
  return lines;
}
