import { FrequencyTable, countItems } from "../nlp/frequency";
import { extractNgrams } from "../nlp/ngrams";
import { filterByMinCount } from "../nlp/filter";
import { sortCounts, type SortedCount, type TieBreak } from "../export/sort";

export type PipelineMode = "count-first" | "filter-first";

export type PipelineStage =
  | "ReadInput"
  | "TokenizeAndCountTokens"
  | "CountNGramsBeforeFilter"
  | "FilterTokensThenCountNGrams"
  | "FilterTokenTable"
  | "FilterNGramTable"
  | "EmitTokenOutput"
  | "EmitNGramOutput"
  | "Done";

export type NgramSettings = {
  minN: number;
  maxN: number;
  bracket: boolean;
};

export type PipelineConfig = Readonly<{
  tokenMin?: number;
  ngramMin?: number;
  filterFirst?: boolean;
  tieBreak?: TieBreak;
  /** Leave out to skip n-gram counting entirely. */
  ngrams?: NgramSettings;
  onStage?: (stage: PipelineStage) => void;
}>;

export type CountStats = {
  tokenOccurrences: number;
  distinctTokens: number;
  keptTokens: number;
  distinctNgrams?: number;
  keptNgrams?: number;
};

export type CountResult = {
  tokens: SortedCount[];
  ngrams?: SortedCount[];
  stats: CountStats;
};

export function pipelineMode(config: Pick<PipelineConfig, "filterFirst">): PipelineMode {
  return config.filterFirst ? "filter-first" : "count-first";
}

/**
 * N-grams of each distinct token, credited with the token's count. Walking
 * tokens in first-seen order gives the same counts and the same first-seen
 * order as extracting from every occurrence.
 */
export function countNgrams(tokens: FrequencyTable, settings: NgramSettings): FrequencyTable {
  const ngrams = new FrequencyTable();
  for (const [token, count] of tokens.entries()) {
    for (const gram of extractNgrams(token, settings)) {
      ngrams.add(gram, count);
    }
  }
  return ngrams;
}

export function countCorpus(tokenStream: Iterable<string>, config: PipelineConfig = {}): CountResult {
  const enter = config.onStage ?? (() => {});
  const tieBreak = config.tieBreak ?? "first-seen";

  enter("TokenizeAndCountTokens");
  const allTokens = countItems(tokenStream);

  let tokens: FrequencyTable;
  let ngrams: FrequencyTable | undefined;
  let distinctNgrams: number | undefined;

  if (pipelineMode(config) === "count-first") {
    if (config.ngrams) {
      enter("CountNGramsBeforeFilter");
      ngrams = countNgrams(allTokens, config.ngrams);
      distinctNgrams = ngrams.size;
    }
    enter("FilterTokenTable");
    tokens = filterByMinCount(allTokens, config.tokenMin);
  } else {
    // Token filtering happens here, so dropped tokens contribute no n-grams
    // and there is no separate FilterTokenTable stage.
    enter("FilterTokensThenCountNGrams");
    tokens = filterByMinCount(allTokens, config.tokenMin);
    if (config.ngrams) {
      ngrams = countNgrams(tokens, config.ngrams);
      distinctNgrams = ngrams.size;
    }
  }

  if (ngrams) {
    enter("FilterNGramTable");
    ngrams = filterByMinCount(ngrams, config.ngramMin);
  }

  enter("EmitTokenOutput");
  const result: CountResult = {
    tokens: sortCounts(tokens, tieBreak),
    stats: {
      tokenOccurrences: allTokens.total,
      distinctTokens: allTokens.size,
      keptTokens: tokens.size,
      distinctNgrams,
      keptNgrams: ngrams?.size,
    },
  };

  if (ngrams) {
    enter("EmitNGramOutput");
    result.ngrams = sortCounts(ngrams, tieBreak);
  }

  enter("Done");
  return result;
}
