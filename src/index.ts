export { tokenize, tokenizeLines } from "./nlp/tokenize";
export { FrequencyTable, countItems, type CountEntry } from "./nlp/frequency";
export { extractNgrams, bracketToken, BOW, EOW, type NgramOptions } from "./nlp/ngrams";
export { filterByMinCount } from "./nlp/filter";
export { sortCounts, type SortedCount, type TieBreak } from "./export/sort";
export { renderTsv, openSink, closeSink, writeCounts, type CountSink } from "./export/exporters";
export { readCorpus } from "./ingest/readCorpus";
export {
  countCorpus,
  countNgrams,
  pipelineMode,
  type CountResult,
  type CountStats,
  type NgramSettings,
  type PipelineConfig,
  type PipelineMode,
  type PipelineStage,
} from "./pipeline/countCorpus";
export { parseArgs, validateConfig, DEFAULTS, type CountConfig } from "./config/options";
export { CorpusCountError, ConfigurationError, IoError, exitCodeFor } from "./errors";
export { runCorpusCount, summarize } from "./jobs/runCorpusCount";
