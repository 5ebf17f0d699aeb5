import { ConfigurationError } from "../errors";
import type { TieBreak } from "../export/sort";

export type CountConfig = Readonly<{
  corpus?: string;      // undefined => stdin
  tokenCounts?: string; // undefined => stdout
  ngramCounts?: string; // undefined => no n-gram counting
  tokenMin: number;
  ngramMin: number;
  minN: number;
  maxN: number;
  bracket: boolean;
  filterFirst: boolean;
  tieBreak: TieBreak;
  help: boolean;
}>;

export const DEFAULTS = {
  tokenMin: 1,
  ngramMin: 1,
  minN: 3,
  maxN: 6,
  bracket: true,
  filterFirst: false,
  tieBreak: "first-seen",
  help: false,
} as const satisfies Partial<CountConfig>;

export const USAGE = `Usage: corpus-count [options]

  -c, --corpus <path>        corpus file (default: stdin)
  -t, --token_counts <path>  token count file (default: stdout)
  -n, --ngram_counts <path>  n-gram count file (omit to skip n-grams)
      --token_min <n>        minimum token count (default: ${DEFAULTS.tokenMin})
      --ngram_min <n>        minimum n-gram count (default: ${DEFAULTS.ngramMin})
      --min_n <n>            minimum n-gram length (default: ${DEFAULTS.minN})
      --max_n <n>            maximum n-gram length (default: ${DEFAULTS.maxN})
      --no_bracket           do not wrap tokens in < > before taking n-grams
      --filter_first         filter tokens before counting n-grams
      --ties <rule>          tie order: first-seen | lexical (default: ${DEFAULTS.tieBreak})
  -h, --help                 show this message
`;

const VALUE_FLAGS = new Map<string, string>([
  ["--corpus", "--corpus"],
  ["-c", "--corpus"],
  ["--token_counts", "--token_counts"],
  ["-t", "--token_counts"],
  ["--ngram_counts", "--ngram_counts"],
  ["-n", "--ngram_counts"],
  ["--token_min", "--token_min"],
  ["--ngram_min", "--ngram_min"],
  ["--min_n", "--min_n"],
  ["--max_n", "--max_n"],
  ["--ties", "--ties"],
]);

const SWITCHES = new Map<string, string>([
  ["--no_bracket", "--no_bracket"],
  ["--filter_first", "--filter_first"],
  ["--help", "--help"],
  ["-h", "--help"],
]);

type RawArgs = {
  values: Map<string, string>;
  switches: Set<string>;
};

function splitArgs(argv: readonly string[]): RawArgs {
  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;

    const valueFlag = VALUE_FLAGS.get(flag);
    if (valueFlag) {
      let value: string | undefined;
      if (eq >= 0) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i++;
      }
      if (value === undefined) throw new ConfigurationError(`Missing value for ${flag}`, valueFlag);
      values.set(valueFlag, value);
      continue;
    }

    const sw = SWITCHES.get(flag);
    if (sw && eq < 0) {
      switches.add(sw);
      continue;
    }

    throw new ConfigurationError(`Unknown argument: "${arg}"`);
  }

  return { values, switches };
}

function parseCount(raw: string | undefined, flag: string, fallback: number): number {
  if (raw === undefined) return fallback;
  const s = raw.trim();
  if (!/^\d+$/.test(s)) {
    throw new ConfigurationError(`${flag} must be a non-negative integer, got "${raw}"`, flag);
  }
  const n = Number(s);
  if (!Number.isSafeInteger(n)) throw new ConfigurationError(`${flag} is too large: ${raw}`, flag);
  return n;
}

function parseTieBreak(raw: string | undefined): TieBreak {
  if (raw === undefined) return DEFAULTS.tieBreak;
  const t = raw.trim().toLowerCase();
  if (t === "first-seen" || t === "lexical") return t;
  throw new ConfigurationError(`--ties must be "first-seen" or "lexical", got "${raw}"`, "--ties");
}

export function validateConfig(config: CountConfig): CountConfig {
  const { minN, maxN } = config;
  if (minN === 0) throw new ConfigurationError("The minimum n-gram length cannot be zero.", "--min_n");
  if (minN > maxN) {
    throw new ConfigurationError(
      `The maximum n-gram length (${maxN}) must be at least the minimum length (${minN}).`,
      "--max_n"
    );
  }
  return config;
}

export function parseArgs(argv: readonly string[]): CountConfig {
  const { values, switches } = splitArgs(argv);

  const config: CountConfig = Object.freeze({
    corpus: values.get("--corpus"),
    tokenCounts: values.get("--token_counts"),
    ngramCounts: values.get("--ngram_counts"),
    tokenMin: parseCount(values.get("--token_min"), "--token_min", DEFAULTS.tokenMin),
    ngramMin: parseCount(values.get("--ngram_min"), "--ngram_min", DEFAULTS.ngramMin),
    minN: parseCount(values.get("--min_n"), "--min_n", DEFAULTS.minN),
    maxN: parseCount(values.get("--max_n"), "--max_n", DEFAULTS.maxN),
    bracket: !switches.has("--no_bracket"),
    filterFirst: switches.has("--filter_first"),
    tieBreak: parseTieBreak(values.get("--ties")),
    help: switches.has("--help"),
  });

  if (config.help) return config;
  return validateConfig(config);
}
