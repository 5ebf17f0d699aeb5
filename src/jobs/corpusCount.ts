#!/usr/bin/env node
import { parseArgs, USAGE } from "../config/options";
import { exitCodeFor } from "../errors";
import { runCorpusCount, summarize } from "./runCorpusCount";

async function main() {
  const config = parseArgs(process.argv.slice(2));
  if (config.help) {
    process.stdout.write(USAGE);
    return;
  }

  const result = runCorpusCount(config);

  // stdout may be carrying the token counts
  for (const line of summarize(result)) console.error(line);
}

main().catch((err) => {
  console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(exitCodeFor(err));
});
