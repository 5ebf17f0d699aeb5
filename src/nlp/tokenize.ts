// Unicode White_Space: includes U+0085, excludes U+FEFF (unlike \s).
const WHITESPACE_RUN = /[^\p{White_Space}]+/gu;

/**
 * Splits text on runs of whitespace. Leading and trailing whitespace
 * produce no tokens, so no token is ever the empty string.
 */
export function* tokenize(text: string): Generator<string> {
  for (const m of text.matchAll(WHITESPACE_RUN)) {
    yield m[0];
  }
}

export function* tokenizeLines(lines: Iterable<string>): Generator<string> {
  for (const line of lines) {
    yield* tokenize(line);
  }
}
