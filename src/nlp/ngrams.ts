export const BOW = "<";
export const EOW = ">";

export type NgramOptions = {
  minN: number;
  maxN: number;
  bracket?: boolean; // default true
};

export function bracketToken(token: string): string {
  return `${BOW}${token}${EOW}`;
}

/**
 * Character n-grams of a token, shortest first, each length left to right.
 * Lengths are counted in code points so astral characters stay whole.
 */
export function* extractNgrams(token: string, opts: NgramOptions): Generator<string> {
  const word = (opts.bracket ?? true) ? bracketToken(token) : token;
  const chars = Array.from(word);

  if (chars.length < opts.minN) return;

  const maxN = Math.min(opts.maxN, chars.length);
  for (let n = opts.minN; n <= maxN; n++) {
    for (let i = 0; i + n <= chars.length; i++) {
      yield chars.slice(i, i + n).join("");
    }
  }
}
