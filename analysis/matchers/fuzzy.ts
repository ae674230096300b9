import type { FuzzyMatch, FuzzyOptions } from "../analyzer.types.js";

// Widest phrase the bit-parallel path handles in a 32-bit int
const MAX_BITS = 30;

type CompiledPhrase = {
  length: number;
  /** LCS(phrase, text[start, end)) */
  lcs: (text: string, start: number, end: number) => number;
};

const compiled = new Map<string, CompiledPhrase>();

function popcount(x: number): number {
  let n = x - ((x >>> 1) & 0x55555555);
  n = (n & 0x33333333) + ((n >>> 2) & 0x33333333);
  return (((n + (n >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24;
}

function compilePhrase(phrase: string): CompiledPhrase {
  const cached = compiled.get(phrase);
  if (cached) return cached;

  const L = phrase.length;
  let entry: CompiledPhrase;

  if (L <= MAX_BITS) {
    const mask = 2 ** L - 1;
    const peq = new Map<string, number>();
    for (let i = 0; i < L; i++) {
      const ch = phrase[i];
      peq.set(ch, (peq.get(ch) ?? 0) | (1 << i));
    }
    entry = {
      length: L,
      lcs: (text, start, end) => {
        let v = mask;
        for (let j = start; j < end; j++) {
          const u = v & (peq.get(text[j]) ?? 0);
          v = ((v + u) | (v - u)) & mask;
        }
        return L - popcount(v);
      },
    };
  } else {
    entry = {
      length: L,
      lcs: (text, start, end) => {
        let col = new Array<number>(L + 1).fill(0);
        for (let j = start; j < end; j++) {
          const next = new Array<number>(L + 1).fill(0);
          for (let i = 1; i <= L; i++) {
            next[i] = phrase[i - 1] === text[j] ? col[i - 1] + 1 : Math.max(col[i], next[i - 1]);
          }
          col = next;
        }
        return col[L];
      },
    };
  }

  compiled.set(phrase, entry);
  return entry;
}

/**
 * Best similarity (0-100) between the phrase and a window of the text.
 * Windows are exactly as long as the phrase, except at the two ends of the
 * text where shorter prefixes and suffixes also count. Similarity of two
 * strings is 2 * LCS / (len1 + len2), rounded.
 *
 * The phrase is always the side searched for, whichever string is shorter:
 * a title-only row "Art" scores 23 against "artificial intelligence", not
 * the 100 a shorter-string-first scorer would give.
 */
export function partialRatio(text: string, phrase: string): number {
  if (!text || !phrase) return 0;
  const { length: L, lcs } = compilePhrase(phrase);
  let best = 0;

  const consider = (start: number, end: number) => {
    const score = Math.round((200 * lcs(text, start, end)) / (L + end - start));
    if (score > best) best = score;
    return best === 100;
  };

  // Full-length windows
  for (let start = 0; start + L <= text.length; start++) {
    if (consider(start, start + L)) return best;
  }
  // Shorter windows at the start and end
  const edge = Math.min(L - 1, text.length);
  for (let n = 1; n <= edge; n++) {
    if (consider(0, n)) return best;
    if (consider(text.length - n, text.length)) return best;
  }
  return best;
}

/** Highest-scoring phrase; the first one wins ties. */
export function bestFuzzyMatch(text: string, phrases: readonly string[]): FuzzyMatch {
  let best: FuzzyMatch = { score: 0, phrase: "" };
  if (!text) return best;
  for (const phrase of phrases) {
    const score = partialRatio(text, phrase);
    if (score > best.score || (!best.phrase && score === best.score)) best = { score, phrase };
  }
  return best;
}

export function fuzzyScore(text: string, phrases: readonly string[]): number {
  return bestFuzzyMatch(text, phrases).score;
}

export function isFuzzyMatch(match: FuzzyMatch, opts: FuzzyOptions): boolean {
  return opts.enabled && match.score >= opts.threshold;
}
