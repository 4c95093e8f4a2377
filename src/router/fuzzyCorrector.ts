import type { SynonymTable } from "./synonymTable.js";
import { normaliseText } from "./text.js";
import type { CanonicalTerm } from "./types.js";

/** Minimum weighted ratio (0-100, inclusive) required to accept a correction. */
export const DEFAULT_FUZZY_THRESHOLD = 80;
/** Tokens shorter than this are never corrected. */
export const DEFAULT_FUZZY_MIN_LENGTH = 3;

/** Scale applied to the token-based ratios. */
const UNBASE_SCALE = 0.95;
/** Length ratio from which partial alignments are considered. */
const PARTIAL_LENGTH_RATIO = 1.5;
/** Length ratio above which partial alignments are heavily discounted. */
const LONG_PARTIAL_LENGTH_RATIO = 8;

/** Lower-cases and replaces every non alphanumeric run with a single space. */
function preprocess(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/** Length of the longest common subsequence, in O(min(m, n)) memory. */
function longestCommonSubsequence(left: string, right: string): number {
  const [outer, inner] = left.length >= right.length ? [left, right] : [right, left];
  let previous = new Array<number>(inner.length + 1).fill(0);
  for (let position = 0; position < outer.length; position += 1) {
    const current = [0];
    for (let index = 0; index < inner.length; index += 1) {
      current.push(outer[position] === inner[index] ? previous[index] + 1 : Math.max(previous[index + 1], current[index]));
    }
    previous = current;
  }
  return previous[inner.length];
}

/**
 * Normalised indel similarity in `[0, 100]`, `2 * LCS / (m + n)`: insertions
 * and deletions cost one, substitutions two.
 */
function ratio(left: string, right: string): number {
  if (left.length === 0 || right.length === 0) {
    return 0;
  }
  if (left === right) {
    return 100;
  }
  return (200 * longestCommonSubsequence(left, right)) / (left.length + right.length);
}

/** Best {@link ratio} of the shorter string against every same-length window of the longer one. */
function partialRatio(left: string, right: string): number {
  const [shorter, longer] = left.length <= right.length ? [left, right] : [right, left];
  if (shorter.length === 0) {
    return 0;
  }
  if (shorter.length === longer.length) {
    return ratio(shorter, longer);
  }
  let best = 0;
  for (let offset = 0; offset <= longer.length - shorter.length; offset += 1) {
    best = Math.max(best, ratio(shorter, longer.slice(offset, offset + shorter.length)));
    if (best === 100) {
      break;
    }
  }
  return best;
}

function splitTokens(value: string): string[] {
  return value.split(" ").filter((token) => token.length > 0);
}

function tokenSortRatio(left: string, right: string, partial: boolean): number {
  const scorer = partial ? partialRatio : ratio;
  return scorer(splitTokens(left).sort().join(" "), splitTokens(right).sort().join(" "));
}

/**
 * Compares the shared tokens against each side's remainder so that "rep sales"
 * and "sales rep team" are recognised as overlapping.
 */
function tokenSetRatio(left: string, right: string, partial: boolean): number {
  const scorer = partial ? partialRatio : ratio;
  const leftTokens = new Set(splitTokens(left));
  const rightTokens = new Set(splitTokens(right));
  const intersection = [...leftTokens].filter((token) => rightTokens.has(token)).sort();
  const leftOnly = [...leftTokens].filter((token) => !rightTokens.has(token)).sort();
  const rightOnly = [...rightTokens].filter((token) => !leftTokens.has(token)).sort();

  const shared = intersection.join(" ");
  const combinedLeft = `${shared} ${leftOnly.join(" ")}`.trim();
  const combinedRight = `${shared} ${rightOnly.join(" ")}`.trim();
  return Math.max(
    scorer(shared, combinedLeft),
    scorer(shared, combinedRight),
    scorer(combinedLeft, combinedRight),
  );
}

/**
 * Weighted similarity (integer in `[0, 100]`) combining the plain ratio with
 * token-sorted and token-set variants. Partial alignments only participate
 * when one string is at least 1.5 times longer than the other, and are
 * discounted more strongly past a length ratio of 8.
 */
export function weightedRatio(left: string, right: string): number {
  const a = preprocess(left);
  const b = preprocess(right);
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  const base = ratio(a, b);
  const lengthRatio = Math.max(a.length, b.length) / Math.min(a.length, b.length);

  if (lengthRatio < PARTIAL_LENGTH_RATIO) {
    const sorted = tokenSortRatio(a, b, false) * UNBASE_SCALE;
    const set = tokenSetRatio(a, b, false) * UNBASE_SCALE;
    return Math.round(Math.max(base, sorted, set));
  }

  const partialScale = lengthRatio > LONG_PARTIAL_LENGTH_RATIO ? 0.6 : 0.9;
  const partial = partialRatio(a, b) * partialScale;
  const sorted = tokenSortRatio(a, b, true) * UNBASE_SCALE * partialScale;
  const set = tokenSetRatio(a, b, true) * UNBASE_SCALE * partialScale;
  return Math.round(Math.max(base, partial, sorted, set));
}

export interface FuzzyCorrectorOptions {
  /** Inclusive acceptance threshold on the `[0, 100]` scale. */
  readonly threshold?: number;
  /** Minimum token length eligible for correction. */
  readonly minLength?: number;
}

/** Closest synonym key found for a token. */
export interface FuzzyCandidate {
  readonly key: string;
  readonly term: CanonicalTerm;
  readonly score: number;
}

/**
 * Typo-tolerant lookup against the synonym vocabulary. A failed correction is
 * a normal outcome and yields `null`.
 */
export class FuzzyCorrector {
  readonly threshold: number;
  readonly minLength: number;

  constructor(
    private readonly synonyms: SynonymTable,
    options: FuzzyCorrectorOptions = {},
  ) {
    this.threshold = options.threshold ?? DEFAULT_FUZZY_THRESHOLD;
    this.minLength = options.minLength ?? DEFAULT_FUZZY_MIN_LENGTH;
  }

  /** Canonical term of the closest key when it clears the threshold. */
  correct(token: string): CanonicalTerm | null {
    const exact = this.synonyms.normalize(token);
    if (exact !== null) {
      return exact;
    }
    const candidate = this.closest(token);
    if (!candidate || candidate.score < this.threshold) {
      return null;
    }
    return candidate.term;
  }

  /**
   * Highest scoring key regardless of the threshold; ties keep the first key
   * in table order. Tokens below {@link minLength} yield `null`.
   */
  closest(token: string): FuzzyCandidate | null {
    const needle = normaliseText(token);
    if (needle.length < this.minLength) {
      return null;
    }
    let best: FuzzyCandidate | null = null;
    for (const key of this.synonyms.keys()) {
      const score = weightedRatio(needle, key);
      if (best !== null && score <= best.score) {
        continue;
      }
      const term = this.synonyms.normalize(key);
      if (term !== null) {
        best = { key, term, score };
      }
      if (score === 100) {
        break;
      }
    }
    return best;
  }
}
