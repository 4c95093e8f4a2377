/** Tokens shorter than this never count as keywords. */
export const MIN_KEYWORD_LENGTH = 2;

/**
 * Lower-cases the text, folds typographic apostrophes and collapses runs of
 * whitespace so substring checks behave the same for every input source.
 */
export function normaliseText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’ʼ`]/g, "'")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Splits text on every character that is neither a letter nor a digit. Empty
 * fragments are dropped; short tokens are kept so callers can still spot
 * action verbs before filtering.
 */
export function tokenise(text: string | undefined): string[] {
  if (!text) {
    return [];
  }
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/** Escapes a literal so it can be embedded in a regular expression. */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
