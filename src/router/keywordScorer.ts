import type { SynonymTable } from "./synonymTable.js";
import { escapeRegExp, MIN_KEYWORD_LENGTH, normaliseText, tokenise } from "./text.js";
import type { CanonicalTerm, ToolMetadata } from "./types.js";

/** Additive boost granted when an action verb matches the tool name suffix. */
export const ACTION_VERB_BONUS = 0.5;

/** Bilingual word lists driving keyword extraction. */
export interface ScoringVocabulary {
  readonly stopwords: readonly string[];
  /** Action verb → tool name suffixes it favours (`"daftar"` → `["_list"]`). */
  readonly actionVerbs: Readonly<Record<string, readonly string[]>>;
}

/** Optional second-chance lookup applied to tokens the synonym table misses. */
export type TermCorrector = (token: string) => CanonicalTerm | null;

/** Query word that was rewritten by the corrector. */
export interface TermCorrection {
  readonly surface: string;
  readonly term: CanonicalTerm;
}

/** Keywords and verb hints extracted from a piece of text. */
export interface QueryTerms {
  readonly keywords: ReadonlySet<string>;
  readonly actionSuffixes: readonly string[];
  readonly corrections: readonly TermCorrection[];
}

const NUMERIC_TOKEN = /^\p{N}+$/u;

/**
 * Scores catalog tools by keyword overlap with a query. Text is split into
 * tokens, stop-words are dropped and the remaining tokens go through the
 * synonym table so "faktur" and "invoices" both count as "invoice".
 */
export class KeywordScorer {
  private readonly stopwords: ReadonlySet<string>;
  private readonly actionVerbs: ReadonlyMap<string, readonly string[]>;
  private readonly phrasePatterns: ReadonlyArray<{ readonly term: CanonicalTerm; readonly pattern: RegExp }>;

  constructor(
    private readonly synonyms: SynonymTable,
    vocabulary: ScoringVocabulary,
  ) {
    this.stopwords = new Set(vocabulary.stopwords.map((word) => normaliseText(word)));
    this.actionVerbs = new Map(
      Object.entries(vocabulary.actionVerbs).map(([verb, suffixes]) => [normaliseText(verb), Object.freeze([...suffixes])]),
    );
    const phrasePatterns: Array<{ term: CanonicalTerm; pattern: RegExp }> = [];
    for (const phrase of synonyms.phrases()) {
      const term = synonyms.normalize(phrase);
      if (term !== null) {
        phrasePatterns.push({ term, pattern: new RegExp(`\\b${escapeRegExp(phrase)}\\b`, "gu") });
      }
    }
    this.phrasePatterns = Object.freeze(phrasePatterns);
  }

  isStopword(token: string): boolean {
    return this.stopwords.has(token);
  }

  isActionVerb(token: string): boolean {
    return this.actionVerbs.has(token);
  }

  /** Tool-name suffixes favoured by the action verbs among the tokens. */
  actionSuffixes(tokens: Iterable<string>): string[] {
    const suffixes: string[] = [];
    for (const token of tokens) {
      for (const suffix of this.actionVerbs.get(token) ?? []) {
        if (!suffixes.includes(suffix)) {
          suffixes.push(suffix);
        }
      }
    }
    return suffixes;
  }

  /**
   * Extracts normalised keywords from free text. Multi-word synonyms
   * ("jatuh tempo") are resolved first, then single tokens are looked up in
   * the synonym table, handed to {@link correct} when absent, and kept
   * verbatim when neither knows them. Numeric tokens and action verbs are
   * never corrected.
   */
  analyze(text: string, correct?: TermCorrector): QueryTerms {
    const keywords = new Set<string>();
    const corrections: TermCorrection[] = [];

    let remainder = normaliseText(text);
    for (const { term, pattern } of this.phrasePatterns) {
      if (remainder.search(pattern) >= 0) {
        keywords.add(term);
        remainder = remainder.replace(pattern, " ");
      }
    }

    const tokens = tokenise(remainder);
    const actionSuffixes = this.actionSuffixes(tokens);
    for (const token of tokens) {
      if (token.length < MIN_KEYWORD_LENGTH || this.stopwords.has(token)) {
        continue;
      }
      const canonical = this.synonyms.normalize(token);
      if (canonical !== null) {
        keywords.add(canonical);
        continue;
      }
      const correctable = correct && !NUMERIC_TOKEN.test(token) && !this.isActionVerb(token);
      const corrected = correctable ? correct(token) : null;
      if (corrected !== null) {
        keywords.add(corrected);
        corrections.push({ surface: token, term: corrected });
        continue;
      }
      keywords.add(token);
    }

    return { keywords, actionSuffixes, corrections };
  }

  /**
   * Size of the overlap between the query keywords and the tool keywords, plus
   * {@link ACTION_VERB_BONUS} when one of the action suffixes ends the tool
   * name. Action verbs only ever contribute the bonus: "list" matching the
   * `list` keyword of `contact_list` is not overlap, so a query made of verbs
   * alone scores zero everywhere.
   */
  score(
    queryTokens: ReadonlySet<string>,
    tool: ToolMetadata,
    actionSuffixes: readonly string[] = this.actionSuffixes(queryTokens),
  ): number {
    let overlap = 0;
    for (const token of queryTokens) {
      if (tool.keywords.has(token) && !this.isActionVerb(token)) {
        overlap += 1;
      }
    }
    if (overlap === 0) {
      return 0;
    }
    const name = tool.name.toLowerCase();
    const boosted = actionSuffixes.some((suffix) => name.endsWith(suffix));
    return overlap + (boosted ? ACTION_VERB_BONUS : 0);
  }
}
