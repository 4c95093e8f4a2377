import { ROUTER_ERROR_CODES, RoutingConfigurationError } from "./errors.js";
import { normaliseText } from "./text.js";
import type { Confidence, ParamValue } from "./types.js";

/**
 * Date hint carried by a pattern. `this_month` asks the router to fill
 * `date_from`/`date_to` from the query's date phrase, or from the current
 * month when the query names no period.
 */
export type PatternDateHint = "this_month";

/** Pattern as declared in the data files. */
export interface PatternDefinition {
  readonly phrases: readonly string[];
  readonly tool: string;
  readonly params?: Readonly<Record<string, ParamValue>>;
  readonly alternative?: string;
  readonly dateHint?: PatternDateHint;
  readonly confidence: Confidence;
}

/** Registered pattern with normalised phrases. */
export interface Pattern {
  readonly phrases: readonly string[];
  readonly tool: string;
  readonly params: Readonly<Record<string, ParamValue>>;
  readonly alternative: string | null;
  readonly dateHint: PatternDateHint | null;
  readonly confidence: Confidence;
}

export interface PatternMatch {
  readonly pattern: Pattern;
  /** Registered phrase found in the query. */
  readonly phrase: string;
}

interface PhraseEntry {
  readonly phrase: string;
  readonly pattern: Pattern;
}

/**
 * Ordered library of idiomatic expressions bound directly to a tool. Matching
 * is a plain containment check: the longest phrase contained in the query wins
 * and equal lengths keep registration order.
 */
export class PatternLibrary {
  private readonly registered: readonly Pattern[];
  private readonly phraseIndex: readonly PhraseEntry[];

  private constructor(patterns: readonly Pattern[]) {
    this.registered = patterns;
    this.phraseIndex = Object.freeze(
      patterns.flatMap((pattern) => pattern.phrases.map((phrase) => ({ phrase, pattern }))),
    );
  }

  /**
   * Validates and freezes the declarations. Empty phrases, phrase-less patterns
   * and phrases shared by two patterns abort construction.
   */
  static fromDefinitions(definitions: readonly PatternDefinition[]): PatternLibrary {
    const owners = new Map<string, number>();
    const patterns: Pattern[] = [];

    definitions.forEach((definition, index) => {
      const tool = definition.tool.trim();
      if (tool.length === 0) {
        throw new RoutingConfigurationError(
          ROUTER_ERROR_CODES.PATTERN_INVALID,
          `pattern #${index} does not name a tool`,
          { index },
        );
      }
      const phrases: string[] = [];
      for (const raw of definition.phrases) {
        const phrase = normaliseText(raw);
        if (phrase.length === 0) {
          throw new RoutingConfigurationError(
            ROUTER_ERROR_CODES.PATTERN_INVALID,
            `pattern #${index} (${tool}) declares an empty phrase`,
            { index, tool },
          );
        }
        const owner = owners.get(phrase);
        if (owner !== undefined && owner !== index) {
          throw new RoutingConfigurationError(
            ROUTER_ERROR_CODES.PATTERN_CONFLICT,
            `phrase "${phrase}" is registered by patterns #${owner} and #${index}`,
            { phrase, patterns: [owner, index] },
          );
        }
        if (owner === undefined) {
          owners.set(phrase, index);
          phrases.push(phrase);
        }
      }
      if (phrases.length === 0) {
        throw new RoutingConfigurationError(
          ROUTER_ERROR_CODES.PATTERN_INVALID,
          `pattern #${index} (${tool}) has no phrases`,
          { index, tool },
        );
      }
      const alternative = definition.alternative?.trim();
      patterns.push(
        Object.freeze({
          phrases: Object.freeze(phrases),
          tool,
          params: Object.freeze({ ...(definition.params ?? {}) }),
          alternative: alternative && alternative.length > 0 ? alternative : null,
          dateHint: definition.dateHint ?? null,
          confidence: definition.confidence,
        }),
      );
    });

    return new PatternLibrary(Object.freeze(patterns));
  }

  /** Returns the pattern owning the longest phrase contained in the query. */
  match(query: string): PatternMatch | null {
    const haystack = normaliseText(query);
    if (haystack.length === 0) {
      return null;
    }
    let best: PhraseEntry | null = null;
    for (const entry of this.phraseIndex) {
      if (best !== null && entry.phrase.length <= best.phrase.length) {
        continue;
      }
      if (haystack.includes(entry.phrase)) {
        best = entry;
      }
    }
    return best ? { pattern: best.pattern, phrase: best.phrase } : null;
  }

  patterns(): readonly Pattern[] {
    return this.registered;
  }

  /** Tool names referenced by the library (primary tools and alternatives). */
  referencedTools(): Set<string> {
    const tools = new Set<string>();
    for (const pattern of this.registered) {
      tools.add(pattern.tool);
      if (pattern.alternative) {
        tools.add(pattern.alternative);
      }
    }
    return tools;
  }
}
