/** Normalised, language-independent identifier of a business concept. */
export type CanonicalTerm = string;

/**
 * Confidence attached to a suggestion. Pattern hits carry the confidence
 * declared by the pattern; keyword-scored tools are always
 * `context-dependent`.
 */
export type Confidence = "definitive" | "context-dependent";

/** Exhaustive list of {@link Confidence} values, used by the data schemas. */
export const CONFIDENCE_LEVELS = ["definitive", "context-dependent"] as const satisfies readonly Confidence[];

/** Scalar values a suggested parameter may hold. */
export type ParamValue = string | number | boolean;

/** Distinguishes calendar-aligned periods from windows counted back from today. */
export type DateRangeKind = "calendar" | "rolling";

/** Inclusive date span resolved from a temporal phrase. Dates use `YYYY-MM-DD`. */
export interface DateRange {
  readonly start: string;
  readonly end: string;
  readonly kind: DateRangeKind;
  /** Phrase of the query that produced the range. */
  readonly expression: string;
}

/** Catalog entry as consumed by the scorer once keywords are normalised. */
export interface ToolMetadata {
  readonly name: string;
  /** One-line purpose surfaced with suggestions. */
  readonly purpose: string;
  readonly params: readonly string[];
  readonly keywords: ReadonlySet<string>;
}

export interface ToolSuggestion {
  readonly tool: string;
  readonly purpose: string;
  readonly keyParams: readonly string[];
  readonly suggestedParams: Readonly<Record<string, ParamValue>>;
  readonly score: number;
  readonly confidence: Confidence;
}

/** Terminal state reached by the router for a query. */
export type RoutingResolution = "pattern" | "keywords" | "clarify";

export interface RoutingResult {
  readonly query: string;
  /** Ordered by score (descending) then tool name. Empty when clarifying. */
  readonly suggestions: readonly ToolSuggestion[];
  /** Non-null only when no tool could be resolved. */
  readonly clarification: string | null;
  readonly dateRange: DateRange | null;
  readonly resolution: RoutingResolution;
  /** Phrase that triggered the pattern hit, `null` otherwise. */
  readonly matchedPhrase: string | null;
  /** Normalised keywords used for scoring (sorted). Empty on pattern hits. */
  readonly keywords: readonly string[];
}
