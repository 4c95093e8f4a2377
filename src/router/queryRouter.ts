import { DEFAULT_TOOL_ROUTER_TOPK, MAX_TOOL_ROUTER_TOPK } from "../config/routerConfig.js";
import type { StructuredLogger } from "../logger.js";
import { DateInterpreter } from "./dateInterpreter.js";
import { ROUTER_ERROR_CODES, RoutingConfigurationError } from "./errors.js";
import { FuzzyCorrector } from "./fuzzyCorrector.js";
import { KeywordScorer, type ScoringVocabulary } from "./keywordScorer.js";
import { type Pattern, PatternLibrary, type PatternDefinition } from "./patternLibrary.js";
import { type SynonymGroup, SynonymTable } from "./synonymTable.js";
import { escapeRegExp, normaliseText } from "./text.js";
import { ToolCatalog, type ToolCatalogEntry } from "./toolCatalog.js";
import type {
  Confidence,
  DateRange,
  ParamValue,
  RoutingResult,
  ToolMetadata,
  ToolSuggestion,
} from "./types.js";

/** Score given to the tool bound to a matched pattern. */
export const PATTERN_PRIMARY_SCORE = 10;
/** Score given to the alternative tool of a matched pattern. */
export const PATTERN_ALTERNATIVE_SCORE = 9;

/** Number of canonical concepts quoted in clarification prompts. */
const CLARIFICATION_EXAMPLES = 5;

/** Raw declarations the router is assembled from. */
export interface RoutingData {
  readonly synonyms: readonly SynonymGroup[];
  readonly patterns: readonly PatternDefinition[];
  readonly vocabulary: ScoringVocabulary;
  readonly catalog: readonly ToolCatalogEntry[];
}

export interface QueryRouterOptions {
  /** Maximum number of keyword-ranked suggestions, clamped to `[1, 10]`. */
  readonly topK?: number;
  /** Inclusive acceptance threshold of the fuzzy corrector. */
  readonly fuzzyThreshold?: number;
  readonly logger?: StructuredLogger;
}

export interface QueryRouterComponents {
  readonly synonyms: SynonymTable;
  readonly patterns: PatternLibrary;
  readonly catalog: ToolCatalog;
  readonly scorer: KeywordScorer;
  readonly corrector: FuzzyCorrector;
  readonly dates?: DateInterpreter;
}

interface ScoredTool {
  readonly tool: ToolMetadata;
  readonly score: number;
}

function clampTopK(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return DEFAULT_TOOL_ROUTER_TOPK;
  }
  return Math.min(Math.max(1, Math.floor(value)), MAX_TOOL_ROUTER_TOPK);
}

/**
 * Resolves a free-text business query to ranked tool suggestions.
 *
 * A pattern hit short-circuits everything else. Otherwise the query keywords
 * are scored against every catalog tool, and a query no tool scores on gets a
 * clarification prompt instead of a guess. The temporal phrase of the query is
 * resolved in every case.
 */
export class QueryRouter {
  readonly topK: number;
  private readonly synonyms: SynonymTable;
  private readonly patterns: PatternLibrary;
  private readonly catalog: ToolCatalog;
  private readonly scorer: KeywordScorer;
  private readonly corrector: FuzzyCorrector;
  private readonly dates: DateInterpreter;
  private readonly logger?: StructuredLogger;
  private readonly clarificationPrompt: string;

  constructor(components: QueryRouterComponents, options: QueryRouterOptions = {}) {
    this.synonyms = components.synonyms;
    this.patterns = components.patterns;
    this.catalog = components.catalog;
    this.scorer = components.scorer;
    this.corrector = components.corrector;
    this.dates = components.dates ?? new DateInterpreter();
    this.topK = clampTopK(options.topK);
    this.logger = options.logger;

    for (const tool of this.patterns.referencedTools()) {
      if (!this.catalog.has(tool)) {
        throw new RoutingConfigurationError(
          ROUTER_ERROR_CODES.UNKNOWN_TOOL,
          `pattern references unknown tool "${tool}"`,
          { tool },
        );
      }
    }
    for (const reference of this.catalog.unknownTermTools) {
      this.logger?.warn("router_term_tool_unknown", reference);
    }

    const examples = this.synonyms
      .canonicalTerms()
      .filter((term) => this.synonyms.toolsFor(term).some((tool) => this.catalog.has(tool)))
      .slice(0, CLARIFICATION_EXAMPLES);
    this.clarificationPrompt =
      examples.length > 0
        ? `Please be more specific about what you need, for example: ${examples.join(", ")}.`
        : "Please be more specific about what you need.";
  }

  /** Builds every component from raw declarations. */
  static fromData(data: RoutingData, options: QueryRouterOptions = {}): QueryRouter {
    const synonyms = SynonymTable.fromGroups(data.synonyms);
    const scorer = new KeywordScorer(synonyms, data.vocabulary);
    return new QueryRouter(
      {
        synonyms,
        patterns: PatternLibrary.fromDefinitions(data.patterns),
        catalog: ToolCatalog.build(data.catalog, { synonyms, scorer }),
        scorer,
        corrector: new FuzzyCorrector(synonyms, { threshold: options.fuzzyThreshold }),
      },
      options,
    );
  }

  /** Routes one query. `today` anchors every relative date phrase. */
  route(query: string, today: Date): RoutingResult {
    const text = normaliseText(query);
    const dateRange = this.dates.find(text, today);

    const hit = this.patterns.match(text);
    if (hit) {
      return this.routePattern(query, hit.pattern, hit.phrase, dateRange, today);
    }

    // Same word boundaries as the date rules, so "2024" never bites into "sku2024".
    const remainder = dateRange
      ? text.replace(new RegExp(`\\b${escapeRegExp(dateRange.expression)}\\b`, "u"), " ")
      : text;
    const terms = this.scorer.analyze(remainder, (token) => this.corrector.correct(token));
    const keywords = Array.from(terms.keywords).sort();

    const ranked: ScoredTool[] = [];
    for (const tool of this.catalog.list()) {
      const score = this.scorer.score(terms.keywords, tool, terms.actionSuffixes);
      if (score > 0) {
        ranked.push({ tool, score });
      }
    }
    ranked.sort((left, right) => right.score - left.score || left.tool.name.localeCompare(right.tool.name));

    if (ranked.length === 0) {
      this.logger?.debug("router_clarify", { query, keywords });
      return {
        query,
        suggestions: [],
        clarification: this.clarificationPrompt,
        dateRange,
        resolution: "clarify",
        matchedPhrase: null,
        keywords,
      };
    }

    const suggestions = ranked
      .slice(0, this.topK)
      .map(({ tool, score }) => this.suggest(tool, score, "context-dependent", {}, dateRange));
    this.logger?.debug("router_ranked", {
      query,
      keywords,
      corrections: terms.corrections,
      tools: suggestions.map((suggestion) => ({ tool: suggestion.tool, score: suggestion.score })),
    });
    return {
      query,
      suggestions,
      clarification: null,
      dateRange,
      resolution: "keywords",
      matchedPhrase: null,
      keywords,
    };
  }

  private routePattern(
    query: string,
    pattern: Pattern,
    phrase: string,
    found: DateRange | null,
    today: Date,
  ): RoutingResult {
    const dateRange = found ?? (pattern.dateHint === "this_month" ? this.dates.monthToDate(today) : null);
    const suggestions: ToolSuggestion[] = [
      this.suggest(this.requireTool(pattern.tool), PATTERN_PRIMARY_SCORE, pattern.confidence, pattern.params, dateRange),
    ];
    if (pattern.alternative) {
      suggestions.push(
        this.suggest(
          this.requireTool(pattern.alternative),
          PATTERN_ALTERNATIVE_SCORE,
          "context-dependent",
          {},
          dateRange,
        ),
      );
    }
    this.logger?.debug("router_pattern_hit", { query, phrase, tool: pattern.tool });
    return {
      query,
      suggestions,
      clarification: null,
      dateRange,
      resolution: "pattern",
      matchedPhrase: phrase,
      keywords: [],
    };
  }

  /** Pattern tools are checked at construction, so a miss here is a programming error. */
  private requireTool(name: string): ToolMetadata {
    const tool = this.catalog.get(name);
    if (!tool) {
      throw new RoutingConfigurationError(ROUTER_ERROR_CODES.UNKNOWN_TOOL, `unknown tool "${name}"`, { tool: name });
    }
    return tool;
  }

  private suggest(
    tool: ToolMetadata,
    score: number,
    confidence: Confidence,
    params: Readonly<Record<string, ParamValue>>,
    dateRange: DateRange | null,
  ): ToolSuggestion {
    const suggestedParams: Record<string, ParamValue> = { ...params };
    if (dateRange && tool.params.includes("date_from") && tool.params.includes("date_to")) {
      suggestedParams.date_from = dateRange.start;
      suggestedParams.date_to = dateRange.end;
    }
    return Object.freeze({
      tool: tool.name,
      purpose: tool.purpose,
      keyParams: tool.params,
      suggestedParams: Object.freeze(suggestedParams),
      score,
      confidence,
    });
  }
}
