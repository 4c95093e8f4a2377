export { DateInterpreter, MAX_ROLLING_DAYS } from "./dateInterpreter.js";
export { ROUTER_ERROR_CODES, RoutingConfigurationError, type RouterErrorCode } from "./errors.js";
export {
  DEFAULT_FUZZY_MIN_LENGTH,
  DEFAULT_FUZZY_THRESHOLD,
  FuzzyCorrector,
  weightedRatio,
  type FuzzyCandidate,
  type FuzzyCorrectorOptions,
} from "./fuzzyCorrector.js";
export {
  ACTION_VERB_BONUS,
  KeywordScorer,
  type QueryTerms,
  type ScoringVocabulary,
  type TermCorrection,
  type TermCorrector,
} from "./keywordScorer.js";
export {
  PatternLibrary,
  type Pattern,
  type PatternDateHint,
  type PatternDefinition,
  type PatternMatch,
} from "./patternLibrary.js";
export {
  PATTERN_ALTERNATIVE_SCORE,
  PATTERN_PRIMARY_SCORE,
  QueryRouter,
  type QueryRouterComponents,
  type QueryRouterOptions,
  type RoutingData,
} from "./queryRouter.js";
export { createQueryRouter, loadRoutingData, ROUTING_DATA_FILES, type CreateQueryRouterOptions } from "./routingData.js";
export { SynonymTable, type SynonymGroup } from "./synonymTable.js";
export { ToolCatalog, type ToolCatalogEntry, type UnknownTermTool } from "./toolCatalog.js";
export type {
  CanonicalTerm,
  Confidence,
  DateRange,
  DateRangeKind,
  ParamValue,
  RoutingResolution,
  RoutingResult,
  ToolMetadata,
  ToolSuggestion,
} from "./types.js";
