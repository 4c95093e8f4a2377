import { ROUTER_ERROR_CODES, RoutingConfigurationError } from "./errors.js";
import type { KeywordScorer } from "./keywordScorer.js";
import type { SynonymTable } from "./synonymTable.js";
import type { CanonicalTerm, ToolMetadata } from "./types.js";

/** Tool declaration as found in the catalog data file. */
export interface ToolCatalogEntry {
  readonly name: string;
  readonly purpose: string;
  readonly params: readonly string[];
  /** Free-text trigger phrases, tokenised into keywords. */
  readonly hints?: string;
  /** Extra keywords, normalised like the hints. */
  readonly keywords?: readonly string[];
}

/** TermToTools reference to a tool the catalog does not declare. */
export interface UnknownTermTool {
  readonly term: CanonicalTerm;
  readonly tool: string;
}

export interface ToolCatalogDependencies {
  readonly synonyms: SynonymTable;
  readonly scorer: KeywordScorer;
}

/**
 * Immutable index of the routable tools. Keyword sets are computed once from
 * each tool's name and hints, then extended with every canonical term whose
 * TermToTools entry lists the tool.
 */
export class ToolCatalog {
  private readonly byName: ReadonlyMap<string, ToolMetadata>;
  private readonly ordered: readonly ToolMetadata[];
  /** TermToTools references that were skipped because the tool is not declared. */
  readonly unknownTermTools: readonly UnknownTermTool[];

  private constructor(tools: readonly ToolMetadata[], unknownTermTools: readonly UnknownTermTool[]) {
    this.ordered = tools;
    this.byName = new Map(tools.map((tool) => [tool.name, tool]));
    this.unknownTermTools = unknownTermTools;
  }

  static build(entries: readonly ToolCatalogEntry[], { synonyms, scorer }: ToolCatalogDependencies): ToolCatalog {
    const keywords = new Map<string, Set<string>>();
    const drafts: ToolCatalogEntry[] = [];

    for (const entry of entries) {
      const name = entry.name.trim();
      if (name.length === 0) {
        throw new RoutingConfigurationError(ROUTER_ERROR_CODES.DATA_INVALID, "catalog entry without a tool name", {
          entry,
        });
      }
      if (keywords.has(name)) {
        throw new RoutingConfigurationError(
          ROUTER_ERROR_CODES.CATALOG_DUPLICATE,
          `tool "${name}" is declared twice in the catalog`,
          { tool: name },
        );
      }
      const source = [name, entry.hints ?? "", ...(entry.keywords ?? [])].join(" ");
      keywords.set(name, new Set(scorer.analyze(source).keywords));
      drafts.push({ ...entry, name });
    }

    const unknown: UnknownTermTool[] = [];
    for (const [term, tools] of synonyms.termToolEntries()) {
      for (const tool of tools) {
        const bucket = keywords.get(tool);
        if (bucket) {
          bucket.add(term);
        } else {
          unknown.push({ term, tool });
        }
      }
    }

    const tools = drafts.map((entry) =>
      Object.freeze({
        name: entry.name,
        purpose: entry.purpose,
        params: Object.freeze([...entry.params]),
        keywords: keywords.get(entry.name) ?? new Set<string>(),
      }),
    );
    return new ToolCatalog(Object.freeze(tools), Object.freeze(unknown));
  }

  get(name: string): ToolMetadata | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** Tools in declaration order. */
  list(): readonly ToolMetadata[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }
}
