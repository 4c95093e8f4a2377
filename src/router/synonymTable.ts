import { ROUTER_ERROR_CODES, RoutingConfigurationError } from "./errors.js";
import { normaliseText } from "./text.js";
import type { CanonicalTerm } from "./types.js";

/**
 * One business concept as declared in the synonym data: the canonical term,
 * its alternate surface forms in either language and the tools serving it.
 */
export interface SynonymGroup {
  readonly canonical: string;
  readonly forms: readonly string[];
  readonly tools?: readonly string[];
}

/** Deduplicate a list of strings while preserving the first occurrence order. */
function dedupe(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      result.push(value);
    }
  }
  return result;
}

/**
 * Immutable surface-form → canonical-term dictionary, plus the canonical-term →
 * tool-names index built alongside it. Canonical terms are registered as keys
 * of their own so the fuzzy corrector can reach them.
 */
export class SynonymTable {
  private readonly entries: ReadonlyMap<string, CanonicalTerm>;
  private readonly termTools: ReadonlyMap<CanonicalTerm, readonly string[]>;
  private readonly forms: ReadonlyMap<CanonicalTerm, readonly string[]>;
  private readonly orderedKeys: readonly string[];
  private readonly multiWordKeys: readonly string[];

  private constructor(
    entries: Map<string, CanonicalTerm>,
    termTools: Map<CanonicalTerm, readonly string[]>,
  ) {
    this.entries = entries;
    this.termTools = termTools;
    this.orderedKeys = Object.freeze(Array.from(entries.keys()));
    // Longest phrases first so "ringkasan per" is consumed before "per".
    this.multiWordKeys = Object.freeze(
      this.orderedKeys
        .filter((key) => key.includes(" "))
        .sort((left, right) => right.length - left.length || left.localeCompare(right)),
    );
    const forms = new Map<CanonicalTerm, string[]>();
    for (const [key, canonical] of entries) {
      const bucket = forms.get(canonical) ?? [];
      bucket.push(key);
      forms.set(canonical, bucket);
    }
    this.forms = new Map(Array.from(forms, ([term, list]) => [term, Object.freeze(list)] as const));
  }

  /**
   * Builds the table from grouped declarations. A surface form claimed by two
   * different canonical terms aborts construction.
   */
  static fromGroups(groups: readonly SynonymGroup[]): SynonymTable {
    const entries = new Map<string, CanonicalTerm>();
    const termTools = new Map<CanonicalTerm, string[]>();

    const register = (surface: string, canonical: CanonicalTerm) => {
      const key = normaliseText(surface);
      if (key.length === 0) {
        throw new RoutingConfigurationError(
          ROUTER_ERROR_CODES.DATA_INVALID,
          `empty synonym form declared for "${canonical}"`,
          { canonical },
        );
      }
      const existing = entries.get(key);
      if (existing !== undefined && existing !== canonical) {
        throw new RoutingConfigurationError(
          ROUTER_ERROR_CODES.SYNONYM_CONFLICT,
          `synonym "${key}" maps to both "${existing}" and "${canonical}"`,
          { form: key, existing, conflicting: canonical },
        );
      }
      entries.set(key, canonical);
    };

    for (const group of groups) {
      const canonical = normaliseText(group.canonical);
      register(canonical, canonical);
      for (const form of group.forms) {
        register(form, canonical);
      }
      const tools = termTools.get(canonical) ?? [];
      tools.push(...(group.tools ?? []).map((tool) => tool.trim()).filter((tool) => tool.length > 0));
      termTools.set(canonical, tools);
    }

    const frozenTools = new Map<CanonicalTerm, readonly string[]>();
    for (const [term, tools] of termTools) {
      frozenTools.set(term, Object.freeze(dedupe(tools)));
    }
    return new SynonymTable(entries, frozenTools);
  }

  /** Returns the canonical term for a token or short phrase, `null` when unknown. */
  normalize(term: string): CanonicalTerm | null {
    return this.entries.get(normaliseText(term)) ?? null;
  }

  has(term: string): boolean {
    return this.entries.has(normaliseText(term));
  }

  /** Every registered surface form in declaration order. */
  keys(): readonly string[] {
    return this.orderedKeys;
  }

  /** Multi-word surface forms, longest first. */
  phrases(): readonly string[] {
    return this.multiWordKeys;
  }

  canonicalTerms(): CanonicalTerm[] {
    return Array.from(this.forms.keys());
  }

  /** Surface forms (the canonical term included) normalising to {@link term}. */
  formsOf(term: CanonicalTerm): readonly string[] {
    return this.forms.get(term) ?? [];
  }

  /** Tools known to serve the canonical term, in declaration order. */
  toolsFor(term: CanonicalTerm): readonly string[] {
    return this.termTools.get(term) ?? [];
  }

  /** Iterates over every (term, tools) pair of the TermToTools index. */
  termToolEntries(): IterableIterator<[CanonicalTerm, readonly string[]]> {
    return this.termTools.entries();
  }

  get size(): number {
    return this.entries.size;
  }
}
