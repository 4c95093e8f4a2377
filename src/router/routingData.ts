import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { z } from "zod";

import { DEFAULT_DATA_DIR } from "../config/routerConfig.js";
import { ROUTER_ERROR_CODES, RoutingConfigurationError } from "./errors.js";
import { QueryRouter, type QueryRouterOptions, type RoutingData } from "./queryRouter.js";
import { CONFIDENCE_LEVELS } from "./types.js";

/** File names looked up inside the data directory. */
export const ROUTING_DATA_FILES = {
  synonyms: "synonyms.json",
  patterns: "patterns.json",
  vocabulary: "vocabulary.json",
  catalog: "catalog.json",
} as const;

type RoutingDataFile = keyof typeof ROUTING_DATA_FILES;

const NonEmptyString = z.string().trim().min(1);

export const SynonymDataSchema = z
  .object({
    terms: z.array(
      z
        .object({
          canonical: NonEmptyString,
          forms: z.array(NonEmptyString),
          tools: z.array(NonEmptyString).optional(),
        })
        .strict(),
    ),
  })
  .strict();

export const PatternDataSchema = z
  .object({
    patterns: z.array(
      z
        .object({
          phrases: z.array(NonEmptyString).min(1),
          tool: NonEmptyString,
          params: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
          alternative: NonEmptyString.optional(),
          dateHint: z.literal("this_month").optional(),
          confidence: z.enum(CONFIDENCE_LEVELS),
        })
        .strict(),
    ),
  })
  .strict();

export const VocabularyDataSchema = z
  .object({
    stopwords: z.array(NonEmptyString),
    actionVerbs: z.record(z.array(z.string().regex(/^_[a-z]+$/, "suffixes look like _list"))),
  })
  .strict();

export const CatalogDataSchema = z
  .object({
    tools: z.array(
      z
        .object({
          name: z.string().regex(/^[a-z][a-z0-9_]*$/, "tool names are snake_case"),
          purpose: NonEmptyString,
          params: z.array(NonEmptyString),
          hints: z.string().optional(),
          keywords: z.array(NonEmptyString).optional(),
        })
        .strict(),
    ),
  })
  .strict();

async function readDataFile<T>(directory: string, file: RoutingDataFile, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const path = join(directory, ROUTING_DATA_FILES[file]);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    throw new RoutingConfigurationError(ROUTER_ERROR_CODES.DATA_INVALID, `unable to read ${path}`, {
      path,
      message: error instanceof Error ? error.message : String(error),
    });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new RoutingConfigurationError(ROUTER_ERROR_CODES.DATA_INVALID, `invalid routing data in ${path}`, {
      path,
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
  }
  return parsed.data;
}

/** Loads and validates the four routing data files of {@link directory}. */
export async function loadRoutingData(directory: string = DEFAULT_DATA_DIR): Promise<RoutingData> {
  const [synonyms, patterns, vocabulary, catalog] = await Promise.all([
    readDataFile(directory, "synonyms", SynonymDataSchema),
    readDataFile(directory, "patterns", PatternDataSchema),
    readDataFile(directory, "vocabulary", VocabularyDataSchema),
    readDataFile(directory, "catalog", CatalogDataSchema),
  ]);
  return {
    synonyms: synonyms.terms,
    patterns: patterns.patterns,
    vocabulary,
    catalog: catalog.tools,
  };
}

export interface CreateQueryRouterOptions extends QueryRouterOptions {
  readonly dataDir?: string;
}

/** Loads the routing data and assembles a ready-to-use router. */
export async function createQueryRouter(options: CreateQueryRouterOptions = {}): Promise<QueryRouter> {
  const data = await loadRoutingData(options.dataDir);
  return QueryRouter.fromData(data, options);
}
