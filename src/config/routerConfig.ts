import { fileURLToPath } from "node:url";

import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { DEFAULT_FUZZY_THRESHOLD } from "../router/fuzzyCorrector.js";
import { type EnvSource, readInt, readOptionalEnum, readOptionalInt, readOptionalString } from "./env.js";

/** Default number of suggestions returned for keyword-ranked queries. */
export const DEFAULT_TOOL_ROUTER_TOPK = 5;
/** Hard cap on the number of suggestions, whatever the environment says. */
export const MAX_TOOL_ROUTER_TOPK = 10;

/** Directory holding the bundled routing data, relative to this module in both `src/` and `dist/`. */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

/** Resolved runtime configuration of the routing service. */
export interface RouterConfig {
  readonly topK: number;
  readonly fuzzyThreshold: number;
  readonly dataDir: string;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly logRedact: string | undefined;
}

/**
 * Resolves how many suggestions the router returns. `TOOL_ROUTER_TOPK` is
 * honoured when it is a positive integer; larger values are clamped to
 * {@link MAX_TOOL_ROUTER_TOPK}.
 */
export function resolveToolRouterTopKLimit(env: EnvSource = process.env): number {
  const requested = readInt("TOOL_ROUTER_TOPK", DEFAULT_TOOL_ROUTER_TOPK, { min: 1 }, env);
  return Math.min(requested, MAX_TOOL_ROUTER_TOPK);
}

export function resolveRouterConfig(env: EnvSource = process.env): RouterConfig {
  return {
    topK: resolveToolRouterTopKLimit(env),
    fuzzyThreshold:
      readOptionalInt("TOOL_ROUTER_FUZZY_THRESHOLD", { min: 0, max: 100 }, env) ?? DEFAULT_FUZZY_THRESHOLD,
    dataDir: readOptionalString("TOOL_ROUTER_DATA_DIR", env) ?? DEFAULT_DATA_DIR,
    logLevel: readOptionalEnum("TOOL_ROUTER_LOG_LEVEL", LOG_LEVELS, env) ?? "info",
    logFile: readOptionalString("TOOL_ROUTER_LOG_FILE", env) ?? null,
    logRedact: readOptionalString("TOOL_ROUTER_LOG_REDACT", env),
  };
}
