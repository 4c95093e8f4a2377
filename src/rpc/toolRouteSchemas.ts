import { z } from "zod";

import { CONFIDENCE_LEVELS } from "../router/types.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Returns `true` when the literal names an existing calendar day. */
function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

/**
 * Shape advertised to MCP clients. Only the field types are checked here;
 * {@link ToolRouteInputSchema} runs inside the handler so malformed values come
 * back as `E-TOOL-ROUTE-INPUT` results.
 */
export const ToolRouteRegistrationShape = {
  query: z.string().describe("Business question in English or Indonesian"),
  today: z.string().optional().describe("Reference date (YYYY-MM-DD) anchoring relative periods"),
};

/** Input payload accepted by the `tool_route` façade. */
export const ToolRouteInputSchema = z
  .object({
    query: z.string().trim().min(1, "query must not be empty").max(1_000),
    today: z
      .string()
      .trim()
      .refine(isCalendarDate, "today must be a calendar date formatted as YYYY-MM-DD")
      .optional(),
  })
  .strict();

export const ToolRouteSuggestionSchema = z
  .object({
    tool: z.string().min(1),
    purpose: z.string(),
    key_params: z.array(z.string()),
    suggested_params: z.record(z.union([z.string(), z.number(), z.boolean()])),
    score: z.number().nonnegative(),
    confidence: z.enum(CONFIDENCE_LEVELS),
  })
  .strict();

export const ToolRouteDateRangeSchema = z
  .object({
    start: z.string().regex(ISO_DATE),
    end: z.string().regex(ISO_DATE),
    kind: z.enum(["calendar", "rolling"]),
    expression: z.string(),
  })
  .strict();

const ToolRouteSuccessDetailsSchema = z
  .object({
    query: z.string(),
    today: z.string().regex(ISO_DATE),
    resolution: z.enum(["pattern", "keywords", "clarify"]),
    suggestions: z.array(ToolRouteSuggestionSchema).max(10),
    clarification: z.string().nullable(),
    date_range: ToolRouteDateRangeSchema.nullable(),
    matched_phrase: z.string().nullable(),
    keywords: z.array(z.string()),
  })
  .strict();

const ToolRouteErrorDetailsSchema = z
  .object({
    code: z.literal("E-TOOL-ROUTE-INPUT"),
    issues: z.array(z.object({ path: z.string(), message: z.string() }).strict()),
  })
  .strict();

/** Structured result returned by the façade. */
export const ToolRouteOutputSchema = z
  .object({
    ok: z.boolean(),
    summary: z.string().min(1),
    details: z.union([ToolRouteSuccessDetailsSchema, ToolRouteErrorDetailsSchema]),
  })
  .strict();

export type ToolRouteOutput = z.infer<typeof ToolRouteOutputSchema>;
