import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import type { StructuredLogger } from "../logger.js";
import type { QueryRouter } from "../router/queryRouter.js";
import type { RoutingResult } from "../router/types.js";
import {
  ToolRouteInputSchema,
  ToolRouteOutputSchema,
  ToolRouteRegistrationShape,
  type ToolRouteOutput,
} from "../rpc/toolRouteSchemas.js";
import { buildToolErrorResult, buildToolSuccessResult } from "./shared.js";

/** Canonical name advertised to MCP clients. */
export const TOOL_ROUTE_TOOL_NAME = "tool_route" as const;

/** Error code attached to payloads rejected by {@link ToolRouteInputSchema}. */
export const TOOL_ROUTE_INPUT_ERROR = "E-TOOL-ROUTE-INPUT" as const;

export interface ToolRouteToolContext {
  readonly router: QueryRouter;
  readonly logger: StructuredLogger;
  /** Clock used when the caller does not pin `today`. Defaults to the system clock. */
  readonly clock?: () => Date;
}

function asJsonPayload(result: ToolRouteOutput): string {
  return JSON.stringify({ tool: TOOL_ROUTE_TOOL_NAME, result }, null, 2);
}

/** Formats the local calendar day of {@link date} as `YYYY-MM-DD`. */
function formatLocalDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/** Parses a validated `YYYY-MM-DD` literal into a local-midnight date. */
function parseLocalDate(value: string): Date {
  const [year, month, day] = value.split("-").map((part) => Number.parseInt(part, 10));
  return new Date(year, month - 1, day);
}

function summarise(result: RoutingResult): string {
  const top = result.suggestions[0];
  if (result.resolution === "clarify" || !top) {
    return "clarification needed";
  }
  return `top suggestion: ${top.tool}`;
}

function toStructured(result: RoutingResult, today: string): ToolRouteOutput {
  return ToolRouteOutputSchema.parse({
    ok: true,
    summary: summarise(result),
    details: {
      query: result.query,
      today,
      resolution: result.resolution,
      suggestions: result.suggestions.map((suggestion) => ({
        tool: suggestion.tool,
        purpose: suggestion.purpose,
        key_params: [...suggestion.keyParams],
        suggested_params: { ...suggestion.suggestedParams },
        score: suggestion.score,
        confidence: suggestion.confidence,
      })),
      clarification: result.clarification,
      date_range: result.dateRange ? { ...result.dateRange } : null,
      matched_phrase: result.matchedPhrase,
      keywords: [...result.keywords],
    },
  });
}

/**
 * Creates the handler behind the `tool_route` façade. The handler validates the
 * payload, routes the query and never executes the suggested tool.
 */
export function createToolRouteHandler(context: ToolRouteToolContext): (input: unknown) => CallToolResult {
  const clock = context.clock ?? (() => new Date());

  return function handleToolRoute(input: unknown): CallToolResult {
    const parsed = ToolRouteInputSchema.safeParse(input ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }));
      context.logger.warn("tool_route_invalid_input", { issues });
      const structured: ToolRouteOutput = {
        ok: false,
        summary: "invalid tool_route input",
        details: { code: TOOL_ROUTE_INPUT_ERROR, issues },
      };
      return buildToolErrorResult(asJsonPayload(structured), structured);
    }

    const today = parsed.data.today ? parseLocalDate(parsed.data.today) : clock();
    const result = context.router.route(parsed.data.query, today);
    const structured = toStructured(result, formatLocalDate(today));

    context.logger.info("tool_route_evaluated", {
      query: parsed.data.query,
      resolution: result.resolution,
      top_tool: result.suggestions[0]?.tool ?? null,
      date_range: result.dateRange,
    });
    return buildToolSuccessResult(asJsonPayload(structured), structured);
  };
}

/** Registers the façade on an MCP server. */
export function registerToolRouteTool(server: McpServer, context: ToolRouteToolContext): void {
  const handler = createToolRouteHandler(context);
  server.registerTool(
    TOOL_ROUTE_TOOL_NAME,
    {
      title: "Tool router",
      description:
        "Suggest which accounting tool answers a business question (English or Indonesian), with parameter values.",
      inputSchema: ToolRouteRegistrationShape,
      annotations: { readOnlyHint: true, idempotentHint: true },
    },
    async (args) => handler(args),
  );
}
