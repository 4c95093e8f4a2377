import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

type StructuredContent = NonNullable<CallToolResult["structuredContent"]>;

/** Result whose structured payload keeps its precise type for callers and tests. */
export type TypedToolResult<TStructured extends StructuredContent> = CallToolResult & {
  structuredContent: TStructured;
};

/**
 * Envelope shared by the façades: one text item carrying the rendered payload
 * next to the same data under `structuredContent`.
 */
function toolResult<TStructured extends StructuredContent>(
  text: string,
  structured: TStructured,
  isError: boolean,
): TypedToolResult<TStructured> {
  return { isError, content: [{ type: "text", text }], structuredContent: structured };
}

export function buildToolSuccessResult<TStructured extends StructuredContent>(
  text: string,
  structured: TStructured,
): TypedToolResult<TStructured> {
  return toolResult(text, structured, false);
}

/** Application-level failure reported inside a successful RPC response. */
export function buildToolErrorResult<TStructured extends StructuredContent>(
  text: string,
  structured: TStructured,
): TypedToolResult<TStructured> {
  return toolResult(text, structured, true);
}
