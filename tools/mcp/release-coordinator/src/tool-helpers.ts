/**
 * Result shapes shared by the tool groups.
 *
 * Handlers return toolResponse(); wrapTool() times them through
 * withLogging() and converts anything they throw into an isError result.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { withLogging } from "./logger.js";

export type { McpServer };

function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

/** Strings verbatim, anything else as indented JSON */
export function toolResponse(data: unknown) {
  return textResult(typeof data === "string" ? data : JSON.stringify(data, null, 2));
}

/** `Error: <message>`, with ` (<kind>)` for the typed errors in errors.ts */
export function toolError(error: unknown) {
  let text = `Error: ${error instanceof Error ? error.message : String(error)}`;
  if (error instanceof Error && "kind" in error && typeof error.kind === "string") {
    text += ` (${error.kind})`;
  }
  return { ...textResult(text), isError: true as const };
}

type ToolResult = ReturnType<typeof toolResponse> | ReturnType<typeof toolError>;

export function wrapTool<T>(
  toolName: string,
  handler: (params: T) => Promise<ReturnType<typeof toolResponse>>
): (params: T) => Promise<ToolResult> {
  return (params: T) => withLogging(toolName, () => handler(params)).catch(toolError);
}
