export type TextContent = { type: "text"; text: string };

export type ToolResult = {
  content: TextContent[];
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

/** A user-visible failure that leaves the server usable. */
export function errorResult(text: string): ToolResult {
  return { content: [{ type: "text", text }], isError: true };
}
