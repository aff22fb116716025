export interface ToolResult<TDetails = unknown> {
  content: Array<{ type: "text"; text: string }>;
  details?: TDetails;
}

export interface ToolDefinition<TDetails = unknown> {
  name: string;
  label: string;
  description: string;
  /** JSON Schema for the arguments object. */
  parameters: Record<string, unknown>;
  execute: (toolCallId: string, args: unknown) => Promise<ToolResult<TDetails>>;
}
