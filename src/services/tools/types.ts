// Tool system types
// Tools take positional string arguments bound to named parameters and
// return a result-or-error value instead of throwing

export const TOOL_KINDS = ['get_spending', 'compare_spending', 'get_total_spending'] as const;

export type ToolKind = typeof TOOL_KINDS[number];

export interface ToolParameter {
  name: string;
  description: string;
  /** Optional parameters carry a default; a parameter without one is required. */
  default?: string;
}

export type ToolArgs = Record<string, string>;

export type ToolResult =
  | { success: true; content: string }
  | { success: false; error: string };

export type ToolCallable = (args: ToolArgs) => Promise<ToolResult>;

export interface ToolDefinition<K extends string = ToolKind> {
  name: K;
  aliases: string[];
  description: string;
  parameters: ToolParameter[];
  execute: ToolCallable;
}

export interface ToolSpec<K extends string = ToolKind> {
  readonly name: K;
  readonly aliases: readonly string[];
  readonly description: string;
  readonly parameters: readonly ToolParameter[];
  readonly execute: ToolCallable;
}
