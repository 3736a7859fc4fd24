// Tool System
// Builds the spending tool registry for an agent session

export { ToolRegistry, formatUsage } from './registry.js';
export { createSpendingTools, createSpendingToolRegistry, formatNok } from './spending-tools.js';
export type { SpendingToolOptions } from './spending-tools.js';
export { TOOL_KINDS } from './types.js';
export type {
  ToolArgs,
  ToolCallable,
  ToolDefinition,
  ToolKind,
  ToolParameter,
  ToolResult,
  ToolSpec,
} from './types.js';
