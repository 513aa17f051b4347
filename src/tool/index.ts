// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  ToolResult,
  ToolHandler,
  Tool,
  ToolRegistry,
  ModelTool,
  ToolInputSchema,
} from './types.ts';

export { createToolRegistry } from './registry.ts';
export { createTavilyTools } from './builtin/tavily.ts';
export type { TavilyToolOptions } from './builtin/tavily.ts';
