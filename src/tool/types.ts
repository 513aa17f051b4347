// pattern: Functional Core

/**
 * Tool system types for registration, dispatch, and advertisement to agents.
 * These types define the port interface for the tool registry and tool handlers.
 */

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';

export type ToolParameter = {
  name: string;
  /** A list means any of the listed types is accepted. */
  type: ToolParameterType | ReadonlyArray<ToolParameterType>;
  description: string;
  required: boolean;
  /** Allowed string values; non-string values of an accepted type pass through. */
  enum_values?: ReadonlyArray<string>;
  items?: ToolParameterType;
  default?: string | number | boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ReadonlyArray<ToolParameter>;
};

export type ToolResult = {
  success: boolean;
  output: string;
  error?: string;
};

export type ToolHandler = (
  params: Record<string, unknown>,
  signal?: AbortSignal,
) => Promise<ToolResult>;

export type Tool = {
  definition: ToolDefinition;
  handler: ToolHandler;
};

export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required: Array<string>;
};

export type ModelTool = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

export interface ToolRegistry {
  register(tool: Tool): void;
  getDefinitions(): Array<ToolDefinition>;
  dispatch(name: string, params: Record<string, unknown>, signal?: AbortSignal): Promise<ToolResult>;
  toModelTools(): Array<ModelTool>;
}
