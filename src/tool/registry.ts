// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration, first-pass parameter checks, dispatch, and the JSON Schema
 * advertised to agents in tools/list.
 */

import type {
  ModelTool,
  Tool,
  ToolDefinition,
  ToolParameter,
  ToolParameterType,
  ToolResult,
  ToolRegistry,
} from './types.ts';

function typesOf(param: ToolParameter): ReadonlyArray<ToolParameterType> {
  return typeof param.type === 'string' ? [param.type] : param.type;
}

function matchesType(value: unknown, expectedType: ToolParameterType): boolean {
  switch (expectedType) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'array':
      return Array.isArray(value);
    default:
      return false;
  }
}

function describeType(param: ToolParameter): string {
  return typesOf(param).join(' | ');
}

function toJsonSchema(param: ToolParameter): Record<string, unknown> {
  const variants = typesOf(param).map((type) => ({
    type,
    ...(type === 'string' && param.enum_values ? { enum: param.enum_values } : {}),
    ...(type === 'array' && param.items ? { items: { type: param.items } } : {}),
  }));

  const base: Record<string, unknown> =
    variants.length === 1 && variants[0] ? { ...variants[0] } : { anyOf: variants };

  return {
    ...base,
    description: param.description,
    ...(param.default !== undefined ? { default: param.default } : {}),
  };
}

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, Tool>();

  function checkParameters(
    definition: ToolDefinition,
    params: Record<string, unknown>,
  ): string | null {
    for (const param of definition.parameters) {
      if (param.required && !(param.name in params)) {
        return `missing required parameter: ${param.name}`;
      }
    }

    for (const param of definition.parameters) {
      const value = params[param.name];
      // agents often send null for "not set"
      if (value === undefined || value === null) {
        continue;
      }

      const types = typesOf(param);
      if (!types.some((type) => matchesType(value, type))) {
        return `invalid type for parameter ${param.name}: expected ${describeType(param)}, got ${typeof value}`;
      }

      if (typeof value === 'string' && param.enum_values && !param.enum_values.includes(value)) {
        return `invalid value for parameter ${param.name}: expected one of ${param.enum_values.join(', ')}, got ${value}`;
      }
    }

    return null;
  }

  return {
    register(tool: Tool): void {
      if (tools.has(tool.definition.name)) {
        throw new Error(
          `tool already registered: ${tool.definition.name}`,
        );
      }
      tools.set(tool.definition.name, tool);
    },

    getDefinitions(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => tool.definition);
    },

    async dispatch(
      name: string,
      params: Record<string, unknown>,
      signal?: AbortSignal,
    ): Promise<ToolResult> {
      const tool = tools.get(name);
      if (!tool) {
        return {
          success: false,
          output: '',
          error: `unknown tool: ${name}`,
        };
      }

      const problem = checkParameters(tool.definition, params);
      if (problem) {
        return {
          success: false,
          output: '',
          error: problem,
        };
      }

      try {
        return await tool.handler(params, signal);
      } catch (error) {
        console.error(`[tool] ${name} handler error:`, error);
        return {
          success: false,
          output: '',
          error: `handler error: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    },

    toModelTools(): Array<ModelTool> {
      return Array.from(tools.values()).map((tool) => {
        const properties: Record<string, Record<string, unknown>> = {};
        const required: Array<string> = [];

        for (const param of tool.definition.parameters) {
          properties[param.name] = toJsonSchema(param);

          if (param.required) {
            required.push(param.name);
          }
        }

        return {
          name: tool.definition.name,
          description: tool.definition.description,
          inputSchema: {
            type: 'object',
            properties,
            required,
          },
        };
      });
    },
  };
}
