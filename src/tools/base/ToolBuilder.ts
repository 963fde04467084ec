import { Tool } from '@modelcontextprotocol/sdk/types.js';

export interface ToolParameter {
  type: 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';
  description?: string;
  enum?: string[];
  default?: string | number | boolean;
  items?: ToolParameter;
  minimum?: number;
}

export interface ToolConfig {
  name: string;
  description: string;
  parameters?: Record<string, ToolParameter>;
  required?: string[];
}

// Drops the keys the ParameterTypes helpers leave undefined
function compact(param: ToolParameter): ToolParameter {
  const result: ToolParameter = { type: param.type };
  if (param.description !== undefined) result.description = param.description;
  if (param.enum !== undefined) result.enum = param.enum;
  if (param.default !== undefined) result.default = param.default;
  if (param.minimum !== undefined) result.minimum = param.minimum;
  if (param.items !== undefined) result.items = compact(param.items);
  return result;
}

export class ToolBuilder {
  private tool: Tool;

  constructor(config: ToolConfig) {
    this.tool = {
      name: config.name,
      description: config.description,
      inputSchema: {
        type: 'object',
        properties: this.buildProperties(config),
        ...(config.required && config.required.length > 0 ? { required: config.required } : {}),
      },
    };
  }

  private buildProperties(config: ToolConfig): Record<string, ToolParameter> {
    const properties: Record<string, ToolParameter> = {};
    for (const [key, param] of Object.entries(config.parameters ?? {})) {
      properties[key] = compact(param);
    }
    return properties;
  }

  build(): Tool {
    return this.tool;
  }

  static fromConfig(config: ToolConfig): Tool {
    return new ToolBuilder(config).build();
  }
}

// Helpers for the parameter shapes the retention tools share
export const ParameterTypes = {
  string: (description?: string, enumValues?: string[], defaultValue?: string): ToolParameter => ({
    type: 'string',
    description,
    enum: enumValues,
    default: defaultValue,
  }),

  integer: (description?: string, min?: number, defaultValue?: number): ToolParameter => ({
    type: 'integer',
    description,
    minimum: min,
    default: defaultValue,
  }),

  boolean: (description?: string, defaultValue?: boolean): ToolParameter => ({
    type: 'boolean',
    description,
    default: defaultValue,
  }),

  array: (items: ToolParameter, description?: string): ToolParameter => ({
    type: 'array',
    items,
    description,
  }),

  ruleId: (): ToolParameter => ({
    type: 'integer',
    minimum: 1,
    description: 'Id of the retention rule',
  }),

  action: (): ToolParameter => ({
    type: 'string',
    enum: ['trash', 'delete'],
    description: 'trash moves messages to Trash (recoverable); delete removes them permanently',
  }),

  retention: (): ToolParameter => ({
    type: 'string',
    description: 'Minimum message age as <unit>:<count>, unit one of d, w, m, y (e.g. y:1, m:6, d:30)',
  }),

  ruleIds: (): ToolParameter => ({
    type: 'array',
    items: { type: 'integer', minimum: 1 },
    description: 'Only consider these rule ids',
  }),
};
