// Tool Registry - tools available to every agent of a run
// Built once at startup and passed by reference; read-only while runs execute

import type { ToolDefinition, ToolParameter } from './types.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'tool-registry' });

export interface JsonSchemaProperty {
  type: ToolParameter['type'];
  description: string;
  enum?: string[];
  default?: unknown;
}

export interface ToolJsonSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface OpenAIFunctionDef {
  name: string;
  description: string;
  parameters: ToolJsonSchema;
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (!tool.name.trim()) {
      throw new Error('Tool name must not be empty');
    }
    if (this.tools.has(tool.name)) {
      log.warn({ tool: tool.name }, 'Tool already registered, overwriting');
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  toOpenAIFunctions(): OpenAIFunctionDef[] {
    return this.getAll().map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: this.toJsonSchema(tool.parameters),
    }));
  }

  private toJsonSchema(params: ToolParameter[]): ToolJsonSchema {
    const properties: Record<string, JsonSchemaProperty> = {};

    for (const param of params) {
      const paramSchema: JsonSchemaProperty = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      properties[param.name] = paramSchema;
    }

    return {
      type: 'object',
      properties,
      required: params.filter(p => p.required).map(p => p.name),
    };
  }
}
