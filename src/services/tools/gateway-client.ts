// Tool Gateway Client
// Discovers and invokes the remote tools (filesystem, git, GitHub, commands)
// exposed by the tool gateway over HTTP

import { z } from 'zod';
import type { ToolArguments, ToolDefinition, ToolParameter, ToolParameterType, ToolResult } from './types.js';
import { formatResult } from '../workflow/dispatcher.js';
import { PLACEHOLDER_ARG } from '../workflow/extractor.js';
import { AppError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'tool-gateway' });

const schemaPropertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    enum: z.array(z.string()).optional(),
    default: z.unknown().optional(),
  })
  .passthrough();

const inputSchemaSchema = z
  .object({
    type: z.string().optional(),
    properties: z.record(schemaPropertySchema).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

const gatewayToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullish(),
  // Gateways disagree on the casing of this key
  input_schema: inputSchemaSchema.nullish(),
  inputSchema: inputSchemaSchema.nullish(),
});

const listResponseSchema = z.object({
  tools: z.array(gatewayToolSchema),
});

const callResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z.string().nullish(),
  isError: z.boolean().optional(),
});

export type GatewayTool = z.infer<typeof gatewayToolSchema>;
export type GatewayInputSchema = z.infer<typeof inputSchemaSchema>;

const PARAMETER_TYPES: readonly ToolParameterType[] = ['string', 'number', 'boolean', 'array', 'object'];

function isParameterType(value: unknown): value is ToolParameterType {
  return typeof value === 'string' && PARAMETER_TYPES.some(type => type === value);
}

function toParameterType(type: string | string[] | undefined): ToolParameterType {
  const declared = Array.isArray(type) ? type.find(t => t !== 'null') : type;
  if (declared === 'integer') return 'number';
  return isParameterType(declared) ? declared : 'object';
}

export function toToolParameters(schema: GatewayInputSchema | null | undefined): ToolParameter[] {
  const properties = schema?.properties ?? {};
  const required = new Set(schema?.required ?? []);

  return Object.entries(properties).map(([name, property]) => {
    const parameter: ToolParameter = {
      name,
      type: toParameterType(property.type),
      description: property.description ?? '',
      required: required.has(name),
    };
    if (property.enum) parameter.enum = property.enum;
    if (property.default !== undefined) parameter.default = property.default;
    return parameter;
  });
}

/**
 * Arguments as the gateway expects them: no placeholder key, and a lone
 * `query` fallback mapped onto the tool's first parameter when the tool
 * declares no `query` of its own.
 */
export function adaptArguments(args: ToolArguments, parameters: ToolParameter[]): ToolArguments {
  if (parameters.length === 0) {
    return {};
  }

  const cleaned: ToolArguments = Object.fromEntries(Object.entries(args).filter(([key]) => key !== PLACEHOLDER_ARG));

  const keys = Object.keys(cleaned);
  if (keys.length === 1 && keys[0] === 'query' && !parameters.some(p => p.name === 'query')) {
    return { [parameters[0].name]: cleaned.query };
  }

  return cleaned;
}

export class ToolGatewayClient {
  private baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  get url(): string {
    return this.baseUrl;
  }

  async listTools(signal?: AbortSignal): Promise<GatewayTool[]> {
    const data = await this.request('/tools', { method: 'GET', signal });
    const parsed = listResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw AppError.gatewayUnavailable('Tool gateway returned an invalid tool list', parsed.error.issues);
    }
    return parsed.data.tools;
  }

  async callTool(name: string, args: ToolArguments, signal?: AbortSignal): Promise<ToolResult> {
    const data = await this.request('/tools/call', {
      method: 'POST',
      body: JSON.stringify({ name, arguments: args }),
      signal,
    });

    const parsed = callResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Tool gateway returned an invalid response for "${name}"`);
    }

    const { result, error, isError } = parsed.data;
    if (error || isError) {
      return { success: false, content: error || formatResult(result) };
    }

    return { success: true, content: formatResult(result) };
  }

  private async request(path: string, init: { method: string; body?: string; signal?: AbortSignal }): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        ...init,
        headers: { 'Content-Type': 'application/json' },
      });
    } catch (error) {
      throw AppError.gatewayUnavailable(`Tool gateway unreachable at ${this.baseUrl}: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Tool gateway error: ${response.status} - ${error}`);
    }

    return response.json();
  }
}

export function createGatewayTool(tool: GatewayTool, client: ToolGatewayClient): ToolDefinition {
  const parameters = toToolParameters(tool.input_schema ?? tool.inputSchema);

  return {
    name: tool.name,
    description: tool.description ?? '',
    parameters,
    async execute(args, context) {
      return client.callTool(tool.name, adaptArguments(args, parameters), context.signal);
    },
  };
}

/** Gateway tools wrapped for the registry, first definition of each name wins. */
export async function loadGatewayTools(client: ToolGatewayClient): Promise<ToolDefinition[]> {
  const definitions = await client.listTools();
  const seen = new Set<string>();
  const tools: ToolDefinition[] = [];

  for (const definition of definitions) {
    if (seen.has(definition.name)) {
      log.debug({ tool: definition.name }, 'Skipping duplicate gateway tool');
      continue;
    }
    seen.add(definition.name);
    tools.push(createGatewayTool(definition, client));
  }

  log.info({ gateway: client.url, count: tools.length }, 'Gateway tools loaded');
  return tools;
}
