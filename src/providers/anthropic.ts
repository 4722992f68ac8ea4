// Anthropic Provider
// Claude through @anthropic-ai/sdk; tool calls come back as tool_use content blocks

import Anthropic from '@anthropic-ai/sdk';
import { env } from '../env.js';
import { textOf } from '../services/workflow/extractor.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ProviderTool } from './types.js';

export interface AnthropicConfig {
  apiKey?: string;
  client?: Anthropic;
}

function toAnthropicTool(tool: ProviderTool): Anthropic.Tool {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: 'object',
      properties: tool.parameters.properties,
      required: tool.parameters.required,
    },
  };
}

export class AnthropicProvider implements Provider {
  name = 'anthropic';
  private client: Anthropic;

  constructor(config: AnthropicConfig = {}) {
    if (config.client) {
      this.client = config.client;
      return;
    }

    const apiKey = config.apiKey ?? env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY not configured');
    }
    this.client = new Anthropic({ apiKey });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const response = await this.client.messages.create(
      {
        model: options.model,
        max_tokens: options.maxTokens ?? 4096,
        system: options.system,
        messages: messages.map(m => ({ role: m.role, content: m.content })),
        tools: options.tools?.length ? options.tools.map(toAnthropicTool) : undefined,
        temperature: options.temperature,
      },
      { signal: options.signal }
    );

    const promptTokens = response.usage.input_tokens;
    const completionTokens = response.usage.output_tokens;

    return {
      content: textOf(response.content),
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
      raw: { content: response.content },
    };
  }
}
