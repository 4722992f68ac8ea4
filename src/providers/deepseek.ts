// DeepSeek Provider
// Uses the OpenAI-compatible DeepSeek API which supports function calling

import { z } from 'zod';
import { env } from '../env.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z.array(z.unknown()).nullish(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .partial()
    .nullish(),
});

export interface DeepSeekConfig {
  apiKey?: string;
  baseUrl?: string;
}

export class DeepSeekProvider implements Provider {
  name = 'deepseek';
  private apiKey: string;
  private baseUrl: string;

  constructor(config: DeepSeekConfig = {}) {
    this.apiKey = config.apiKey ?? env.DEEPSEEK_API_KEY;
    this.baseUrl = (config.baseUrl ?? env.DEEPSEEK_BASE_URL).replace(/\/+$/, '');
    if (!this.apiKey) {
      throw new Error('DEEPSEEK_API_KEY not configured');
    }
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const chat = options.system
      ? [{ role: 'system', content: options.system }, ...messages]
      : messages;
    const tools = options.tools?.length
      ? options.tools.map(fn => ({ type: 'function', function: fn }))
      : undefined;

    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: options.model || 'deepseek-chat',
        messages: chat,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        stream: false,
        tools,
        tool_choice: tools ? 'auto' : undefined,
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`DeepSeek API error: ${response.status} - ${error}`);
    }

    const parsed = completionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('DeepSeek API returned an unexpected response body');
    }

    const { choices, usage } = parsed.data;
    const message = choices[0].message;

    return {
      content: message.content || '',
      usage: {
        promptTokens: usage?.prompt_tokens || 0,
        completionTokens: usage?.completion_tokens || 0,
        totalTokens: usage?.total_tokens || 0,
      },
      // OpenAI-style calls with JSON-string arguments live in the metadata mapping
      raw: message.tool_calls ? { extra: { tool_calls: message.tool_calls } } : {},
    };
  }
}
