// Provider Interface
// Common interface that every model binding implements

import type { RawToolCallPayload } from '../services/workflow/types.js';
import type { OpenAIFunctionDef } from '../services/tools/registry.js';

export type ProviderTool = OpenAIFunctionDef;

export interface ProviderMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ProviderOptions {
  model: string;
  system?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  tools?: ProviderTool[];
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ProviderResponse {
  content: string;
  usage: ProviderUsage;
  /** Tool calls in whatever shape the provider returns them */
  raw: RawToolCallPayload;
}

export interface Provider {
  name: string;
  sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse>;
}
