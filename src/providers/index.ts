// Provider Registry
// Central registry for the model bindings agents can run on

import type { Provider } from './types.js';
import { AnthropicProvider } from './anthropic.js';
import { DeepSeekProvider } from './deepseek.js';
import { isProviderConfigured } from '../env.js';

// Provider instances (lazy initialization)
const providers: Map<string, Provider> = new Map();

function getOrCreateProvider(name: string): Provider | null {
  const cached = providers.get(name);
  if (cached) {
    return cached;
  }

  if (!isProviderConfigured(name)) {
    return null;
  }

  let provider: Provider | null = null;

  switch (name) {
    case 'anthropic':
      provider = new AnthropicProvider();
      break;
    case 'deepseek':
      provider = new DeepSeekProvider();
      break;
    default:
      return null;
  }

  providers.set(name, provider);
  return provider;
}

export function getProvider(name: string): Provider {
  const provider = getOrCreateProvider(name);

  if (!provider) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  return provider;
}

export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ProviderTool } from './types.js';
