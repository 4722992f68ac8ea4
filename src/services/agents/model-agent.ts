// Model Agent Runner
// Produces one agent turn by sending the run transcript to a model provider

import type { Provider } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { AgentName, AgentRunner, AgentTurnOptions, Message } from '../workflow/types.js';
import { extractToolCalls } from '../workflow/extractor.js';
import { AGENT_PROMPTS } from './prompts.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'agent' });

export const EMPTY_TRANSCRIPT = "Let's begin the task.";

export interface ModelAgentOptions {
  maxTokens?: number;
  temperature?: number;
  prompts?: Record<AgentName, string>;
}

function renderMessage(message: Message): string[] {
  switch (message.role) {
    case 'user':
      return [`user: ${message.text}`];
    case 'tool':
      return [`tool ${message.author ?? 'unknown'}: ${message.text}`];
    case 'agent': {
      const author = message.author ?? 'agent';
      const lines = message.text ? [`${author}: ${message.text}`] : [];
      for (const call of extractToolCalls(message)) {
        lines.push(`${author} called ${call.name} ${JSON.stringify(call.arguments)}`);
      }
      return lines;
    }
  }
}

/** One line per message, tool calls rendered on their own lines. */
export function renderTranscript(history: readonly Message[]): string {
  if (history.length === 0) {
    return EMPTY_TRANSCRIPT;
  }
  return history.flatMap(renderMessage).join('\n');
}

export class ModelAgentRunner implements AgentRunner {
  private provider: Provider;
  private model: string;
  private registry: ToolRegistry;
  private maxTokens: number;
  private temperature: number;
  private prompts: Record<AgentName, string>;

  constructor(provider: Provider, model: string, registry: ToolRegistry, options: ModelAgentOptions = {}) {
    this.provider = provider;
    this.model = model;
    this.registry = registry;
    this.maxTokens = options.maxTokens ?? 4096;
    this.temperature = options.temperature ?? 0;
    this.prompts = options.prompts ?? AGENT_PROMPTS;
  }

  async runTurn(agent: AgentName, history: readonly Message[], options: AgentTurnOptions = {}): Promise<Message> {
    const response = await this.provider.sendChat(
      [{ role: 'user', content: renderTranscript(history) }],
      {
        model: this.model,
        system: this.prompts[agent],
        maxTokens: this.maxTokens,
        temperature: this.temperature,
        signal: options.signal,
        tools: this.registry.toOpenAIFunctions(),
      }
    );

    log.debug(
      { agent, provider: this.provider.name, tokens: response.usage.totalTokens },
      'Agent turn received'
    );

    return {
      role: 'agent',
      author: agent,
      text: response.content,
      raw: response.raw,
    };
  }
}
