import { describe, it, expect, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { AnthropicProvider } from '../anthropic.js';
import { extractWithShape } from '../../services/workflow/extractor.js';

const reply: Anthropic.Message = {
  id: 'msg_1',
  type: 'message',
  role: 'assistant',
  model: 'claude-test',
  content: [
    { type: 'text', text: 'Reading.' },
    { type: 'tool_use', id: 'tu_1', name: 'read_file', input: { path: 'a' } },
  ],
  stop_reason: 'tool_use',
  stop_sequence: null,
  usage: { input_tokens: 12, output_tokens: 8 },
};

describe('Anthropic Provider', () => {
  it('should refuse to start without an API key', () => {
    expect(() => new AnthropicProvider({ apiKey: '' })).toThrow('ANTHROPIC_API_KEY not configured');
  });

  it('should surface tool_use blocks as content', async () => {
    const client = new Anthropic({ apiKey: 'test-secret' });
    const create = vi.spyOn(client.messages, 'create').mockResolvedValue(reply);
    const provider = new AnthropicProvider({ client });

    const response = await provider.sendChat([{ role: 'user', content: 'hi' }], {
      model: 'claude-test',
      system: 'You are helpful.',
      maxTokens: 512,
      temperature: 0,
      tools: [
        {
          name: 'read_file',
          description: 'Read a file',
          parameters: {
            type: 'object',
            properties: { path: { type: 'string', description: 'File path' } },
            required: ['path'],
          },
        },
      ],
    });

    expect(response).toEqual({
      content: 'Reading.',
      usage: { promptTokens: 12, completionTokens: 8, totalTokens: 20 },
      raw: { content: reply.content },
    });
    expect(extractWithShape({ role: 'agent', text: response.content, raw: response.raw })).toEqual({
      shape: 'content',
      calls: [{ id: 'tu_1', name: 'read_file', arguments: { path: 'a' } }],
    });
    expect(create).toHaveBeenCalledWith(
      {
        model: 'claude-test',
        max_tokens: 512,
        system: 'You are helpful.',
        messages: [{ role: 'user', content: 'hi' }],
        tools: [
          {
            name: 'read_file',
            description: 'Read a file',
            input_schema: {
              type: 'object',
              properties: { path: { type: 'string', description: 'File path' } },
              required: ['path'],
            },
          },
        ],
        temperature: 0,
      },
      { signal: undefined }
    );
  });

  it('should omit tools when none are registered', async () => {
    const client = new Anthropic({ apiKey: 'test-secret' });
    const create = vi.spyOn(client.messages, 'create').mockResolvedValue(reply);
    const provider = new AnthropicProvider({ client });

    await provider.sendChat([{ role: 'user', content: 'hi' }], { model: 'claude-test', tools: [] });

    expect(create.mock.calls[0][0].tools).toBeUndefined();
    expect(create.mock.calls[0][0].max_tokens).toBe(4096);
  });
});
