import { describe, it, expect } from 'vitest';
import {
  coerceArguments,
  detectShapes,
  extractToolCalls,
  extractWithShape,
  textOf,
} from '../extractor.js';
import type { Message, RawToolCallPayload } from '../types.js';

function agentMessage(raw?: RawToolCallPayload, text = ''): Message {
  return { role: 'agent', author: 'orchestrator', text, raw };
}

describe('Call Extractor', () => {
  describe('shape independence', () => {
    const expected = [{ id: 'call_1', name: 'read_file', arguments: { path: 'README.md' } }];

    it('should read direct tool call descriptors', () => {
      const message = agentMessage({
        toolCalls: [{ id: 'call_1', name: 'read_file', args: { path: 'README.md' } }],
      });

      expect(extractWithShape(message)).toEqual({ shape: 'direct', calls: expected });
    });

    it('should read OpenAI-style calls from the metadata mapping', () => {
      const message = agentMessage({
        extra: {
          tool_calls: [
            { id: 'call_1', type: 'function', function: { name: 'read_file', arguments: '{"path":"README.md"}' } },
          ],
        },
      });

      expect(extractWithShape(message)).toEqual({ shape: 'metadata', calls: expected });
    });

    it('should read tool_use content blocks', () => {
      const message = agentMessage({
        content: [
          { type: 'text', text: 'Reading the readme' },
          { type: 'tool_use', id: 'call_1', name: 'read_file', input: { path: 'README.md' } },
        ],
      });

      expect(extractWithShape(message)).toEqual({ shape: 'content', calls: expected });
    });

    it('should accept the function variant in direct descriptors', () => {
      const message = agentMessage({
        toolCalls: [{ id: 'c', function: { name: 'search_files', arguments: '{"pattern":"*.ts"}' } }],
      });

      expect(extractToolCalls(message)).toEqual([
        { id: 'c', name: 'search_files', arguments: { pattern: '*.ts' } },
      ]);
    });
  });

  describe('argument coercion', () => {
    it('should wrap a non-JSON argument string as a query', () => {
      const message = agentMessage({
        extra: { tool_calls: [{ id: 'x', function: { name: 'search_files', arguments: 'not json' } }] },
      });

      expect(extractToolCalls(message)).toEqual([
        { id: 'x', name: 'search_files', arguments: { query: 'not json' } },
      ]);
    });

    it('should wrap JSON that is not an object as a query', () => {
      expect(coerceArguments('[1,2]')).toEqual({ query: '[1,2]' });
    });

    it('should treat blank and missing arguments as empty', () => {
      expect(coerceArguments('   ')).toEqual({});
      expect(coerceArguments(null)).toEqual({});
      expect(coerceArguments(undefined)).toEqual({});
    });

    it('should copy object arguments', () => {
      const input = { path: 'a' };
      const result = coerceArguments(input);

      expect(result).toEqual({ path: 'a' });
      expect(result).not.toBe(input);
    });

    it('should wrap array and scalar arguments as a query', () => {
      const message = agentMessage({
        content: [{ type: 'tool_use', id: 't', name: 'read_file', input: ['a'] }],
      });

      expect(extractToolCalls(message)).toEqual([{ id: 't', name: 'read_file', arguments: { query: '["a"]' } }]);
      expect(coerceArguments(42)).toEqual({ query: '42' });
    });

    it('should keep __proto__ as an own argument key', () => {
      const message = agentMessage({
        extra: { tool_calls: [{ id: 'p', function: { name: 'read_file', arguments: '{"__proto__":{"path":"x"},"a":1}' } }] },
      });

      const [call] = extractToolCalls(message);

      expect(Object.keys(call.arguments)).toEqual(['__proto__', 'a']);
      expect(Object.getPrototypeOf(call.arguments)).toBe(Object.prototype);
      expect(call.arguments.path).toBeUndefined();
      expect(JSON.stringify(call.arguments)).toBe('{"__proto__":{"path":"x"},"a":1}');
    });
  });

  describe('partial_json fragments', () => {
    it('should merge a parsable fragment into the block input', () => {
      const message = agentMessage({
        content: [
          {
            type: 'tool_use',
            id: 'tu_1',
            name: 'write_file',
            input: { path: 'a.txt' },
            partial_json: '{"content":"hi"}',
          },
        ],
      });

      expect(extractToolCalls(message)).toEqual([
        { id: 'tu_1', name: 'write_file', arguments: { path: 'a.txt', content: 'hi' } },
      ]);
    });

    it('should merge a __proto__ key from the fragment as an own key', () => {
      const message = agentMessage({
        content: [
          { type: 'tool_use', id: 'tu_1', name: 'write_file', input: { path: 'a.txt' }, partial_json: '{"__proto__":{"mode":"x"}}' },
        ],
      });

      const [call] = extractToolCalls(message);

      expect(Object.keys(call.arguments)).toEqual(['path', '__proto__']);
      expect(call.arguments.mode).toBeUndefined();
    });

    it('should keep the block input when the fragment cannot be parsed', () => {
      const message = agentMessage({
        content: [
          { type: 'tool_use', id: 'tu_1', name: 'write_file', input: { path: 'a.txt' }, partial_json: '{"content":' },
        ],
      });

      expect(extractToolCalls(message)).toEqual([
        { id: 'tu_1', name: 'write_file', arguments: { path: 'a.txt' } },
      ]);
    });
  });

  describe('reserved keys', () => {
    it('should strip the __arg1 placeholder in every shape', () => {
      const direct = agentMessage({ toolCalls: [{ id: 'a', name: 'run_command', args: { __arg1: 'ls', cwd: '.' } }] });
      const metadata = agentMessage({
        extra: { tool_calls: [{ id: 'a', function: { name: 'run_command', arguments: '{"__arg1":"ls","cwd":"."}' } }] },
      });
      const content = agentMessage({
        content: [{ type: 'tool_use', id: 'a', name: 'run_command', input: { __arg1: 'ls', cwd: '.' } }],
      });

      for (const message of [direct, metadata, content]) {
        expect(extractToolCalls(message)).toEqual([{ id: 'a', name: 'run_command', arguments: { cwd: '.' } }]);
      }
    });

    it('should strip the tool_call_id correlation key', () => {
      const message = agentMessage({
        toolCalls: [{ id: 'a', name: 'read_file', args: { tool_call_id: 'a', path: 'p' } }],
      });

      expect(extractToolCalls(message)[0].arguments).toEqual({ path: 'p' });
    });
  });

  describe('ids and names', () => {
    it('should keep calls whose id is a number', () => {
      const message = agentMessage({
        extra: { tool_calls: [{ id: 7, function: { name: 'read_file', arguments: '{"path":"a"}' } }] },
      });

      expect(extractToolCalls(message)).toEqual([{ id: '7', name: 'read_file', arguments: { path: 'a' } }]);
    });

    it('should synthesize an id when the id cannot be used', () => {
      const message = agentMessage({ toolCalls: [{ id: { nested: true }, name: 'list_directory' }] });

      expect(extractToolCalls(message)).toEqual([{ id: 'call_0', name: 'list_directory', arguments: {} }]);
    });

    it('should synthesize ids for calls without one', () => {
      const message = agentMessage({
        toolCalls: [{ name: 'list_directory' }, { name: 'read_file', args: { path: 'x' } }],
      });

      expect(extractToolCalls(message).map(c => c.id)).toEqual(['call_0', 'call_1']);
    });

    it('should replace duplicate ids', () => {
      const message = agentMessage({
        toolCalls: [{ id: 'x', name: 'a' }, { id: 'x', name: 'b' }],
      });

      expect(extractToolCalls(message).map(c => c.id)).toEqual(['x', 'call_1']);
    });

    it('should avoid collisions with ids the model already used', () => {
      const message = agentMessage({
        toolCalls: [{ id: 'call_1', name: 'a' }, { name: 'b' }],
      });

      expect(extractToolCalls(message).map(c => c.id)).toEqual(['call_1', 'call_1_1']);
    });

    it('should trim names and skip calls without a name', () => {
      const message = agentMessage({
        toolCalls: [{ id: 'a', name: '  read_file ' }, { id: 'b', name: '   ' }],
      });

      expect(extractToolCalls(message)).toEqual([{ id: 'a', name: 'read_file', arguments: {} }]);
    });
  });

  describe('priority and fallbacks', () => {
    it('should prefer direct descriptors over the metadata mapping', () => {
      const message = agentMessage({
        toolCalls: [{ id: 'd', name: 'direct_tool' }],
        extra: { tool_calls: [{ id: 'm', function: { name: 'metadata_tool', arguments: '{}' } }] },
      });

      expect(extractWithShape(message)).toEqual({
        shape: 'direct',
        calls: [{ id: 'd', name: 'direct_tool', arguments: {} }],
      });
    });

    it('should fall through to the next shape when one yields nothing', () => {
      const message = agentMessage({
        toolCalls: [],
        extra: { tool_calls: [{ id: 'm', function: { name: 'metadata_tool', arguments: '{}' } }] },
      });

      expect(extractWithShape(message).shape).toBe('metadata');
    });

    it('should report every shape present in priority order', () => {
      const message = agentMessage({ content: [], toolCalls: [], extra: { tool_calls: [] } });

      expect(detectShapes(message).map(s => s.shape)).toEqual(['direct', 'metadata', 'content']);
    });

    it('should return no calls for a plain text turn', () => {
      expect(extractWithShape(agentMessage(undefined, 'All done.'))).toEqual({ shape: null, calls: [] });
    });

    it('should ignore unrecognized entries without throwing', () => {
      const message = agentMessage({
        toolCalls: [42, { foo: 1 }],
        content: [{ type: 'image' }, { type: 'tool_use', name: 7 }],
      });

      expect(extractToolCalls(message)).toEqual([]);
    });
  });

  describe('textOf', () => {
    it('should concatenate text blocks only', () => {
      const content = [
        { type: 'text', text: 'a' },
        { type: 'tool_use', id: 't', name: 'x', input: {} },
        { type: 'text', text: 'b' },
      ];

      expect(textOf(content)).toBe('ab');
    });

    it('should pass strings through and ignore other values', () => {
      expect(textOf('plain')).toBe('plain');
      expect(textOf(5)).toBe('');
    });
  });
});
