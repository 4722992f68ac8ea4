// Call Extractor
// Normalizes the tool calls of an agent message into canonical ToolCalls,
// whatever shape the model binding used to represent them

import { z } from 'zod';
import type { Message, ToolCall } from './types.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'extractor' });

/** Placeholder key some bindings add for single positional arguments */
export const PLACEHOLDER_ARG = '__arg1';
/** Correlation key; handlers receive the call id through their context instead */
export const CORRELATION_ARG = 'tool_call_id';

// Only the tool name is required; ids and arguments are repaired later.
const functionSchema = z.object({
  name: z.string(),
  arguments: z.unknown(),
});

const directCallSchema = z.union([
  z.object({
    id: z.unknown(),
    function: functionSchema,
  }),
  z.object({
    id: z.unknown(),
    name: z.string(),
    args: z.unknown(),
    arguments: z.unknown(),
  }),
]);

const metadataCallSchema = z.object({
  id: z.unknown(),
  type: z.string().optional(),
  function: functionSchema,
});

const toolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.unknown(),
  name: z.string(),
  input: z.unknown(),
  partial_json: z.unknown(),
});

const textBlockSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

/** The raw representations a message can carry, in extraction priority order. */
export type RawShape =
  | { shape: 'direct'; entries: unknown[] }
  | { shape: 'metadata'; entries: unknown[] }
  | { shape: 'content'; entries: unknown[] };

export type ShapeName = RawShape['shape'];

interface DraftCall {
  id?: string | null;
  name: string;
  arguments: Record<string, unknown>;
}

export interface Extraction {
  shape: ShapeName | null;
  calls: ToolCall[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type JsonParse = { ok: true; value: unknown } | { ok: false };

function parseJson(text: string): JsonParse {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function jsonText(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

// Object.fromEntries defines keys such as `__proto__` as own properties
function copyRecord(...sources: Record<string, unknown>[]): Record<string, unknown> {
  return Object.fromEntries(sources.flatMap(source => Object.entries(source)));
}

/**
 * Best-effort coercion of an argument payload into a mapping.
 * A string that is not a JSON object becomes `{ query: <string> }`;
 * any other non-object value becomes `{ query: <its JSON text> }`.
 */
export function coerceArguments(value: unknown): Record<string, unknown> {
  if (value === null || value === undefined) return {};
  if (isRecord(value)) return copyRecord(value);

  if (typeof value !== 'string') {
    log.debug({ raw: value }, 'Arguments are not an object, wrapping as query');
    return { query: jsonText(value) };
  }
  if (!value.trim()) return {};

  const parsed = parseJson(value);
  if (parsed.ok && isRecord(parsed.value)) {
    return copyRecord(parsed.value);
  }

  log.debug({ raw: value }, 'Arguments are not a JSON object, wrapping as query');
  return { query: value };
}

function normalizeId(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function detectShapes(message: Message): RawShape[] {
  const raw = message.raw;
  if (!raw) return [];

  const shapes: RawShape[] = [];

  if (Array.isArray(raw.toolCalls)) {
    shapes.push({ shape: 'direct', entries: raw.toolCalls });
  }

  const nested = raw.extra?.['tool_calls'];
  if (Array.isArray(nested)) {
    shapes.push({ shape: 'metadata', entries: nested });
  }

  if (Array.isArray(raw.content)) {
    shapes.push({ shape: 'content', entries: raw.content });
  }

  return shapes;
}

function fromDirect(entries: unknown[]): DraftCall[] {
  const drafts: DraftCall[] = [];

  for (const entry of entries) {
    const parsed = directCallSchema.safeParse(entry);
    if (!parsed.success) {
      log.debug({ entry }, 'Skipping unrecognized direct tool call entry');
      continue;
    }

    const call = parsed.data;
    if ('function' in call) {
      drafts.push({ id: normalizeId(call.id), name: call.function.name, arguments: coerceArguments(call.function.arguments) });
    } else {
      drafts.push({ id: normalizeId(call.id), name: call.name, arguments: coerceArguments(call.args ?? call.arguments) });
    }
  }

  return drafts;
}

function fromMetadata(entries: unknown[]): DraftCall[] {
  const drafts: DraftCall[] = [];

  for (const entry of entries) {
    const parsed = metadataCallSchema.safeParse(entry);
    if (!parsed.success) {
      log.debug({ entry }, 'Skipping unrecognized metadata tool call entry');
      continue;
    }

    drafts.push({
      id: normalizeId(parsed.data.id),
      name: parsed.data.function.name,
      arguments: coerceArguments(parsed.data.function.arguments),
    });
  }

  return drafts;
}

function fromContent(entries: unknown[]): DraftCall[] {
  const drafts: DraftCall[] = [];

  for (const entry of entries) {
    if (!isRecord(entry) || entry.type !== 'tool_use') continue;

    const parsed = toolUseBlockSchema.safeParse(entry);
    if (!parsed.success) {
      log.debug({ entry }, 'Skipping malformed tool_use block');
      continue;
    }

    const block = parsed.data;
    let args = coerceArguments(block.input);
    const fragment = block.partial_json;

    if (isRecord(fragment)) {
      args = copyRecord(args, fragment);
    } else if (typeof fragment === 'string' && fragment.trim()) {
      const merged = parseJson(fragment);
      if (merged.ok && isRecord(merged.value)) {
        args = copyRecord(args, merged.value);
      } else {
        log.warn({ tool: block.name, fragment }, 'Dropping unparsable partial_json fragment');
      }
    } else if (fragment !== null && fragment !== undefined && typeof fragment !== 'string') {
      log.warn({ tool: block.name, fragment }, 'Dropping non-object partial_json fragment');
    }

    drafts.push({ id: normalizeId(block.id), name: block.name, arguments: args });
  }

  return drafts;
}

function draftsFor(shape: RawShape): DraftCall[] {
  switch (shape.shape) {
    case 'direct':
      return fromDirect(shape.entries);
    case 'metadata':
      return fromMetadata(shape.entries);
    case 'content':
      return fromContent(shape.entries);
  }
}

function finalize(drafts: DraftCall[]): ToolCall[] {
  const seen = new Set<string>();
  const calls: ToolCall[] = [];

  drafts.forEach((draft, index) => {
    const name = draft.name.trim();
    if (!name) {
      log.debug({ index }, 'Skipping tool call without a name');
      return;
    }

    let id = draft.id?.trim() ?? '';
    if (!id || seen.has(id)) {
      id = `call_${index}`;
      for (let suffix = 1; seen.has(id); suffix++) {
        id = `call_${index}_${suffix}`;
      }
    }
    seen.add(id);

    const args = Object.fromEntries(
      Object.entries(draft.arguments).filter(([key]) => key !== PLACEHOLDER_ARG && key !== CORRELATION_ARG)
    );

    calls.push({ id, name, arguments: args });
  });

  return calls;
}

/**
 * Extracts tool calls and reports which shape they came from.
 * Shapes are tried in priority order; the first one yielding a call wins.
 */
export function extractWithShape(message: Message): Extraction {
  for (const shape of detectShapes(message)) {
    const calls = finalize(draftsFor(shape));
    if (calls.length > 0) {
      return { shape: shape.shape, calls };
    }
  }

  return { shape: null, calls: [] };
}

/** Canonical tool calls of a message; empty for a plain-text turn. Never throws. */
export function extractToolCalls(message: Message): ToolCall[] {
  return extractWithShape(message).calls;
}

/** Concatenated text of the `text` blocks in a content array. */
export function textOf(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';

  let text = '';
  for (const block of content) {
    const parsed = textBlockSchema.safeParse(block);
    if (parsed.success) {
      text += parsed.data.text;
    }
  }
  return text;
}
