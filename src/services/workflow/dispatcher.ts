// Tool Dispatcher
// Executes canonical tool calls against the registry and converts every result,
// error or hand-off request into a ToolOutcome. Never throws.

import { z } from 'zod';
import type { ToolRegistry } from '../tools/registry.js';
import type { DispatchMode } from '../../env.js';
import type { ToolCall, ToolOutcome } from './types.js';
import { withTimeout } from '../../utils/timeout.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'dispatcher' });

const controlTransferSchema = z.object({
  target: z.string(),
  note: z.string(),
});

const toolResultSchema = z.object({
  success: z.boolean(),
  content: z.string(),
});

export interface DispatchedCall {
  call: ToolCall;
  outcome: ToolOutcome;
}

export interface BatchResult {
  dispatched: DispatchedCall[];
  dropped: ToolCall[];
}

export function formatResult(result: unknown): string {
  if (result === null || result === undefined) {
    return '';
  }

  if (typeof result === 'string') {
    return result;
  }

  if (typeof result === 'object') {
    return JSON.stringify(result, null, 2);
  }

  return String(result);
}

/** Maps a handler's return value onto an outcome. */
export function toOutcome(result: unknown): ToolOutcome {
  const transfer = controlTransferSchema.safeParse(result);
  if (transfer.success) {
    return { kind: 'transfer', target: transfer.data.target, note: transfer.data.note };
  }

  const reported = toolResultSchema.safeParse(result);
  if (reported.success) {
    return reported.data.success
      ? { kind: 'value', text: reported.data.content }
      : { kind: 'failure', message: reported.data.content };
  }

  return { kind: 'value', text: formatResult(result) };
}

export class ToolDispatcher {
  private timeoutMs: number;

  constructor(timeoutMs: number = 30000) {
    this.timeoutMs = timeoutMs;
  }

  async dispatch(call: ToolCall, registry: ToolRegistry): Promise<ToolOutcome> {
    const tool = registry.get(call.name);

    if (!tool) {
      log.warn({ tool: call.name, callId: call.id }, 'Tool not found');
      return { kind: 'failure', message: `tool not found: ${call.name}` };
    }

    const startTime = Date.now();

    try {
      const result = await withTimeout(
        signal => tool.execute({ ...call.arguments }, { callId: call.id, signal }),
        this.timeoutMs,
        `Tool "${call.name}"`
      );
      const outcome = toOutcome(result);
      log.info(
        { tool: call.name, callId: call.id, outcome: outcome.kind, durationMs: Date.now() - startTime },
        'Tool dispatched'
      );
      return outcome;
    } catch (error) {
      const message = `Error executing ${call.name}: ${errorMessage(error)}`;
      log.error(
        { tool: call.name, callId: call.id, err: error, durationMs: Date.now() - startTime },
        'Tool execution failed'
      );
      return { kind: 'failure', message };
    }
  }

  /**
   * Dispatches the pending calls of one turn.
   * `first` actions only the first call; `all` runs them in order and stops
   * after a control transfer. Calls not actioned are returned as `dropped`.
   */
  async dispatchBatch(calls: readonly ToolCall[], registry: ToolRegistry, mode: DispatchMode = 'first'): Promise<BatchResult> {
    const dispatched: DispatchedCall[] = [];
    const limit = mode === 'first' ? Math.min(calls.length, 1) : calls.length;
    let index = 0;

    while (index < limit) {
      const call = calls[index];
      index++;

      const outcome = await this.dispatch(call, registry);
      dispatched.push({ call, outcome });

      if (outcome.kind === 'transfer') {
        break;
      }
    }

    const dropped = calls.slice(index);
    if (dropped.length > 0) {
      log.warn(
        { mode, dropped: dropped.map(c => c.name) },
        'Tool calls not dispatched in this step'
      );
    }

    return { dispatched, dropped };
  }
}
