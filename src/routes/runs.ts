// Run routes
// Starts a multi-agent run and returns its final state

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { WorkflowEngine } from '../services/workflow/engine.js';
import { extractToolCalls } from '../services/workflow/extractor.js';
import type { Message, RunResult, ToolCall } from '../services/workflow/types.js';
import { AppError, formatErrorResponse, errorMessage, isAppError } from '../utils/errors.js';

const CreateRunSchema = z.object({
  input: z.string().trim().min(1).max(20000),
  max_steps: z.number().int().min(1).max(500).optional(),
});

export interface RunRoutesOptions {
  engine: WorkflowEngine;
}

export interface SerializedMessage {
  role: Message['role'];
  author?: string;
  text: string;
  tool_calls?: ToolCall[];
  tool_call_id?: string;
  outcome?: Message['outcome'];
}

export interface RunResponse {
  run_id: string;
  status: RunResult['status'];
  steps: number;
  history: SerializedMessage[];
  error?: string;
}

export function serializeMessage(message: Message): SerializedMessage {
  const serialized: SerializedMessage = { role: message.role, text: message.text };

  if (message.author) serialized.author = message.author;
  if (message.role === 'agent') {
    const calls = extractToolCalls(message);
    if (calls.length > 0) serialized.tool_calls = calls;
  }
  if (message.toolCallId) serialized.tool_call_id = message.toolCallId;
  if (message.outcome) serialized.outcome = message.outcome;

  return serialized;
}

export function toRunResponse(result: RunResult): RunResponse {
  const response: RunResponse = {
    run_id: result.state.runId,
    status: result.status,
    steps: result.state.stepCount,
    history: result.state.history.map(serializeMessage),
  };
  if (result.error) response.error = result.error;
  return response;
}

export async function runRoutes(server: FastifyInstance, options: RunRoutesOptions) {
  const { engine } = options;

  // POST /v1/runs - Run the agent team on a task
  server.post('/runs', async (request, reply) => {
    const parsed = CreateRunSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({
        success: false,
        error: 'Validation failed',
        details: parsed.error.issues,
      });
    }

    const { input, max_steps } = parsed.data;

    try {
      const result = await engine.execute(input, { maxSteps: max_steps });
      request.log.info(
        { runId: result.state.runId, status: result.status, steps: result.state.stepCount },
        'Run finished'
      );

      return reply.code(result.status === 'failed' ? 502 : 200).send(toRunResponse(result));
    } catch (error) {
      request.log.error({ err: error }, 'Run crashed');
      const appError = isAppError(error) ? error : AppError.internal(errorMessage(error));
      return reply.code(appError.statusCode).send(formatErrorResponse(appError));
    }
  });
}
