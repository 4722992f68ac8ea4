// Workflow Engine
// Drives agent turns and tool dispatch until the router chooses to end the run
// or the step ceiling is reached

import { randomUUID } from 'crypto';
import type { ToolRegistry } from '../tools/registry.js';
import type { DispatchMode } from '../../env.js';
import { DISPATCHER, END } from './types.js';
import type {
  AgentName,
  AgentRunner,
  Message,
  RunOptions,
  RunResult,
  RunState,
  ToolCall,
  ToolOutcome,
} from './types.js';
import { extractWithShape } from './extractor.js';
import { ToolDispatcher } from './dispatcher.js';
import { route } from './router.js';
import type { RouteDecision } from './router.js';
import { withTimeout } from '../../utils/timeout.js';
import { AppError, ErrorCode, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'workflow' });

export interface WorkflowEngineOptions {
  maxSteps?: number;
  agentTimeoutMs?: number;
  toolTimeoutMs?: number;
  dispatchMode?: DispatchMode;
}

/** An agent turn could not be produced; carries the state reached before it. */
export class WorkflowRunError extends AppError {
  constructor(
    message: string,
    public readonly state: RunState,
    cause: unknown
  ) {
    super(ErrorCode.COLLABORATOR_FAILED, message, 502, { runId: state.runId, cause: errorMessage(cause) });
    this.name = 'WorkflowRunError';
  }
}

interface StepResult {
  state: RunState;
  decision: RouteDecision;
}

function freezeMessage(message: Message): Message {
  return Object.freeze({ ...message });
}

function appendMessages(history: readonly Message[], ...messages: Message[]): readonly Message[] {
  return Object.freeze([...history, ...messages]);
}

export function createRunState(input: string, runId: string = randomUUID()): RunState {
  return {
    runId,
    history: appendMessages([], freezeMessage({ role: 'user', text: input })),
    currentAgent: 'orchestrator',
    caller: 'orchestrator',
    pendingCalls: [],
    stepCount: 0,
  };
}

function outcomeText(outcome: ToolOutcome): string {
  switch (outcome.kind) {
    case 'value':
      return outcome.text;
    case 'failure':
      return `Error: ${outcome.message}`;
    case 'transfer':
      return outcome.note;
  }
}

/** History entry recording what a dispatched call produced. */
export function toolMessage(call: ToolCall, outcome: ToolOutcome): Message {
  return freezeMessage({
    role: 'tool',
    author: call.name,
    text: outcomeText(outcome),
    toolCallId: call.id,
    outcome: outcome.kind,
  });
}

export class WorkflowEngine {
  private agents: AgentRunner;
  private registry: ToolRegistry;
  private dispatcher: ToolDispatcher;
  private maxSteps: number;
  private agentTimeoutMs: number;
  private dispatchMode: DispatchMode;

  constructor(agents: AgentRunner, registry: ToolRegistry, options: WorkflowEngineOptions = {}) {
    this.agents = agents;
    this.registry = registry;
    this.dispatcher = new ToolDispatcher(options.toolTimeoutMs ?? 30000);
    this.maxSteps = options.maxSteps ?? 50;
    this.agentTimeoutMs = options.agentTimeoutMs ?? 120000;
    this.dispatchMode = options.dispatchMode ?? 'first';
  }

  createRunState(input: string): RunState {
    return createRunState(input);
  }

  /**
   * Runs from `initial` until completion or the step ceiling.
   * Throws `WorkflowRunError` when an agent turn fails; tool and routing
   * faults never escape.
   */
  async run(initial: RunState, options: RunOptions = {}): Promise<RunResult> {
    const maxSteps = options.maxSteps ?? this.maxSteps;
    const runLog = log.child({ runId: initial.runId });
    let state = initial;

    runLog.info({ maxSteps, agent: state.currentAgent }, 'Run started');

    for (;;) {
      const node = state.currentAgent;
      if (node === END) {
        return { status: 'completed', state };
      }

      const { state: next, decision } = node === DISPATCHER
        ? await this.dispatchStep(state)
        : await this.agentStep(state, node);

      const stepCount = next.stepCount + 1;
      runLog.info({ step: stepCount, node, next: decision.next, reason: decision.reason }, 'Step complete');

      if (decision.next === END) {
        runLog.info({ steps: stepCount, messages: next.history.length }, 'Run completed');
        return { status: 'completed', state: { ...next, currentAgent: END, stepCount } };
      }

      state = { ...next, currentAgent: decision.next, stepCount };

      if (stepCount >= maxSteps) {
        runLog.warn({ steps: stepCount, maxSteps }, 'Step limit reached, aborting run');
        return { status: 'step_limit', state, error: `Step limit of ${maxSteps} reached` };
      }
    }
  }

  /** Starts a run for `input`; agent failures become a `failed` result. */
  async execute(input: string, options: RunOptions = {}): Promise<RunResult> {
    const initial = this.createRunState(input);

    try {
      return await this.run(initial, options);
    } catch (error) {
      if (error instanceof WorkflowRunError) {
        log.error({ runId: initial.runId, err: error }, 'Run failed');
        return { status: 'failed', state: error.state, error: error.message };
      }
      throw error;
    }
  }

  private async agentStep(state: RunState, agent: AgentName): Promise<StepResult> {
    let reply: Message;
    try {
      reply = await withTimeout(
        signal => this.agents.runTurn(agent, state.history, { signal }),
        this.agentTimeoutMs,
        `Agent "${agent}" turn`
      );
    } catch (error) {
      throw new WorkflowRunError(`Agent "${agent}" turn failed: ${errorMessage(error)}`, state, error);
    }

    const message = freezeMessage({ ...reply, role: 'agent', author: agent });
    const { shape, calls } = extractWithShape(message);
    if (shape) {
      log.debug({ runId: state.runId, agent, shape, calls: calls.map(c => c.name) }, 'Tool calls extracted');
    }

    const decision = route(state, { kind: 'agent_turn', message, calls });

    return {
      state: {
        ...state,
        history: appendMessages(state.history, message),
        caller: agent,
        pendingCalls: decision.next === DISPATCHER ? calls : [],
      },
      decision,
    };
  }

  private async dispatchStep(state: RunState): Promise<StepResult> {
    if (state.pendingCalls.length === 0) {
      return { state, decision: route(state, { kind: 'dispatch', outcome: null }) };
    }

    const { dispatched } = await this.dispatcher.dispatchBatch(state.pendingCalls, this.registry, this.dispatchMode);
    const messages = dispatched.map(({ call, outcome }) => toolMessage(call, outcome));
    const last = dispatched[dispatched.length - 1];

    return {
      state: {
        ...state,
        history: appendMessages(state.history, ...messages),
        pendingCalls: [],
      },
      decision: route(state, { kind: 'dispatch', outcome: last ? last.outcome : null }),
    };
  }
}
