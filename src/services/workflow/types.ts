// Workflow Types
// Messages, canonical tool calls, outcomes and the per-run state threaded through the engine

export const AGENTS = ['orchestrator', 'planner', 'coder'] as const;

export type AgentName = (typeof AGENTS)[number];

export const DISPATCHER = 'dispatcher' as const;
export const END = 'end' as const;

export type NodeName = AgentName | typeof DISPATCHER | typeof END;

export function isAgentName(value: unknown): value is AgentName {
  return typeof value === 'string' && AGENTS.some(agent => agent === value);
}

export type MessageRole = 'user' | 'agent' | 'tool';

/**
 * Tool-call payload exactly as the model binding produced it.
 * Which field is populated depends on the provider:
 * - `toolCalls`: a direct list of call descriptors
 * - `extra`: a metadata mapping whose `tool_calls` entry holds OpenAI-style calls
 * - `content`: typed content blocks, some of them `tool_use`
 */
export interface RawToolCallPayload {
  toolCalls?: unknown;
  extra?: Record<string, unknown>;
  content?: unknown;
}

export interface Message {
  readonly role: MessageRole;
  readonly author?: string;
  readonly text: string;
  readonly raw?: RawToolCallPayload;
  /** Set on tool messages: the call this message answers */
  readonly toolCallId?: string;
  /** Set on tool messages */
  readonly outcome?: ToolOutcome['kind'];
}

export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

export type ToolOutcome =
  | { kind: 'value'; text: string }
  | { kind: 'failure'; message: string }
  | { kind: 'transfer'; target: string; note: string };

export interface RunState {
  readonly runId: string;
  readonly history: readonly Message[];
  readonly currentAgent: NodeName;
  /** Agent whose turn ran last; non-routing tools hand control back to it */
  readonly caller: AgentName;
  readonly pendingCalls: readonly ToolCall[];
  readonly stepCount: number;
}

export type RunStatus = 'completed' | 'step_limit' | 'failed';

export interface RunResult {
  status: RunStatus;
  state: RunState;
  error?: string;
}

export interface RunOptions {
  maxSteps?: number;
}

export interface AgentTurnOptions {
  signal?: AbortSignal;
}

/** Model-binding collaborator: one agent turn over the full history. */
export interface AgentRunner {
  runTurn(agent: AgentName, history: readonly Message[], options?: AgentTurnOptions): Promise<Message>;
}
