// Router
// Chooses the next node after an agent turn or a dispatch step.
// Pure apart from warning logs; never throws on ambiguous input.

import { AGENTS, DISPATCHER, END, isAgentName } from './types.js';
import type { AgentName, Message, NodeName, RunState, ToolCall, ToolOutcome } from './types.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'router' });

/**
 * Plain-text hand-off markers shared with the agent prompts.
 * Matched as case-insensitive substrings, so they must stay distinctive.
 */
export const ROUTING_DIRECTIVES: Record<AgentName, string> = {
  orchestrator: 'route_to_orchestrator',
  planner: 'route_to_planner',
  coder: 'route_to_coder',
};

export type RouteEvent =
  | { kind: 'agent_turn'; message: Message; calls: readonly ToolCall[] }
  | { kind: 'dispatch'; outcome: ToolOutcome | null };

export type RouteReason =
  | 'tool_calls'
  | 'directive'
  | 'no_directive'
  | 'control_transfer'
  | 'return_to_caller'
  | 'malformed_transfer'
  | 'nothing_dispatched';

export interface RouteDecision {
  next: NodeName;
  reason: RouteReason;
}

/**
 * Earliest directive in `text` naming an agent other than `self`.
 * Returns null when the text carries none.
 */
export function findDirective(text: string, self?: AgentName): AgentName | null {
  const haystack = text.toLowerCase();
  let found: AgentName | null = null;
  let foundAt = Infinity;

  for (const agent of AGENTS) {
    if (agent === self) continue;
    const at = haystack.indexOf(ROUTING_DIRECTIVES[agent]);
    if (at !== -1 && at < foundAt) {
      found = agent;
      foundAt = at;
    }
  }

  return found;
}

function afterAgentTurn(state: RunState, message: Message, calls: readonly ToolCall[]): RouteDecision {
  if (calls.length > 0) {
    return { next: DISPATCHER, reason: 'tool_calls' };
  }

  const self = isAgentName(message.author) ? message.author : state.caller;
  const target = findDirective(message.text, self);
  if (target) {
    return { next: target, reason: 'directive' };
  }

  return { next: END, reason: 'no_directive' };
}

function afterDispatch(state: RunState, outcome: ToolOutcome | null): RouteDecision {
  if (!outcome) {
    log.warn({ runId: state.runId }, 'Dispatch step produced no outcome, defaulting to orchestrator');
    return { next: 'orchestrator', reason: 'nothing_dispatched' };
  }

  if (outcome.kind === 'transfer') {
    if (isAgentName(outcome.target)) {
      return { next: outcome.target, reason: 'control_transfer' };
    }
    log.warn(
      { runId: state.runId, target: outcome.target },
      'Control transfer names no known agent, defaulting to orchestrator'
    );
    return { next: 'orchestrator', reason: 'malformed_transfer' };
  }

  return { next: state.caller, reason: 'return_to_caller' };
}

/**
 * Next node for `state` given what the step that just finished produced.
 * `state` is the state observed before that step's effects were applied.
 */
export function route(state: RunState, event: RouteEvent): RouteDecision {
  return event.kind === 'agent_turn'
    ? afterAgentTurn(state, event.message, event.calls)
    : afterDispatch(state, event.outcome);
}
