// Workflow Module - Main exports

export { WorkflowEngine, WorkflowRunError, createRunState, toolMessage } from './engine.js';
export { extractToolCalls, extractWithShape, detectShapes, coerceArguments, textOf } from './extractor.js';
export { ToolDispatcher, toOutcome, formatResult } from './dispatcher.js';
export { route, findDirective, ROUTING_DIRECTIVES } from './router.js';
export { AGENTS, DISPATCHER, END, isAgentName } from './types.js';
export type { WorkflowEngineOptions } from './engine.js';
export type { RawShape, ShapeName, Extraction } from './extractor.js';
export type { BatchResult, DispatchedCall } from './dispatcher.js';
export type { RouteDecision, RouteEvent, RouteReason } from './router.js';
export type {
  AgentName,
  AgentRunner,
  AgentTurnOptions,
  Message,
  MessageRole,
  NodeName,
  RawToolCallPayload,
  RunOptions,
  RunResult,
  RunState,
  RunStatus,
  ToolCall,
  ToolOutcome,
} from './types.js';
