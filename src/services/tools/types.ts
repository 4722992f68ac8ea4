// Tool system types and interfaces
// Registry tools are either local (routing tools) or wrappers around the remote tool gateway

export type ToolParameterType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: unknown;
}

export type ToolArguments = Record<string, unknown>;

export interface ToolContext {
  /** Correlation id of the call being executed */
  callId: string;
  /** Aborted when the dispatcher gives up on the call */
  signal?: AbortSignal;
}

/**
 * A handler may return anything. Two shapes are recognized by the dispatcher:
 * a `ControlTransfer` requests a hand-off to another agent, and a `ToolResult`
 * reports success or failure explicitly.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
  execute: (args: ToolArguments, context: ToolContext) => Promise<unknown>;
}

export interface ToolResult {
  success: boolean;
  content: string;
  metadata?: {
    duration_ms?: number;
    [key: string]: unknown;
  };
}

export interface ControlTransfer {
  target: string;
  note: string;
}
