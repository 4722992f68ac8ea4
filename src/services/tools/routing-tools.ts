// Routing tools
// Let an agent hand control to another agent through an ordinary tool call

import type { AgentName } from '../workflow/types.js';
import { ROUTING_DIRECTIVES } from '../workflow/router.js';
import type { ControlTransfer, ToolDefinition } from './types.js';

const descriptions: Record<AgentName, string> = {
  orchestrator: 'Return control to the orchestrator agent. Use when your part of the task is complete.',
  planner: 'Route the workflow to the planner agent, which designs candidate solutions from the gathered context.',
  coder: 'Route the workflow to the coder agent, which implements, tests and commits a planned solution.',
};

export function createRoutingTool(target: AgentName): ToolDefinition {
  return {
    // Same token as the plain-text directive for this agent
    name: ROUTING_DIRECTIVES[target],
    description: descriptions[target],
    parameters: [],
    async execute(): Promise<ControlTransfer> {
      return { target, note: `Routing to ${target}` };
    },
  };
}

export const ROUTING_TOOLS: ToolDefinition[] = [
  createRoutingTool('planner'),
  createRoutingTool('coder'),
  createRoutingTool('orchestrator'),
];

export function isRoutingTool(name: string): boolean {
  return Object.values(ROUTING_DIRECTIVES).includes(name);
}
