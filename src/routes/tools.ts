import type { FastifyInstance } from 'fastify';
import type { ToolRegistry } from '../services/tools/registry.js';
import { isRoutingTool } from '../services/tools/routing-tools.js';

export interface ToolRoutesOptions {
  registry: ToolRegistry;
}

export async function toolRoutes(server: FastifyInstance, options: ToolRoutesOptions) {
  // Public: tools every agent can call, in function-calling format.
  server.get('/tools', async () => {
    const tools = options.registry.toOpenAIFunctions().map(fn => ({
      ...fn,
      kind: isRoutingTool(fn.name) ? 'routing' : 'gateway',
    }));

    return {
      count: tools.length,
      tools,
    };
  });
}
