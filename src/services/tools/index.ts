// Tool System Initialization
// Builds the registry shared by every agent: routing tools plus the gateway's tools

import { ToolRegistry } from './registry.js';
import { ROUTING_TOOLS, isRoutingTool } from './routing-tools.js';
import { ToolGatewayClient, loadGatewayTools } from './gateway-client.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'tools' });

export { ToolRegistry } from './registry.js';
export { ToolGatewayClient } from './gateway-client.js';
export { ROUTING_TOOLS, createRoutingTool, isRoutingTool } from './routing-tools.js';
export type { ToolDefinition, ToolResult, ToolParameter, ToolContext, ToolArguments, ControlTransfer } from './types.js';

export interface InitializeToolsOptions {
  /** Remote tool gateway; omitted means routing tools only */
  gateway?: ToolGatewayClient;
}

/**
 * Creates the tool registry for this process.
 * Throws when a configured gateway cannot list its tools.
 */
export async function initializeTools(options: InitializeToolsOptions = {}): Promise<ToolRegistry> {
  log.info('Initializing tool system...');
  const registry = new ToolRegistry();

  for (const tool of ROUTING_TOOLS) {
    registry.register(tool);
  }

  if (options.gateway) {
    const gatewayTools = await loadGatewayTools(options.gateway);
    for (const tool of gatewayTools) {
      if (isRoutingTool(tool.name)) {
        log.warn({ tool: tool.name }, 'Gateway tool shadows a routing tool, skipping');
        continue;
      }
      registry.register(tool);
    }
  } else {
    log.info('No tool gateway configured, only routing tools are available');
  }

  const names = registry.names();
  log.info({ count: names.length, tools: names }, 'Tool system initialized');

  return registry;
}
