// Crewline API
// Multi-agent coding workflow: orchestrator, planner and coder sharing one tool registry

// Load environment variables from .env file
import 'dotenv/config';

import { env, describeConfiguration } from './env.js';
import { logger } from './utils/logger.js';
import { getProvider } from './providers/index.js';
import { initializeTools, ToolGatewayClient } from './services/tools/index.js';
import { ModelAgentRunner } from './services/agents/index.js';
import { WorkflowEngine } from './services/workflow/index.js';
import { buildServer } from './server.js';

const PORT = env.PORT;
const HOST = env.HOST;

try {
  const registry = await initializeTools({
    gateway: env.TOOL_GATEWAY_URL ? new ToolGatewayClient(env.TOOL_GATEWAY_URL) : undefined,
  });

  const agents = new ModelAgentRunner(getProvider(env.AGENT_PROVIDER), env.AGENT_MODEL, registry, {
    maxTokens: env.AGENT_MAX_TOKENS,
    temperature: env.AGENT_TEMPERATURE,
  });

  const engine = new WorkflowEngine(agents, registry, {
    maxSteps: env.WORKFLOW_MAX_STEPS,
    agentTimeoutMs: env.AGENT_TIMEOUT_MS,
    toolTimeoutMs: env.TOOL_TIMEOUT_MS,
    dispatchMode: env.WORKFLOW_DISPATCH_MODE,
  });

  const server = await buildServer({ registry, engine });
  await server.listen({ port: PORT, host: HOST });

  logger.info(describeConfiguration(), 'Configuration');
  logger.info(`Health: http://${HOST}:${PORT}/v1/health`);
} catch (err) {
  logger.error({ err }, 'Startup failed');
  process.exit(1);
}
