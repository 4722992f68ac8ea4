// HTTP server assembly
// Routes are registered against injected collaborators so tests can build the app without a model or gateway

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './env.js';
import { loggerOptions } from './utils/logger.js';
import { runRoutes } from './routes/runs.js';
import { toolRoutes } from './routes/tools.js';
import type { ToolRegistry } from './services/tools/registry.js';
import type { WorkflowEngine } from './services/workflow/engine.js';

export const API_VERSION = '0.1.0';

export interface ServerDependencies {
  registry: ToolRegistry;
  engine: WorkflowEngine;
}

export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  // Same pino configuration as the workflow services
  const server = Fastify({ logger: loggerOptions });

  await server.register(cors, {
    origin: env.CORS_ORIGINS,
    credentials: true,
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      tools: deps.registry.names().length,
    };
  });

  await server.register(toolRoutes, { prefix: '/v1', registry: deps.registry });
  await server.register(runRoutes, { prefix: '/v1', engine: deps.engine });

  return server;
}
