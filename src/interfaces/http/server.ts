import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import orchestratorPlugin from './orchestrator-plugin.js';
import type { OrchestratorPluginOptions } from './orchestrator-plugin.js';
import workflowRoutes from './workflow-routes.js';
import agentRoutes from './agent-routes.js';

export interface BuildServerOptions extends OrchestratorPluginOptions {
  logLevel: string;
}

/**
 * Builds the Fastify app without listening, so tests can drive it
 * through `inject`.
 *
 * Order:
 * 1) Orchestrator decorations
 * 2) HTTP routes
 */
export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: options.logLevel,
    },
  });

  await fastify.register(orchestratorPlugin, {
    engine: options.engine,
    agents: options.agents,
    discovery: options.discovery,
  });

  await fastify.register(workflowRoutes);
  await fastify.register(agentRoutes);

  fastify.get('/api/v1/health', async () => ({
    status: 'ok',
    cell_id: options.engine.cellId,
  }));

  return fastify;
}
