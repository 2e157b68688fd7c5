import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { BaseAgent, DiscoveryAgent, WorkflowEngine } from '../../application/index.js';

export interface OrchestratorPluginOptions {
  engine: WorkflowEngine;
  /** Agents running in this process; empty when they run in the worker. */
  agents: readonly BaseAgent[];
  discovery: DiscoveryAgent | null;
}

/**
 * Exposes the runtime's engine and in-process agents to the routes.
 *
 * The runtime owns their lifecycle; closing the server only stops the
 * engine's sweep and flushes its lifecycle events.
 */
async function orchestratorPlugin(fastify: FastifyInstance, options: OrchestratorPluginOptions): Promise<void> {
  fastify.decorate('engine', options.engine);
  fastify.decorate('agents', options.agents);
  fastify.decorate('discovery', options.discovery);

  fastify.addHook('onClose', async () => {
    await options.engine.close();
  });
}

export default fp(orchestratorPlugin, {
  name: 'orchestrator',
  fastify: '5.x',
});

/** Extend Fastify's type system so the orchestrator decorations are available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    engine: WorkflowEngine;
    agents: readonly BaseAgent[];
    discovery: DiscoveryAgent | null;
  }
}
