import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { scrapeRequestSchema } from '../../application/index.js';

/**
 * Agent diagnostics and the discovery scheduling entry point.
 *
 * GET  /api/v1/agents/health    status of the agents in this process
 * POST /api/v1/discovery/scrape run discovery now
 */
async function agentRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/agents/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const agents = fastify.agents.map((agent) => agent.getHealthStatus());
      const healthy = agents.every((a) => a.status === 'healthy');
      return reply.status(200).send({
        status: healthy ? 'ok' : 'degraded',
        agents,
      });
    },
  );

  /**
   * Synchronous scrape through the in-process discovery agent. When
   * agents run in the worker, publish `job.discovery.requested` instead.
   */
  fastify.post(
    '/api/v1/discovery/scrape',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const discovery = fastify.discovery;
      if (discovery === null) {
        return reply.status(503).send({ error: 'Discovery agent is not running in this process' });
      }

      const parsed = scrapeRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await discovery.startScraping(parsed.data);
      return reply.status(200).send(result);
    },
  );
}

export default fp(agentRoutes, {
  name: 'agent-routes',
  dependencies: ['orchestrator'],
  fastify: '5.x',
});
