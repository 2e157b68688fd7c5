import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { WorkflowStatus } from '../../domain/index.js';
import { UnknownWorkflowTypeError } from '../../application/index.js';

const userIdSchema = z.coerce.number().int().positive();

const createWorkflowSchema = z.object({
  workflow_type: z.string().min(1),
  user_id: z.number().int().positive(),
  initial_context: z.record(z.unknown()).default({}),
});

const jobSearchSchema = z.object({
  user_id: z.number().int().positive(),
  search_terms: z.array(z.string().trim().min(1)).min(1),
  location: z.string().min(1).default('Remote'),
});

const quickResumeSchema = z.object({
  user_id: z.number().int().positive(),
  job_id: z.string().min(1),
});

const optimizationSchema = z.object({
  user_id: z.number().int().positive(),
});

const listQuerySchema = z.object({
  user_id: userIdSchema.optional(),
  status: z.nativeEnum(WorkflowStatus).optional(),
  workflow_type: z.string().min(1).optional(),
});

const cancelBodySchema = z
  .object({ reason: z.string().min(1).optional() })
  .nullish();

type WorkflowParams = { Params: { workflow_id: string } };

/**
 * Workflow control and read projections.
 *
 * POST /api/v1/workflows                        create and start
 * POST /api/v1/workflows/job-search             new_job_search shortcut
 * POST /api/v1/workflows/quick-resume           single_job_application shortcut
 * POST /api/v1/workflows/optimization           resume_improvement shortcut
 * GET  /api/v1/workflows                        list (user_id, status, workflow_type)
 * GET  /api/v1/workflows/:workflow_id           snapshot
 * POST /api/v1/workflows/:workflow_id/pause     pause
 * POST /api/v1/workflows/:workflow_id/resume    resume
 * POST /api/v1/workflows/:workflow_id/cancel    cancel
 * GET  /api/v1/users/:user_id/workflows         per-user summary
 * GET  /api/v1/engine/stats                     engine counters
 * GET  /api/v1/workflow-templates               template catalog
 */
async function workflowRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/workflows ───────────────────────────────
  fastify.post(
    '/api/v1/workflows',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = createWorkflowSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      try {
        const workflowId = fastify.engine.createAndStartWorkflow(
          parsed.data.workflow_type,
          parsed.data.user_id,
          parsed.data.initial_context,
        );
        return reply.status(202).send({ workflow_id: workflowId });
      } catch (err: unknown) {
        if (err instanceof UnknownWorkflowTypeError) {
          return reply.status(400).send({ error: err.message });
        }
        throw err;
      }
    },
  );

  // ── Shortcuts ────────────────────────────────────────────
  fastify.post(
    '/api/v1/workflows/job-search',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = jobSearchSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }
      const { user_id, search_terms, location } = parsed.data;
      const workflowId = fastify.engine.startJobSearchWorkflow(user_id, search_terms, location);
      return reply.status(202).send({ workflow_id: workflowId });
    },
  );

  fastify.post(
    '/api/v1/workflows/quick-resume',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = quickResumeSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }
      const workflowId = fastify.engine.startQuickResumeWorkflow(parsed.data.user_id, parsed.data.job_id);
      return reply.status(202).send({ workflow_id: workflowId });
    },
  );

  fastify.post(
    '/api/v1/workflows/optimization',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = optimizationSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }
      const workflowId = fastify.engine.startOptimizationWorkflow(parsed.data.user_id);
      return reply.status(202).send({ workflow_id: workflowId });
    },
  );

  // ── GET /api/v1/workflows ────────────────────────────────
  fastify.get(
    '/api/v1/workflows',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = listQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }
      return reply.status(200).send(fastify.engine.listWorkflows(parsed.data));
    },
  );

  // ── GET /api/v1/workflows/:workflow_id ───────────────────
  fastify.get(
    '/api/v1/workflows/:workflow_id',
    async (request: FastifyRequest<WorkflowParams>, reply: FastifyReply) => {
      const snapshot = fastify.engine.getWorkflowStatus(request.params.workflow_id);
      if (snapshot === null) {
        return reply.status(404).send({ error: 'Workflow not found' });
      }
      return reply.status(200).send(snapshot);
    },
  );

  // ── Control ──────────────────────────────────────────────

  /** Runs a control command; 404 for unknown ids, 409 when the workflow refuses the transition. */
  function control(
    reply: FastifyReply,
    workflowId: string,
    action: string,
    command: () => boolean,
  ): FastifyReply {
    const workflow = fastify.engine.getWorkflow(workflowId);
    if (workflow === null) {
      return reply.status(404).send({ error: 'Workflow not found' });
    }
    if (!command()) {
      return reply.status(409).send({
        error: `Cannot ${action} workflow in status ${workflow.status}`,
      });
    }
    return reply.status(200).send({ workflow_id: workflowId, status: workflow.status });
  }

  fastify.post(
    '/api/v1/workflows/:workflow_id/pause',
    async (request: FastifyRequest<WorkflowParams>, reply: FastifyReply) => {
      const { workflow_id } = request.params;
      return control(reply, workflow_id, 'pause', () => fastify.engine.pauseWorkflow(workflow_id));
    },
  );

  fastify.post(
    '/api/v1/workflows/:workflow_id/resume',
    async (request: FastifyRequest<WorkflowParams>, reply: FastifyReply) => {
      const { workflow_id } = request.params;
      return control(reply, workflow_id, 'resume', () => fastify.engine.resumeWorkflow(workflow_id));
    },
  );

  fastify.post(
    '/api/v1/workflows/:workflow_id/cancel',
    async (request: FastifyRequest<WorkflowParams & { Body: unknown }>, reply: FastifyReply) => {
      const parsed = cancelBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }
      const { workflow_id } = request.params;
      const reason = parsed.data?.reason;
      return control(reply, workflow_id, 'cancel', () => fastify.engine.cancelWorkflow(workflow_id, reason));
    },
  );

  // ── Projections ──────────────────────────────────────────
  fastify.get(
    '/api/v1/users/:user_id/workflows',
    async (request: FastifyRequest<{ Params: { user_id: string } }>, reply: FastifyReply) => {
      const parsed = userIdSchema.safeParse(request.params.user_id);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'user_id must be a positive integer' });
      }
      return reply.status(200).send(fastify.engine.getUserWorkflows(parsed.data));
    },
  );

  fastify.get(
    '/api/v1/engine/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.engine.getEngineStats());
    },
  );

  fastify.get(
    '/api/v1/workflow-templates',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.engine.getWorkflowTemplates());
    },
  );
}

export default fp(workflowRoutes, {
  name: 'workflow-routes',
  dependencies: ['orchestrator'],
  fastify: '5.x',
});
