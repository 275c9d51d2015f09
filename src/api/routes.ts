import type { FastifyInstance, FastifyPluginOptions, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ActionFeedbackSchema, StateSnapshotSchema } from '../types/index.js';
import type { DecisionAgent } from '../agent/decision-agent.js';
import { SnapshotNotReadyError } from '../decision/errors.js';

export interface ApiDependencies {
  agent: DecisionAgent;
}

export interface ApiRouteOptions extends FastifyPluginOptions {
  deps: ApiDependencies;
}

const DiagnosticBodySchema = z.object({
  message: z.string().min(1).max(4096),
});

/**
 * Decision service routes: one cycle per POST, executor feedback,
 * host diagnostics, health and counters.
 */
export const decisionRoutes: FastifyPluginAsync<ApiRouteOptions> = async (
  fastify: FastifyInstance,
  options: ApiRouteOptions
): Promise<void> => {
  const { agent } = options.deps;

  // ── Decisions ─────────────────────────────────────────────────────────

  fastify.post('/api/v1/decide', async (request, reply) => {
    if (typeof request.body !== 'object' || request.body === null) {
      return reply.code(400).send({ error: 'INVALID_SNAPSHOT', message: 'Body must be a JSON object' });
    }
    // malformed is 400; well-formed but not ready stays 409
    const parsed = StateSnapshotSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: 'INVALID_SNAPSHOT',
        message: 'Snapshot failed validation',
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    try {
      const outcome = await agent.runCycle(parsed.data);
      if (outcome.status === 'cooling_down') {
        return reply.code(202).send(outcome);
      }
      return reply.code(200).send(outcome.decision);
    } catch (error) {
      if (error instanceof SnapshotNotReadyError) {
        return reply.code(409).send({ error: error.code, message: error.message, issues: error.issues });
      }
      throw error;
    }
  });

  // ── Feedback & diagnostics ────────────────────────────────────────────

  fastify.post('/api/v1/feedback', async (request, reply) => {
    const parsed = ActionFeedbackSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'INVALID_FEEDBACK', message: parsed.error.message });
    }

    await agent.reportFeedback(parsed.data);
    return reply.code(204).send();
  });

  fastify.post('/api/v1/diagnostics', async (request, reply) => {
    const parsed = DiagnosticBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'INVALID_DIAGNOSTIC', message: parsed.error.message });
    }

    const outcome = await agent.observeDiagnostic(parsed.data.message);
    return reply.code(202).send({
      healed: outcome?.changed ?? false,
      rule: outcome?.rule ?? null,
      directives: outcome?.directives ?? [],
    });
  });

  // ── Health & metrics ──────────────────────────────────────────────────

  fastify.get('/health', async () => {
    const health = agent.health();
    return {
      status: health.status,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      components: health.components,
    };
  });

  fastify.get('/metrics', async () => {
    const stats = agent.getStats();
    return {
      totalDecisions: stats.totalDecisions,
      byTier: stats.byTier,
      tierFailures: stats.tierFailures,
      meanLatencyMs: stats.meanLatencyMs,
      feedback: stats.feedback,
    };
  });
};
