import Fastify, { type FastifyInstance } from 'fastify';
import type { DecisionAgent } from '../agent/decision-agent.js';
import { decisionRoutes } from './routes.js';

export const LOOPBACK_HOST = '127.0.0.1';

/**
 * Build the decision service. Listening is left to the caller.
 */
export async function createServer(agent: DecisionAgent): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false, bodyLimit: 1024 * 1024 });
  await fastify.register(decisionRoutes, { deps: { agent } });
  return fastify;
}

export async function startServer(agent: DecisionAgent, port: number): Promise<FastifyInstance> {
  const fastify = await createServer(agent);
  await fastify.listen({ host: LOOPBACK_HOST, port });
  return fastify;
}
