import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createServer } from '../../../src/api/server.js';
import { DecisionAgent } from '../../../src/agent/decision-agent.js';
import type { RemoteTransport } from '../../../src/decision/transport.js';
import { makeConfig, makeSnapshotInput } from '../../helpers/fixtures.js';

const silentTransport: RemoteTransport = { send: async () => ({ action: null }) };

describe('API Routes', () => {
  let fastify: FastifyInstance;
  let agent: DecisionAgent;

  beforeEach(async () => {
    agent = new DecisionAgent({
      config: makeConfig({ healing: { occurrences: 1 } }),
      transports: { pattern: silentTransport, planner: silentTransport },
      healer: null,
    });
    fastify = await createServer(agent);
  });

  afterEach(async () => {
    await fastify.close();
  });

  describe('POST /api/v1/decide', () => {
    it('should return the committed decision', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/decide',
        payload: makeSnapshotInput({ agent: { health: 20 } }),
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.kind).toBe('useItem');
      expect(body.tierUsed).toBe('reflex');
      expect(body.parameters).toEqual({ item: 'White Potion' });
      expect(typeof body.cycleId).toBe('string');
    });

    it('should answer 202 while the agent is cooling down', async () => {
      await fastify.inject({ method: 'POST', url: '/api/v1/decide', payload: makeSnapshotInput() });
      const response = await fastify.inject({ method: 'POST', url: '/api/v1/decide', payload: makeSnapshotInput() });

      expect(response.statusCode).toBe(202);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('cooling_down');
      expect(body.cooldown).toBe('action');
    });

    it('should answer 409 for a snapshot that is not ready', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/decide',
        payload: makeSnapshotInput({ ready: false }),
      });

      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body)).toEqual({
        error: 'SNAPSHOT_NOT_READY',
        message: 'Agent state not ready',
        issues: [],
      });
    });

    it('should answer 400 with validation issues for a malformed snapshot', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/decide',
        payload: { agent: { name: 'tester' } },
      });

      expect(response.statusCode).toBe(400);
      const body = JSON.parse(response.body);
      expect(body.error).toBe('INVALID_SNAPSHOT');
      expect(body.message).toBe('Snapshot failed validation');
      expect(body.issues).toContain('location: Required');
    });

    it('should answer 400 for a body that is not an object', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/decide',
        headers: { 'content-type': 'application/json' },
        payload: '"hello"',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('INVALID_SNAPSHOT');
    });
  });

  describe('POST /api/v1/feedback', () => {
    it('should record feedback and answer 204', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/feedback',
        payload: { kind: 'attack', status: 'partial' },
      });

      expect(response.statusCode).toBe(204);
      expect(agent.getStats().feedback).toEqual({ attack: { success: 0, failed: 0, partial: 1 } });
    });

    it('should reject an unknown status', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/feedback',
        payload: { kind: 'attack', status: 'maybe' },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('INVALID_FEEDBACK');
    });
  });

  describe('POST /api/v1/diagnostics', () => {
    it('should report that nothing was healed while healing is off', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/diagnostics',
        payload: { message: 'Calculating auto-buy route to Prontera' },
      });

      expect(response.statusCode).toBe(202);
      expect(JSON.parse(response.body)).toEqual({ healed: false, rule: null, directives: [] });
    });

    it('should reject an empty message', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/diagnostics',
        payload: { message: '' },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('health and metrics', () => {
    it('should return health status', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('healthy');
      expect(body.uptime).toBeGreaterThanOrEqual(0);
      expect(body.components.limiter).toMatchObject({ count: 0, limit: 30, paused: false });
    });

    it('should report degraded health with an open breaker', async () => {
      agent.resilience.breaker('pattern').trip();
      const response = await fastify.inject({ method: 'GET', url: '/health' });

      expect(JSON.parse(response.body).status).toBe('degraded');
    });

    it('should expose decision counters', async () => {
      await fastify.inject({
        method: 'POST',
        url: '/api/v1/decide',
        payload: makeSnapshotInput({ agent: { health: 20 } }),
      });
      const response = await fastify.inject({ method: 'GET', url: '/metrics' });

      const body = JSON.parse(response.body);
      expect(body.totalDecisions).toBe(1);
      expect(body.byTier.reflex).toBe(1);
    });
  });
});
