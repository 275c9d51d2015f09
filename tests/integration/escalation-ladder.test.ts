/**
 * End-to-end cycles through the agent, the HTTP transports and the API,
 * with fetch stubbed in process.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DecisionAgent } from '../../src/agent/decision-agent.js';
import { createServer } from '../../src/api/server.js';
import { ConfigHealer, healingMarker } from '../../src/resilience/config-healer.js';
import { HealingLog } from '../../src/audit/healing-log.js';
import { EventBus } from '../../src/kernel/event-bus.js';
import { hostile, makeConfig, makeSnapshotInput } from '../helpers/fixtures.js';

const PATTERN_URL = 'http://127.0.0.1:9902/api/v1/pattern/decide';
const PLANNER_URL = 'http://127.0.0.1:9902/api/v1/llm/query';

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

/** Hostile out of reach: only the pattern gate opens. */
const distantHostile = makeSnapshotInput({ entities: [hostile('far', 20, false)] });
/** Level milestone with nothing else going on: only the planner gate opens. */
const milestone = makeSnapshotInput({ agent: { level: 10 } });

describe('Escalation ladder', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should decide every snapshot from local tiers with both remote breakers open', async () => {
    const fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
    const agent = new DecisionAgent({ config: makeConfig({ cycle: { min_interval_ms: 0 } }), healer: null });
    agent.resilience.breaker('pattern').trip();
    agent.resilience.breaker('planner').trip();

    const snapshots = [
      makeSnapshotInput({ agent: { health: 20 } }),
      makeSnapshotInput({ entities: [hostile('m1', 4)] }),
      makeSnapshotInput({ agent: { health: 50 } }),
      distantHostile,
      milestone,
    ];
    const tiers: string[] = [];
    for (const snapshot of snapshots) {
      agent.resilience.cooldowns.clear('action');
      const outcome = await agent.runCycle(snapshot);
      if (outcome.status === 'decided') tiers.push(outcome.decision.tierUsed);
    }

    expect(tiers).toEqual(['reflex', 'policyBank', 'rule', 'rule', 'rule']);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(agent.health().status).toBe('degraded');
  });

  it('should stop calling the planner after three timeouts', async () => {
    const fetchMock = vi.fn<typeof fetch>(() => new Promise<Response>(() => undefined));
    vi.stubGlobal('fetch', fetchMock);
    const agent = new DecisionAgent({
      config: makeConfig({ cycle: { min_interval_ms: 0 }, planner: { deadline_ms: 20, min_interval_ms: 0 } }),
      healer: null,
    });

    const tiers: string[] = [];
    for (let cycle = 0; cycle < 4; cycle++) {
      agent.resilience.cooldowns.clear('action');
      const outcome = await agent.runCycle(milestone);
      if (outcome.status === 'decided') tiers.push(outcome.decision.tierUsed);
    }

    expect(tiers).toEqual(['rule', 'rule', 'rule', 'rule']);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(urlOf(fetchMock.mock.calls[0]?.[0] ?? '')).toBe(PLANNER_URL);
    expect(agent.resilience.breaker('planner').getState()).toBe('open');
    expect(agent.getStats().tierFailures.planner).toBe(3);
  });

  it('should engage the emergency pause on the 31st remote call in a window', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ action: { kind: 'attack', parameters: { target: 'far' }, confidence: 0.7, rationale: 'chase' } }),
    );
    vi.stubGlobal('fetch', fetchMock);
    const bus = new EventBus();
    const paused = vi.fn();
    bus.on('limiter:emergency_pause', paused);
    const agent = new DecisionAgent({
      config: makeConfig({ cycle: { min_interval_ms: 0 } }),
      eventBus: bus,
      healer: null,
    });

    for (let cycle = 0; cycle < 30; cycle++) {
      const outcome = await agent.runCycle(distantHostile);
      expect(outcome).toMatchObject({ status: 'decided', decision: { tierUsed: 'pattern', kind: 'attack' } });
    }

    const thirtyFirst = await agent.runCycle(distantHostile);

    expect(thirtyFirst).toMatchObject({ status: 'decided', decision: { tierUsed: 'rule', kind: 'idle' } });
    expect(fetchMock).toHaveBeenCalledTimes(30);
    expect(urlOf(fetchMock.mock.calls[29]?.[0] ?? '')).toBe(PATTERN_URL);
    expect(paused).toHaveBeenCalledWith(expect.objectContaining({ count: 30, limit: 30 }));
    expect(agent.health().components.limiter.paused).toBe(true);
    expect(agent.resilience.breaker('pattern').getSnapshot().consecutiveFailures).toBe(0);
  });

  describe('self-healing over the API', () => {
    let dir: string;
    let configPath: string;
    let logPath: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ladder-heal-'));
      configPath = path.join(dir, 'config.txt');
      logPath = path.join(dir, 'healing.jsonl');
      fs.writeFileSync(configPath, 'buyAuto Fly Wing {\n  maxAmount 10\n}\nattackAuto 2\n');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should comment out the conflicting block after the third diagnostic', async () => {
      const bus = new EventBus();
      const healingLog = new HealingLog(logPath);
      const agent = new DecisionAgent({
        config: makeConfig(),
        eventBus: bus,
        healer: new ConfigHealer({ configPath, healingLog, eventBus: bus }),
      });
      const fastify = await createServer(agent);
      const message = 'Calculating auto-buy route to: Prontera';

      const bodies: unknown[] = [];
      for (let i = 0; i < 3; i++) {
        const response = await fastify.inject({ method: 'POST', url: '/api/v1/diagnostics', payload: { message } });
        expect(response.statusCode).toBe(202);
        bodies.push(JSON.parse(response.body));
      }
      await fastify.close();

      expect(bodies).toEqual([
        { healed: false, rule: null, directives: [] },
        { healed: false, rule: null, directives: [] },
        { healed: true, rule: 'auto-buy', directives: ['buyAuto Fly Wing'] },
      ]);
      const marker = healingMarker('auto-buy');
      expect(fs.readFileSync(configPath, 'utf-8')).toBe(
        `${marker} buyAuto Fly Wing {\n  ${marker} maxAmount 10\n${marker} }\nattackAuto 2\n`,
      );
      expect(await healingLog.verify()).toEqual({ valid: true, entriesChecked: 1 });
      const [entry] = await healingLog.list();
      expect(entry?.reason).toBe(`"${message}" observed 3 times within 30000ms`);
    });
  });
});
