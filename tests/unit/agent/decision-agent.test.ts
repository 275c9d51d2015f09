import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DecisionAgent } from '../../../src/agent/decision-agent.js';
import { ConfigHealer, healingMarker } from '../../../src/resilience/config-healer.js';
import { HealingLog } from '../../../src/audit/healing-log.js';
import { SnapshotNotReadyError } from '../../../src/decision/errors.js';
import { EventBus } from '../../../src/kernel/event-bus.js';
import type { RemoteTransport } from '../../../src/decision/transport.js';
import type { EngineConfigInput } from '../../../src/types/index.js';
import { hostile, makeConfig, makeSnapshotInput } from '../../helpers/fixtures.js';

const T0 = 1_700_000_000_000;

const silentTransport: RemoteTransport = { send: async () => ({ action: null }) };

function createAgent(overrides: EngineConfigInput = {}, bus = new EventBus()): DecisionAgent {
  return new DecisionAgent({
    config: makeConfig(overrides),
    eventBus: bus,
    transports: { pattern: silentTransport, planner: silentTransport },
    healer: null,
  });
}

const calm = (region = 'prt_fild08'): ReturnType<typeof makeSnapshotInput> =>
  makeSnapshotInput({ location: { region } });
/** Heal rule applies, so no rest cooldown follows the decision */
const wounded = (region = 'prt_fild08'): ReturnType<typeof makeSnapshotInput> =>
  makeSnapshotInput({ agent: { health: 50 }, location: { region } });

describe('DecisionAgent', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('cooldowns', () => {
    it('should rest for the idle duration before the next cycle', async () => {
      const agent = createAgent();

      const first = await agent.runCycle(calm());
      expect(first).toMatchObject({ status: 'decided', decision: { kind: 'idle', tierUsed: 'rule' } });

      const second = await agent.runCycle(calm());
      expect(second).toEqual({ status: 'cooling_down', until: T0 + 5_000, cooldown: 'action' });

      vi.setSystemTime(T0 + 5_000);
      const third = await agent.runCycle(calm());
      expect(third.status).toBe('decided');
    });

    it('should emit cycle:skipped while cooling down', async () => {
      const bus = new EventBus();
      const skipped = vi.fn();
      bus.on('cycle:skipped', skipped);
      const agent = createAgent({}, bus);

      await agent.runCycle(calm());
      await agent.runCycle(calm());

      expect(skipped).toHaveBeenCalledWith({ agent: 'tester', cooldown: 'action', until: T0 + 5_000 });
    });

    it('should settle after entering a new region', async () => {
      const agent = createAgent();

      await agent.runCycle(wounded('prt_fild08'));
      vi.setSystemTime(T0 + 1_000);
      const outcome = await agent.runCycle(wounded('prt_fild09'));

      expect(outcome).toEqual({ status: 'cooling_down', until: T0 + 6_000, cooldown: 'region' });
      expect(agent.resilience.cooldowns.get('region')?.reason).toBe('entered:prt_fild09');
      expect(agent.resilience.loopDetector.getVisits('prt_fild09')).toBe(1);
    });

    it('should count every change when the agent bounces between two regions', async () => {
      const bus = new EventBus();
      const detected = vi.fn();
      bus.on('loop:detected', detected);
      const agent = createAgent({}, bus);

      await agent.runCycle(wounded('prt_fild08'));
      for (let step = 1; step <= 11; step++) {
        vi.setSystemTime(T0 + step * 1_000);
        await agent.runCycle(wounded(step % 2 === 1 ? 'prt_fild09' : 'prt_fild08'));
      }

      expect(agent.resilience.loopDetector.getVisits('prt_fild08')).toBe(5);
      expect(detected).toHaveBeenCalledTimes(1);
      expect(detected).toHaveBeenCalledWith({ location: 'prt_fild09', visits: 6, cooldownUntil: T0 + 71_000 });
    });

    it('should drop a repeated entry of the same region inside the debounce window', async () => {
      const agent = createAgent();

      await agent.runCycle(wounded('prt_fild08'));
      vi.setSystemTime(T0 + 500);
      await agent.runCycle(wounded('prt_fild09'));
      vi.setSystemTime(T0 + 1_000);
      await agent.runCycle(wounded('prt_fild08'));
      vi.setSystemTime(T0 + 1_500);
      await agent.runCycle(wounded('prt_fild09'));

      expect(agent.resilience.loopDetector.getVisits('prt_fild09')).toBe(1);
      expect(agent.resilience.loopDetector.getVisits('prt_fild08')).toBe(0);
    });

    it('should wait the minimum interval between evaluated cycles', async () => {
      const agent = createAgent();

      const first = await agent.runCycle(wounded());
      expect(first).toMatchObject({ status: 'decided', decision: { kind: 'useItem' } });

      vi.setSystemTime(T0 + 1_000);
      const second = await agent.runCycle(wounded());
      expect(second).toEqual({ status: 'cooling_down', until: T0 + 2_000, cooldown: 'cycle' });
      expect(agent.resilience.cooldowns.get('cycle')?.reason).toBe('min_interval');

      vi.setSystemTime(T0 + 2_000);
      const third = await agent.runCycle(wounded());
      expect(third.status).toBe('decided');
    });

    it('should run overlapping cycles one at a time', async () => {
      const agent = createAgent();

      const [first, second] = await Promise.all([agent.runCycle(calm()), agent.runCycle(calm())]);

      expect(first.status).toBe('decided');
      expect(second).toMatchObject({ status: 'cooling_down', cooldown: 'action' });
    });

    it('should reject a snapshot that is not ready and keep working afterwards', async () => {
      const agent = createAgent();

      await expect(agent.runCycle(makeSnapshotInput({ ready: false }))).rejects.toBeInstanceOf(SnapshotNotReadyError);
      await expect(agent.runCycle(wounded())).resolves.toMatchObject({ status: 'decided' });
    });
  });

  describe('loop detection', () => {
    it('should discard movement intent and enter the stuck cooldown when a region repeats', async () => {
      const bus = new EventBus();
      const detected = vi.fn();
      bus.on('loop:detected', detected);
      const agent = createAgent({ loop: { threshold: 2 } }, bus);
      const surrounded = makeSnapshotInput({
        agent: { health: 50 },
        entities: [hostile('a', 3), hostile('b', 4), hostile('c', 6)],
        location: { region: 'prt_fild08' },
      });

      const first = await agent.runCycle(surrounded);
      expect(first).toMatchObject({ status: 'decided', decision: { kind: 'move', policy: 'navigation' } });
      expect(agent.getMovementIntent()?.kind).toBe('move');

      const regions = ['prt_fild09', 'prt_fild08', 'prt_fild09', 'prt_fild08', 'prt_fild09'];
      for (const [index, region] of regions.entries()) {
        vi.setSystemTime(T0 + (index + 1) * 3_000);
        await agent.runCycle(wounded(region));
      }

      expect(detected).toHaveBeenCalledWith({
        location: 'prt_fild09',
        visits: 3,
        cooldownUntil: T0 + 15_000 + 60_000,
      });
      expect(agent.getMovementIntent()).toBeNull();
      expect(agent.resilience.cooldowns.isActive('stuck')).toBe(true);

      vi.setSystemTime(T0 + 20_000);
      const blocked = await agent.runCycle(wounded('prt_fild09'));
      expect(blocked).toEqual({ status: 'cooling_down', until: T0 + 75_000, cooldown: 'stuck' });
    });
  });

  describe('feedback and self-healing', () => {
    let dir: string;
    let configPath: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ladder-agent-'));
      configPath = path.join(dir, 'config.txt');
      fs.writeFileSync(configPath, 'attackAuto 2\nteleportAuto_hp 10\nroute_randomWalk 1\n');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should heal the host configuration after a recurring failure', async () => {
      const bus = new EventBus();
      const applied = vi.fn();
      const reload = vi.fn();
      bus.on('heal:applied', applied);
      bus.on('config:reload_requested', reload);
      const agent = new DecisionAgent({
        config: makeConfig(),
        eventBus: bus,
        transports: { pattern: silentTransport, planner: silentTransport },
        healer: new ConfigHealer({
          configPath,
          healingLog: new HealingLog(path.join(dir, 'healing.jsonl')),
          eventBus: bus,
        }),
      });
      const failure = { kind: 'teleport', status: 'failed', reasonCode: 'no_teleport_item' } as const;

      expect(await agent.reportFeedback(failure)).toBeNull();
      expect(await agent.reportFeedback(failure)).toBeNull();
      const outcome = await agent.reportFeedback(failure);

      expect(outcome).toMatchObject({ rule: 'auto-teleport', directives: ['teleportAuto_hp 10'], changed: true });
      expect(fs.readFileSync(configPath, 'utf-8')).toBe(
        `attackAuto 2\n${healingMarker('auto-teleport')} teleportAuto_hp 10\nroute_randomWalk 1\n`,
      );
      expect(applied).toHaveBeenCalledWith({
        rule: 'auto-teleport',
        reason: '"teleport:no_teleport_item" observed 3 times within 30000ms',
        directives: ['teleportAuto_hp 10'],
        configPath,
      });
      expect(reload).toHaveBeenCalledWith({ configPath, rule: 'auto-teleport' });
      expect(agent.getStats().feedback).toEqual({ teleport: { success: 0, failed: 3, partial: 0 } });
    });

    it('should only report when self-healing is disabled', async () => {
      const bus = new EventBus();
      const skipped = vi.fn();
      bus.on('heal:skipped', skipped);
      const agent = createAgent({ healing: { occurrences: 1 } }, bus);

      const outcome = await agent.observeDiagnostic("You don't have the Teleport skill or a Fly Wing");

      expect(outcome).toBeNull();
      expect(skipped).toHaveBeenCalledWith({ rule: 'auto-teleport', reason: 'healing_disabled' });
      expect(fs.readFileSync(configPath, 'utf-8')).toContain('teleportAuto_hp 10');
    });

    it('should ignore successful feedback for diagnostics', async () => {
      const agent = createAgent({ healing: { occurrences: 1 } });
      const recorded = vi.fn();
      agent.eventBus.on('feedback:recorded', recorded);

      const outcome = await agent.reportFeedback({ kind: 'attack', status: 'success', reasonCode: '' });

      expect(outcome).toBeNull();
      expect(recorded).toHaveBeenCalledWith({
        agent: 'unknown',
        feedback: { kind: 'attack', status: 'success', reasonCode: '' },
      });
    });
  });

  describe('health', () => {
    it('should report healthy with no open breakers', () => {
      expect(createAgent().health().status).toBe('healthy');
    });

    it('should report degraded once a breaker is open', () => {
      const agent = createAgent();
      agent.resilience.breaker('planner').trip();

      const health = agent.health();
      expect(health.status).toBe('degraded');
      expect(health.components.breakers).toEqual([
        expect.objectContaining({ dependency: 'planner', state: 'open' }),
      ]);
      expect(health.components.limiter.paused).toBe(false);
    });
  });
});
