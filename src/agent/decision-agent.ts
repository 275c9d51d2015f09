/**
 * Decision Agent
 *
 * Owns everything one agent needs for its cycles: the orchestrator, an
 * independent resilience state, the diagnostic monitor and the config healer.
 * Cycles for one agent never overlap.
 *
 * @module agent/decision-agent
 */

import type { ActionFeedback, Decision, EngineConfig, FeedbackStatus, StateSnapshot } from '../types/index.js';
import { EventBus } from '../kernel/event-bus.js';
import { expandPath, getHealingLogPath } from '../config/config.js';
import { HealingLog } from '../audit/healing-log.js';
import { EscalationOrchestrator, acceptSnapshot, type OrchestratorStats } from '../decision/orchestrator.js';
import { ReflexEvaluator } from '../decision/reflex.js';
import { RuleEvaluator } from '../decision/rules.js';
import { type PolicyBank, createDefaultPolicyBank } from '../decision/policy-bank.js';
import { PatternTier } from '../decision/pattern-tier.js';
import { PlannerTier } from '../decision/planner-tier.js';
import { HttpTransport, type RemoteTransport } from '../decision/transport.js';
import { type ResilienceState, createResilienceState } from '../resilience/state.js';
import type { CircuitBreakerSnapshot } from '../resilience/circuit-breaker.js';
import type { ActiveCooldown } from '../resilience/cooldowns.js';
import type { RateWindow } from '../resilience/rate-limiter.js';
import type { LoopSignal } from '../resilience/loop-detector.js';
import { DiagnosticMonitor } from '../resilience/diagnostic-monitor.js';
import { ConfigHealer, DEFAULT_HEALING_RULES, type HealOutcome } from '../resilience/config-healer.js';
import { createLogger, formatError, healLogger } from '../utils/logger.js';

const log = createLogger('agent');

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/** Cooldowns that suspend a whole cycle. The emergency pause only gates remote tiers. */
export const CYCLE_COOLDOWNS = ['cycle', 'action', 'region', 'stuck'] as const;

const RESTING_KINDS: ReadonlySet<string> = new Set(['idle', 'rest']);
const MOVEMENT_KINDS: ReadonlySet<string> = new Set(['move', 'travel']);
const MAX_TRACKED_KINDS = 64;

export type CycleOutcome =
  | { status: 'decided'; decision: Decision }
  | { status: 'cooling_down'; until: number; cooldown: string };

export interface DecisionAgentOptions {
  config: EngineConfig;
  eventBus?: EventBus;
  transports?: { pattern?: RemoteTransport; planner?: RemoteTransport };
  policyBank?: PolicyBank;
  /** null disables self-healing regardless of configuration */
  healer?: ConfigHealer | null;
}

export interface AgentHealth {
  status: 'healthy' | 'degraded';
  components: {
    breakers: CircuitBreakerSnapshot[];
    limiter: RateWindow & { paused: boolean };
    cooldowns: ActiveCooldown[];
  };
}

export type FeedbackCounts = Record<FeedbackStatus, number>;

export interface AgentStats extends OrchestratorStats {
  feedback: Record<string, FeedbackCounts>;
}

// ═══════════════════════════════════════════════════════════════════════════
// AGENT
// ═══════════════════════════════════════════════════════════════════════════

export class DecisionAgent {
  readonly eventBus: EventBus;
  readonly resilience: ResilienceState;
  private readonly config: EngineConfig;
  private readonly orchestrator: EscalationOrchestrator;
  private readonly monitor: DiagnosticMonitor;
  private readonly healer: ConfigHealer | null;
  private readonly feedback: Map<string, FeedbackCounts> = new Map();

  private queue: Promise<unknown> = Promise.resolve();
  private agentName: string | null = null;
  private lastRegion: string | null = null;
  /** Last counted entry time per region */
  private readonly regionEntries = new Map<string, number>();
  private movementIntent: Decision | null = null;

  constructor(options: DecisionAgentOptions) {
    this.config = options.config;
    this.eventBus = options.eventBus ?? new EventBus();
    this.resilience = createResilienceState(this.config, this.eventBus);

    const patternTransport =
      options.transports?.pattern ?? new HttpTransport(this.config.pattern.base_url, this.config.pattern.path);
    const plannerTransport =
      options.transports?.planner ?? new HttpTransport(this.config.planner.base_url, this.config.planner.path);

    this.orchestrator = new EscalationOrchestrator({
      reflex: new ReflexEvaluator(this.config.reflex),
      policyBank: options.policyBank ?? createDefaultPolicyBank(this.config),
      rules: new RuleEvaluator(this.config.rules, this.config.reflex),
      remoteTiers: [
        new PatternTier(patternTransport, {
          enabled: this.config.pattern.enabled,
          deadlineMs: this.config.pattern.deadline_ms,
        }),
        new PlannerTier(plannerTransport, {
          enabled: this.config.planner.enabled,
          deadlineMs: this.config.planner.deadline_ms,
          minIntervalMs: this.config.planner.min_interval_ms,
        }),
      ],
      resilience: this.resilience,
      eventBus: this.eventBus,
    });

    this.healer = options.healer === undefined ? this.defaultHealer() : options.healer;
    const rules = this.healer?.getRules() ?? DEFAULT_HEALING_RULES;
    this.monitor = new DiagnosticMonitor(
      rules.map((rule) => ({
        rule: rule.name,
        matches: (message: string) => rule.triggers.some((trigger) => trigger.test(message)),
      })),
      { occurrences: this.config.healing.occurrences, intervalMs: this.config.healing.interval_ms },
    );

    this.resilience.loopDetector.onLoop((signal) => this.discardMovementIntent(signal));
  }

  /**
   * Run one cycle. Overlapping calls are queued and run one at a time.
   * @throws SnapshotNotReadyError
   */
  runCycle(input: unknown): Promise<CycleOutcome> {
    const next = this.queue.then(() => this.cycle(input));
    this.queue = next.catch(() => undefined);
    return next;
  }

  /**
   * Record the executor's outcome for a committed action.
   * Failures are fed to the diagnostic monitor as `kind:reasonCode`.
   */
  async reportFeedback(feedback: ActionFeedback): Promise<HealOutcome | null> {
    let counts = this.feedback.get(feedback.kind);
    if (!counts) {
      if (this.feedback.size >= MAX_TRACKED_KINDS) {
        log.warn({ kind: feedback.kind }, 'Feedback kind limit reached, not tracked');
      } else {
        counts = { success: 0, failed: 0, partial: 0 };
        this.feedback.set(feedback.kind, counts);
      }
    }
    if (counts) {
      counts[feedback.status]++;
    }

    this.eventBus.emit('feedback:recorded', { agent: this.agentName ?? 'unknown', feedback });

    if (feedback.status !== 'failed') {
      return null;
    }
    return this.observeDiagnostic(`${feedback.kind}:${feedback.reasonCode}`);
  }

  /**
   * Feed one host diagnostic line. Returns the healing outcome when this
   * line completed a recurring pattern and the configuration was changed.
   */
  async observeDiagnostic(message: string): Promise<HealOutcome | null> {
    const trigger = this.monitor.observe(message);
    if (!trigger) {
      return null;
    }

    if (!this.healer) {
      healLogger.warn({ rule: trigger.rule }, 'Recurring conflict detected but self-healing is disabled');
      this.eventBus.emit('heal:skipped', { rule: trigger.rule, reason: 'healing_disabled' });
      return null;
    }

    const reason = `"${trigger.message}" observed ${trigger.occurrences} times within ${this.config.healing.interval_ms}ms`;
    const result = await this.healer.heal(trigger.rule, reason);
    if (!result.success) {
      healLogger.error({ rule: trigger.rule, error: formatError(result.error) }, 'Self-heal failed');
      return null;
    }
    return result.data;
  }

  health(): AgentHealth {
    const breakers = [...this.resilience.breakers.values()].map((breaker) => breaker.getSnapshot());
    const allClosed = breakers.every((breaker) => breaker.state === 'closed');

    return {
      status: allClosed ? 'healthy' : 'degraded',
      components: {
        breakers,
        limiter: { ...this.resilience.limiter.getWindow(), paused: this.resilience.limiter.isPaused() },
        cooldowns: this.resilience.cooldowns.list(),
      },
    };
  }

  getStats(): AgentStats {
    const feedback: Record<string, FeedbackCounts> = {};
    for (const [kind, counts] of this.feedback) {
      feedback[kind] = { ...counts };
    }
    return { ...this.orchestrator.getStats(), feedback };
  }

  getMovementIntent(): Decision | null {
    return this.movementIntent;
  }

  // ── Cycle ──────────────────────────────────────────────────────────────

  private async cycle(input: unknown): Promise<CycleOutcome> {
    const snapshot = acceptSnapshot(input);
    const now = Date.now();
    this.agentName = snapshot.agent.name;

    this.trackRegion(snapshot, now);

    const blocking = this.blockingCooldown(now);
    if (blocking) {
      log.debug({ cooldown: blocking.name, until: blocking.until }, 'Cycle skipped, cooling down');
      this.eventBus.emit('cycle:skipped', { agent: snapshot.agent.name, cooldown: blocking.name, until: blocking.until });
      return { status: 'cooling_down', until: blocking.until, cooldown: blocking.name };
    }

    this.resilience.cooldowns.set('cycle', now + this.config.cycle.min_interval_ms, 'min_interval');
    const decision = await this.orchestrator.decide(snapshot);
    this.afterCommit(decision);
    return { status: 'decided', decision };
  }

  private trackRegion(snapshot: StateSnapshot, now: number): void {
    const region = snapshot.location.region;
    if (this.lastRegion === null) {
      this.lastRegion = region;
      this.regionEntries.set(region, now);
      return;
    }
    if (region === this.lastRegion) {
      return;
    }
    this.lastRegion = region;

    const debounceMs = this.config.region.debounce_ms;
    for (const [known, at] of this.regionEntries) {
      if (now - at >= debounceMs) this.regionEntries.delete(known);
    }
    // a change into another region always counts; only re-entering the same one quickly is a duplicate
    if (this.regionEntries.has(region)) {
      log.debug({ region }, 'Duplicate region entry debounced');
      return;
    }
    this.regionEntries.set(region, now);

    this.resilience.loopDetector.recordVisit(region);
    this.resilience.cooldowns.set('region', now + this.config.region.settle_ms, `entered:${region}`);
  }

  private blockingCooldown(now: number): ActiveCooldown | null {
    let latest: ActiveCooldown | null = null;
    for (const name of CYCLE_COOLDOWNS) {
      const entry = this.resilience.cooldowns.get(name);
      if (entry && entry.until > now && (latest === null || entry.until > latest.until)) {
        latest = entry;
      }
    }
    return latest;
  }

  private afterCommit(decision: Decision): void {
    if (MOVEMENT_KINDS.has(decision.kind)) {
      this.movementIntent = decision;
    }

    const duration = decision.parameters['duration'];
    if (RESTING_KINDS.has(decision.kind) && typeof duration === 'number' && duration > 0) {
      this.resilience.cooldowns.set('action', Date.now() + duration * 1000, decision.kind);
    }
  }

  private discardMovementIntent(signal: LoopSignal): void {
    if (this.movementIntent) {
      log.info({ location: signal.location, kind: this.movementIntent.kind }, 'Movement intent discarded');
    }
    this.movementIntent = null;
  }

  private defaultHealer(): ConfigHealer | null {
    if (!this.config.healing.enabled) {
      return null;
    }
    return new ConfigHealer({
      configPath: expandPath(this.config.healing.config_file),
      healingLog: new HealingLog(getHealingLogPath(this.config)),
      eventBus: this.eventBus,
    });
  }
}
