/**
 * Escalation Orchestrator
 *
 * One cycle: start → reflex → policyBank → rule → pattern → planner → committed.
 * The first non-empty action is committed with the tier that produced it.
 *
 * The rule tier always has an answer. Its tactical rules (heal, attack,
 * reposition) commit at the rule step; when only its idle floor applies, the
 * floor is held while the remote tiers are consulted and committed if they
 * have nothing.
 *
 * @module decision/orchestrator
 */

import { randomUUID } from 'node:crypto';
import {
  type CandidateAction,
  type Decision,
  type StateSnapshot,
  type TierName,
  StateSnapshotSchema,
} from '../types/index.js';
import type { EventBus } from '../kernel/event-bus.js';
import type { ReflexEvaluator } from './reflex.js';
import type { RuleEvaluator } from './rules.js';
import type { PolicyBank } from './policy-bank.js';
import type { RemoteTier } from './remote-tier.js';
import { SnapshotNotReadyError, type TierError, describeTierError } from './errors.js';
import type { ResilienceState } from '../resilience/state.js';
import { ResilientCaller } from '../resilience/resilient-caller.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('orchestrator');

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface OrchestratorDeps {
  reflex: ReflexEvaluator;
  policyBank: PolicyBank;
  rules: RuleEvaluator;
  /** Consulted in order after the rule step */
  remoteTiers: readonly RemoteTier[];
  resilience: ResilienceState;
  eventBus?: EventBus;
}

export interface OrchestratorStats {
  totalDecisions: number;
  byTier: Record<TierName, number>;
  tierFailures: Record<TierName, number>;
  meanLatencyMs: number;
}

function emptyTierCounts(): Record<TierName, number> {
  return { reflex: 0, policyBank: 0, rule: 0, pattern: 0, planner: 0 };
}

// ═══════════════════════════════════════════════════════════════════════════
// SNAPSHOT ACCEPTANCE
// ═══════════════════════════════════════════════════════════════════════════

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate and freeze a raw snapshot.
 * @throws SnapshotNotReadyError
 */
export function acceptSnapshot(input: unknown): StateSnapshot {
  const parsed = StateSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new SnapshotNotReadyError(
      'Snapshot failed validation',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const snapshot = parsed.data;
  if (!snapshot.ready) {
    throw new SnapshotNotReadyError('Agent state not ready');
  }
  if (snapshot.agent.maxHealth <= 0) {
    throw new SnapshotNotReadyError('Agent vitals not initialized', ['agent.maxHealth: must be positive']);
  }

  return deepFreeze(snapshot);
}

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════

export class EscalationOrchestrator {
  private readonly caller: ResilientCaller;
  private totalDecisions = 0;
  private totalLatencyMs = 0;
  private readonly byTier = emptyTierCounts();
  private readonly tierFailures = emptyTierCounts();

  constructor(private readonly deps: OrchestratorDeps) {
    this.caller = new ResilientCaller(deps.resilience);
  }

  /**
   * Produce exactly one Decision for the snapshot.
   * Remote failures are absorbed; only SnapshotNotReadyError escapes.
   */
  async decide(input: unknown): Promise<Decision> {
    const snapshot = acceptSnapshot(input);
    const cycleId = randomUUID();
    const started = performance.now();

    const reflexAction = this.deps.reflex.evaluate(snapshot);
    if (reflexAction) {
      return this.commit(snapshot, reflexAction, 'reflex', cycleId, started);
    }

    const selection = this.deps.policyBank.select(snapshot);
    if (selection) {
      return this.commit(snapshot, selection.action, 'policyBank', cycleId, started, selection.policy);
    }

    const floor = this.deps.rules.decide(snapshot);
    if (this.deps.rules.hasTacticalRule(snapshot)) {
      return this.commit(snapshot, floor, 'rule', cycleId, started);
    }

    for (const tier of this.deps.remoteTiers) {
      const action = await this.consult(tier, snapshot, cycleId);
      if (action) {
        return this.commit(snapshot, action, tier.name, cycleId, started);
      }
    }

    return this.commit(snapshot, floor, 'rule', cycleId, started);
  }

  getStats(): OrchestratorStats {
    return {
      totalDecisions: this.totalDecisions,
      byTier: { ...this.byTier },
      tierFailures: { ...this.tierFailures },
      meanLatencyMs: this.totalDecisions === 0 ? 0 : this.totalLatencyMs / this.totalDecisions,
    };
  }

  private async consult(tier: RemoteTier, snapshot: StateSnapshot, cycleId: string): Promise<CandidateAction | null> {
    if (!tier.enabled) {
      this.skip(tier.name, 'disabled', cycleId);
      return null;
    }
    if (!tier.shouldHandle(snapshot)) {
      this.skip(tier.name, 'gate_declined', cycleId);
      return null;
    }
    if (tier.isThrottled(Date.now())) {
      this.skip(tier.name, 'throttled', cycleId);
      return null;
    }

    const result = await this.caller.call(tier.name, tier.deadlineMs, (signal) =>
      tier.decide(snapshot, tier.deadlineMs, signal),
    );

    if (result.success) {
      if (result.data === null) {
        this.skip(tier.name, 'no_opinion', cycleId);
      }
      return result.data;
    }

    this.fail(tier.name, result.error, cycleId);
    return null;
  }

  private skip(tier: TierName, reason: string, cycleId: string): void {
    log.debug({ tier, reason, cycleId }, 'Tier skipped');
    this.deps.eventBus?.emit('tier:skipped', { tier, reason, cycleId });
  }

  private fail(tier: TierName, error: TierError, cycleId: string): void {
    if (error.kind === 'unavailable') {
      this.skip(tier, error.reason ?? 'unavailable', cycleId);
      return;
    }

    this.tierFailures[tier]++;
    if (error.kind === 'malformed_response') {
      log.warn({ tier, cycleId, message: error.message }, 'Malformed tier response, falling through');
    } else {
      log.info({ tier, cycleId, failure: describeTierError(tier, error) }, 'Tier failed, falling through');
    }
    this.deps.eventBus?.emit('tier:failed', { tier, kind: error.kind, message: error.message, cycleId });
  }

  private commit(
    snapshot: StateSnapshot,
    action: CandidateAction,
    tierUsed: TierName,
    cycleId: string,
    started: number,
    policy?: string,
  ): Decision {
    const latencyMs = performance.now() - started;
    const decision: Decision = Object.freeze({
      kind: action.kind,
      parameters: action.parameters,
      confidence: action.confidence,
      rationale: action.rationale,
      tierUsed,
      latencyMs,
      cycleId,
      ...(policy !== undefined ? { policy } : {}),
    });

    this.totalDecisions++;
    this.totalLatencyMs += latencyMs;
    this.byTier[tierUsed]++;

    log.debug({ cycleId, tierUsed, kind: decision.kind, latencyMs }, 'Decision committed');
    this.deps.eventBus?.emit('decision:committed', { decision, agent: snapshot.agent.name });
    return decision;
  }
}
