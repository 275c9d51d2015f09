import type { CandidateAction, StateSnapshot, Result } from '../types/index.js';
import type { TierError } from './errors.js';
import type { RemoteTransport } from './transport.js';
import { TransportTier, type TransportTierOptions } from './remote-tier.js';

export const PLANNER_LEVEL_MILESTONE = 10;

export interface PlannerTierOptions extends TransportTierOptions {
  /** Minimum time between two attempted calls */
  minIntervalMs: number;
}

/**
 * Slow strategic tier. Consulted at level milestones or when advancement
 * points are unspent, and never more often than the minimum interval.
 */
export class PlannerTier extends TransportTier {
  readonly name = 'planner' as const;
  private readonly minIntervalMs: number;
  private lastAttempt: number | null = null;

  constructor(transport: RemoteTransport, options: PlannerTierOptions) {
    super(transport, options);
    this.minIntervalMs = options.minIntervalMs;
  }

  shouldHandle(snapshot: StateSnapshot): boolean {
    const { level } = snapshot.agent;
    const milestone = level >= PLANNER_LEVEL_MILESTONE && level % PLANNER_LEVEL_MILESTONE === 0;
    const unspent = snapshot.freePoints.stat > 0 || snapshot.freePoints.skill > 0;
    return milestone || unspent;
  }

  isThrottled(now: number): boolean {
    return this.lastAttempt !== null && now - this.lastAttempt < this.minIntervalMs;
  }

  getLastAttempt(): number | null {
    return this.lastAttempt;
  }

  async decide(
    snapshot: StateSnapshot,
    deadlineMs: number,
    signal: AbortSignal,
  ): Promise<Result<CandidateAction | null, TierError>> {
    this.lastAttempt = Date.now();
    return super.decide(snapshot, deadlineMs, signal);
  }
}
