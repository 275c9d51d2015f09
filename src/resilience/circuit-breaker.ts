import { z } from 'zod';
import type { EventBus, BreakerStateName } from '../kernel/event-bus.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('breaker');

export const CircuitBreakerConfigSchema = z.object({
  failureThreshold: z.number().int().positive().default(3),
  resetTimeoutMs: z.number().int().positive().default(60_000),
});
export type CircuitBreakerConfig = z.infer<typeof CircuitBreakerConfigSchema>;

export interface CircuitBreakerSnapshot {
  dependency: string;
  state: BreakerStateName;
  consecutiveFailures: number;
  failureThreshold: number;
  lastFailureTime: number | null;
  resetTimeoutMs: number;
}

/**
 * Circuit breaker guarding one remote dependency.
 *
 * Three-state pattern:
 * - closed: calls pass through; consecutive failures are counted
 * - open: calls are not attempted
 * - half_open: a single trial call is allowed
 *
 * State transitions:
 * - closed → open: consecutiveFailures reaches failureThreshold
 * - open → half_open: resetTimeoutMs elapsed since lastFailureTime
 * - half_open → closed: trial succeeded, consecutiveFailures reset to 0
 * - half_open → open: trial failed, lastFailureTime reset to now
 */
export class CircuitBreaker {
  private state: BreakerStateName = 'closed';
  private consecutiveFailures: number = 0;
  private lastFailureTime: number | null = null;
  private trialInFlight: boolean = false;
  private readonly config: CircuitBreakerConfig;

  constructor(
    readonly dependency: string,
    config?: Partial<CircuitBreakerConfig>,
    private readonly eventBus?: EventBus,
  ) {
    this.config = CircuitBreakerConfigSchema.parse(config ?? {});
  }

  /**
   * Ask permission to attempt a call.
   *
   * - closed: always allowed
   * - open: allowed only once the reset timeout has elapsed (moves to half_open)
   * - half_open: allowed only if no trial is already in flight
   *
   * A granted half_open permission claims the trial slot until the outcome
   * is recorded.
   */
  tryAcquire(): boolean {
    if (this.state === 'closed') {
      return true;
    }

    if (this.state === 'open') {
      if (!this.shouldAttemptRecovery()) {
        return false;
      }
      this.transition('half_open');
    }

    if (this.trialInFlight) {
      return false;
    }
    this.trialInFlight = true;
    return true;
  }

  /**
   * Whether a call would currently be permitted, without claiming the trial slot.
   */
  canExecute(): boolean {
    if (this.state === 'closed') return true;
    if (this.state === 'open') return this.shouldAttemptRecovery();
    return !this.trialInFlight;
  }

  recordSuccess(): void {
    if (this.state === 'half_open') {
      this.trialInFlight = false;
      this.consecutiveFailures = 0;
      this.transition('closed');
      return;
    }

    if (this.state === 'closed') {
      this.consecutiveFailures = 0;
    }
  }

  recordFailure(): void {
    const now = Date.now();

    if (this.state === 'half_open') {
      this.trialInFlight = false;
      this.lastFailureTime = now;
      this.transition('open');
      return;
    }

    if (this.state === 'closed') {
      this.consecutiveFailures++;
      this.lastFailureTime = now;
      if (this.consecutiveFailures >= this.config.failureThreshold) {
        this.transition('open');
      }
    }

    // open: calls are never attempted, so there is nothing to record
  }

  getState(): BreakerStateName {
    if (this.state === 'open' && this.shouldAttemptRecovery()) {
      return 'half_open';
    }
    return this.state;
  }

  getSnapshot(): CircuitBreakerSnapshot {
    return {
      dependency: this.dependency,
      state: this.getState(),
      consecutiveFailures: this.consecutiveFailures,
      failureThreshold: this.config.failureThreshold,
      lastFailureTime: this.lastFailureTime,
      resetTimeoutMs: this.config.resetTimeoutMs,
    };
  }

  /**
   * Force the breaker open, as if the threshold had just been reached.
   */
  trip(): void {
    this.lastFailureTime = Date.now();
    this.consecutiveFailures = Math.max(this.consecutiveFailures, this.config.failureThreshold);
    this.trialInFlight = false;
    if (this.state !== 'open') {
      this.transition('open');
    }
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.lastFailureTime = null;
    this.trialInFlight = false;
    if (this.state !== 'closed') {
      this.transition('closed');
    }
  }

  private shouldAttemptRecovery(): boolean {
    if (this.lastFailureTime === null) {
      return true;
    }
    return Date.now() - this.lastFailureTime >= this.config.resetTimeoutMs;
  }

  private transition(to: BreakerStateName): void {
    const from = this.state;
    this.state = to;

    log.info({ dependency: this.dependency, from, to }, 'Circuit breaker transition');
    this.eventBus?.emit('breaker:transition', {
      dependency: this.dependency,
      from,
      to,
      timestamp: Date.now(),
    });
  }
}
