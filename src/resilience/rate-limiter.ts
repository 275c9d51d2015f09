import type { EventBus } from '../kernel/event-bus.js';
import type { CooldownRegistry } from './cooldowns.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('rate-limiter');

export interface RollingRateLimiterConfig {
  /** Maximum call attempts per window */
  limit: number;
  /** Window size in milliseconds */
  windowMs: number;
  /** Emergency pause engaged when the limit is hit */
  pauseMs: number;
}

const DEFAULT_CONFIG: RollingRateLimiterConfig = {
  limit: 30,
  windowMs: 60_000,
  pauseMs: 60_000,
};

export interface RateWindow {
  count: number;
  windowStart: number;
  limit: number;
  windowSizeMs: number;
}

export const EMERGENCY_COOLDOWN = 'emergency';

/**
 * RollingRateLimiter
 *
 * Caps remote call attempts per window across every remote tier of one agent.
 * Hitting the cap rejects the attempt before any I/O and engages the
 * emergency pause cooldown.
 */
export class RollingRateLimiter {
  private readonly config: RollingRateLimiterConfig;
  private windowStart: number;
  private count: number = 0;

  constructor(
    private readonly cooldowns: CooldownRegistry,
    config?: Partial<RollingRateLimiterConfig>,
    private readonly eventBus?: EventBus,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.windowStart = Date.now();
  }

  /**
   * Try to consume a slot for one call attempt.
   * Returns true if allowed, false if rate limited.
   */
  tryAcquire(): boolean {
    const now = Date.now();
    this.updateWindow(now);

    if (this.count >= this.config.limit) {
      this.engagePause(now);
      return false;
    }

    this.count++;
    return true;
  }

  isPaused(now: number = Date.now()): boolean {
    return this.cooldowns.isActive(EMERGENCY_COOLDOWN, now);
  }

  getWindow(): RateWindow {
    this.updateWindow(Date.now());
    return {
      count: this.count,
      windowStart: this.windowStart,
      limit: this.config.limit,
      windowSizeMs: this.config.windowMs,
    };
  }

  getRemainingCapacity(): number {
    this.updateWindow(Date.now());
    return Math.max(0, this.config.limit - this.count);
  }

  reset(): void {
    this.count = 0;
    this.windowStart = Date.now();
    this.cooldowns.clear(EMERGENCY_COOLDOWN);
  }

  private updateWindow(now: number): void {
    if (now - this.windowStart >= this.config.windowMs) {
      this.windowStart = now;
      this.count = 0;
    }
  }

  private engagePause(now: number): void {
    const until = now + this.config.pauseMs;
    log.warn({ count: this.count, limit: this.config.limit, until }, 'Rate limit reached, emergency pause engaged');
    this.cooldowns.set(EMERGENCY_COOLDOWN, until, 'rate_limit_exceeded');
    this.eventBus?.emit('limiter:emergency_pause', { until, count: this.count, limit: this.config.limit });
  }
}
