import type { EventBus } from '../kernel/event-bus.js';
import type { EngineConfig } from '../types/index.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { CooldownRegistry } from './cooldowns.js';
import { RollingRateLimiter } from './rate-limiter.js';
import { LoopDetector } from './loop-detector.js';

/**
 * Every piece of mutable resilience state one agent owns.
 * Never shared between agents.
 */
export interface ResilienceState {
  readonly cooldowns: CooldownRegistry;
  readonly limiter: RollingRateLimiter;
  readonly loopDetector: LoopDetector;
  readonly breakers: ReadonlyMap<string, CircuitBreaker>;
  /** Breaker for a dependency, created closed on first use */
  breaker(dependency: string): CircuitBreaker;
}

export function createResilienceState(config: EngineConfig, eventBus?: EventBus): ResilienceState {
  const cooldowns = new CooldownRegistry(eventBus);
  const breakers = new Map<string, CircuitBreaker>();

  return {
    cooldowns,
    limiter: new RollingRateLimiter(
      cooldowns,
      {
        limit: config.rate_limit.limit,
        windowMs: config.rate_limit.window_ms,
        pauseMs: config.rate_limit.pause_ms,
      },
      eventBus,
    ),
    loopDetector: new LoopDetector(
      cooldowns,
      {
        threshold: config.loop.threshold,
        windowMs: config.loop.window_ms,
        stuckCooldownMs: config.loop.stuck_cooldown_ms,
      },
      eventBus,
    ),
    breakers,
    breaker(dependency: string): CircuitBreaker {
      let breaker = breakers.get(dependency);
      if (!breaker) {
        breaker = new CircuitBreaker(
          dependency,
          {
            failureThreshold: config.breaker.failure_threshold,
            resetTimeoutMs: config.breaker.reset_timeout_ms,
          },
          eventBus,
        );
        breakers.set(dependency, breaker);
      }
      return breaker;
    },
  };
}
