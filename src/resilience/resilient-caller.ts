import { type Result, err } from '../types/index.js';
import { TierError } from '../decision/errors.js';
import { DeadlineExceededError, withDeadline } from '../utils/deadline.js';
import type { ResilienceState } from './state.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('resilient-caller');

/**
 * The single wrapper every remote call goes through:
 * emergency pause → breaker gate → rate limiter → breaker permit →
 * deadline-bounded call → breaker accounting.
 *
 * Nothing is retried. Unavailability is reported without touching the breaker.
 */
export class ResilientCaller {
  constructor(private readonly state: ResilienceState) {}

  async call<T>(
    dependency: string,
    deadlineMs: number,
    task: (signal: AbortSignal) => Promise<Result<T, TierError>>,
  ): Promise<Result<T, TierError>> {
    if (this.state.limiter.isPaused()) {
      return err(TierError.unavailable('emergency_pause'));
    }

    const breaker = this.state.breaker(dependency);
    if (!breaker.canExecute()) {
      return err(TierError.unavailable('breaker_open'));
    }

    if (!this.state.limiter.tryAcquire()) {
      return err(TierError.unavailable('rate_limited'));
    }

    if (!breaker.tryAcquire()) {
      return err(TierError.unavailable('breaker_open'));
    }

    let result: Result<T, TierError>;
    try {
      result = await withDeadline(task, deadlineMs);
    } catch (error) {
      result = err(toTierError(error));
    }

    if (!result.success && result.error.countsAsFailure()) {
      log.debug({ dependency, kind: result.error.kind, message: result.error.message }, 'Remote call failed');
      breaker.recordFailure();
    } else {
      breaker.recordSuccess();
    }

    return result;
  }
}

function toTierError(error: unknown): TierError {
  if (error instanceof TierError) return error;
  if (error instanceof DeadlineExceededError) return new TierError('timeout', error.message);
  return new TierError('transport', error instanceof Error ? error.message : String(error));
}
