import type { TierName } from '../types/index.js';

export type TierErrorKind = 'unavailable' | 'timeout' | 'malformed_response' | 'transport';

export type UnavailableReason = 'breaker_open' | 'rate_limited' | 'emergency_pause' | 'throttled' | 'disabled';

/**
 * Failure of one remote tier for one cycle.
 * Absorbed by the orchestrator; never reaches the caller of decide().
 */
export class TierError extends Error {
  readonly kind: TierErrorKind;
  readonly reason: UnavailableReason | undefined;

  constructor(kind: TierErrorKind, message: string, reason?: UnavailableReason) {
    super(message);
    this.name = 'TierError';
    this.kind = kind;
    this.reason = reason;
  }

  static unavailable(reason: UnavailableReason): TierError {
    return new TierError('unavailable', `Tier unavailable: ${reason}`, reason);
  }

  /** Whether this failure counts against the dependency's breaker */
  countsAsFailure(): boolean {
    return this.kind !== 'unavailable';
  }
}

/**
 * The snapshot cannot be decided on (agent not initialized or malformed).
 * The only error that escapes a decision cycle.
 */
export class SnapshotNotReadyError extends Error {
  readonly code = 'SNAPSHOT_NOT_READY';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'SnapshotNotReadyError';
  }
}

export function describeTierError(tier: TierName, error: TierError): string {
  return error.reason ? `${tier}: ${error.kind}/${error.reason}` : `${tier}: ${error.kind}`;
}
