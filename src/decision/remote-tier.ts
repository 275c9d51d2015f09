import { randomUUID } from 'node:crypto';
import {
  type CandidateAction,
  type StateSnapshot,
  type Result,
  createAction,
  ok,
  err,
} from '../types/index.js';
import { TierError } from './errors.js';
import { RemoteResponseSchema, type RemoteTransport } from './transport.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('remote-tier');

export type RemoteTierName = 'pattern' | 'planner';

/**
 * One remote decision source. Calls always go through the resilience layer;
 * the orchestrator owns the deadline.
 */
export interface RemoteTier {
  readonly name: RemoteTierName;
  readonly enabled: boolean;
  readonly deadlineMs: number;
  /** Cheap local gate */
  shouldHandle(snapshot: StateSnapshot): boolean;
  /** Local throttle checked before any call; never a breaker concern */
  isThrottled(now: number): boolean;
  decide(
    snapshot: StateSnapshot,
    deadlineMs: number,
    signal: AbortSignal,
  ): Promise<Result<CandidateAction | null, TierError>>;
}

export interface TransportTierOptions {
  enabled?: boolean;
  deadlineMs: number;
}

/**
 * RemoteTier over a RemoteTransport: builds the request, validates the
 * response, maps failures onto the tier error taxonomy. No retries.
 */
export abstract class TransportTier implements RemoteTier {
  abstract readonly name: RemoteTierName;
  readonly enabled: boolean;
  readonly deadlineMs: number;

  constructor(
    protected readonly transport: RemoteTransport,
    options: TransportTierOptions,
  ) {
    this.enabled = options.enabled ?? true;
    this.deadlineMs = options.deadlineMs;
  }

  abstract shouldHandle(snapshot: StateSnapshot): boolean;

  isThrottled(_now: number): boolean {
    return false;
  }

  async decide(
    snapshot: StateSnapshot,
    deadlineMs: number,
    signal: AbortSignal,
  ): Promise<Result<CandidateAction | null, TierError>> {
    const requestId = randomUUID();

    let body: unknown;
    try {
      body = await this.transport.send(
        { requestId, snapshot, context: { tier: this.name, deadlineMs, agent: snapshot.agent.name } },
        signal,
      );
    } catch (error) {
      if (error instanceof TierError) return err(error);
      throw error;
    }

    const parsed = RemoteResponseSchema.safeParse(body);
    if (!parsed.success) {
      log.warn({ tier: this.name, requestId, issues: parsed.error.issues.length }, 'Malformed tier response');
      return err(new TierError('malformed_response', `${this.name}: ${parsed.error.message}`));
    }

    const action = parsed.data.action;
    if (action === null) {
      return ok(null);
    }
    return ok(createAction(action.kind, action.rationale, action.confidence, action.parameters));
  }
}
