import { z } from 'zod';
import { CandidateActionSchema, type StateSnapshot } from '../types/index.js';
import { TierError } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRE FORMAT
// ═══════════════════════════════════════════════════════════════════════════

export interface RemoteRequest {
  requestId: string;
  snapshot: StateSnapshot;
  context: {
    tier: 'pattern' | 'planner';
    deadlineMs: number;
    agent: string;
  };
}

/** A null action means the remote tier has no opinion for this snapshot. */
export const RemoteResponseSchema = z.object({
  action: CandidateActionSchema.nullable(),
});
export type RemoteResponse = z.infer<typeof RemoteResponseSchema>;

/**
 * Moves one request to a remote tier and returns the raw response body.
 * Must honor the signal; the caller owns the deadline.
 */
export interface RemoteTransport {
  send(request: RemoteRequest, signal: AbortSignal): Promise<unknown>;
}

// ═══════════════════════════════════════════════════════════════════════════
// HTTP
// ═══════════════════════════════════════════════════════════════════════════

export class HttpTransport implements RemoteTransport {
  private readonly url: string;

  constructor(baseUrl: string, path: string) {
    this.url = new URL(path, baseUrl).toString();
  }

  getUrl(): string {
    return this.url;
  }

  async send(request: RemoteRequest, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-Request-Id': request.requestId },
        body: JSON.stringify(request),
        signal,
      });
    } catch (error) {
      if (signal.aborted) throw error;
      throw new TierError('transport', error instanceof Error ? error.message : String(error));
    }

    if (!response.ok) {
      throw new TierError('transport', `HTTP ${response.status} from ${this.url}`);
    }

    try {
      return await response.json();
    } catch {
      throw new TierError('malformed_response', `Response from ${this.url} is not JSON`);
    }
  }
}
