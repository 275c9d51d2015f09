import type { TierName, ActionFeedback, Decision } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('event-bus');

export type BreakerStateName = 'closed' | 'open' | 'half_open';

/**
 * EventMap interface defining event name to payload mappings.
 * Operators and the action executor observe the engine only through these events.
 */
export interface EventMap {
  // ── Decision cycle ─────────────────────────────────────────────────────
  'decision:committed': { decision: Decision; agent: string };
  'tier:skipped': { tier: TierName; reason: string; cycleId: string };
  'tier:failed': { tier: TierName; kind: string; message: string; cycleId: string };
  'cycle:skipped': { agent: string; cooldown: string; until: number };

  // ── Resilience ─────────────────────────────────────────────────────────
  'breaker:transition': { dependency: string; from: BreakerStateName; to: BreakerStateName; timestamp: number };
  'limiter:emergency_pause': { until: number; count: number; limit: number };
  'cooldown:set': { name: string; until: number; reason: string };
  'loop:detected': { location: string; visits: number; cooldownUntil: number };

  // ── Self-healing ───────────────────────────────────────────────────────
  'heal:applied': { rule: string; reason: string; directives: string[]; configPath: string };
  'heal:skipped': { rule: string; reason: string };
  'config:reload_requested': { configPath: string; rule: string };

  // ── Executor feedback ──────────────────────────────────────────────────
  'feedback:recorded': { agent: string; feedback: ActionFeedback };

  // ── System ─────────────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

export class EventBus {
  private listeners: Map<string, Set<(payload: never) => void>> = new Map();
  private handlerErrors: number = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }

    handlers.add(handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Emit an event to all subscribers.
   * A throwing handler is logged and reported; the remaining handlers still run.
   */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        (handler as (payload: EventMap[K]) => void)(payload);
      } catch (error) {
        this.handlerErrors++;
        const errorMsg = error instanceof Error ? error.message : String(error);

        log.error({ event: String(event), err: error }, 'Error in event handler');

        // Guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event: String(event),
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  once<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
    const wrappedHandler = (payload: EventMap[K]): void => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    const handlers = this.listeners.get(event);
    return handlers ? handlers.size : 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
