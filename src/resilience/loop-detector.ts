import type { EventBus } from '../kernel/event-bus.js';
import type { CooldownRegistry } from './cooldowns.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('loop-detector');

export interface LoopDetectorConfig {
  /** Visits above this count within one window trigger the signal */
  threshold: number;
  windowMs: number;
  stuckCooldownMs: number;
}

const DEFAULT_CONFIG: LoopDetectorConfig = {
  threshold: 5,
  windowMs: 60_000,
  stuckCooldownMs: 60_000,
};

export const STUCK_COOLDOWN = 'stuck';

export interface LoopSignal {
  location: string;
  visits: number;
  cooldownUntil: number;
}

/**
 * Counts visits per location and raises a corrective signal when one
 * location is revisited too often inside the current window.
 *
 * The whole map is cleared once per window; no per-visit history is kept.
 */
export class LoopDetector {
  private readonly config: LoopDetectorConfig;
  private readonly visits: Map<string, number> = new Map();
  private windowStart: number;
  private readonly intentHandlers: Set<(signal: LoopSignal) => void> = new Set();

  constructor(
    private readonly cooldowns: CooldownRegistry,
    config?: Partial<LoopDetectorConfig>,
    private readonly eventBus?: EventBus,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.windowStart = Date.now();
  }

  /**
   * Record one visit. Returns the signal when this visit crossed the threshold.
   */
  recordVisit(location: string): LoopSignal | null {
    const now = Date.now();
    if (now - this.windowStart >= this.config.windowMs) {
      this.visits.clear();
      this.windowStart = now;
    }

    const count = (this.visits.get(location) ?? 0) + 1;
    if (count <= this.config.threshold) {
      this.visits.set(location, count);
      return null;
    }

    this.visits.set(location, 0);
    const signal: LoopSignal = {
      location,
      visits: count,
      cooldownUntil: now + this.config.stuckCooldownMs,
    };

    log.warn({ location, visits: count }, 'Repetition loop detected');
    this.cooldowns.set(STUCK_COOLDOWN, signal.cooldownUntil, `loop:${location}`);
    for (const handler of this.intentHandlers) {
      handler(signal);
    }
    this.eventBus?.emit('loop:detected', signal);
    return signal;
  }

  /**
   * Register a handler that discards pending movement intent on a loop signal.
   * @returns Unsubscribe function
   */
  onLoop(handler: (signal: LoopSignal) => void): () => void {
    this.intentHandlers.add(handler);
    return () => {
      this.intentHandlers.delete(handler);
    };
  }

  getVisits(location: string): number {
    return this.visits.get(location) ?? 0;
  }

  trackedLocations(): number {
    return this.visits.size;
  }
}
