import type { EventBus } from '../kernel/event-bus.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('cooldowns');

/** Names the engine uses; any other string is accepted as well. */
export type CooldownName = 'cycle' | 'action' | 'region' | 'stuck' | 'emergency' | (string & {});

export interface ActiveCooldown {
  name: CooldownName;
  until: number;
  reason: string;
}

/**
 * Named "do not act before" timestamps.
 *
 * One scalar per name: setting a name again replaces its timestamp
 * (the later of the two wins), so memory is bounded by the name set.
 */
export class CooldownRegistry {
  private readonly entries: Map<string, ActiveCooldown> = new Map();

  constructor(private readonly eventBus?: EventBus) {}

  set(name: CooldownName, until: number, reason: string): void {
    const existing = this.entries.get(name);
    if (existing && existing.until >= until) {
      return;
    }

    this.entries.set(name, { name, until, reason });
    log.debug({ name, until, reason }, 'Cooldown set');
    this.eventBus?.emit('cooldown:set', { name, until, reason });
  }

  isActive(name: CooldownName, now: number = Date.now()): boolean {
    const entry = this.entries.get(name);
    return entry !== undefined && entry.until > now;
  }

  /**
   * The active cooldown that expires last, or null when none is active.
   */
  activeUntil(now: number = Date.now()): ActiveCooldown | null {
    let latest: ActiveCooldown | null = null;
    for (const entry of this.entries.values()) {
      if (entry.until <= now) continue;
      if (latest === null || entry.until > latest.until) {
        latest = entry;
      }
    }
    return latest;
  }

  get(name: CooldownName): ActiveCooldown | undefined {
    return this.entries.get(name);
  }

  clear(name: CooldownName): void {
    this.entries.delete(name);
  }

  list(now: number = Date.now()): ActiveCooldown[] {
    return [...this.entries.values()].filter((entry) => entry.until > now);
  }
}
