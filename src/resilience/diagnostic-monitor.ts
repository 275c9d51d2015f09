import { createLogger } from '../utils/logger.js';

const log = createLogger('diagnostic-monitor');

export interface DiagnosticMonitorConfig {
  /** Occurrences needed to trigger */
  occurrences: number;
  /** Occurrences must fall inside this interval, measured from the first */
  intervalMs: number;
}

export interface DiagnosticPattern {
  /** Healing rule to run when the pattern recurs */
  rule: string;
  matches: (message: string) => boolean;
}

interface Counter {
  count: number;
  firstSeen: number;
}

export interface DiagnosticTrigger {
  rule: string;
  occurrences: number;
  message: string;
}

/**
 * Watches diagnostic messages for a recurring pattern.
 *
 * Each pattern keeps one counter and the time it was first seen; a counter
 * older than the interval starts over. Reaching the occurrence count returns
 * a trigger and resets the counter.
 */
export class DiagnosticMonitor {
  private readonly counters: Map<string, Counter> = new Map();

  constructor(
    private readonly patterns: readonly DiagnosticPattern[],
    private readonly config: DiagnosticMonitorConfig,
  ) {}

  observe(message: string): DiagnosticTrigger | null {
    const pattern = this.patterns.find((candidate) => candidate.matches(message));
    if (!pattern) {
      return null;
    }

    const now = Date.now();
    let counter = this.counters.get(pattern.rule);
    if (!counter || now - counter.firstSeen > this.config.intervalMs) {
      counter = { count: 0, firstSeen: now };
      this.counters.set(pattern.rule, counter);
    }

    counter.count++;
    log.debug({ rule: pattern.rule, count: counter.count }, 'Diagnostic pattern observed');

    if (counter.count < this.config.occurrences) {
      return null;
    }

    this.counters.delete(pattern.rule);
    return { rule: pattern.rule, occurrences: counter.count, message };
  }

  getCount(rule: string): number {
    return this.counters.get(rule)?.count ?? 0;
  }
}
