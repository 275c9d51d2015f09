/**
 * Self-Healing Configuration Resolver
 *
 * Neutralizes directives in the externally-owned, line-oriented host
 * configuration when a recurring diagnostic shows they conflict with the
 * agent's situation. Lines are commented out with a marker, never deleted.
 *
 * Two halves:
 * - healConfigText(): pure text → text transform
 * - ConfigHealer.heal(): read, transform, write, append to the healing log,
 *   then signal a hot reload; a failed append restores the original text
 *
 * @module resilience/config-healer
 */

import * as fs from 'node:fs';
import type { EventBus } from '../kernel/event-bus.js';
import type { HealingLog } from '../audit/healing-log.js';
import { type HealingEntry, type Result, ok, err } from '../types/index.js';
import { healLogger } from '../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════════════════

export interface HealingRule {
  name: string;
  /** Diagnostic messages that indicate this conflict */
  triggers: readonly RegExp[];
  /** Top-level `key value` directive to neutralize */
  disablesDirective: (key: string, value: string) => boolean;
  /** `key ... {` block to neutralize in full */
  disablesBlock: (key: string) => boolean;
}

const isNeutral = (value: string): boolean => value === '' || value === '0';

export const AUTO_TELEPORT_RULE: HealingRule = {
  name: 'auto-teleport',
  triggers: [
    /You don't have the Teleport skill or a Fly Wing/i,
    /^teleport:no_teleport_item$/,
  ],
  disablesDirective: (key, value) => key.startsWith('teleportAuto') && !isNeutral(value),
  disablesBlock: () => false,
};

export const AUTO_BUY_RULE: HealingRule = {
  name: 'auto-buy',
  triggers: [
    /Calculating auto-buy route/i,
    /^buy:town_return_loop$/,
  ],
  disablesDirective: (key, value) => key.startsWith('buyAuto') && !isNeutral(value),
  disablesBlock: (key) => key === 'buyAuto',
};

export const DEFAULT_HEALING_RULES: readonly HealingRule[] = [AUTO_TELEPORT_RULE, AUTO_BUY_RULE];

export function findRule(name: string, rules: readonly HealingRule[] = DEFAULT_HEALING_RULES): HealingRule | undefined {
  return rules.find((rule) => rule.name === name);
}

// ═══════════════════════════════════════════════════════════════════════════
// PURE TRANSFORM
// ═══════════════════════════════════════════════════════════════════════════

export interface HealedText {
  text: string;
  /** Directives neutralized by this pass, as they appeared (trimmed) */
  directives: string[];
}

export function healingMarker(ruleName: string): string {
  return `# [self-heal:${ruleName}]`;
}

function splitDirective(trimmed: string): { key: string; value: string } {
  const space = trimmed.search(/\s/);
  if (space === -1) {
    return { key: trimmed, value: '' };
  }
  return { key: trimmed.slice(0, space), value: trimmed.slice(space + 1).trim() };
}

function commentOut(line: string, marker: string): string {
  const indent = /^\s*/.exec(line)?.[0] ?? '';
  return `${indent}${marker} ${line.slice(indent.length)}`;
}

/**
 * Comment out every directive the rule disables.
 *
 * Already-commented and neutral (`0` or empty) directives are left alone,
 * so running the transform twice changes nothing the second time.
 */
export function healConfigText(text: string, rule: HealingRule): HealedText {
  const marker = healingMarker(rule.name);
  const lines = text.split('\n');
  const directives: string[] = [];
  const out: string[] = [];

  let depth = 0;
  let disabling = false;

  for (const line of lines) {
    const trimmed = line.trim();

    if (trimmed === '' || trimmed.startsWith('#')) {
      out.push(line);
      continue;
    }

    if (trimmed === '}') {
      depth = Math.max(0, depth - 1);
      out.push(disabling ? commentOut(line, marker) : line);
      if (depth === 0) {
        disabling = false;
      }
      continue;
    }

    const opensBlock = trimmed.endsWith('{');

    if (disabling) {
      if (opensBlock) depth++;
      out.push(commentOut(line, marker));
      continue;
    }

    if (opensBlock) {
      const header = trimmed.slice(0, -1).trim();
      const { key } = splitDirective(header);
      if (depth === 0 && rule.disablesBlock(key)) {
        disabling = true;
        directives.push(header);
        out.push(commentOut(line, marker));
      } else {
        out.push(line);
      }
      depth++;
      continue;
    }

    const { key, value } = splitDirective(trimmed);
    if (depth === 0 && rule.disablesDirective(key, value)) {
      directives.push(trimmed);
      out.push(commentOut(line, marker));
    } else {
      out.push(line);
    }
  }

  return { text: out.join('\n'), directives };
}

// ═══════════════════════════════════════════════════════════════════════════
// APPLY STEP
// ═══════════════════════════════════════════════════════════════════════════

export type ReloadSignal = (configPath: string, rule: string) => void;

export interface ConfigHealerOptions {
  configPath: string;
  healingLog: HealingLog;
  eventBus?: EventBus;
  /** Hot reload hook; defaults to emitting config:reload_requested */
  reload?: ReloadSignal;
  rules?: readonly HealingRule[];
}

export interface HealOutcome {
  rule: string;
  directives: string[];
  changed: boolean;
  dryRun: boolean;
  entry?: HealingEntry;
}

export class ConfigHealer {
  private readonly rules: readonly HealingRule[];
  private readonly reload: ReloadSignal;

  constructor(private readonly options: ConfigHealerOptions) {
    this.rules = options.rules ?? DEFAULT_HEALING_RULES;
    this.reload =
      options.reload ??
      ((configPath, rule) => {
        options.eventBus?.emit('config:reload_requested', { configPath, rule });
      });
  }

  get configPath(): string {
    return this.options.configPath;
  }

  getRules(): readonly HealingRule[] {
    return this.rules;
  }

  async heal(ruleName: string, reason: string, opts: { dryRun?: boolean } = {}): Promise<Result<HealOutcome, Error>> {
    const rule = findRule(ruleName, this.rules);
    if (!rule) {
      return err(new Error(`Unknown healing rule: ${ruleName}`));
    }

    const dryRun = opts.dryRun ?? false;
    const configPath = this.options.configPath;

    let original: string;
    try {
      original = fs.readFileSync(configPath, 'utf-8');
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }

    const healed = healConfigText(original, rule);

    if (healed.directives.length === 0) {
      healLogger.info({ rule: rule.name, configPath }, 'Nothing to heal');
      this.options.eventBus?.emit('heal:skipped', { rule: rule.name, reason: 'no_matching_directives' });
      return ok({ rule: rule.name, directives: [], changed: false, dryRun });
    }

    if (dryRun) {
      return ok({ rule: rule.name, directives: healed.directives, changed: false, dryRun });
    }

    try {
      fs.writeFileSync(configPath, healed.text, 'utf-8');
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }

    healLogger.warn(
      { rule: rule.name, reason, configPath, directives: healed.directives },
      'Configuration healed',
    );

    const appended = await this.options.healingLog.append({
      rule: rule.name,
      reason,
      configPath,
      directives: healed.directives,
    });
    if (!appended.success) {
      healLogger.error({ err: appended.error, rule: rule.name }, 'Healing log append failed, restoring configuration');
      // no mutation may stand without its log entry
      try {
        fs.writeFileSync(configPath, original, 'utf-8');
      } catch (error) {
        healLogger.error({ err: error, configPath }, 'Configuration restore failed');
      }
      return err(appended.error);
    }

    this.options.eventBus?.emit('heal:applied', {
      rule: rule.name,
      reason,
      directives: healed.directives,
      configPath,
    });
    this.reload(configPath, rule.name);

    return ok({ rule: rule.name, directives: healed.directives, changed: true, dryRun, entry: appended.data });
  }
}
