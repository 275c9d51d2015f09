import type { CandidateAction, EngineConfig, PolicyName, StateSnapshot } from '../types/index.js';
import { CombatPolicy } from './policies/combat.js';
import { EconomyPolicy } from './policies/economy.js';
import { NavigationPolicy } from './policies/navigation.js';
import { ProgressionPolicy } from './policies/progression.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('policy-bank');

/**
 * One concern-scoped decision unit. Both methods must be free of side effects.
 */
export interface Policy {
  readonly name: string;
  applicable(snapshot: StateSnapshot): boolean;
  decide(snapshot: StateSnapshot): CandidateAction;
}

export interface PolicySelection {
  policy: string;
  action: CandidateAction;
}

export interface PolicyBankOptions {
  /** Per-entry time budget; overruns are logged */
  entryBudgetMs?: number;
}

/**
 * Ordered registry of policies, fixed at construction.
 * The first applicable entry wins; confidences are never compared.
 */
export class PolicyBank {
  private readonly policies: readonly Policy[];
  private readonly entryBudgetMs: number;

  constructor(policies: readonly Policy[], options: PolicyBankOptions = {}) {
    const seen = new Set<string>();
    for (const policy of policies) {
      if (seen.has(policy.name)) {
        throw new Error(`Duplicate policy name: ${policy.name}`);
      }
      seen.add(policy.name);
    }
    this.policies = [...policies];
    this.entryBudgetMs = options.entryBudgetMs ?? 5;
  }

  select(snapshot: StateSnapshot): PolicySelection | null {
    for (const policy of this.policies) {
      const started = performance.now();
      try {
        if (!policy.applicable(snapshot)) {
          continue;
        }
        return { policy: policy.name, action: policy.decide(snapshot) };
      } catch (error) {
        log.error({ policy: policy.name, err: error }, 'Policy threw, skipping');
      } finally {
        const elapsed = performance.now() - started;
        if (elapsed > this.entryBudgetMs) {
          log.warn({ policy: policy.name, elapsedMs: elapsed, budgetMs: this.entryBudgetMs }, 'Policy over budget');
        }
      }
    }
    return null;
  }

  names(): string[] {
    return this.policies.map((policy) => policy.name);
  }

  size(): number {
    return this.policies.length;
  }
}

export function createPolicy(name: PolicyName, config: EngineConfig): Policy {
  switch (name) {
    case 'combat':
      return new CombatPolicy(config.rules);
    case 'economy':
      return new EconomyPolicy();
    case 'progression':
      return new ProgressionPolicy();
    case 'navigation':
      return new NavigationPolicy(config.rules);
  }
}

/**
 * Bank in the configured order (default combat → economy → progression → navigation).
 */
export function createDefaultPolicyBank(config: EngineConfig): PolicyBank {
  return new PolicyBank(
    config.policies.order.map((name) => createPolicy(name, config)),
    { entryBudgetMs: config.policies.entry_budget_ms },
  );
}
