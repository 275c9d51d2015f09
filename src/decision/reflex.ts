import type { CandidateAction, EngineConfig, StateSnapshot } from '../types/index.js';
import { createAction } from '../types/index.js';
import {
  HEALTH_CONSUMABLES,
  STAMINA_CONSUMABLES,
  STATUS_CURES,
  bestConsumable,
} from './consumables.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('reflex');

export type ReflexRuleName =
  | 'critical_health'
  | 'dangerous_status'
  | 'hostile_contact'
  | 'over_capacity'
  | 'critical_resource';

export const DANGEROUS_STATUSES: ReadonlySet<string> = new Set([
  'stunned',
  'frozen',
  'stone curse',
  'sleep',
  'blind',
  'silence',
]);

type ReflexConfig = EngineConfig['reflex'];

interface ReflexRule {
  name: ReflexRuleName;
  fires: (snapshot: StateSnapshot, config: ReflexConfig) => boolean;
  action: (snapshot: StateSnapshot) => CandidateAction;
}

const ratio = (value: number, max: number): number => (max > 0 ? value / max : 1);

const healthRatio = (s: StateSnapshot): number => ratio(s.agent.health, s.agent.maxHealth);

/** Fixed precedence: survival health first. */
const REFLEX_RULES: readonly ReflexRule[] = [
  {
    name: 'critical_health',
    fires: (s, c) => healthRatio(s) < c.hp_critical,
    action: (s) =>
      createAction('useItem', 'Health critical, emergency healing', 1.0, {
        item: bestConsumable(s.inventory, HEALTH_CONSUMABLES),
      }),
  },
  {
    name: 'dangerous_status',
    fires: (s) => s.agent.statusEffects.some((status) => DANGEROUS_STATUSES.has(status.toLowerCase())),
    action: (s) =>
      createAction('useItem', 'Dangerous status effect active', 1.0, {
        item: bestConsumable(s.inventory, STATUS_CURES),
      }),
  },
  {
    name: 'hostile_contact',
    fires: (s, c) =>
      healthRatio(s) < c.hp_low &&
      s.entities.some((e) => e.aggressive && e.disposition === 'hostile' && e.distance <= c.contact_distance),
    action: (s) =>
      createAction('useItem', 'Low health while under attack', 1.0, {
        item: bestConsumable(s.inventory, HEALTH_CONSUMABLES),
      }),
  },
  {
    name: 'over_capacity',
    fires: (s, c) => s.agent.maxWeight > 0 && s.agent.weight / s.agent.maxWeight >= c.weight_critical,
    action: () => createAction('storeItems', 'Carrying capacity exhausted', 1.0, { destination: 'storage' }),
  },
  {
    name: 'critical_resource',
    fires: (s, c) => ratio(s.agent.stamina, s.agent.maxStamina) < c.stamina_low,
    action: (s) =>
      createAction('useItem', 'Stamina critically low', 1.0, {
        item: bestConsumable(s.inventory, STAMINA_CONSUMABLES),
      }),
  },
];

/**
 * Emergency predicates. Pure: equal vitals give an equal action.
 */
export class ReflexEvaluator {
  constructor(private readonly config: ReflexConfig) {}

  evaluate(snapshot: StateSnapshot): CandidateAction | null {
    const started = performance.now();
    const fired = this.firstFiring(snapshot);
    const elapsed = performance.now() - started;

    if (elapsed > this.config.budget_ms) {
      log.warn({ elapsedMs: elapsed, budgetMs: this.config.budget_ms }, 'Reflex evaluation over budget');
    }

    return fired ? fired.action(snapshot) : null;
  }

  /** Name of the reflex that would fire, if any */
  firing(snapshot: StateSnapshot): ReflexRuleName | null {
    return this.firstFiring(snapshot)?.name ?? null;
  }

  private firstFiring(snapshot: StateSnapshot): ReflexRule | undefined {
    return REFLEX_RULES.find((rule) => rule.fires(snapshot, this.config));
  }
}
