import type { CandidateAction, EngineConfig, Entity, StateSnapshot } from '../types/index.js';
import { createAction } from '../types/index.js';
import { HEALTH_CONSUMABLES, bestConsumable } from './consumables.js';

type RulesConfig = EngineConfig['rules'];
type ReflexConfig = EngineConfig['reflex'];

const SKILL_RANGE = 10;
const SURROUNDED_COUNT = 3;

/** Basic offensive skill per job class; classes not listed use plain attacks. */
export const CLASS_ATTACK_SKILLS: Readonly<Record<string, string>> = {
  Swordman: 'Bash',
  Knight: 'Bowling Bash',
  Mage: 'Fire Bolt',
  Wizard: 'Jupitel Thunder',
  Archer: 'Double Strafe',
  Hunter: 'Blitz Beat',
  Thief: 'Envenom',
  Assassin: 'Sonic Blow',
  Merchant: 'Mammonite',
  Acolyte: 'Holy Light',
};

export type TacticalRuleName = 'heal' | 'attack' | 'reposition';

/**
 * Deterministic floor of the ladder. decide() always returns an action:
 * heal → attack → reposition → idle.
 */
export class RuleEvaluator {
  constructor(
    private readonly config: RulesConfig,
    private readonly reflexConfig: Pick<ReflexConfig, 'hp_critical'>,
  ) {}

  decide(snapshot: StateSnapshot): CandidateAction {
    switch (this.tacticalRule(snapshot)) {
      case 'heal':
        return createAction('useItem', 'Health below comfort threshold, healing', 0.75, {
          item: bestConsumable(snapshot.inventory, HEALTH_CONSUMABLES),
        });
      case 'attack':
        return this.attack(snapshot);
      case 'reposition':
        return createAction('move', 'Surrounded by aggressive enemies, retreating', 0.7, { direction: 'away' });
      case null:
        return createAction('idle', 'No tactical action required', 0.6, { duration: this.config.rest_seconds });
    }
  }

  /** Whether a rule above the idle floor applies */
  hasTacticalRule(snapshot: StateSnapshot): boolean {
    return this.tacticalRule(snapshot) !== null;
  }

  tacticalRule(snapshot: StateSnapshot): TacticalRuleName | null {
    const hp = healthRatio(snapshot);
    if (hp < this.config.heal_below && hp >= this.reflexConfig.hp_critical) {
      return 'heal';
    }
    if (hp >= this.config.min_health_to_attack && this.findTarget(snapshot) !== null) {
      return 'attack';
    }
    if (this.nearbyAggressive(snapshot) >= SURROUNDED_COUNT) {
      return 'reposition';
    }
    return null;
  }

  /**
   * Closest aggressive hostile in range; otherwise the closest hostile in range.
   */
  findTarget(snapshot: StateSnapshot): Entity | null {
    let best: Entity | null = null;
    for (const entity of snapshot.entities) {
      if (entity.disposition !== 'hostile' || entity.distance > this.config.attack_distance) continue;
      if (best === null) {
        best = entity;
        continue;
      }
      if (entity.aggressive !== best.aggressive) {
        if (entity.aggressive) best = entity;
        continue;
      }
      if (entity.distance < best.distance) best = entity;
    }
    return best;
  }

  private attack(snapshot: StateSnapshot): CandidateAction {
    const target = this.findTarget(snapshot);
    if (target === null) {
      return createAction('idle', 'No valid target', 0.6, { duration: this.config.rest_seconds });
    }

    const skill = CLASS_ATTACK_SKILLS[snapshot.agent.jobClass];
    const stamina = snapshot.agent.maxStamina > 0 ? snapshot.agent.stamina / snapshot.agent.maxStamina : 0;
    if (skill !== undefined && stamina > this.config.skill_stamina_above && target.distance <= SKILL_RANGE) {
      return createAction('useSkill', `Skill attack on ${target.name}`, 0.8, { skill, target: target.id });
    }
    return createAction('attack', `Basic attack on ${target.name}`, 0.8, { target: target.id });
  }

  private nearbyAggressive(snapshot: StateSnapshot): number {
    return snapshot.entities.filter(
      (entity) => entity.aggressive && entity.disposition !== 'friendly' && entity.distance <= this.config.safe_distance,
    ).length;
  }
}

function healthRatio(snapshot: StateSnapshot): number {
  return snapshot.agent.maxHealth > 0 ? snapshot.agent.health / snapshot.agent.maxHealth : 1;
}
