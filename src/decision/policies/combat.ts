import { type CandidateAction, type EngineConfig, type Entity, type StateSnapshot, createAction } from '../../types/index.js';
import { CLASS_ATTACK_SKILLS } from '../rules.js';
import type { Policy } from '../policy-bank.js';

const MIN_HEALTH_TO_ENGAGE = 0.5;
const AOE_RADIUS = 5;
const AOE_MIN_TARGETS = 3;
const SKILL_STAMINA_MIN = 0.3;

export class CombatPolicy implements Policy {
  readonly name = 'combat';

  constructor(private readonly config: Pick<EngineConfig['rules'], 'attack_distance'>) {}

  applicable(snapshot: StateSnapshot): boolean {
    const { health, maxHealth } = snapshot.agent;
    return maxHealth > 0 && health / maxHealth > MIN_HEALTH_TO_ENGAGE && this.selectTarget(snapshot) !== null;
  }

  decide(snapshot: StateSnapshot): CandidateAction {
    const target = this.selectTarget(snapshot);
    if (target === null) {
      return createAction('idle', 'No valid combat target', 0.5);
    }

    const clustered = snapshot.entities.filter(
      (entity) => entity.disposition === 'hostile' && entity.distance <= AOE_RADIUS,
    ).length;
    if (clustered >= AOE_MIN_TARGETS) {
      return createAction('useSkill', `${clustered} targets clustered, area attack`, 0.85, {
        skill: 'Magnum Break',
        targetArea: 'self',
      });
    }

    const { stamina, maxStamina, jobClass } = snapshot.agent;
    const skill = CLASS_ATTACK_SKILLS[jobClass];
    if (skill !== undefined && maxStamina > 0 && stamina / maxStamina >= SKILL_STAMINA_MIN) {
      return createAction('useSkill', `Class skill on ${target.name}`, 0.9, { skill, target: target.id });
    }

    return createAction('attack', `Basic attack on ${target.name}`, 0.75, { target: target.id });
  }

  /** Aggressive before passive, then closest */
  private selectTarget(snapshot: StateSnapshot): Entity | null {
    const inRange = snapshot.entities.filter(
      (entity) => entity.disposition === 'hostile' && entity.distance <= this.config.attack_distance,
    );
    if (inRange.length === 0) return null;

    const sorted = [...inRange].sort((a, b) => {
      if (a.aggressive !== b.aggressive) return a.aggressive ? -1 : 1;
      return a.distance - b.distance;
    });
    return sorted[0] ?? null;
  }
}
