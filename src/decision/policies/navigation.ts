import { type CandidateAction, type EngineConfig, type StateSnapshot, createAction } from '../../types/index.js';
import type { Policy } from '../policy-bank.js';

const SURROUNDED_COUNT = 3;

export class NavigationPolicy implements Policy {
  readonly name = 'navigation';

  constructor(private readonly config: Pick<EngineConfig['rules'], 'safe_distance'>) {}

  applicable(snapshot: StateSnapshot): boolean {
    return this.threats(snapshot) >= SURROUNDED_COUNT;
  }

  decide(snapshot: StateSnapshot): CandidateAction {
    const threats = this.threats(snapshot);
    return createAction('move', `Surrounded by ${threats} aggressive entities, retreating`, 0.7, {
      direction: 'away',
    });
  }

  private threats(snapshot: StateSnapshot): number {
    return snapshot.entities.filter(
      (entity) => entity.aggressive && entity.disposition !== 'friendly' && entity.distance <= this.config.safe_distance,
    ).length;
  }
}
