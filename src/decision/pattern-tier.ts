import type { StateSnapshot } from '../types/index.js';
import { TransportTier } from './remote-tier.js';

/**
 * Learned-model tier with a tight deadline. Consulted only when there is
 * something to fight.
 */
export class PatternTier extends TransportTier {
  readonly name = 'pattern' as const;

  shouldHandle(snapshot: StateSnapshot): boolean {
    return snapshot.entities.some((entity) => entity.disposition === 'hostile' || entity.aggressive);
  }
}
