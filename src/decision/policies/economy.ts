import { type CandidateAction, type StateSnapshot, createAction } from '../../types/index.js';
import type { Policy } from '../policy-bank.js';

export const OVERWEIGHT_RATIO = 0.85;
export const INVENTORY_FULL_SLOTS = 100;

/**
 * Heads back to storage or a merchant before the reflex layer has to.
 */
export class EconomyPolicy implements Policy {
  readonly name = 'economy';

  applicable(snapshot: StateSnapshot): boolean {
    return isOverweight(snapshot) || isInventoryFull(snapshot);
  }

  decide(snapshot: StateSnapshot): CandidateAction {
    if (isOverweight(snapshot)) {
      return createAction('travel', 'Overweight, returning to storage', 0.85, { destination: 'storage' });
    }
    if (isInventoryFull(snapshot)) {
      return createAction('travel', 'Inventory full, going to sell items', 0.8, { destination: 'merchant' });
    }
    return createAction('idle', 'Economy check passed', 0.5);
  }
}

function isOverweight(snapshot: StateSnapshot): boolean {
  const { weight, maxWeight } = snapshot.agent;
  return maxWeight > 0 && weight / maxWeight > OVERWEIGHT_RATIO;
}

function isInventoryFull(snapshot: StateSnapshot): boolean {
  return snapshot.inventory.length >= INVENTORY_FULL_SLOTS;
}
