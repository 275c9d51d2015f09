import type { InventoryItem } from '../types/index.js';

/** Preference order, strongest first */
export const HEALTH_CONSUMABLES = ['White Potion', 'Yellow Potion', 'Orange Potion', 'Red Potion'] as const;
export const STATUS_CURES = ['Panacea', 'Royal Jelly', 'Green Potion'] as const;
export const STAMINA_CONSUMABLES = ['Blue Potion', 'Grape Juice'] as const;

/**
 * First preferred item the agent carries; the first preference when none is carried.
 */
export function bestConsumable(inventory: readonly InventoryItem[], preference: readonly [string, ...string[]]): string {
  for (const name of preference) {
    if (inventory.some((item) => item.name === name && item.amount > 0)) {
      return name;
    }
  }
  return preference[0];
}
