import {
  StateSnapshotSchema,
  EngineConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
  type StateSnapshot,
  type StateSnapshotInput,
} from '../../src/types/index.js';

type AgentInput = StateSnapshotInput['agent'];

export interface SnapshotPatch {
  agent?: Partial<AgentInput>;
  location?: Partial<StateSnapshotInput['location']>;
  inventory?: StateSnapshotInput['inventory'];
  entities?: StateSnapshotInput['entities'];
  freePoints?: StateSnapshotInput['freePoints'];
  timestamp?: number;
  ready?: boolean;
}

/**
 * A calm, fully initialized agent: full vitals, nobody around, nothing to spend.
 */
export function makeSnapshotInput(patch: SnapshotPatch = {}): StateSnapshotInput {
  return {
    agent: {
      name: 'tester',
      level: 5,
      jobClass: 'Swordman',
      health: 100,
      maxHealth: 100,
      stamina: 50,
      maxStamina: 50,
      weight: 100,
      maxWeight: 1000,
      currency: 0,
      statusEffects: [],
      ...patch.agent,
    },
    location: { region: 'prt_fild08', x: 100, y: 100, ...patch.location },
    inventory: patch.inventory ?? [],
    entities: patch.entities ?? [],
    freePoints: patch.freePoints ?? { stat: 0, skill: 0 },
    timestamp: patch.timestamp ?? 1_700_000_000_000,
    ...(patch.ready !== undefined ? { ready: patch.ready } : {}),
  };
}

export function makeSnapshot(patch: SnapshotPatch = {}): StateSnapshot {
  return StateSnapshotSchema.parse(makeSnapshotInput(patch));
}

export function makeConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return EngineConfigSchema.parse(overrides);
}

export function hostile(id: string, distance: number, aggressive = true): NonNullable<StateSnapshotInput['entities']>[number] {
  return { id, name: `Poring ${id}`, disposition: 'hostile', distance, aggressive };
}
