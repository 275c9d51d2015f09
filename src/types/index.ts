/**
 * Core Type Definitions
 *
 * All types, schemas, and validation for the engine.
 * Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 * @version 1.0.0
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const TIER_ORDER = ['reflex', 'policyBank', 'rule', 'pattern', 'planner'] as const;

export const TierNameSchema = z.enum(TIER_ORDER);
export type TierName = z.infer<typeof TierNameSchema>;

export const DispositionSchema = z.enum(['hostile', 'neutral', 'friendly']);
export type Disposition = z.infer<typeof DispositionSchema>;

export const FeedbackStatusSchema = z.enum(['success', 'failed', 'partial']);
export type FeedbackStatus = z.infer<typeof FeedbackStatusSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// SNAPSHOT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const AgentVitalsSchema = z.object({
  name: z.string().min(1),
  level: z.number().int().nonnegative(),
  jobClass: z.string().default('Novice'),
  health: z.number().nonnegative(),
  maxHealth: z.number().nonnegative(),
  stamina: z.number().nonnegative(),
  maxStamina: z.number().nonnegative(),
  weight: z.number().nonnegative().default(0),
  maxWeight: z.number().nonnegative().default(0),
  currency: z.number().nonnegative().default(0),
  statusEffects: z.array(z.string()).default([]),
});
export type AgentVitals = z.infer<typeof AgentVitalsSchema>;

export const LocationSchema = z.object({
  region: z.string().min(1),
  x: z.number().int(),
  y: z.number().int(),
});
export type Location = z.infer<typeof LocationSchema>;

export const InventoryItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  amount: z.number().int().nonnegative(),
  category: z.string().default('misc'),
});
export type InventoryItem = z.infer<typeof InventoryItemSchema>;

export const EntitySchema = z.object({
  id: z.string(),
  name: z.string(),
  disposition: DispositionSchema,
  distance: z.number().nonnegative(),
  aggressive: z.boolean().default(false),
  health: z.number().nonnegative().optional(),
  maxHealth: z.number().nonnegative().optional(),
});
export type Entity = z.infer<typeof EntitySchema>;

export const FreePointsSchema = z.object({
  stat: z.number().int().nonnegative().default(0),
  skill: z.number().int().nonnegative().default(0),
});
export type FreePoints = z.infer<typeof FreePointsSchema>;

export const StateSnapshotSchema = z.object({
  agent: AgentVitalsSchema,
  location: LocationSchema,
  inventory: z.array(InventoryItemSchema).default([]),
  entities: z.array(EntitySchema).default([]),
  freePoints: FreePointsSchema.default({}),
  timestamp: z.number().int().nonnegative(),
  ready: z.boolean().default(true),
});
export type StateSnapshot = Readonly<z.infer<typeof StateSnapshotSchema>>;
export type StateSnapshotInput = z.input<typeof StateSnapshotSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// ACTION & DECISION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const ParameterValueSchema = z.union([z.string(), z.number(), z.boolean()]);
export type ParameterValue = z.infer<typeof ParameterValueSchema>;

export const CandidateActionSchema = z.object({
  kind: z.string().min(1).max(64),
  parameters: z.record(z.string(), ParameterValueSchema).default({}),
  confidence: z.number().min(0).max(1),
  rationale: z.string().default(''),
});
export type CandidateAction = Readonly<{
  kind: string;
  parameters: Readonly<Record<string, ParameterValue>>;
  confidence: number;
  rationale: string;
}>;

export interface Decision extends CandidateAction {
  tierUsed: TierName;
  latencyMs: number;
  cycleId: string;
  /** Policy Bank entry that produced the action, when tierUsed is policyBank */
  policy?: string;
}

export const ActionFeedbackSchema = z.object({
  kind: z.string().min(1).max(64),
  status: FeedbackStatusSchema,
  reasonCode: z.string().max(128).default(''),
  detail: z.string().max(2048).optional(),
});
export type ActionFeedback = z.infer<typeof ActionFeedbackSchema>;

/**
 * Build an immutable candidate action.
 * Confidence is clamped into [0, 1].
 */
export function createAction(
  kind: string,
  rationale: string,
  confidence: number,
  parameters: Record<string, ParameterValue> = {},
): CandidateAction {
  return Object.freeze({
    kind,
    parameters: Object.freeze({ ...parameters }),
    confidence: Math.min(1, Math.max(0, confidence)),
    rationale,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// HEALING AUDIT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const HealingEntrySchema = z.object({
  sequence: z.number().int().nonnegative(),
  timestamp: z.string().datetime(),
  rule: z.string(),
  reason: z.string(),
  config_path: z.string(),
  directives: z.array(z.string()),
  prev_hash: z.string(),
  hash: z.string().regex(/^[a-f0-9]{64}$/),
});
export type HealingEntry = z.infer<typeof HealingEntrySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const RemoteTierConfigSchema = (defaults: { path: string; deadline: number }) =>
  z.object({
    enabled: z.boolean().default(true),
    base_url: z.string().url().default('http://127.0.0.1:9902'),
    path: z.string().startsWith('/').default(defaults.path),
    deadline_ms: z.number().int().positive().default(defaults.deadline),
  });

export const PolicyNameSchema = z.enum(['combat', 'economy', 'progression', 'navigation']);
export type PolicyName = z.infer<typeof PolicyNameSchema>;

export const EngineConfigSchema = z.object({
  reflex: z
    .object({
      hp_critical: z.number().min(0).max(1).default(0.25),
      hp_low: z.number().min(0).max(1).default(0.4),
      stamina_low: z.number().min(0).max(1).default(0.2),
      weight_critical: z.number().min(0).max(1).default(0.9),
      contact_distance: z.number().nonnegative().default(5),
      budget_ms: z.number().positive().default(1),
    })
    .default({}),
  rules: z
    .object({
      heal_below: z.number().min(0).max(1).default(0.6),
      skill_stamina_above: z.number().min(0).max(1).default(0.3),
      attack_distance: z.number().nonnegative().default(15),
      safe_distance: z.number().nonnegative().default(8),
      min_health_to_attack: z.number().min(0).max(1).default(0.4),
      rest_seconds: z.number().int().positive().default(5),
    })
    .default({}),
  policies: z
    .object({
      order: z.array(PolicyNameSchema).default(['combat', 'economy', 'progression', 'navigation']),
      entry_budget_ms: z.number().positive().default(5),
    })
    .default({}),
  pattern: RemoteTierConfigSchema({ path: '/api/v1/pattern/decide', deadline: 100 }).default({}),
  // the host's HTTP client gives up on /decide after 30s
  planner: RemoteTierConfigSchema({ path: '/api/v1/llm/query', deadline: 30_000 })
    .extend({
      min_interval_ms: z.number().int().nonnegative().default(60_000),
    })
    .default({}),
  breaker: z
    .object({
      failure_threshold: z.number().int().positive().default(3),
      reset_timeout_ms: z.number().int().positive().default(60_000),
    })
    .default({}),
  rate_limit: z
    .object({
      limit: z.number().int().positive().default(30),
      window_ms: z.number().int().positive().default(60_000),
      pause_ms: z.number().int().nonnegative().default(60_000),
    })
    .default({}),
  loop: z
    .object({
      threshold: z.number().int().positive().default(5),
      window_ms: z.number().int().positive().default(60_000),
      stuck_cooldown_ms: z.number().int().nonnegative().default(60_000),
    })
    .default({}),
  cycle: z
    .object({
      min_interval_ms: z.number().int().nonnegative().default(2_000),
    })
    .default({}),
  region: z
    .object({
      settle_ms: z.number().int().nonnegative().default(5_000),
      debounce_ms: z.number().int().nonnegative().default(2_000),
    })
    .default({}),
  healing: z
    .object({
      enabled: z.boolean().default(true),
      config_file: z.string().default('control/config.txt'),
      log_file: z.string().default('~/.ladder/healing.jsonl'),
      occurrences: z.number().int().positive().default(3),
      interval_ms: z.number().int().positive().default(30_000),
    })
    .default({}),
  api: z
    .object({
      host: z.literal('127.0.0.1').default('127.0.0.1'),
      port: z.number().int().min(1024).max(65535).default(9901),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    })
    .default({}),
});
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}
