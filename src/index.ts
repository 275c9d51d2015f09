/**
 * Main Exports
 *
 * Public API surface of the engine.
 *
 * @module decision-ladder
 * @version 1.0.0
 */

// Types
export {
  TIER_ORDER,
  type TierName,
  type StateSnapshot,
  type StateSnapshotInput,
  type CandidateAction,
  type Decision,
  type ActionFeedback,
  type HealingEntry,
  type EngineConfig,
  type EngineConfigInput,
  type PolicyName,
  StateSnapshotSchema,
  ActionFeedbackSchema,
  EngineConfigSchema,
  createAction,
  type Result,
  ok,
  err,
  isOk,
  isErr,
} from './types/index.js';

// Config
export {
  DEFAULT_CONFIG,
  getConfig,
  loadConfig,
  saveConfig,
  resolveConfig,
  reloadConfig,
  clearConfigCache,
  getConfigPath,
} from './config/config.js';

// Kernel
export { EventBus, type EventMap } from './kernel/event-bus.js';

// Decision ladder
export { EscalationOrchestrator, acceptSnapshot, type OrchestratorStats } from './decision/orchestrator.js';
export { ReflexEvaluator, type ReflexRuleName } from './decision/reflex.js';
export { RuleEvaluator } from './decision/rules.js';
export { PolicyBank, createDefaultPolicyBank, createPolicy, type Policy, type PolicySelection } from './decision/policy-bank.js';
export { PatternTier } from './decision/pattern-tier.js';
export { PlannerTier } from './decision/planner-tier.js';
export { TransportTier, type RemoteTier } from './decision/remote-tier.js';
export { HttpTransport, type RemoteTransport, type RemoteRequest } from './decision/transport.js';
export { TierError, SnapshotNotReadyError, type TierErrorKind } from './decision/errors.js';

// Resilience
export * from './resilience/index.js';

// Audit
export { HealingLog } from './audit/healing-log.js';

// Agent & service
export { DecisionAgent, type CycleOutcome, type AgentHealth } from './agent/decision-agent.js';
export { decisionRoutes } from './api/routes.js';
export { createServer, startServer } from './api/server.js';
