/**
 * Polity Core Types
 *
 * These are the canonical data models for the simulation engine.
 * Every package references these types. Nothing is implicit.
 */

// ─── Resources ──────────────────────────────────────────────────────

export type ResourceName = "food" | "energy" | "infrastructure" | "morale" | "treasury";

export const RESOURCE_NAMES: readonly ResourceName[] = [
  "food", "energy", "infrastructure", "morale", "treasury",
];

export type ResourceLevels = Record<ResourceName, number>;

// ─── Actions ────────────────────────────────────────────────────────

export type ResourceActionKind =
  | "improve_food"
  | "improve_energy"
  | "improve_infrastructure"
  | "boost_morale";

export type SocialActionKind = "support_agent" | "oppose_agent" | "send_message";

export type ActionKind = ResourceActionKind | SocialActionKind | "pass";

/** Canonical order. Used for iteration and as the final tie-break when ranking. */
export const ACTION_KINDS: readonly ActionKind[] = [
  "improve_food",
  "improve_energy",
  "improve_infrastructure",
  "boost_morale",
  "support_agent",
  "oppose_agent",
  "send_message",
  "pass",
];

export const RESOURCE_ACTION_KINDS: readonly ResourceActionKind[] = [
  "improve_food", "improve_energy", "improve_infrastructure", "boost_morale",
];

export const SOCIAL_ACTION_KINDS: readonly SocialActionKind[] = [
  "support_agent", "oppose_agent", "send_message",
];

export function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some((k) => k === value);
}

export function isResourceActionKind(kind: ActionKind): kind is ResourceActionKind {
  return RESOURCE_ACTION_KINDS.some((k) => k === kind);
}

export function isSocialActionKind(kind: ActionKind): kind is SocialActionKind {
  return SOCIAL_ACTION_KINDS.some((k) => k === kind);
}

/**
 * Output of the decision collaborator. Untrusted: `kind` may name an unknown
 * action, `target` may be decorated or unknown, fields may be missing.
 */
export interface ActionRequest {
  kind: string;
  target?: string | null;
  message?: string | null;
  justification?: string;
}

export type MessageTone = "friendly" | "neutral" | "hostile";

// ─── Rules ──────────────────────────────────────────────────────────

export interface ResourceAmount {
  resource: ResourceName;
  amount: number;
}

export interface ResourceActionRule {
  gain: ResourceAmount;
  cost: ResourceAmount;
}

export type ModifierKind = "supported" | "opposed";

export interface SocialActionRule {
  modifier?: { kind: ModifierKind; multiplier: number };
  world_effect?: ResourceAmount;
}

export interface RelationshipDeltaRule {
  trust: number;
  resentment: number;
}

export interface SimulationRules {
  resource_actions: Record<ResourceActionKind, ResourceActionRule>;
  social_actions: Record<SocialActionKind, SocialActionRule>;
  action_deltas: Partial<Record<ActionKind, RelationshipDeltaRule>>;
  tone_deltas: Record<MessageTone, RelationshipDeltaRule>;
  relationship_bounds: { min: number; max: number };
  /** Turn-ends a freshly installed cost modifier survives. */
  modifier_lifetime_turns: number;
}

export interface SimulationRulesOverrides {
  resource_actions?: Partial<Record<ResourceActionKind, ResourceActionRule>>;
  social_actions?: Partial<Record<SocialActionKind, SocialActionRule>>;
  action_deltas?: Partial<Record<ActionKind, RelationshipDeltaRule>>;
  tone_deltas?: Partial<Record<MessageTone, RelationshipDeltaRule>>;
  relationship_bounds?: { min: number; max: number };
  modifier_lifetime_turns?: number;
}

// ─── World ──────────────────────────────────────────────────────────

export interface CostModifier {
  kind: ModifierKind;
  multiplier: number;
  remaining_turns: number;
  granted_by: string;
}

export interface WorldSnapshot extends ResourceLevels {
  crisis_level: number;
  turn: number;
  cost_modifiers: Record<string, CostModifier>;
}

// ─── Relationships ──────────────────────────────────────────────────

export interface RelationshipView {
  subject: string;
  trust: number;
  resentment: number;
  score: number;
}

export interface RelationshipRecord extends RelationshipView {
  observer: string;
  history: string[];
}

export interface RelationshipDelta {
  observer: string;
  subject: string;
  cause: "action" | "tone";
  trust_delta: number;
  resentment_delta: number;
  trust: number;
  resentment: number;
  score: number;
}

// ─── Outcomes & Narrative ───────────────────────────────────────────

export type OutcomeStatus =
  | "applied"
  | "passed"
  | "invalid_request"
  | "unaffordable"
  | "collaborator_failure";

export interface ActionCost {
  resource: ResourceName;
  base: number;
  paid: number;
  modifier: ModifierKind | null;
}

export interface ActionOutcome {
  status: OutcomeStatus;
  requested_kind: string | null;
  kind: ActionKind;
  target: string | null;
  message: string | null;
  cost: ActionCost | null;
  resource_deltas: Partial<Record<ResourceName, number>>;
  modifier_installed: (CostModifier & { target: string }) | null;
  reason: string | null;
}

export interface NarrativeEntry {
  turn: number;
  step: number;
  actor: string;
  requested_kind: string | null;
  kind: ActionKind;
  target: string | null;
  status: OutcomeStatus;
  resource_deltas: Partial<Record<ResourceName, number>>;
  relationship_deltas: RelationshipDelta[];
  message: string | null;
  tone: MessageTone | null;
  justification: string;
  text: string;
}

// ─── Observation ────────────────────────────────────────────────────

export interface PendingMessage {
  from: string;
  text: string;
  tone: MessageTone;
  sent_turn: number;
}

export interface Interaction {
  turn: number;
  actor: string;
  kind: SocialActionKind;
  message: string | null;
}

export interface Affordability {
  resource: ResourceName;
  cost: number;
  available: number;
  affordable: boolean;
}

export interface Persona {
  description?: string;
  goals?: string[];
  traits?: string[];
  voice?: string;
}

export interface Observation {
  run_id: string;
  turn: number;
  agent: string;
  persona: Persona | null;
  world: WorldSnapshot;
  relationships: RelationshipView[];
  recent_actions: ActionKind[];
  repetition_penalties: Record<ActionKind, number>;
  pending_messages: PendingMessage[];
  recent_interactions: Interaction[];
  affordability: Record<ResourceActionKind, Affordability>;
  active_modifier: CostModifier | null;
  valid_targets: string[];
  resource_history: ResourceLevels[];
}

/** The external reasoning collaborator. */
export interface Decider {
  decide(observation: Observation): Promise<ActionRequest>;
}

// ─── Configuration ──────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AgentConfig {
  id: string;
  persona?: Persona;
}

export interface SimulationSettings {
  max_turns: number;
  idle_turn_limit: number;
  history_size: number;
  repetition_window: number;
  repetition_penalty: number;
  decide_timeout_ms: number;
  stop_on_collapse: boolean;
  log_level: LogLevel;
}

export interface SimulationConfig {
  simulation: SimulationSettings;
  world: ResourceLevels;
  rules?: SimulationRulesOverrides;
  agents: AgentConfig[];
}

export interface SimLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// ─── Run lifecycle ──────────────────────────────────────────────────

export type SimulationPhase = "init" | "turn_start" | "agent_step" | "turn_end" | "terminated";

export type TerminationReason = "max_turns" | "idle_consensus" | "collapse" | "stopped";

export interface TurnSummary {
  turn: number;
  entries: NarrativeEntry[];
  world: WorldSnapshot;
  expired_modifiers: string[];
  all_passed: boolean;
}

export interface SimulationResult {
  run_id: string;
  turns: number;
  reason: TerminationReason;
  world: WorldSnapshot;
  narrative: NarrativeEntry[];
  relationships: RelationshipRecord[];
}

// ─── Journal ────────────────────────────────────────────────────────

export type JournalEventType =
  | "simulation.created"
  | "simulation.started"
  | "turn.started"
  | "decision.received"
  | "decision.failed"
  | "action.resolved"
  | "action.rejected"
  | "relationship.updated"
  | "message.delivered"
  | "modifier.expired"
  | "turn.ended"
  | "simulation.terminated";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  run_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}
