import type {
  ActionKind,
  ResourceActionKind,
  SimulationRules,
  SimulationRulesOverrides,
  SimulationSettings,
} from "@polity/schemas";

export const DEFAULT_RULES: SimulationRules = {
  resource_actions: {
    improve_food: { gain: { resource: "food", amount: 8 }, cost: { resource: "energy", amount: 3 } },
    improve_energy: { gain: { resource: "energy", amount: 8 }, cost: { resource: "treasury", amount: 3 } },
    improve_infrastructure: { gain: { resource: "infrastructure", amount: 8 }, cost: { resource: "treasury", amount: 4 } },
    boost_morale: { gain: { resource: "morale", amount: 8 }, cost: { resource: "food", amount: 2 } },
  },
  social_actions: {
    support_agent: {
      modifier: { kind: "supported", multiplier: 0.5 },
      world_effect: { resource: "morale", amount: 5 },
    },
    oppose_agent: {
      modifier: { kind: "opposed", multiplier: 1.5 },
      world_effect: { resource: "morale", amount: -3 },
    },
    send_message: {},
  },
  action_deltas: {
    support_agent: { trust: 10, resentment: -5 },
    oppose_agent: { trust: -10, resentment: 10 },
    send_message: { trust: 0, resentment: 0 },
  },
  tone_deltas: {
    friendly: { trust: 5, resentment: -2 },
    neutral: { trust: 1, resentment: 0 },
    hostile: { trust: -5, resentment: 5 },
  },
  relationship_bounds: { min: -50, max: 50 },
  modifier_lifetime_turns: 2,
};

export const DEFAULT_SETTINGS: SimulationSettings = {
  max_turns: 10,
  idle_turn_limit: 2,
  history_size: 5,
  repetition_window: 3,
  repetition_penalty: 0.05,
  decide_timeout_ms: 30_000,
  stop_on_collapse: true,
  log_level: "info",
};

/** Overrides replace whole entries; sections not named keep their defaults. */
export function resolveRules(overrides?: SimulationRulesOverrides): SimulationRules {
  if (!overrides) return structuredClone(DEFAULT_RULES);
  const base = structuredClone(DEFAULT_RULES);
  return {
    resource_actions: { ...base.resource_actions, ...overrides.resource_actions },
    social_actions: { ...base.social_actions, ...overrides.social_actions },
    action_deltas: { ...base.action_deltas, ...overrides.action_deltas },
    tone_deltas: { ...base.tone_deltas, ...overrides.tone_deltas },
    relationship_bounds: overrides.relationship_bounds ?? base.relationship_bounds,
    modifier_lifetime_turns: overrides.modifier_lifetime_turns ?? base.modifier_lifetime_turns,
  };
}

/** Builds a record keyed by every action kind, in canonical order. */
export function mapActionKinds<T>(fn: (kind: ActionKind) => T): Record<ActionKind, T> {
  return {
    improve_food: fn("improve_food"),
    improve_energy: fn("improve_energy"),
    improve_infrastructure: fn("improve_infrastructure"),
    boost_morale: fn("boost_morale"),
    support_agent: fn("support_agent"),
    oppose_agent: fn("oppose_agent"),
    send_message: fn("send_message"),
    pass: fn("pass"),
  };
}

export function mapResourceActionKinds<T>(fn: (kind: ResourceActionKind) => T): Record<ResourceActionKind, T> {
  return {
    improve_food: fn("improve_food"),
    improve_energy: fn("improve_energy"),
    improve_infrastructure: fn("improve_infrastructure"),
    boost_morale: fn("boost_morale"),
  };
}
