const RESOURCE_ENUM = ["food", "energy", "infrastructure", "morale", "treasury"];

const ResourceAmountSchema = (minimum?: number) => ({
  type: "object",
  required: ["resource", "amount"],
  properties: {
    resource: { type: "string", enum: RESOURCE_ENUM },
    amount: minimum === undefined ? { type: "integer" } : { type: "integer", minimum },
  },
  additionalProperties: false,
});

const ResourceActionRuleSchema = {
  type: "object",
  required: ["gain", "cost"],
  properties: {
    gain: ResourceAmountSchema(1),
    cost: ResourceAmountSchema(0),
  },
  additionalProperties: false,
};

const SocialActionRuleSchema = {
  type: "object",
  properties: {
    modifier: {
      type: "object",
      required: ["kind", "multiplier"],
      properties: {
        kind: { type: "string", enum: ["supported", "opposed"] },
        multiplier: { type: "number", exclusiveMinimum: 0 },
      },
      additionalProperties: false,
    },
    world_effect: ResourceAmountSchema(),
  },
  additionalProperties: false,
};

const DeltaRuleSchema = {
  type: "object",
  required: ["trust", "resentment"],
  properties: {
    trust: { type: "integer" },
    resentment: { type: "integer" },
  },
  additionalProperties: false,
};

export const ResourceLevelsSchema = {
  type: "object",
  required: RESOURCE_ENUM,
  properties: Object.fromEntries(RESOURCE_ENUM.map((r) => [r, { type: "integer", minimum: 0 }])),
  additionalProperties: false,
};

export const SimulationRulesSchema = {
  type: "object",
  properties: {
    resource_actions: {
      type: "object",
      properties: {
        improve_food: ResourceActionRuleSchema,
        improve_energy: ResourceActionRuleSchema,
        improve_infrastructure: ResourceActionRuleSchema,
        boost_morale: ResourceActionRuleSchema,
      },
      additionalProperties: false,
    },
    social_actions: {
      type: "object",
      properties: {
        support_agent: SocialActionRuleSchema,
        oppose_agent: SocialActionRuleSchema,
        send_message: SocialActionRuleSchema,
      },
      additionalProperties: false,
    },
    action_deltas: {
      type: "object",
      propertyNames: {
        enum: [
          "improve_food", "improve_energy", "improve_infrastructure", "boost_morale",
          "support_agent", "oppose_agent", "send_message", "pass",
        ],
      },
      additionalProperties: DeltaRuleSchema,
    },
    tone_deltas: {
      type: "object",
      properties: {
        friendly: DeltaRuleSchema,
        neutral: DeltaRuleSchema,
        hostile: DeltaRuleSchema,
      },
      additionalProperties: false,
    },
    relationship_bounds: {
      type: "object",
      required: ["min", "max"],
      properties: {
        min: { type: "integer", maximum: 0 },
        max: { type: "integer", minimum: 0 },
      },
      additionalProperties: false,
    },
    modifier_lifetime_turns: { type: "integer", minimum: 1 },
  },
  additionalProperties: false,
};

export const SimulationConfigSchema = {
  type: "object",
  required: ["simulation", "world", "agents"],
  properties: {
    simulation: {
      type: "object",
      required: [
        "max_turns", "idle_turn_limit", "history_size", "repetition_window",
        "repetition_penalty", "decide_timeout_ms", "stop_on_collapse", "log_level",
      ],
      properties: {
        max_turns: { type: "integer", minimum: 1 },
        idle_turn_limit: { type: "integer", minimum: 1 },
        history_size: { type: "integer", minimum: 3, maximum: 5 },
        repetition_window: { type: "integer", minimum: 2, maximum: 5 },
        repetition_penalty: { type: "number", exclusiveMinimum: 0, maximum: 1 },
        decide_timeout_ms: { type: "integer", minimum: 0 },
        stop_on_collapse: { type: "boolean" },
        log_level: { type: "string", enum: ["debug", "info", "warn", "error"] },
      },
      additionalProperties: false,
    },
    world: ResourceLevelsSchema,
    rules: SimulationRulesSchema,
    agents: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["id"],
        properties: {
          id: { type: "string", minLength: 1, pattern: "\\S" },
          persona: {
            type: "object",
            properties: {
              description: { type: "string" },
              goals: { type: "array", items: { type: "string" } },
              traits: { type: "array", items: { type: "string" } },
              voice: { type: "string" },
            },
            additionalProperties: false,
          },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
};
