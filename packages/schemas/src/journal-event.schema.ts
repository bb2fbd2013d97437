export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "run_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    run_id: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "simulation.created", "simulation.started", "simulation.terminated",
        "turn.started", "turn.ended",
        "decision.received", "decision.failed",
        "action.resolved", "action.rejected",
        "relationship.updated", "message.delivered", "modifier.expired",
      ],
    },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
