export const ActionRequestSchema = {
  type: "object",
  required: ["kind"],
  properties: {
    kind: { type: "string", minLength: 1 },
    target: { type: ["string", "null"] },
    message: { type: ["string", "null"] },
    justification: { type: "string" },
  },
} as const;
