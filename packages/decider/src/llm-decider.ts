import type { ActionRequest, Decider, Observation, SimLogger } from "@polity/schemas";
import { buildSystemPrompt, buildUserPrompt } from "./prompt.js";

export interface ModelCallResult {
  text: string;
  usage?: { input_tokens: number; output_tokens: number };
}

export type ModelCallFn = (systemPrompt: string, userPrompt: string) => Promise<ModelCallResult>;

const MAX_RESPONSE_SIZE = 100_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstString(record: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string") return value;
  }
  return undefined;
}

/**
 * Reads a model reply into an ActionRequest. Accepts the field names models
 * commonly drift to (type, reasoning, content). Throws on anything that is not
 * a JSON object with a kind.
 */
export function parseActionResponse(raw: string): ActionRequest {
  if (raw.length > MAX_RESPONSE_SIZE) {
    throw new Error(`Decider response too large: ${raw.length} characters (max ${MAX_RESPONSE_SIZE})`);
  }
  let jsonStr = raw.trim();
  if (jsonStr.startsWith("```")) {
    jsonStr = jsonStr.replace(/^```(?:json)?\n?/, "").replace(/\n?```$/, "");
  }
  let parsed: unknown;
  try { parsed = JSON.parse(jsonStr); }
  catch { throw new Error(`Decider returned invalid JSON: ${jsonStr.slice(0, 200)}`); }
  if (!isRecord(parsed)) {
    throw new Error("Decider returned JSON that is not an object");
  }

  const kind = firstString(parsed, ["kind", "type", "action"]);
  if (kind === undefined || kind.trim() === "") {
    throw new Error("Decider response has no action kind");
  }
  const request: ActionRequest = { kind: kind.trim() };

  const target = parsed.target;
  // "world" is how models say "no target" for resource actions
  if (typeof target === "string" && target.trim().toLowerCase() !== "world") request.target = target;
  else if (target === null) request.target = null;

  const message = firstString(parsed, ["message", "content"]);
  if (message !== undefined) request.message = message;

  const justification = firstString(parsed, ["justification", "reasoning", "reason"]);
  if (justification !== undefined) request.justification = justification;

  return request;
}

export class LLMDecider implements Decider {
  private callModel: ModelCallFn;
  private systemPrompt: string;
  private logger: SimLogger | undefined;

  constructor(callModel: ModelCallFn, logger?: SimLogger) {
    this.callModel = callModel;
    this.systemPrompt = buildSystemPrompt();
    this.logger = logger;
  }

  async decide(observation: Observation): Promise<ActionRequest> {
    const { text, usage } = await this.callModel(this.systemPrompt, buildUserPrompt(observation));
    if (usage) {
      this.logger?.debug("Model usage", { agent: observation.agent, turn: observation.turn, ...usage });
    }
    return parseActionResponse(text);
  }
}
