import type {
  ActionCost,
  ActionKind,
  ActionOutcome,
  ActionRequest,
  Affordability,
  NarrativeEntry,
  ResourceActionKind,
  ResourceName,
  SimLogger,
  SimulationRules,
  SocialActionKind,
} from "@polity/schemas";
import {
  RESOURCE_NAMES,
  isActionKind,
  isActionRequest,
  isResourceActionKind,
  validateActionRequestData,
} from "@polity/schemas";
import type { WorldState } from "./world-state.js";

export interface StepContext {
  turn: number;
  step: number;
}

export interface Resolution {
  outcome: ActionOutcome;
  entry: NarrativeEntry;
}

/** Strips decoration models tend to add around names: brackets, underscores, padding. */
export function sanitizeTarget(raw: string): string {
  return raw.replace(/[[\]]/g, "").replace(/_/g, " ").trim().replace(/\s+/g, " ");
}

function unique(matches: string[]): string | null {
  return matches.length === 1 ? matches[0] ?? null : null;
}

/**
 * Raw exact id, then raw case-insensitive id, then the same two comparisons
 * with both sides sanitized, then a unique first-word match.
 */
export function matchTarget(raw: string, agents: readonly string[]): string | null {
  const trimmed = raw.trim();
  if (trimmed === "") return null;
  if (agents.includes(trimmed)) return trimmed;
  const rawCaseless = unique(agents.filter((a) => a.toLowerCase() === trimmed.toLowerCase()));
  if (rawCaseless !== null) return rawCaseless;

  const cleaned = sanitizeTarget(raw);
  if (cleaned === "") return null;
  const exact = unique(agents.filter((a) => sanitizeTarget(a) === cleaned));
  if (exact !== null) return exact;
  const lower = cleaned.toLowerCase();
  const caseless = unique(agents.filter((a) => sanitizeTarget(a).toLowerCase() === lower));
  if (caseless !== null) return caseless;

  const firstWord = lower.split(" ")[0];
  return unique(agents.filter((a) => sanitizeTarget(a).toLowerCase().split(" ")[0] === firstWord));
}

function formatDeltas(deltas: Partial<Record<ResourceName, number>>): string {
  const parts: string[] = [];
  for (const resource of RESOURCE_NAMES) {
    const amount = deltas[resource];
    if (amount === undefined) continue;
    parts.push(`${resource} ${amount >= 0 ? "+" : ""}${amount}`);
  }
  return parts.join(", ");
}

/**
 * Validates one agent's request and applies its effects to the world. Never
 * throws for bad input: malformed, unknown, mistargeted and unaffordable
 * requests all become outcomes with no effect.
 *
 * Relationship updates are left to the caller, which fills in
 * relationship_deltas and tone on the returned entry.
 */
export class ActionResolver {
  private world: WorldState;
  private agents: readonly string[];
  private rules: SimulationRules;
  private logger: SimLogger;

  constructor(world: WorldState, agents: readonly string[], rules: SimulationRules, logger: SimLogger) {
    this.world = world;
    this.agents = agents;
    this.rules = rules;
    this.logger = logger;
  }

  resolve(actor: string, request: unknown, ctx: StepContext): Resolution {
    if (!isActionRequest(request)) {
      const problems = validateActionRequestData(request).errors.join("; ");
      return this.reject(actor, null, "", `malformed request (${problems})`, ctx);
    }
    const justification = request.justification ?? "";
    const kind = request.kind;
    if (!isActionKind(kind)) {
      return this.reject(actor, kind, justification, `unknown action "${kind}"`, ctx);
    }
    if (kind === "pass") {
      return this.finish(actor, ctx, justification, {
        status: "passed",
        requested_kind: kind,
        kind: "pass",
        target: null,
        message: null,
        cost: null,
        resource_deltas: {},
        modifier_installed: null,
        reason: null,
      }, `${actor} passes.`);
    }
    if (isResourceActionKind(kind)) {
      return this.resolveResource(actor, kind, justification, ctx);
    }
    return this.resolveSocial(actor, kind, request, ctx);
  }

  /** Outcome for a step whose decide() call failed or timed out. */
  resolveFailure(actor: string, reason: string, ctx: StepContext): Resolution {
    this.logger.error(`Decision failed for ${actor}`, { turn: ctx.turn, reason });
    return this.finish(actor, ctx, "", {
      status: "collaborator_failure",
      requested_kind: null,
      kind: "pass",
      target: null,
      message: null,
      cost: null,
      resource_deltas: {},
      modifier_installed: null,
      reason,
    }, `${actor} could not decide (${reason}) and does nothing.`);
  }

  /** Current price of a resource action for an agent, including any active modifier. */
  quote(actor: string, kind: ResourceActionKind): Affordability & { modifier: ActionCost["modifier"]; base: number } {
    const { cost } = this.rules.resource_actions[kind];
    const modifier = this.world.modifierFor(actor);
    const paid = modifier ? Math.floor(cost.amount * modifier.multiplier) : cost.amount;
    const available = this.world.get(cost.resource);
    return {
      resource: cost.resource,
      cost: paid,
      base: cost.amount,
      available,
      affordable: available >= paid,
      modifier: modifier?.kind ?? null,
    };
  }

  private resolveResource(actor: string, kind: ResourceActionKind, justification: string, ctx: StepContext): Resolution {
    const { gain } = this.rules.resource_actions[kind];
    const quote = this.quote(actor, kind);
    const cost: ActionCost = { resource: quote.resource, base: quote.base, paid: quote.cost, modifier: quote.modifier };

    if (!quote.affordable) {
      this.logger.info(`${actor} cannot afford ${kind}`, { turn: ctx.turn, needs: quote.cost, has: quote.available });
      return this.finish(actor, ctx, justification, {
        status: "unaffordable",
        requested_kind: kind,
        kind: "pass",
        target: null,
        message: null,
        cost,
        resource_deltas: {},
        modifier_installed: null,
        reason: `needs ${quote.cost} ${quote.resource}, has ${quote.available}`,
      }, `${actor} cannot afford ${kind} (needs ${quote.cost} ${quote.resource}, has ${quote.available}) and passes.`);
    }

    const deltas: Partial<Record<ResourceName, number>> = {};
    const paid = this.world.applyDelta(quote.resource, -quote.cost);
    deltas[quote.resource] = paid;
    const gained = this.world.applyDelta(gain.resource, gain.amount);
    deltas[gain.resource] = (deltas[gain.resource] ?? 0) + gained;
    const consumed = this.world.consumeModifier(actor);

    const modifierNote = consumed ? ` (${consumed.kind} by ${consumed.granted_by}, cost x${consumed.multiplier})` : "";
    return this.finish(actor, ctx, justification, {
      status: "applied",
      requested_kind: kind,
      kind,
      target: null,
      message: null,
      cost,
      resource_deltas: deltas,
      modifier_installed: null,
      reason: null,
    }, `${actor} chose ${kind}: ${formatDeltas(deltas)}${modifierNote}.`);
  }

  private resolveSocial(actor: string, kind: SocialActionKind, request: ActionRequest, ctx: StepContext): Resolution {
    const justification = request.justification ?? "";
    if (typeof request.target !== "string" || request.target.trim() === "") {
      return this.reject(actor, kind, justification, `${kind} requires a target`, ctx);
    }
    const target = matchTarget(request.target, this.agents);
    if (target === null) {
      return this.reject(actor, kind, justification, `unknown target "${request.target}"`, ctx);
    }
    if (target === actor) {
      return this.reject(actor, kind, justification, `${kind} cannot target oneself`, ctx);
    }

    const message = typeof request.message === "string" && request.message.trim() !== ""
      ? request.message.trim()
      : null;
    if (kind === "send_message" && message === null) {
      return this.reject(actor, kind, justification, "send_message requires a non-empty message", ctx);
    }

    const rule = this.rules.social_actions[kind];
    const deltas: Partial<Record<ResourceName, number>> = {};
    if (rule.world_effect) {
      deltas[rule.world_effect.resource] = this.world.applyDelta(rule.world_effect.resource, rule.world_effect.amount);
    }
    let installed: ActionOutcome["modifier_installed"] = null;
    if (rule.modifier) {
      const modifier = this.world.installModifier(
        target,
        rule.modifier.kind,
        rule.modifier.multiplier,
        actor,
        this.rules.modifier_lifetime_turns,
      );
      installed = { ...modifier, target };
    }

    let text: string;
    if (kind === "send_message") {
      text = `${actor} messages ${target}: "${message}"`;
    } else {
      const verb = kind === "support_agent" ? "supports" : "opposes";
      const effects = formatDeltas(deltas);
      text = `${actor} ${verb} ${target}${effects ? ` (${effects})` : ""}.`;
      if (message !== null) text += ` ${actor} tells ${target}: "${message}"`;
    }

    return this.finish(actor, ctx, justification, {
      status: "applied",
      requested_kind: kind,
      kind,
      target,
      message,
      cost: null,
      resource_deltas: deltas,
      modifier_installed: installed,
      reason: null,
    }, text);
  }

  private reject(
    actor: string,
    requestedKind: string | null,
    justification: string,
    reason: string,
    ctx: StepContext,
  ): Resolution {
    this.logger.warn(`Rejected request from ${actor}: ${reason}`, { turn: ctx.turn, requested_kind: requestedKind });
    return this.finish(actor, ctx, justification, {
      status: "invalid_request",
      requested_kind: requestedKind,
      kind: "pass",
      target: null,
      message: null,
      cost: null,
      resource_deltas: {},
      modifier_installed: null,
      reason,
    }, `${actor}'s request was rejected (${reason}); no effect.`);
  }

  private finish(
    actor: string,
    ctx: StepContext,
    justification: string,
    outcome: ActionOutcome,
    text: string,
  ): Resolution {
    const kind: ActionKind = outcome.kind;
    const entry: NarrativeEntry = {
      turn: ctx.turn,
      step: ctx.step,
      actor,
      requested_kind: outcome.requested_kind,
      kind,
      target: outcome.target,
      status: outcome.status,
      resource_deltas: { ...outcome.resource_deltas },
      relationship_deltas: [],
      message: outcome.message,
      tone: null,
      justification,
      text,
    };
    return { outcome, entry };
  }
}
