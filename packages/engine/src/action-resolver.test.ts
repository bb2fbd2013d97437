import { describe, it, expect, vi } from "vitest";
import type { ResourceLevels, SimLogger } from "@polity/schemas";
import { ActionResolver, matchTarget, sanitizeTarget } from "./action-resolver.js";
import { WorldState } from "./world-state.js";
import { resolveRules } from "./rules.js";

const AGENTS = ["Ada", "Bram", "Cyd"];
const ctx = { turn: 1, step: 0 };

function makeLogger(): SimLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function makeResolver(levels: Partial<ResourceLevels> = {}) {
  const world = new WorldState({ food: 50, energy: 50, infrastructure: 50, morale: 50, treasury: 50, ...levels });
  const logger = makeLogger();
  const resolver = new ActionResolver(world, AGENTS, resolveRules(), logger);
  return { world, logger, resolver };
}

describe("sanitizeTarget / matchTarget", () => {
  it("strips brackets and underscores", () => {
    expect(sanitizeTarget("  [Bram_Stone]  ")).toBe("Bram Stone");
  });

  it("matches exact, case-insensitive and unique first-word names", () => {
    expect(matchTarget("Bram", AGENTS)).toBe("Bram");
    expect(matchTarget("[bram]", AGENTS)).toBe("Bram");
    expect(matchTarget("Cyd_the_Miller", AGENTS)).toBe("Cyd");
    expect(matchTarget("Dora", AGENTS)).toBeNull();
    expect(matchTarget("[]", AGENTS)).toBeNull();
  });

  it("matches ids that contain underscores", () => {
    const ids = ["agent_a", "agent_b"];
    expect(matchTarget("agent_b", ids)).toBe("agent_b");
    expect(matchTarget("AGENT_B", ids)).toBe("agent_b");
    expect(matchTarget("[agent_b]", ids)).toBe("agent_b");
    expect(matchTarget("agent b", ids)).toBe("agent_b");
    expect(matchTarget("agent", ids)).toBeNull();
  });

  it("applies a social action aimed at an underscored id", () => {
    const world = new WorldState({ food: 50, energy: 50, infrastructure: 50, morale: 50, treasury: 50 });
    const resolver = new ActionResolver(world, ["agent_a", "agent_b"], resolveRules(), makeLogger());
    const { outcome } = resolver.resolve("agent_a", { kind: "support_agent", target: "agent_b" }, ctx);
    expect(outcome.status).toBe("applied");
    expect(outcome.kind).toBe("support_agent");
    expect(outcome.target).toBe("agent_b");
  });

  it("refuses an ambiguous first word", () => {
    expect(matchTarget("Ada", ["Ada Lovelace", "Ada King"])).toBeNull();
    expect(matchTarget("ada king", ["Ada Lovelace", "Ada King"])).toBe("Ada King");
  });
});

describe("ActionResolver", () => {
  // ─── Resource actions ─────────────────────────────────────────────

  it("applies gain and cost for a resource action", () => {
    const { world, resolver } = makeResolver();
    const { outcome, entry } = resolver.resolve("Ada", { kind: "improve_food", justification: "granary is low" }, ctx);
    expect(outcome.status).toBe("applied");
    expect(outcome.resource_deltas).toEqual({ energy: -3, food: 8 });
    expect(outcome.cost).toEqual({ resource: "energy", base: 3, paid: 3, modifier: null });
    expect(world.get("food")).toBe(58);
    expect(world.get("energy")).toBe(47);
    expect(entry.text).toBe("Ada chose improve_food: food +8, energy -3.");
    expect(entry.justification).toBe("granary is low");
  });

  it("records an unaffordable action as a pass with no effect", () => {
    const { world, resolver } = makeResolver({ energy: 2 });
    const { outcome, entry } = resolver.resolve("Ada", { kind: "improve_food" }, ctx);
    expect(outcome.status).toBe("unaffordable");
    expect(outcome.kind).toBe("pass");
    expect(outcome.requested_kind).toBe("improve_food");
    expect(world.get("energy")).toBe(2);
    expect(world.get("food")).toBe(50);
    expect(entry.text).toBe("Ada cannot afford improve_food (needs 3 energy, has 2) and passes.");
  });

  it("ignores a target on a resource action", () => {
    const { resolver } = makeResolver();
    const { outcome } = resolver.resolve("Ada", { kind: "boost_morale", target: "Bram" }, ctx);
    expect(outcome.target).toBeNull();
    expect(outcome.resource_deltas).toEqual({ food: -2, morale: 8 });
  });

  // ─── Cost modifiers ───────────────────────────────────────────────

  it("halves a supported agent's next cost and consumes the modifier", () => {
    const { world, resolver } = makeResolver();
    resolver.resolve("Ada", { kind: "support_agent", target: "Bram" }, ctx);
    const { outcome } = resolver.resolve("Bram", { kind: "improve_food" }, { turn: 1, step: 1 });
    expect(outcome.cost).toEqual({ resource: "energy", base: 3, paid: 1, modifier: "supported" });
    expect(world.get("energy")).toBe(49);
    expect(world.modifierFor("Bram")).toBeNull();
  });

  it("raises an opposed agent's cost, rounding down", () => {
    const { world, resolver } = makeResolver();
    resolver.resolve("Ada", { kind: "oppose_agent", target: "Bram" }, ctx);
    const { outcome } = resolver.resolve("Bram", { kind: "improve_infrastructure" }, ctx);
    expect(outcome.cost?.paid).toBe(6);
    expect(world.get("treasury")).toBe(44);
  });

  it("keeps the modifier when the discounted action is still unaffordable", () => {
    const { world, resolver } = makeResolver({ energy: 0 });
    resolver.resolve("Ada", { kind: "support_agent", target: "Bram" }, ctx);
    const { outcome } = resolver.resolve("Bram", { kind: "improve_food" }, ctx);
    expect(outcome.status).toBe("unaffordable");
    expect(world.modifierFor("Bram")?.kind).toBe("supported");
  });

  it("quotes affordability with the active modifier", () => {
    const { resolver } = makeResolver({ treasury: 5 });
    resolver.resolve("Ada", { kind: "oppose_agent", target: "Bram" }, ctx);
    expect(resolver.quote("Bram", "improve_energy")).toEqual({
      resource: "treasury", cost: 4, base: 3, available: 5, affordable: true, modifier: "opposed",
    });
    expect(resolver.quote("Bram", "improve_infrastructure").affordable).toBe(false);
  });

  // ─── Social actions ───────────────────────────────────────────────

  it("supports another agent with a morale effect and modifier", () => {
    const { world, resolver } = makeResolver();
    const { outcome, entry } = resolver.resolve("Ada", { kind: "support_agent", target: "[bram]" }, ctx);
    expect(outcome.status).toBe("applied");
    expect(outcome.target).toBe("Bram");
    expect(outcome.resource_deltas).toEqual({ morale: 5 });
    expect(outcome.modifier_installed).toEqual({
      kind: "supported", multiplier: 0.5, remaining_turns: 2, granted_by: "Ada", target: "Bram",
    });
    expect(world.get("morale")).toBe(55);
    expect(entry.text).toBe("Ada supports Bram (morale +5).");
  });

  it("clamps the morale loss of opposition at zero", () => {
    const { world, resolver } = makeResolver({ morale: 1 });
    const { outcome } = resolver.resolve("Ada", { kind: "oppose_agent", target: "Cyd" }, ctx);
    expect(outcome.resource_deltas).toEqual({ morale: -1 });
    expect(world.get("morale")).toBe(0);
  });

  it("carries a message on a social action", () => {
    const { resolver } = makeResolver();
    const { outcome, entry } = resolver.resolve("Ada", { kind: "send_message", target: "Cyd", message: "  Meet at the mill  " }, ctx);
    expect(outcome.message).toBe("Meet at the mill");
    expect(outcome.resource_deltas).toEqual({});
    expect(outcome.modifier_installed).toBeNull();
    expect(entry.text).toBe('Ada messages Cyd: "Meet at the mill"');
  });

  // ─── Rejections ───────────────────────────────────────────────────

  it("rejects unknown action kinds", () => {
    const { logger, resolver } = makeResolver();
    const { outcome, entry } = resolver.resolve("Ada", { kind: "sabotage" }, ctx);
    expect(outcome.status).toBe("invalid_request");
    expect(outcome.kind).toBe("pass");
    expect(outcome.reason).toBe('unknown action "sabotage"');
    expect(entry.text).toBe(`Ada's request was rejected (unknown action "sabotage"); no effect.`);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("rejects malformed requests", () => {
    const { resolver } = makeResolver();
    expect(resolver.resolve("Ada", { target: "Bram" }, ctx).outcome).toMatchObject({
      status: "invalid_request",
      requested_kind: null,
      reason: "malformed request (/: must have required property 'kind')",
    });
    expect(resolver.resolve("Ada", null, ctx).outcome.status).toBe("invalid_request");
    expect(resolver.resolve("Ada", "pass", ctx).outcome.status).toBe("invalid_request");
  });

  it("rejects self-targeting", () => {
    const { world, resolver } = makeResolver();
    const { outcome } = resolver.resolve("Ada", { kind: "support_agent", target: "ada" }, ctx);
    expect(outcome.reason).toBe("support_agent cannot target oneself");
    expect(world.get("morale")).toBe(50);
    expect(world.modifierFor("Ada")).toBeNull();
  });

  it("rejects missing and unknown targets", () => {
    const { resolver } = makeResolver();
    expect(resolver.resolve("Ada", { kind: "oppose_agent" }, ctx).outcome.reason).toBe("oppose_agent requires a target");
    expect(resolver.resolve("Ada", { kind: "oppose_agent", target: "Dora" }, ctx).outcome.reason).toBe('unknown target "Dora"');
  });

  it("rejects an empty message", () => {
    const { resolver } = makeResolver();
    const { outcome } = resolver.resolve("Ada", { kind: "send_message", target: "Bram", message: "   " }, ctx);
    expect(outcome.reason).toBe("send_message requires a non-empty message");
  });

  it("passes explicitly", () => {
    const { resolver } = makeResolver();
    const { outcome, entry } = resolver.resolve("Ada", { kind: "pass" }, ctx);
    expect(outcome.status).toBe("passed");
    expect(entry.text).toBe("Ada passes.");
  });

  it("turns a decider failure into a no-op outcome", () => {
    const { logger, resolver } = makeResolver();
    const { outcome, entry } = resolver.resolveFailure("Ada", "decide(Ada) timed out after 20ms", { turn: 3, step: 0 });
    expect(outcome).toMatchObject({ status: "collaborator_failure", kind: "pass", requested_kind: null });
    expect(entry.turn).toBe(3);
    expect(logger.error).toHaveBeenCalledWith("Decision failed for Ada", { turn: 3, reason: "decide(Ada) timed out after 20ms" });
  });
});
