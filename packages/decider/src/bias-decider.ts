import type { ActionKind, ActionRequest, Decider, Observation, SimulationRules } from "@polity/schemas";
import { isSocialActionKind } from "@polity/schemas";
import { DEFAULT_RULES, pickTarget, rankActions, scoreActions } from "@polity/engine";

const MESSAGES: Record<"support_agent" | "oppose_agent" | "send_message", (target: string) => string> = {
  support_agent: (target) => `Thank you, ${target}. Let's keep working together.`,
  oppose_agent: (target) => `You have been selfish, ${target}.`,
  send_message: (target) => `${target}, can we share the load this turn?`,
};

/**
 * Deterministic stand-in for a reasoning model. Each action's score is scaled
 * by the agent's repetition weight for it and the highest product wins; ties
 * keep the ranking order.
 */
export class BiasDecider implements Decider {
  private rules: Pick<SimulationRules, "resource_actions">;

  constructor(rules: Pick<SimulationRules, "resource_actions"> = DEFAULT_RULES) {
    this.rules = rules;
  }

  async decide(observation: Observation): Promise<ActionRequest> {
    const ranked = rankActions(scoreActions(observation, this.rules), observation.repetition_penalties);
    let choice = ranked[0];
    for (const candidate of ranked) {
      if (choice === undefined || candidate.score * candidate.penalty > choice.score * choice.penalty) {
        choice = candidate;
      }
    }
    if (choice === undefined) return { kind: "pass", justification: "Nothing worth doing" };
    return this.toRequest(observation, choice.kind, choice.score);
  }

  private toRequest(observation: Observation, kind: ActionKind, score: number): ActionRequest {
    const justification = `Highest-scoring option (${score})`;
    if (!isSocialActionKind(kind)) return { kind, justification };
    const target = pickTarget(observation, kind);
    if (target === null) return { kind: "pass", justification: "No one to address" };
    return { kind, target, message: MESSAGES[kind](target), justification };
  }
}
