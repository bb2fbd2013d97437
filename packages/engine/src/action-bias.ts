import type { ActionKind, Observation, RelationshipView, SimulationRules } from "@polity/schemas";
import { ACTION_KINDS, isResourceActionKind } from "@polity/schemas";
import { DEFAULT_RULES, mapActionKinds } from "./rules.js";

export type ActionScores = Record<ActionKind, number>;

export interface RankedAction {
  kind: ActionKind;
  score: number;
  penalty: number;
}

const SOCIAL_BASE = 20;
const MESSAGE_BASE = 10;
const PASS_SCORE = 1;

/**
 * Base desirability of each action from two signals: how low the resource an
 * action raises is, and how warm or cold the agent's relationships are.
 * Repetition penalties are not folded in here.
 */
export function scoreActions(observation: Observation, rules: Pick<SimulationRules, "resource_actions"> = DEFAULT_RULES): ActionScores {
  const relationships = observation.relationships;
  const hasTargets = observation.valid_targets.length > 0;
  const warmest = relationships.reduce((max, r) => Math.max(max, r.score), 0);
  const coldest = relationships.reduce((min, r) => Math.min(min, r.score), 0);
  const mixed = relationships.some((r) => r.trust > 0 && r.resentment > 0);

  return mapActionKinds((kind) => {
    if (isResourceActionKind(kind)) {
      if (!observation.affordability[kind].affordable) return 0;
      const level = observation.world[rules.resource_actions[kind].gain.resource];
      return Math.max(0, 100 - level);
    }
    switch (kind) {
      case "support_agent":
        return hasTargets && warmest > 0 ? SOCIAL_BASE + warmest : 0;
      case "oppose_agent":
        return hasTargets && coldest < 0 ? SOCIAL_BASE - coldest : 0;
      case "send_message":
        if (!hasTargets) return 0;
        return MESSAGE_BASE + observation.pending_messages.length * 5 + (mixed ? 5 : 0);
      default:
        return PASS_SCORE;
    }
  });
}

/**
 * Orders candidates by score. Exact ties go to the less penalized kind, then
 * to the canonical action order.
 */
export function rankActions(scores: ActionScores, penalties: Record<ActionKind, number>): RankedAction[] {
  return ACTION_KINDS
    .map((kind, index) => ({ kind, score: scores[kind], penalty: penalties[kind], index }))
    .sort((a, b) => b.score - a.score || b.penalty - a.penalty || a.index - b.index)
    .map(({ kind, score, penalty }) => ({ kind, score, penalty }));
}

function byName(a: RelationshipView, b: RelationshipView): number {
  return a.subject < b.subject ? -1 : a.subject > b.subject ? 1 : 0;
}

/**
 * Target for a social action: warmest for support, coldest for opposition,
 * for messages the first unanswered sender or else the most intense relation.
 */
export function pickTarget(observation: Observation, kind: ActionKind): string | null {
  const candidates = [...observation.relationships].sort(byName);
  if (candidates.length === 0) return null;
  switch (kind) {
    case "support_agent":
      return candidates.reduce((best, r) => (r.score > best.score ? r : best)).subject;
    case "oppose_agent":
      return candidates.reduce((best, r) => (r.score < best.score ? r : best)).subject;
    case "send_message": {
      const sender = observation.pending_messages.find((m) => observation.valid_targets.includes(m.from));
      if (sender) return sender.from;
      return candidates.reduce((best, r) => (Math.abs(r.score) > Math.abs(best.score) ? r : best)).subject;
    }
    default:
      return null;
  }
}
