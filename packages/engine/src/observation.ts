import type {
  Interaction,
  NarrativeEntry,
  Observation,
  PendingMessage,
  Persona,
} from "@polity/schemas";
import { isSocialActionKind } from "@polity/schemas";
import type { ActionResolver } from "./action-resolver.js";
import type { RelationshipLedger } from "./relationships.js";
import type { RepetitionGuard } from "./repetition-guard.js";
import type { WorldState } from "./world-state.js";
import { mapResourceActionKinds } from "./rules.js";

export interface ObservationSources {
  runId: string;
  agents: readonly string[];
  world: WorldState;
  ledger: RelationshipLedger;
  guard: RepetitionGuard;
  resolver: ActionResolver;
  narrative: readonly NarrativeEntry[];
}

/** Social actions aimed at the agent during this turn and the previous one. */
export function recentInteractions(agent: string, turn: number, narrative: readonly NarrativeEntry[]): Interaction[] {
  const interactions: Interaction[] = [];
  for (const entry of narrative) {
    if (entry.turn < turn - 1 || entry.target !== agent || entry.status !== "applied") continue;
    if (!isSocialActionKind(entry.kind)) continue;
    interactions.push({ turn: entry.turn, actor: entry.actor, kind: entry.kind, message: entry.message });
  }
  return interactions;
}

export function buildObservation(
  sources: ObservationSources,
  agent: string,
  persona: Persona | null,
  pendingMessages: PendingMessage[],
): Observation {
  const { world, ledger, guard, resolver, agents } = sources;
  const others = agents.filter((a) => a !== agent);
  return {
    run_id: sources.runId,
    turn: world.turn,
    agent,
    persona,
    world: world.snapshot(),
    relationships: ledger.viewOf(agent, others),
    recent_actions: guard.recent(agent),
    repetition_penalties: guard.penalties(agent),
    pending_messages: pendingMessages.map((m) => ({ ...m })),
    recent_interactions: recentInteractions(agent, world.turn, sources.narrative),
    affordability: mapResourceActionKinds((kind) => {
      const { resource, cost, available, affordable } = resolver.quote(agent, kind);
      return { resource, cost, available, affordable };
    }),
    active_modifier: world.modifierFor(agent),
    valid_targets: others,
    resource_history: world.resourceHistory(),
  };
}
