// Pure formatting functions for the console narrative, zero side effects.
import type {
  JournalEvent,
  NarrativeEntry,
  OutcomeStatus,
  RelationshipRecord,
  SimulationResult,
  WorldSnapshot,
} from "@polity/schemas";

// ANSI color helpers
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const MAX_PAYLOAD_LEN = 400;

export function colorForStatus(status: OutcomeStatus): (s: string) => string {
  switch (status) {
    case "applied": return green;
    case "passed": return dim;
    case "collaborator_failure": return red;
    default: return yellow;
  }
}

export function colorForType(type: string): (s: string) => string {
  if (type === "simulation.terminated" || type === "action.resolved") return green;
  if (type.includes("failed") || type.includes("rejected")) return red;
  if (type.includes("expired")) return yellow;
  return cyan;
}

export function truncate(s: string, max: number): string {
  return s.length > max ? `${s.slice(0, max)}... (${s.length} chars total)` : s;
}

export function formatTurnHeader(turn: number): string {
  return bold(`=== Turn ${turn} ===`);
}

export function formatWorld(world: WorldSnapshot): string {
  return `TREASURY=${world.treasury}  FOOD=${world.food}  ENERGY=${world.energy}  INFRA=${world.infrastructure}  MORALE=${world.morale}  CRISIS=${world.crisis_level}`;
}

export function formatEntry(entry: NarrativeEntry, opts: { justification?: boolean } = {}): string {
  const line = colorForStatus(entry.status)(entry.text);
  if (opts.justification && entry.justification) {
    return `${line}\n  ${dim(entry.justification)}`;
  }
  return line;
}

export function formatRelationship(record: RelationshipRecord): string {
  const score = record.score > 0 ? `+${record.score}` : String(record.score);
  return `${record.observer} -> ${record.subject}: trust ${record.trust}, resentment ${record.resentment} (${score})`;
}

export function formatSummary(result: SimulationResult): string {
  const lines = [
    bold(`Run ${result.run_id} ended after ${result.turns} turn${result.turns === 1 ? "" : "s"} (${result.reason})`),
    formatWorld(result.world),
  ];
  if (result.relationships.length > 0) {
    lines.push("Relationships:");
    for (const record of result.relationships) lines.push(`  ${formatRelationship(record)}`);
  }
  return lines.join("\n");
}

/** One journal event per line for `replay`. */
export function formatEvent(event: JournalEvent): string {
  const ts = event.timestamp.split("T")[1]?.slice(0, 12) ?? "";
  const seq = event.seq !== undefined ? `#${event.seq} ` : "";
  const head = `${dim(`${seq}${ts}`)} ${colorForType(event.type)(event.type)}`;
  const text = event.payload.text;
  if (typeof text === "string") return `${head} ${text}`;
  if (Object.keys(event.payload).length === 0) return head;
  return `${head} ${dim(truncate(JSON.stringify(event.payload), MAX_PAYLOAD_LEN))}`;
}
