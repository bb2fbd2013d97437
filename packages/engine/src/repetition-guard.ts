import type { ActionKind } from "@polity/schemas";
import { mapActionKinds } from "./rules.js";

export interface RepetitionGuardConfig {
  /** Ring size per agent (3-5). */
  historySize?: number;
  /** Consecutive identical kinds that trigger the penalty. */
  window?: number;
  /** Multiplier reported for a penalized kind, in (0, 1]. */
  penalty?: number;
}

/**
 * Tracks each agent's recently resolved action kinds and reports a near-zero
 * weight for a kind that filled the whole recent window. Advisory only: the
 * value is surfaced in observations and used as a ranking tie-break, never to
 * block an action.
 */
export class RepetitionGuard {
  private historySize: number;
  private window: number;
  private penalty: number;
  private history = new Map<string, ActionKind[]>();

  constructor(config?: RepetitionGuardConfig) {
    this.historySize = config?.historySize ?? 5;
    this.window = config?.window ?? 3;
    this.penalty = config?.penalty ?? 0.05;
    if (this.window > this.historySize) {
      throw new RangeError(`Repetition window (${this.window}) exceeds history size (${this.historySize})`);
    }
  }

  record(agent: string, kind: ActionKind): void {
    const ring = this.history.get(agent) ?? [];
    ring.push(kind);
    if (ring.length > this.historySize) ring.shift();
    this.history.set(agent, ring);
  }

  recent(agent: string): ActionKind[] {
    return [...(this.history.get(agent) ?? [])];
  }

  penaltyFor(agent: string, kind: ActionKind): number {
    const ring = this.history.get(agent) ?? [];
    if (ring.length < this.window) return 1.0;
    const recent = ring.slice(-this.window);
    return recent.every((k) => k === kind) ? this.penalty : 1.0;
  }

  penalties(agent: string): Record<ActionKind, number> {
    return mapActionKinds((kind) => this.penaltyFor(agent, kind));
  }
}
