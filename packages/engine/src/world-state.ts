import type {
  CostModifier,
  ModifierKind,
  ResourceLevels,
  ResourceName,
  WorldSnapshot,
} from "@polity/schemas";
import { RESOURCE_NAMES } from "@polity/schemas";

const MAX_RESOURCE_HISTORY = 4;

/**
 * The shared world: five non-negative integer resources, the derived crisis
 * level, the turn counter and per-agent cost modifiers.
 *
 * crisis_level is only refreshed by recomputeDerived(), which the turn
 * controller calls at init and at each turn end. Mid-turn reads see the value
 * from the end of the previous turn.
 */
export class WorldState {
  private levels: ResourceLevels;
  private crisisLevel = 0;
  private currentTurn = 0;
  private modifiers = new Map<string, CostModifier>();
  private history: ResourceLevels[] = [];

  constructor(initial: ResourceLevels) {
    for (const name of RESOURCE_NAMES) {
      const value = initial[name];
      if (!Number.isInteger(value) || value < 0) {
        throw new RangeError(`Initial ${name} must be a non-negative integer, got ${value}`);
      }
    }
    this.levels = { ...initial };
  }

  get turn(): number {
    return this.currentTurn;
  }

  get crisis(): number {
    return this.crisisLevel;
  }

  get(resource: ResourceName): number {
    return this.levels[resource];
  }

  /** Applies a signed delta, flooring the result at 0. Returns the delta actually applied. */
  applyDelta(resource: ResourceName, amount: number): number {
    if (!Number.isInteger(amount)) {
      throw new RangeError(`Resource delta must be an integer, got ${amount}`);
    }
    const before = this.levels[resource];
    const after = Math.max(0, before + amount);
    this.levels[resource] = after;
    return after - before;
  }

  recomputeDerived(): number {
    const sum = RESOURCE_NAMES.reduce((acc, name) => acc + this.levels[name], 0);
    this.crisisLevel = Math.min(100, Math.max(0, 100 - Math.floor(sum / 5)));
    return this.crisisLevel;
  }

  /** Starts the next turn and records the turn-start resource levels. */
  advanceTurn(): number {
    this.currentTurn += 1;
    this.history.push({ ...this.levels });
    if (this.history.length > MAX_RESOURCE_HISTORY) this.history.shift();
    return this.currentTurn;
  }

  resourceHistory(): ResourceLevels[] {
    return this.history.map((levels) => ({ ...levels }));
  }

  // ─── Cost modifiers ───────────────────────────────────────────────

  /** Installs a modifier on target, replacing any existing one. */
  installModifier(
    target: string,
    kind: ModifierKind,
    multiplier: number,
    grantedBy: string,
    lifetimeTurns: number,
  ): CostModifier {
    const modifier: CostModifier = { kind, multiplier, remaining_turns: lifetimeTurns, granted_by: grantedBy };
    this.modifiers.set(target, modifier);
    return { ...modifier };
  }

  modifierFor(agent: string): CostModifier | null {
    const modifier = this.modifiers.get(agent);
    return modifier ? { ...modifier } : null;
  }

  consumeModifier(agent: string): CostModifier | null {
    const modifier = this.modifiers.get(agent);
    if (!modifier) return null;
    this.modifiers.delete(agent);
    return modifier;
  }

  /** Ages every modifier by one turn. Returns the agents whose modifier expired. */
  tickModifiers(): string[] {
    const expired: string[] = [];
    for (const [agent, modifier] of this.modifiers) {
      modifier.remaining_turns -= 1;
      if (modifier.remaining_turns <= 0) expired.push(agent);
    }
    for (const agent of expired) this.modifiers.delete(agent);
    return expired.sort();
  }

  snapshot(): WorldSnapshot {
    const costModifiers: Record<string, CostModifier> = {};
    for (const agent of [...this.modifiers.keys()].sort()) {
      const modifier = this.modifiers.get(agent);
      if (modifier) costModifiers[agent] = { ...modifier };
    }
    return {
      ...this.levels,
      crisis_level: this.crisisLevel,
      turn: this.currentTurn,
      cost_modifiers: costModifiers,
    };
  }
}
