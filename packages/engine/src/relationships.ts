import type {
  ActionKind,
  MessageTone,
  RelationshipDelta,
  RelationshipDeltaRule,
  RelationshipRecord,
  RelationshipView,
  SimulationRules,
} from "@polity/schemas";

const MAX_RELATIONSHIP_HISTORY = 10;

interface Bounds {
  min: number;
  max: number;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function clamp(value: number, bounds: Bounds): number {
  return Math.min(bounds.max, Math.max(bounds.min, value));
}

/**
 * Directed trust/resentment records, one per (observer, subject) pair.
 * Records are created lazily at (0, 0) and never removed.
 */
export class RelationshipLedger {
  private records = new Map<string, RelationshipRecord>();
  private bounds: Bounds;

  constructor(bounds: Bounds = { min: -50, max: 50 }) {
    this.bounds = { ...bounds };
  }

  private key(observer: string, subject: string): string {
    return `${observer}\u0000${subject}`;
  }

  private ensure(observer: string, subject: string): RelationshipRecord {
    const key = this.key(observer, subject);
    let record = this.records.get(key);
    if (!record) {
      record = { observer, subject, trust: 0, resentment: 0, score: 0, history: [] };
      this.records.set(key, record);
    }
    return record;
  }

  get(observer: string, subject: string): RelationshipRecord {
    const record = this.ensure(observer, subject);
    return { ...record, history: [...record.history] };
  }

  getScore(observer: string, subject: string): number {
    return this.ensure(observer, subject).score;
  }

  /** Adds the deltas, then clamps. Returns the change actually applied. */
  adjust(
    observer: string,
    subject: string,
    trustDelta: number,
    resentmentDelta: number,
    note: string,
  ): { trust_delta: number; resentment_delta: number; trust: number; resentment: number; score: number } {
    const record = this.ensure(observer, subject);
    const trust = clamp(record.trust + trustDelta, this.bounds);
    const resentment = clamp(record.resentment + resentmentDelta, this.bounds);
    const applied = { trust_delta: trust - record.trust, resentment_delta: resentment - record.resentment };
    record.trust = trust;
    record.resentment = resentment;
    record.score = trust - resentment;
    record.history.push(note);
    if (record.history.length > MAX_RELATIONSHIP_HISTORY) record.history.shift();
    return { ...applied, trust, resentment, score: record.score };
  }

  /** observer's view of each subject, in the order given. */
  viewOf(observer: string, subjects: readonly string[]): RelationshipView[] {
    return subjects
      .filter((subject) => subject !== observer)
      .map((subject) => {
        const { trust, resentment, score } = this.ensure(observer, subject);
        return { subject, trust, resentment, score };
      });
  }

  all(): RelationshipRecord[] {
    return [...this.records.values()]
      .map((r) => ({ ...r, history: [...r.history] }))
      .sort((a, b) => compareIds(a.observer, b.observer) || compareIds(a.subject, b.subject));
  }

  size(): number {
    return this.records.size;
  }
}

/**
 * Applies rule-table deltas. Every update lands on the target's record about
 * the actor: being supported raises the target's trust in whoever supported it.
 */
export class RelationshipEngine {
  private ledger: RelationshipLedger;
  private actionDeltas: Partial<Record<ActionKind, RelationshipDeltaRule>>;
  private toneDeltas: Record<MessageTone, RelationshipDeltaRule>;

  constructor(ledger: RelationshipLedger, rules: Pick<SimulationRules, "action_deltas" | "tone_deltas">) {
    this.ledger = ledger;
    this.actionDeltas = rules.action_deltas;
    this.toneDeltas = rules.tone_deltas;
  }

  applyActionDelta(actor: string, target: string, kind: ActionKind, turn: number): RelationshipDelta | null {
    const rule = this.actionDeltas[kind];
    if (!rule) return null;
    const result = this.ledger.adjust(target, actor, rule.trust, rule.resentment, `turn ${turn}: ${actor} ${kind}`);
    return { observer: target, subject: actor, cause: "action", ...result };
  }

  applyToneDelta(actor: string, target: string, tone: MessageTone, turn: number): RelationshipDelta {
    const rule = this.toneDeltas[tone];
    const result = this.ledger.adjust(target, actor, rule.trust, rule.resentment, `turn ${turn}: ${tone} message from ${actor}`);
    return { observer: target, subject: actor, cause: "tone", ...result };
  }
}
