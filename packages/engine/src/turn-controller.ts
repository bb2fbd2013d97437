import { v4 as uuid } from "uuid";
import type {
  ActionKind,
  Decider,
  JournalEventType,
  NarrativeEntry,
  OutcomeStatus,
  PendingMessage,
  Persona,
  RelationshipDelta,
  RelationshipRecord,
  SimLogger,
  SimulationConfig,
  SimulationPhase,
  SimulationResult,
  SimulationRules,
  TerminationReason,
  TurnSummary,
  WorldSnapshot,
} from "@polity/schemas";
import { errorMessage, withTimeout } from "@polity/schemas";
import type { Journal } from "@polity/journal";
import { validateConfig } from "./config.js";
import { WorldState } from "./world-state.js";
import { RelationshipEngine, RelationshipLedger } from "./relationships.js";
import { RepetitionGuard } from "./repetition-guard.js";
import { ActionResolver } from "./action-resolver.js";
import type { Resolution } from "./action-resolver.js";
import { classifyTone } from "./message-tone.js";
import { buildObservation } from "./observation.js";
import type { ObservationSources } from "./observation.js";
import { resolveRules } from "./rules.js";
import { ConsoleLogger } from "./logger.js";

export interface TurnControllerOptions {
  config: unknown;
  decider: Decider;
  journal?: Journal;
  logger?: SimLogger;
  runId?: string;
}

// Outcomes that count as an agent sitting the turn out. An unaffordable
// attempt is still an attempt.
const IDLE_STATUSES: ReadonlySet<OutcomeStatus> = new Set<OutcomeStatus>([
  "passed",
  "invalid_request",
  "collaborator_failure",
]);

const VALID_TRANSITIONS: Record<SimulationPhase, SimulationPhase[]> = {
  init: ["turn_start"],
  turn_start: ["agent_step"],
  agent_step: ["turn_end"],
  turn_end: ["turn_start", "terminated"],
  terminated: [],
};

/**
 * Drives a run: Init, then per turn TurnStart → AgentStep for each agent in
 * configured order → TurnEnd, until a termination predicate holds.
 *
 * Everything after Init is recovered locally. Bad requests, unaffordable
 * actions and decider failures become no-op steps, and journal writes go
 * through tryEmit.
 */
export class TurnController {
  readonly runId: string;
  private config: SimulationConfig;
  private rules: SimulationRules;
  private decider: Decider;
  private journal: Journal | undefined;
  private logger: SimLogger;

  private world: WorldState;
  private ledger: RelationshipLedger;
  private relationships: RelationshipEngine;
  private guard: RepetitionGuard;
  private resolver: ActionResolver;
  private agents: string[];
  private personas = new Map<string, Persona>();
  private inboxes = new Map<string, PendingMessage[]>();
  private narrative: NarrativeEntry[] = [];

  private currentPhase: SimulationPhase = "init";
  private started = false;
  private idleTurns = 0;
  private stopRequested = false;
  private reason: TerminationReason | null = null;

  constructor(options: TurnControllerOptions) {
    this.config = validateConfig(options.config);
    this.runId = options.runId ?? uuid();
    this.decider = options.decider;
    this.journal = options.journal;
    this.logger = options.logger ?? new ConsoleLogger("engine", this.config.simulation.log_level);
    this.rules = resolveRules(this.config.rules);

    const { simulation } = this.config;
    this.agents = this.config.agents.map((a) => a.id);
    for (const agent of this.config.agents) {
      if (agent.persona) this.personas.set(agent.id, agent.persona);
      this.inboxes.set(agent.id, []);
    }

    this.world = new WorldState(this.config.world);
    this.world.recomputeDerived();
    this.ledger = new RelationshipLedger(this.rules.relationship_bounds);
    this.relationships = new RelationshipEngine(this.ledger, this.rules);
    this.guard = new RepetitionGuard({
      historySize: simulation.history_size,
      window: simulation.repetition_window,
      penalty: simulation.repetition_penalty,
    });
    this.resolver = new ActionResolver(this.world, this.agents, this.rules, this.logger);
  }

  get phase(): SimulationPhase {
    return this.currentPhase;
  }

  get terminationReason(): TerminationReason | null {
    return this.reason;
  }

  /** Ends the run at the next turn end. */
  requestStop(): void {
    this.stopRequested = true;
  }

  getWorld(): WorldSnapshot {
    return this.world.snapshot();
  }

  getNarrative(): NarrativeEntry[] {
    return this.narrative.map((e) => ({ ...e, relationship_deltas: [...e.relationship_deltas] }));
  }

  getRelationships(): RelationshipRecord[] {
    return this.ledger.all();
  }

  getScore(observer: string, subject: string): number {
    return this.ledger.getScore(observer, subject);
  }

  penaltyFor(agent: string, kind: ActionKind): number {
    return this.guard.penaltyFor(agent, kind);
  }

  async run(): Promise<SimulationResult> {
    while (this.currentPhase !== "terminated") {
      await this.runTurn();
    }
    return this.result();
  }

  /** Advances exactly one turn. Throws once the run has terminated. */
  async runTurn(): Promise<TurnSummary> {
    if (this.currentPhase === "terminated") {
      throw new Error(`Simulation ${this.runId} has terminated (${this.reason ?? "unknown"})`);
    }
    if (!this.started) {
      this.started = true;
      await this.emit("simulation.created", {
        agents: this.agents,
        settings: this.config.simulation,
        rules: this.rules,
      });
      await this.emit("simulation.started", { world: this.world.snapshot() });
      this.logger.info(`Simulation ${this.runId} started`, { agents: this.agents.length });
    }

    this.transition("turn_start");
    const turn = this.world.advanceTurn();
    await this.emit("turn.started", { turn, world: this.world.snapshot() });
    this.logger.debug(`Turn ${turn} started`, { crisis_level: this.world.crisis });

    this.transition("agent_step");
    const entries: NarrativeEntry[] = [];
    for (let step = 0; step < this.agents.length; step++) {
      const agent = this.agents[step];
      if (agent === undefined) continue;
      entries.push(await this.agentStep(agent, turn, step));
    }

    this.transition("turn_end");
    return this.turnEnd(turn, entries);
  }

  private async agentStep(agent: string, turn: number, step: number): Promise<NarrativeEntry> {
    const ctx = { turn, step };
    const pending = this.inboxes.get(agent) ?? [];
    this.inboxes.set(agent, []);
    const observation = buildObservation(this.sources(), agent, this.personas.get(agent) ?? null, pending);

    let request: unknown;
    let failure: string | null = null;
    try {
      request = await withTimeout(
        this.decider.decide(observation),
        this.config.simulation.decide_timeout_ms,
        `decide(${agent})`,
      );
    } catch (err) {
      failure = errorMessage(err);
    }

    let resolution: Resolution;
    if (failure !== null) {
      await this.emit("decision.failed", { turn, agent, error: failure });
      resolution = this.resolver.resolveFailure(agent, failure, ctx);
    } else {
      await this.emit("decision.received", { turn, agent, request });
      resolution = this.resolver.resolve(agent, request, ctx);
    }

    const { outcome } = resolution;
    const deltas: RelationshipDelta[] = [];
    let tone: NarrativeEntry["tone"] = null;
    if (outcome.status === "applied" && outcome.target !== null) {
      const actionDelta = this.relationships.applyActionDelta(agent, outcome.target, outcome.kind, turn);
      if (actionDelta) deltas.push(actionDelta);
      if (outcome.message !== null) {
        tone = classifyTone(outcome.message);
        deltas.push(this.relationships.applyToneDelta(agent, outcome.target, tone, turn));
        this.deliver(outcome.target, { from: agent, text: outcome.message, tone, sent_turn: turn });
        await this.emit("message.delivered", { turn, from: agent, to: outcome.target, tone });
      }
    }
    for (const delta of deltas) {
      await this.emit("relationship.updated", { turn, ...delta });
    }

    this.guard.record(agent, outcome.kind);

    const entry: NarrativeEntry = { ...resolution.entry, relationship_deltas: deltas, tone };
    this.narrative.push(entry);
    const accepted = outcome.status === "applied" || outcome.status === "passed";
    await this.emit(accepted ? "action.resolved" : "action.rejected", { ...entry });
    return entry;
  }

  private async turnEnd(turn: number, entries: NarrativeEntry[]): Promise<TurnSummary> {
    const crisis = this.world.recomputeDerived();
    const expired = this.world.tickModifiers();
    for (const agent of expired) {
      await this.emit("modifier.expired", { turn, agent });
    }

    const allPassed = entries.every((e) => IDLE_STATUSES.has(e.status));
    this.idleTurns = allPassed ? this.idleTurns + 1 : 0;

    const { simulation } = this.config;
    let reason: TerminationReason | null = null;
    if (this.stopRequested) reason = "stopped";
    else if (simulation.stop_on_collapse && crisis >= 100) reason = "collapse";
    else if (this.idleTurns >= simulation.idle_turn_limit) reason = "idle_consensus";
    else if (turn >= simulation.max_turns) reason = "max_turns";

    const world = this.world.snapshot();
    await this.emit("turn.ended", { turn, world, expired_modifiers: expired, all_passed: allPassed });

    if (reason !== null) {
      this.transition("terminated");
      this.reason = reason;
      await this.emit("simulation.terminated", { reason, turns: turn, world });
      this.logger.info(`Simulation ${this.runId} terminated`, { reason, turns: turn });
    }

    return { turn, entries, world, expired_modifiers: expired, all_passed: allPassed };
  }

  private result(): SimulationResult {
    return {
      run_id: this.runId,
      turns: this.world.turn,
      reason: this.reason ?? "stopped",
      world: this.world.snapshot(),
      narrative: this.getNarrative(),
      relationships: this.ledger.all(),
    };
  }

  private sources(): ObservationSources {
    return {
      runId: this.runId,
      agents: this.agents,
      world: this.world,
      ledger: this.ledger,
      guard: this.guard,
      resolver: this.resolver,
      narrative: this.narrative,
    };
  }

  private deliver(recipient: string, message: PendingMessage): void {
    const inbox = this.inboxes.get(recipient) ?? [];
    inbox.push(message);
    this.inboxes.set(recipient, inbox);
  }

  private async emit(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    if (!this.journal) return;
    await this.journal.tryEmit(this.runId, type, payload);
  }

  private transition(next: SimulationPhase): void {
    const allowed = VALID_TRANSITIONS[this.currentPhase];
    if (!allowed.includes(next)) {
      throw new Error(`Invalid phase transition: ${this.currentPhase} → ${next}`);
    }
    this.currentPhase = next;
  }
}
