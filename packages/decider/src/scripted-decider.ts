import type { ActionRequest, Decider, Observation } from "@polity/schemas";

export type ScriptFn = (observation: Observation) => ActionRequest | Promise<ActionRequest>;

/**
 * Replays fixed requests. With a plan, each agent consumes its own queue and
 * passes once it runs dry; with a function, every decision is delegated to it.
 */
export class ScriptedDecider implements Decider {
  private queues = new Map<string, ActionRequest[]>();
  private script: ScriptFn | null = null;
  private seen: Observation[] = [];

  constructor(plan: Record<string, ActionRequest[]> | ScriptFn = {}) {
    if (typeof plan === "function") {
      this.script = plan;
    } else {
      for (const [agent, requests] of Object.entries(plan)) {
        this.queues.set(agent, [...requests]);
      }
    }
  }

  async decide(observation: Observation): Promise<ActionRequest> {
    this.seen.push(observation);
    if (this.script) return this.script(observation);
    return this.queues.get(observation.agent)?.shift() ?? { kind: "pass" };
  }

  /** Queues more requests for an agent. */
  enqueue(agent: string, ...requests: ActionRequest[]): void {
    const queue = this.queues.get(agent) ?? [];
    queue.push(...requests);
    this.queues.set(agent, queue);
  }

  remaining(agent: string): number {
    return this.queues.get(agent)?.length ?? 0;
  }

  observations(): Observation[] {
    return [...this.seen];
  }
}
