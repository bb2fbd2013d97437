import type Anthropic from "@anthropic-ai/sdk";
import type { ActionRequest, Decider, SimLogger, SimulationRules } from "@polity/schemas";
import { BiasDecider, LLMDecider, ScriptedDecider } from "@polity/decider";
import type { ModelCallFn, ModelCallResult } from "@polity/decider";

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 500;

export function isTransientError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  // Network errors
  if (msg.includes("econnreset") || msg.includes("econnrefused") || msg.includes("etimedout") || msg.includes("fetch failed") || msg.includes("socket hang up")) return true;
  // HTTP 5xx or 429 from SDK errors
  if ("status" in err && typeof err.status === "number") {
    if (err.status === 429 || err.status >= 500) return true;
  }
  return false;
}

export async function withRetry<T>(fn: () => Promise<T>, baseDelayMs = BASE_DELAY_MS): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt < MAX_RETRIES && isTransientError(err)) {
        const delay = baseDelayMs * Math.pow(2, attempt) * (0.5 + Math.random() * 0.5);
        await new Promise((r) => setTimeout(r, delay));
        continue;
      }
      throw err;
    }
  }
  throw lastError;
}

export type DeciderKind = "mock" | "claude" | "scripted";

const DECIDER_KINDS: readonly DeciderKind[] = ["mock", "claude", "scripted"];

const DEFAULT_CLAUDE_MODEL = "claude-sonnet-4-5";

export function resolveDeciderKind(opts: { decider?: string }): DeciderKind {
  const requested = opts.decider ?? process.env.POLITY_DECIDER ?? (process.env.ANTHROPIC_API_KEY ? "claude" : "mock");
  const kind = DECIDER_KINDS.find((k) => k === requested);
  if (!kind) {
    throw new Error(`Unknown decider type: "${requested}". Valid options: ${DECIDER_KINDS.join(", ")}`);
  }
  return kind;
}

export function resolveModel(opts: { model?: string }): string {
  return opts.model ?? process.env.POLITY_MODEL ?? DEFAULT_CLAUDE_MODEL;
}

export function createClaudeCallFn(model: string, maxTokens = 1024): ModelCallFn {
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error(
      "ANTHROPIC_API_KEY environment variable is required for the claude decider.\n" +
      "Set it with: export ANTHROPIC_API_KEY=<your key>"
    );
  }

  // Cache client across calls for HTTP connection pooling; clear on failure so next call retries
  let clientPromise: Promise<Anthropic> | null = null;

  return async (systemPrompt: string, userPrompt: string): Promise<ModelCallResult> => {
    if (!clientPromise) {
      clientPromise = import("@anthropic-ai/sdk").then(
        ({ default: AnthropicClient }) => new AnthropicClient({ apiKey })
      ).catch((err: unknown) => { clientPromise = null; throw err; });
    }
    const client = await clientPromise;
    return withRetry(async () => {
      const response = await client.messages.create({
        model,
        max_tokens: maxTokens,
        system: systemPrompt,
        messages: [{ role: "user", content: userPrompt }],
      });
      const text = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
      if (!text) {
        throw new Error("Claude returned no text content");
      }
      return {
        text,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    });
  };
}

export interface CreateDeciderOptions {
  decider?: string;
  model?: string;
  script?: Record<string, ActionRequest[]>;
  /** Rule tables the run uses; the mock decider scores against them. */
  rules?: SimulationRules;
  logger?: SimLogger;
}

export function createDecider(opts: CreateDeciderOptions): Decider {
  const kind = resolveDeciderKind(opts);
  switch (kind) {
    case "mock":
      return new BiasDecider(opts.rules);
    case "scripted":
      return new ScriptedDecider(opts.script ?? {});
    case "claude":
      return new LLMDecider(createClaudeCallFn(resolveModel(opts)), opts.logger);
  }
}
