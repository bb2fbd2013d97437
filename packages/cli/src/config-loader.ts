import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { load as parseYaml } from "js-yaml";
import type { ActionRequest, LogLevel, SimulationConfig } from "@polity/schemas";
import { ConfigurationError, errorMessage, isActionRequest } from "@polity/schemas";
import { DEFAULT_SETTINGS, validateConfig } from "@polity/engine";

export interface ConfigOverrides {
  maxTurns?: number;
  decideTimeoutMs?: number;
  logLevel?: LogLevel;
}

const PERSONA_FIELDS = ["description", "goals", "traits", "voice"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readYaml(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError([`${path}: ${errorMessage(err)}`]);
  }
  try {
    return parseYaml(text);
  } catch (err) {
    throw new ConfigurationError([`${path}: ${errorMessage(err)}`]);
  }
}

/**
 * Turns the `personas` list of personas.yaml into agent entries. Each persona's
 * `name` becomes the agent id; unknown persona fields are dropped.
 */
export function personasToAgents(data: unknown): unknown[] {
  const personas = isRecord(data) && Array.isArray(data.personas) ? data.personas : [];
  return personas.map((entry: unknown) => {
    if (!isRecord(entry)) return entry;
    const persona: Record<string, unknown> = {};
    for (const field of PERSONA_FIELDS) {
      if (entry[field] !== undefined) persona[field] = entry[field];
    }
    return { id: entry.name, persona };
  });
}

/**
 * Assembles a SimulationConfig from `settings.yaml` (simulation, world, rules)
 * and `personas.yaml` in one directory. Missing simulation settings take their
 * defaults; overrides from flags or the environment win over both.
 */
export async function loadConfig(configDir: string, overrides: ConfigOverrides = {}): Promise<SimulationConfig> {
  const settings = await readYaml(join(configDir, "settings.yaml"));
  const personas = await readYaml(join(configDir, "personas.yaml"));
  const doc = isRecord(settings) ? settings : {};

  const raw: Record<string, unknown> = {
    simulation: {
      ...DEFAULT_SETTINGS,
      ...(isRecord(doc.simulation) ? doc.simulation : {}),
      ...(overrides.maxTurns !== undefined ? { max_turns: overrides.maxTurns } : {}),
      ...(overrides.decideTimeoutMs !== undefined ? { decide_timeout_ms: overrides.decideTimeoutMs } : {}),
      ...(overrides.logLevel !== undefined ? { log_level: overrides.logLevel } : {}),
    },
    world: doc.world,
    agents: personasToAgents(personas),
  };
  if (doc.rules !== undefined) raw.rules = doc.rules;
  return validateConfig(raw);
}

/** Reads a YAML map of agent id to a list of action requests for the scripted decider. */
export async function loadScript(path: string): Promise<Record<string, ActionRequest[]>> {
  const doc = await readYaml(path);
  if (!isRecord(doc)) throw new ConfigurationError([`${path}: expected a map of agent to actions`]);

  const plan: Record<string, ActionRequest[]> = {};
  const problems: string[] = [];
  for (const [agent, entries] of Object.entries(doc)) {
    if (!Array.isArray(entries)) {
      problems.push(`${path}: actions for "${agent}" must be a list`);
      continue;
    }
    const requests: ActionRequest[] = [];
    entries.forEach((entry: unknown, i: number) => {
      if (isActionRequest(entry)) requests.push(entry);
      else problems.push(`${path}: ${agent}[${i}] is not a valid action request`);
    });
    plan[agent] = requests;
  }
  if (problems.length > 0) throw new ConfigurationError(problems);
  return plan;
}
