import type { SimulationConfig, SimulationSettings } from "@polity/schemas";
import { ConfigurationError, isSimulationConfig, validateSimulationConfigData } from "@polity/schemas";
import { DEFAULT_SETTINGS } from "./rules.js";

export function withDefaultSettings(partial?: Partial<SimulationSettings>): SimulationSettings {
  return { ...DEFAULT_SETTINGS, ...partial };
}

/**
 * Checks a starting configuration in full and throws one ConfigurationError
 * listing every problem found.
 */
export function validateConfig(input: unknown): SimulationConfig {
  if (!isSimulationConfig(input)) {
    throw new ConfigurationError(validateSimulationConfigData(input).errors);
  }

  const problems: string[] = [];
  const seen = new Set<string>();
  for (const agent of input.agents) {
    const id = agent.id.trim();
    if (seen.has(id)) problems.push(`/agents: duplicate agent id "${id}"`);
    seen.add(id);
    if (id !== agent.id) problems.push(`/agents: agent id "${agent.id}" has surrounding whitespace`);
  }

  const { history_size, repetition_window } = input.simulation;
  if (repetition_window > history_size) {
    problems.push(`/simulation/repetition_window: must be <= history_size (${history_size})`);
  }

  if (problems.length > 0) throw new ConfigurationError(problems);
  return input;
}
