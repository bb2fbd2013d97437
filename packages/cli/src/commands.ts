import { resolve } from "node:path";
import { Journal } from "@polity/journal";
import type { LogLevel, SimulationResult } from "@polity/schemas";
import { ConsoleLogger, TurnController, resolveRules } from "@polity/engine";
import { loadConfig, loadScript } from "./config-loader.js";
import { createDecider } from "./llm-adapters.js";
import { formatEntry, formatEvent, formatSummary, formatTurnHeader, formatWorld, green, red } from "./narrative-formatter.js";

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export function parsePositiveInt(value: string, label: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

export function parseNonNegativeInt(value: string, label: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid ${label}: "${value}" (must be a non-negative integer)`);
  }
  return n;
}

export interface RunOptions {
  configDir: string;
  journal: string;
  maxTurns?: string;
  decideTimeoutMs?: string;
  decider?: string;
  model?: string;
  script?: string;
  runId?: string;
  quiet?: boolean;
  justify?: boolean;
  logLevel?: LogLevel;
}

export async function runCommand(opts: RunOptions, out: Output = consoleOutput): Promise<SimulationResult> {
  const config = await loadConfig(resolve(opts.configDir), {
    maxTurns: opts.maxTurns !== undefined ? parsePositiveInt(opts.maxTurns, "max turns") : undefined,
    decideTimeoutMs: opts.decideTimeoutMs !== undefined ? parseNonNegativeInt(opts.decideTimeoutMs, "decide timeout") : undefined,
    logLevel: opts.logLevel,
  });
  const script = opts.script !== undefined ? await loadScript(resolve(opts.script)) : undefined;
  const logger = new ConsoleLogger("polity", opts.quiet ? "error" : config.simulation.log_level);
  const decider = createDecider({
    decider: opts.decider,
    model: opts.model,
    script,
    rules: resolveRules(config.rules),
    logger: logger.child("decider"),
  });

  const journal = new Journal(resolve(opts.journal));
  await journal.init();
  const controller = new TurnController({ config, decider, journal, logger, runId: opts.runId });

  // First Ctrl-C finishes the current turn and ends the run as "stopped"
  const onSignal = () => controller.requestStop();
  process.once("SIGINT", onSignal);
  try {
    if (!opts.quiet) out.log(`Run ${controller.runId}  ${formatWorld(controller.getWorld())}`);
    while (controller.phase !== "terminated") {
      const summary = await controller.runTurn();
      if (opts.quiet) continue;
      out.log(formatTurnHeader(summary.turn));
      for (const entry of summary.entries) out.log(formatEntry(entry, { justification: opts.justify }));
      out.log(formatWorld(summary.world));
    }
    const result = await controller.run();
    out.log(formatSummary(result));
    return result;
  } finally {
    process.removeListener("SIGINT", onSignal);
    await journal.close();
  }
}

export async function replayCommand(runId: string, opts: { journal: string }, out: Output = consoleOutput): Promise<number> {
  const journal = new Journal(resolve(opts.journal), { lock: false, recovery: "strict" });
  await journal.init();
  const events = await journal.readRun(runId);
  if (events.length === 0) {
    out.error(`No events found for run ${runId}`);
    return 1;
  }
  out.log(`Replaying run ${runId}\n${events.length} events\n`);
  for (const event of events) out.log(formatEvent(event));
  return 0;
}

export async function runsCommand(opts: { journal: string }, out: Output = consoleOutput): Promise<number> {
  const journal = new Journal(resolve(opts.journal), { lock: false, recovery: "strict" });
  await journal.init();
  const runs = await journal.listRuns();
  if (runs.size === 0) {
    out.log("No runs found.");
    return 0;
  }
  for (const [id, info] of runs) {
    out.log(`${id}  [${info.reason ?? "incomplete"}]  ${info.events} events  ${info.started}`);
  }
  return 0;
}

export async function verifyCommand(opts: { journal: string }, out: Output = consoleOutput): Promise<number> {
  const journal = new Journal(resolve(opts.journal), { lock: false });
  const integrity = await journal.verifyIntegrity();
  if (integrity.valid) {
    out.log(green("Journal integrity: OK"));
    return 0;
  }
  out.error(red(`Journal integrity: BROKEN at event ${integrity.brokenAt ?? "?"}`));
  return 1;
}
