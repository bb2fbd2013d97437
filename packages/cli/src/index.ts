#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { resolve } from "node:path";
import { ConfigurationError, errorMessage } from "@polity/schemas";
import { replayCommand, runCommand, runsCommand, verifyCommand } from "./commands.js";

// Global error handlers: prevent silent crashes from unhandled rejections/exceptions
process.on("unhandledRejection", (reason) => {
  console.error("[polity] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[polity] Uncaught exception:", err);
  process.exit(1);
});

const JOURNAL_PATH = process.env.POLITY_JOURNAL_PATH ?? resolve("journal/events.jsonl");
const CONFIG_DIR = process.env.POLITY_CONFIG_DIR ?? "config";

function fail(err: unknown): never {
  if (err instanceof ConfigurationError) {
    console.error(`Configuration error:\n${err.problems.map((p) => `  - ${p}`).join("\n")}`);
  } else {
    console.error(`Error: ${errorMessage(err)}`);
  }
  process.exit(1);
}

const program = new Command();
program.name("polity").description("Polity: deterministic social simulation engine").version("0.1.0");

program.command("run").description("Run a simulation to termination")
  .option("-c, --config-dir <dir>", "Directory holding settings.yaml and personas.yaml", CONFIG_DIR)
  .option("--max-turns <n>", "Override simulation.max_turns")
  .option("--decide-timeout <ms>", "Override simulation.decide_timeout_ms", process.env.POLITY_DECIDE_TIMEOUT_MS)
  .option("--decider <type>", "Decider: mock, claude, scripted")
  .option("--model <name>", "Model name for the claude decider")
  .option("--script <file>", "YAML map of agent to actions for the scripted decider")
  .option("--run-id <id>", "Run id (default: random)")
  .option("--journal <path>", "Journal file", JOURNAL_PATH)
  .option("--justify", "Print each decision's justification")
  .option("-q, --quiet", "Print only the final summary")
  .action(async (opts: { configDir: string; maxTurns?: string; decideTimeout?: string; decider?: string; model?: string; script?: string; runId?: string; journal: string; justify?: boolean; quiet?: boolean }) => {
    try {
      await runCommand({
        configDir: opts.configDir,
        journal: opts.journal,
        maxTurns: opts.maxTurns,
        decideTimeoutMs: opts.decideTimeout,
        decider: opts.decider,
        model: opts.model,
        script: opts.script,
        runId: opts.runId,
        justify: opts.justify,
        quiet: opts.quiet,
      });
    } catch (err) {
      fail(err);
    }
  });

program.command("runs").description("List runs recorded in the journal")
  .option("--journal <path>", "Journal file", JOURNAL_PATH)
  .action(async (opts: { journal: string }) => {
    try { process.exitCode = await runsCommand(opts); }
    catch (err) { fail(err); }
  });

program.command("replay").description("Print a recorded run's events").argument("<runId>", "Run ID")
  .option("--journal <path>", "Journal file", JOURNAL_PATH)
  .action(async (runId: string, opts: { journal: string }) => {
    try { process.exitCode = await replayCommand(runId, opts); }
    catch (err) { fail(err); }
  });

program.command("verify").description("Check the journal's hash chain")
  .option("--journal <path>", "Journal file", JOURNAL_PATH)
  .action(async (opts: { journal: string }) => {
    try { process.exitCode = await verifyCommand(opts); }
    catch (err) { fail(err); }
  });

await program.parseAsync();
