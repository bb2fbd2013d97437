import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigurationError } from "@polity/schemas";
import { loadConfig, loadScript, personasToAgents } from "./config-loader.js";

const SETTINGS = `simulation:
  max_turns: 4
world:
  food: 50
  energy: 40
  infrastructure: 30
  morale: 20
  treasury: 10
`;

const PERSONAS = `personas:
  - name: Ada
    description: Farmer
    goals: [feed everyone]
    role: ignored
  - name: Bram
`;

describe("personasToAgents", () => {
  it("keeps known persona fields and uses name as id", () => {
    expect(personasToAgents({ personas: [{ name: "Ada", voice: "calm", age: 40 }] })).toEqual([
      { id: "Ada", persona: { voice: "calm" } },
    ]);
  });

  it("returns nothing for a document without personas", () => {
    expect(personasToAgents(null)).toEqual([]);
    expect(personasToAgents({ people: [] })).toEqual([]);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "polity-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("merges settings, defaults and personas", async () => {
    await writeFile(join(dir, "settings.yaml"), SETTINGS);
    await writeFile(join(dir, "personas.yaml"), PERSONAS);
    const config = await loadConfig(dir);
    expect(config.simulation.max_turns).toBe(4);
    expect(config.simulation.idle_turn_limit).toBe(2);
    expect(config.world).toEqual({ food: 50, energy: 40, infrastructure: 30, morale: 20, treasury: 10 });
    expect(config.agents).toEqual([
      { id: "Ada", persona: { description: "Farmer", goals: ["feed everyone"] } },
      { id: "Bram", persona: {} },
    ]);
  });

  it("applies overrides last", async () => {
    await writeFile(join(dir, "settings.yaml"), SETTINGS);
    await writeFile(join(dir, "personas.yaml"), PERSONAS);
    const config = await loadConfig(dir, { maxTurns: 7, decideTimeoutMs: 0, logLevel: "error" });
    expect(config.simulation.max_turns).toBe(7);
    expect(config.simulation.decide_timeout_ms).toBe(0);
    expect(config.simulation.log_level).toBe("error");
  });

  it("passes rule overrides through", async () => {
    await writeFile(join(dir, "settings.yaml"), `${SETTINGS}rules:\n  modifier_lifetime_turns: 3\n`);
    await writeFile(join(dir, "personas.yaml"), PERSONAS);
    const config = await loadConfig(dir);
    expect(config.rules).toEqual({ modifier_lifetime_turns: 3 });
  });

  it("reports a missing file as a configuration error", async () => {
    await writeFile(join(dir, "personas.yaml"), PERSONAS);
    await expect(loadConfig(dir)).rejects.toThrow(ConfigurationError);
  });

  it("reports malformed YAML as a configuration error", async () => {
    await writeFile(join(dir, "settings.yaml"), "simulation: [unclosed\n");
    await writeFile(join(dir, "personas.yaml"), PERSONAS);
    await expect(loadConfig(dir)).rejects.toThrow(ConfigurationError);
  });

  it("rejects duplicate persona names", async () => {
    await writeFile(join(dir, "settings.yaml"), SETTINGS);
    await writeFile(join(dir, "personas.yaml"), "personas:\n  - name: Ada\n  - name: Ada\n");
    await expect(loadConfig(dir)).rejects.toThrow('duplicate agent id "Ada"');
  });
});

describe("loadScript", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "polity-script-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads per-agent action lists", async () => {
    const path = join(dir, "script.yaml");
    await writeFile(path, "Ada:\n  - kind: improve_food\n  - kind: send_message\n    target: Bram\n    message: hi\n");
    expect(await loadScript(path)).toEqual({
      Ada: [{ kind: "improve_food" }, { kind: "send_message", target: "Bram", message: "hi" }],
    });
  });

  it("lists every invalid entry", async () => {
    const path = join(dir, "script.yaml");
    await writeFile(path, "Ada: nope\nBram:\n  - target: Ada\n");
    try {
      await loadScript(path);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.problems).toEqual([
          `${path}: actions for "Ada" must be a list`,
          `${path}: Bram[0] is not a valid action request`,
        ]);
      }
    }
  });
});
