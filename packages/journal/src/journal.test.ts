import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm, readFile, writeFile, appendFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { Journal } from "./journal.js";

let testDir: string;
let testFile: string;

describe("Journal", () => {
  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "polity-journal-"));
    testFile = join(testDir, "runs", "journal.jsonl");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("creates directory and file on init + emit", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    const event = await journal.emit("run-1", "simulation.created", { agents: ["Ada", "Bram"] });
    expect(event.event_id).toBeTruthy();
    expect(event.run_id).toBe("run-1");
    expect(event.type).toBe("simulation.created");
    expect(event.payload).toEqual({ agents: ["Ada", "Bram"] });
    expect(existsSync(testFile)).toBe(true);
  });

  it("reads all events", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "simulation.created", {});
    await journal.emit("run-1", "simulation.started", {});
    await journal.emit("run-2", "simulation.created", {});

    expect(await journal.readAll()).toHaveLength(3);
    const last = await journal.readAll({ limit: 1 });
    expect(last.map((e) => e.run_id)).toEqual(["run-2"]);
  });

  it("writes with fsync enabled", async () => {
    const journal = new Journal(testFile, { lock: false });
    await journal.init();
    await journal.emit("run-1", "turn.started", { turn: 1 });
    const content = await readFile(testFile, "utf-8");
    expect(content.trim().split("\n")).toHaveLength(1);
  });

  it("maintains hash chain integrity", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    const e1 = await journal.emit("run-1", "simulation.created", {});
    const e2 = await journal.emit("run-1", "simulation.started", {});

    expect(e1.hash_prev).toBeUndefined();
    expect(e2.hash_prev).toMatch(/^[0-9a-f]{64}$/);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("detects a tampered line", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "turn.started", { turn: 1 });
    await journal.emit("run-1", "action.resolved", { kind: "improve_food" });
    await journal.emit("run-1", "turn.ended", { turn: 1 });

    const lines = (await readFile(testFile, "utf-8")).trim().split("\n");
    lines[1] = lines[1]!.replace("improve_food", "improve_energy");
    await writeFile(testFile, lines.join("\n") + "\n", "utf-8");

    expect(await journal.verifyIntegrity()).toEqual({ valid: false, brokenAt: 2 });

    const strict = new Journal(testFile, { fsync: false, lock: false, recovery: "strict" });
    await expect(strict.init()).rejects.toThrow("Journal integrity violation at event 2");
  });

  it("truncates at the broken link in recovery mode", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "turn.started", { turn: 1 });
    await journal.emit("run-1", "action.resolved", { kind: "pass" });
    await journal.emit("run-1", "turn.ended", { turn: 1 });

    const lines = (await readFile(testFile, "utf-8")).trim().split("\n");
    lines[1] = lines[1]!.replace('"pass"', '"boost_morale"');
    await writeFile(testFile, lines.join("\n") + "\n", "utf-8");

    const recovered = new Journal(testFile, { fsync: false, lock: false });
    await recovered.init();
    const events = await recovered.readAll();
    expect(events.map((e) => e.type)).toEqual(["turn.started", "action.resolved"]);
    expect(await recovered.verifyIntegrity()).toEqual({ valid: true });
  });

  it("drops a partial last line left by a crash", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "turn.started", { turn: 1 });
    await appendFile(testFile, '{"event_id":"half', "utf-8");

    const reopened = new Journal(testFile, { fsync: false, lock: false });
    await reopened.init();
    expect(await reopened.readAll()).toHaveLength(1);
    const next = await reopened.emit("run-1", "turn.ended", { turn: 1 });
    expect(next.seq).toBe(1);
    expect(await reopened.verifyIntegrity()).toEqual({ valid: true });
  });

  it("returns valid integrity for empty journal", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("rejects events that fail schema validation", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    await expect(journal.emit("", "turn.started", {})).rejects.toThrow("Invalid journal event");
    expect(existsSync(testFile)).toBe(false);
  });

  it("tryEmit reports failures as null instead of throwing", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    expect(await journal.tryEmit("", "turn.started", {})).toBeNull();
    const ok = await journal.tryEmit("run-1", "turn.started", { turn: 1 });
    expect(ok?.seq).toBe(0);
  });

  // ─── Listeners ────────────────────────────────────────────────────

  it("notifies listeners on emit", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    const received: string[] = [];
    journal.on((event) => { received.push(event.type); });
    await journal.emit("run-1", "simulation.created", {});
    await journal.emit("run-1", "simulation.started", {});
    expect(received).toEqual(["simulation.created", "simulation.started"]);
  });

  it("supports removing listeners", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    const received: string[] = [];
    const unsub = journal.on((event) => { received.push(event.type); });
    await journal.emit("run-1", "simulation.created", {});
    unsub();
    await journal.emit("run-1", "simulation.started", {});
    expect(received).toEqual(["simulation.created"]);
  });

  it("continues when a listener throws", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    const received: string[] = [];
    journal.on(() => { throw new Error("boom"); });
    journal.on((event) => { received.push(event.type); });
    await journal.emit("run-1", "simulation.created", {});
    expect(received).toEqual(["simulation.created"]);
  });

  // ─── Reopening ────────────────────────────────────────────────────

  it("resumes hash chain and seq from existing file", async () => {
    const first = new Journal(testFile, { fsync: false, lock: false });
    await first.init();
    await first.emit("run-1", "simulation.created", {});
    await first.emit("run-1", "simulation.started", {});

    const second = new Journal(testFile, { fsync: false, lock: false });
    await second.init();
    const e3 = await second.emit("run-1", "simulation.terminated", { reason: "max_turns" });
    expect(e3.seq).toBe(2);
    expect(await second.verifyIntegrity()).toEqual({ valid: true });
    expect(await second.readRun("run-1")).toHaveLength(3);
  });

  it("returns empty array for readAll on nonexistent file", async () => {
    const journal = new Journal(join(testDir, "nonexistent.jsonl"), { lock: false });
    await journal.init();
    expect(await journal.readAll()).toEqual([]);
  });

  it("concurrent emits don't corrupt hash chain", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();

    await Promise.all(Array.from({ length: 20 }, (_, i) =>
      journal.emit(`run-${i % 3}`, "decision.received", { index: i })
    ));

    const events = await journal.readAll();
    expect(events).toHaveLength(20);
    expect(events.map((e) => e.seq)).toEqual(Array.from({ length: 20 }, (_, i) => i));
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  // ─── Run Index ────────────────────────────────────────────────────

  it("readRun returns a run's events in order", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "simulation.created", {});
    await journal.emit("run-2", "simulation.created", {});
    await journal.emit("run-1", "simulation.started", {});
    await journal.emit("run-1", "simulation.terminated", { reason: "stopped" });

    const run1 = await journal.readRun("run-1");
    expect(run1.map((e) => e.type)).toEqual(["simulation.created", "simulation.started", "simulation.terminated"]);
    expect(journal.getRunEventCount("run-1")).toBe(3);
    expect(journal.getRunEventCount("run-2")).toBe(1);
    expect(journal.getRunEventCount("run-3")).toBe(0);
  });

  it("readRun with offset/limit paginates correctly", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "turn.started", { turn: 1 });
    await journal.emit("run-1", "turn.ended", { turn: 1 });
    await journal.emit("run-1", "turn.started", { turn: 2 });

    const page1 = await journal.readRun("run-1", { offset: 0, limit: 2 });
    expect(page1.map((e) => e.type)).toEqual(["turn.started", "turn.ended"]);
    const page2 = await journal.readRun("run-1", { offset: 2, limit: 2 });
    expect(page2.map((e) => e.payload)).toEqual([{ turn: 2 }]);
  });

  it("falls back to the file for runs evicted from the index", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false, maxRunsIndexed: 1 });
    await journal.init();
    await journal.emit("run-1", "simulation.created", {});
    await journal.emit("run-2", "simulation.created", {});

    expect(journal.getRunEventCount("run-1")).toBe(0);
    expect(await journal.readRun("run-1")).toHaveLength(1);
  });

  it("lists runs with their termination reason", async () => {
    const journal = new Journal(testFile, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "simulation.created", {});
    await journal.emit("run-1", "simulation.terminated", { reason: "idle_consensus" });
    await journal.emit("run-2", "simulation.created", {});

    const runs = await journal.listRuns();
    expect([...runs.keys()]).toEqual(["run-1", "run-2"]);
    expect(runs.get("run-1")?.events).toBe(2);
    expect(runs.get("run-1")?.reason).toBe("idle_consensus");
    expect(runs.get("run-2")?.reason).toBeNull();
  });

  // ─── Lockfile ─────────────────────────────────────────────────────

  it("refuses a second writer while the lock is held", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    expect(existsSync(`${testFile}.lock`)).toBe(true);

    const other = new Journal(testFile, { fsync: false });
    await expect(other.init()).rejects.toThrow(`Journal is locked by process ${process.pid}`);

    await journal.close();
    expect(existsSync(`${testFile}.lock`)).toBe(false);
  });

  it("replaces a stale lockfile", async () => {
    const first = new Journal(testFile, { fsync: false, lock: false });
    await first.init();
    await writeFile(`${testFile}.lock`, "not-a-pid", "utf-8");

    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    expect(await readFile(`${testFile}.lock`, "utf-8")).toBe(String(process.pid));
    await journal.close();
  });
});
