import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType } from "@polity/schemas";
import { validateJournalEventData } from "@polity/schemas";

export interface JournalOptions {
  fsync?: boolean;
  /** If true, acquire an advisory lockfile to prevent multi-process corruption. Default: true */
  lock?: boolean;
  /** Maximum number of runs to keep in the in-memory index (LRU eviction). Default: 1000 */
  maxRunsIndexed?: number;
  /** How to handle corruption on init. "truncate" (default) auto-repairs; "strict" throws. */
  recovery?: "truncate" | "strict";
}

export type JournalListener = (event: JournalEvent) => void;

/**
 * Append-only JSONL record of simulation runs. Each line carries the sha256 of
 * the previous line, so any edit to the file breaks the chain.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private runIndex = new Map<string, JournalEvent[]>();
  private runAccessOrder: string[] = [];
  private maxRunsIndexed: number;
  private nextSeq = 0;
  private fsync: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private recovery: "truncate" | "strict";

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.maxRunsIndexed = options?.maxRunsIndexed ?? 1000;
    this.recovery = options?.recovery ?? "truncate";
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (this.lockEnabled) {
      await this.acquireLock();
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    // A crash mid-write leaves a partial last line
    if (lines.length > 0) {
      try { JSON.parse(lines[lines.length - 1]!); }
      catch {
        lines.pop();
        const cleanContent = lines.length > 0 ? lines.join("\n") + "\n" : "";
        await writeFile(this.filePath, cleanContent, "utf-8");
        console.error(`[journal] truncated incomplete last line from crash`);
      }
    }

    let maxSeq = -1;
    let prevHash: string | undefined;
    const tempIndex = new Map<string, JournalEvent[]>();
    try {
      for (let i = 0; i < lines.length; i++) {
        const line = lines[i]!;
        const event = JSON.parse(line) as JournalEvent;
        if (i > 0 && event.hash_prev !== prevHash) {
          if (this.recovery === "strict") {
            throw new Error(`Journal integrity violation at event ${i} (seq=${event.seq}): hash chain broken`);
          }
          console.error(`[journal] recovered from corruption at event ${i}, truncated ${lines.length - i} events`);
          const validLines = lines.slice(0, i);
          const tmpPath = `${this.filePath}.tmp`;
          await writeFile(tmpPath, validLines.length > 0 ? validLines.join("\n") + "\n" : "", "utf-8");
          await rename(tmpPath, this.filePath);
          break;
        }
        prevHash = this.hash(line);
        const bucket = tempIndex.get(event.run_id);
        if (bucket) bucket.push(event);
        else tempIndex.set(event.run_id, [event]);
        if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
      }
    } catch (err) {
      this.runIndex.clear();
      this.lastHash = undefined;
      this.nextSeq = 0;
      throw err;
    }
    for (const [runId, events] of tempIndex) {
      this.trackRunAccess(runId);
      this.runIndex.set(runId, events);
    }
    this.nextSeq = maxSeq + 1;
    this.lastHash = prevHash;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(
    runId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;

      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        run_id: runId,
        type,
        payload,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only commit in-memory state once the line is on disk
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;

      const bucket = this.runIndex.get(runId);
      if (bucket) bucket.push(event);
      else this.runIndex.set(runId, [event]);
      this.trackRunAccess(runId);
      this.evictRunsIfNeeded();

      for (const listener of this.listeners) {
        try { listener(event); } catch (err) {
          console.error(`[journal] listener failed on ${event.type}:`, err);
        }
      }

      return event;
    } finally {
      releaseLock();
    }
  }

  async tryEmit(
    runId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(runId, type, payload);
    } catch (err) {
      console.error(`[journal] failed to record ${type}:`, err instanceof Error ? err.message : err);
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events = content.trim().split("\n").filter(Boolean)
      .map((line) => JSON.parse(line) as JournalEvent);
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  async readRun(runId: string, options?: { offset?: number; limit?: number }): Promise<JournalEvent[]> {
    let events = this.runIndex.get(runId);
    if (events) {
      this.trackRunAccess(runId);
    } else {
      // Evicted from the index (or written by another process): fall back to the file
      events = (await this.readAll()).filter((e) => e.run_id === runId);
    }
    if (!options) return events;
    const start = options.offset ?? 0;
    const end = options.limit !== undefined ? start + options.limit : undefined;
    return events.slice(start, end);
  }

  getRunEventCount(runId: string): number {
    return (this.runIndex.get(runId) ?? []).length;
  }

  async listRuns(): Promise<Map<string, { events: number; started: string; reason: string | null }>> {
    const runs = new Map<string, { events: number; started: string; reason: string | null }>();
    for (const event of await this.readAll()) {
      const info = runs.get(event.run_id) ?? { events: 0, started: event.timestamp, reason: null };
      info.events++;
      if (event.type === "simulation.terminated" && typeof event.payload.reason === "string") {
        info.reason = event.payload.reason;
      }
      runs.set(event.run_id, info);
    }
    return runs;
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    if (!existsSync(this.filePath)) return { valid: true };
    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]!;
      let event: JournalEvent;
      try { event = JSON.parse(line) as JournalEvent; }
      catch { return { valid: false, brokenAt: i }; }
      if (i > 0 && event.hash_prev !== prevHash) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(line);
    }
    return { valid: true };
  }

  /**
   * Wait for any pending writes to complete. Call this before process exit
   * to ensure no journal events are lost.
   */
  async close(): Promise<void> {
    await this.writeLock;
    if (this.lockEnabled && this.locked) {
      await this.releaseLock();
    }
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }

  private async acquireLock(): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
    } catch (err: unknown) {
      if (!isErrnoException(err) || err.code !== "EEXIST") throw err;

      let pid: number;
      try {
        pid = parseInt((await readFile(this.lockPath, "utf-8")).trim(), 10);
      } catch {
        await this.removeStaleLock();
        return this.acquireLock();
      }
      if (isNaN(pid)) {
        await this.removeStaleLock();
        return this.acquireLock();
      }

      try {
        process.kill(pid, 0);
      } catch (killErr: unknown) {
        if (isErrnoException(killErr) && killErr.code === "ESRCH") {
          await this.removeStaleLock();
          return this.acquireLock();
        }
        throw killErr;
      }
      throw new Error(`Journal is locked by process ${pid} (lockfile: ${this.lockPath})`);
    }
  }

  private async releaseLock(): Promise<void> {
    await this.removeStaleLock();
    this.locked = false;
  }

  private async removeStaleLock(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "ENOENT") throw err;
    }
  }

  private trackRunAccess(runId: string): void {
    const idx = this.runAccessOrder.indexOf(runId);
    if (idx !== -1) {
      this.runAccessOrder.splice(idx, 1);
    }
    this.runAccessOrder.push(runId);
  }

  private evictRunsIfNeeded(): void {
    while (this.runIndex.size > this.maxRunsIndexed) {
      const oldest = this.runAccessOrder.shift();
      if (oldest === undefined) break;
      this.runIndex.delete(oldest);
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
