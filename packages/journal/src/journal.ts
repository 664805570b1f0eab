import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { Logger, SessionEvent, SessionEventSink, SessionEventType } from "@ghostwalk/schemas";
import { validateSessionEventData } from "@ghostwalk/schemas";

export interface JournalOptions {
  fsync?: boolean;
  /** If true, acquire an advisory lockfile so two clients never share one file. Default: true */
  lock?: boolean;
  /** How to handle a broken hash chain on init. "truncate" (default) keeps the valid prefix; "strict" throws. */
  recovery?: "truncate" | "strict";
  logger?: Logger;
}

export type JournalListener = (event: SessionEvent) => void;

/**
 * Append-only, hash-chained JSONL log of what happened during a play session:
 * peers joining and leaving, battle requests, chat, stream failures.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private pending = new Set<Promise<void>>();
  private sessionIndex = new Map<string, SessionEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private recovery: "truncate" | "strict";
  private logger: Logger | undefined;

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.recovery = options?.recovery ?? "truncate";
    this.logger = options?.logger;
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

    // A crash mid-append leaves a torn last line
    const last = lines[lines.length - 1];
    if (last !== undefined && !isJson(last)) {
      lines.pop();
      await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
      this.logger?.warn("Journal: truncated incomplete last line");
    }

    let maxSeq = -1;
    let prevHash: string | undefined;
    const index = new Map<string, SessionEvent[]>();
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = JSON.parse(line) as SessionEvent;
      if (i > 0 && event.hash_prev !== prevHash) {
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at event ${i} (seq=${event.seq}): hash chain broken`);
        }
        this.logger?.warn(`Journal: recovered from corruption at event ${i}, truncated ${lines.length - i} events`);
        const tmpPath = `${this.filePath}.tmp`;
        const valid = lines.slice(0, i);
        await writeFile(tmpPath, valid.length > 0 ? valid.join("\n") + "\n" : "", "utf-8");
        await rename(tmpPath, this.filePath);
        break;
      }
      prevHash = this.hash(line);
      const bucket = index.get(event.session_id);
      if (bucket) bucket.push(event);
      else index.set(event.session_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    this.sessionIndex = index;
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
    sessionId: string,
    type: SessionEventType,
    payload: Record<string, unknown>
  ): Promise<SessionEvent> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;
      const event: SessionEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        session_id: sessionId,
        type,
        payload,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateSessionEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid session event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        await fh.write(line + "\n", undefined, "utf-8");
        await fh.sync();
        await fh.close();
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only commit in-memory state once the line is on disk
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;
      const bucket = this.sessionIndex.get(sessionId);
      if (bucket) bucket.push(event);
      else this.sessionIndex.set(sessionId, [event]);

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.logger?.debug("Journal listener threw", { error: String(err) });
        }
      }
      return event;
    } finally {
      releaseLock();
    }
  }

  async tryEmit(
    sessionId: string,
    type: SessionEventType,
    payload: Record<string, unknown>
  ): Promise<SessionEvent | null> {
    try {
      return await this.emit(sessionId, type, payload);
    } catch (err) {
      this.logger?.warn(`Journal: failed to record ${type}`, { error: err instanceof Error ? err.message : String(err) });
      return null;
    }
  }

  /**
   * Synchronous recording handle for one session. Writes are queued behind the
   * journal's write lock; failures are logged by {@link tryEmit}.
   */
  sink(sessionId: string): SessionEventSink {
    return {
      record: (type, payload) => {
        const write: Promise<void> = this.tryEmit(sessionId, type, payload).then(() => {
          this.pending.delete(write);
        });
        this.pending.add(write);
      },
    };
  }

  async readAll(options?: { limit?: number }): Promise<SessionEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events = content.trim().split("\n").filter(Boolean)
      .map((line) => JSON.parse(line) as SessionEvent);
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readSession(sessionId: string): SessionEvent[] {
    return this.sessionIndex.get(sessionId) ?? [];
  }

  sessionIds(): string[] {
    return [...this.sessionIndex.keys()];
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    const events = await this.readAll();
    let prevHash: string | undefined;
    for (let i = 0; i < events.length; i++) {
      const event = events[i];
      if (event === undefined) break;
      if (i > 0 && event.hash_prev !== prevHash) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(JSON.stringify(event));
    }
    return { valid: true };
  }

  /** Wait for queued writes, then release the lockfile. Call before process exit. */
  async close(): Promise<void> {
    await Promise.all(this.pending);
    await this.writeLock;
    if (this.lockEnabled && this.locked) {
      await this.releaseLock();
    }
  }

  getFilePath(): string {
    return this.filePath;
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
      if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;

      const content = await readFile(this.lockPath, "utf-8").catch(() => "");
      const pid = parseInt(content.trim(), 10);
      if (!Number.isNaN(pid) && isAlive(pid)) {
        throw new Error(`Journal is locked by process ${pid} (lockfile: ${this.lockPath})`);
      }
      await unlink(this.lockPath).catch(() => undefined);
      return this.acquireLock();
    }
  }

  private async releaseLock(): Promise<void> {
    await unlink(this.lockPath).catch(() => undefined);
    this.locked = false;
  }
}

function isJson(line: string): boolean {
  try {
    JSON.parse(line);
    return true;
  } catch {
    return false;
  }
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    return (err as NodeJS.ErrnoException).code !== "ESRCH";
  }
}
