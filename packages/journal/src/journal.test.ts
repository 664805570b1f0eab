import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { resolve } from "node:path";
import { rm, readFile, writeFile, appendFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { Journal } from "./journal.js";

const TEST_DIR = resolve(import.meta.dirname ?? ".", "../../../.test-data/journal");
const TEST_FILE = resolve(TEST_DIR, "session.jsonl");

describe("Journal", () => {
  beforeEach(async () => {
    try { await rm(TEST_DIR, { recursive: true }); } catch { /* may not exist */ }
  });

  afterEach(async () => {
    try { await rm(TEST_DIR, { recursive: true }); } catch { /* cleanup */ }
  });

  it("creates directory and file on init + emit", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false, lock: false });
    await journal.init();
    const event = await journal.emit("player-1", "player.joined", { player_id: 7 });
    expect(event.event_id).toBeTruthy();
    expect(event.session_id).toBe("player-1");
    expect(event.type).toBe("player.joined");
    expect(event.payload).toEqual({ player_id: 7 });
    expect(existsSync(TEST_FILE)).toBe(true);
  });

  it("reads all events and filters by session", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("player-1", "session.connected", {});
    await journal.emit("player-2", "session.connected", {});
    await journal.emit("player-1", "player.quit", { player_id: 2 });

    expect(await journal.readAll()).toHaveLength(3);
    expect(await journal.readAll({ limit: 1 })).toHaveLength(1);
    const mine = journal.readSession("player-1");
    expect(mine.map((e) => e.type)).toEqual(["session.connected", "player.quit"]);
    expect(journal.sessionIds()).toEqual(["player-1", "player-2"]);
  });

  it("chains hashes and assigns sequence numbers", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false, lock: false });
    await journal.init();
    const e1 = await journal.emit("player-1", "session.connected", {});
    const e2 = await journal.emit("player-1", "battle.requested", { target: 3 });

    expect(e1.hash_prev).toBeUndefined();
    expect(e2.hash_prev).toMatch(/^[0-9a-f]{64}$/);
    expect(e1.seq).toBe(0);
    expect(e2.seq).toBe(1);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("continues the chain after re-opening", async () => {
    const first = new Journal(TEST_FILE, { fsync: false, lock: false });
    await first.init();
    await first.emit("player-1", "session.connected", {});
    await first.close();

    const second = new Journal(TEST_FILE, { fsync: false, lock: false });
    await second.init();
    const event = await second.emit("player-1", "session.closed", {});
    expect(event.seq).toBe(1);
    expect(await second.verifyIntegrity()).toEqual({ valid: true });
  });

  it("detects a tampered line", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("player-1", "session.connected", {});
    await journal.emit("player-1", "chat.sent", { text: "hi" });
    await journal.emit("player-1", "session.closed", {});

    const lines = (await readFile(TEST_FILE, "utf-8")).trim().split("\n");
    lines[1] = lines[1]?.replace("\"hi\"", "\"bye\"") ?? "";
    await writeFile(TEST_FILE, lines.join("\n") + "\n", "utf-8");

    expect(await journal.verifyIntegrity()).toEqual({ valid: false, brokenAt: 2 });
  });

  it("truncates to the valid prefix on init by default", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("player-1", "session.connected", {});
    await journal.emit("player-1", "chat.sent", { text: "hi" });
    await journal.emit("player-1", "session.closed", {});

    const lines = (await readFile(TEST_FILE, "utf-8")).trim().split("\n");
    lines[1] = lines[1]?.replace("\"hi\"", "\"bye\"") ?? "";
    await writeFile(TEST_FILE, lines.join("\n") + "\n", "utf-8");

    const reopened = new Journal(TEST_FILE, { fsync: false, lock: false });
    await reopened.init();
    expect(await reopened.readAll()).toHaveLength(2);
    expect(await reopened.verifyIntegrity()).toEqual({ valid: true });
  });

  it("throws on a broken chain in strict mode", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("player-1", "session.connected", {});
    await journal.emit("player-1", "session.closed", {});
    const lines = (await readFile(TEST_FILE, "utf-8")).trim().split("\n");
    await writeFile(TEST_FILE, [lines[1], lines[0]].join("\n") + "\n", "utf-8");

    const strict = new Journal(TEST_FILE, { fsync: false, lock: false, recovery: "strict" });
    await expect(strict.init()).rejects.toThrow("hash chain broken");
  });

  it("drops a torn last line", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("player-1", "session.connected", {});
    await appendFile(TEST_FILE, "{\"event_id\":\"tor", "utf-8");

    const reopened = new Journal(TEST_FILE, { fsync: false, lock: false });
    await reopened.init();
    expect(await reopened.readAll()).toHaveLength(1);
  });

  it("notifies listeners and survives a throwing listener", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false, lock: false });
    await journal.init();
    const seen: string[] = [];
    journal.on(() => { throw new Error("boom"); });
    const off = journal.on((e) => seen.push(e.type));
    await journal.emit("player-1", "player.joined", {});
    off();
    await journal.emit("player-1", "player.quit", {});
    expect(seen).toEqual(["player.joined"]);
  });

  it("tryEmit returns null when the write fails", async () => {
    const warn = vi.fn();
    const journal = new Journal(resolve(TEST_DIR, "missing-dir", "x.jsonl"), {
      fsync: false,
      lock: false,
      logger: { info: vi.fn(), warn, error: vi.fn(), debug: vi.fn() },
    });
    const result = await journal.tryEmit("player-1", "player.joined", {});
    expect(result).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("sink records events in order and close waits for them", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false, lock: false });
    await journal.init();
    const sink = journal.sink("player-4");
    sink.record("session.connected", { player_id: 4 });
    sink.record("player.joined", { player_id: 5 });
    await journal.close();
    const events = await journal.readAll();
    expect(events.map((e) => e.type)).toEqual(["session.connected", "player.joined"]);
    expect(events.every((e) => e.session_id === "player-4")).toBe(true);
  });

  it("refuses a lock held by a live process", async () => {
    const holder = new Journal(TEST_FILE, { fsync: false });
    await holder.init();
    const other = new Journal(TEST_FILE, { fsync: false });
    await expect(other.init()).rejects.toThrow(`Journal is locked by process ${process.pid}`);
    await holder.close();
    await other.init();
    await other.close();
  });
});
