// Two-line status bar pinned under the chat scrollback with an ANSI scroll region.
// Stays inactive when the terminal is too small.

import type { SessionPhase } from "@ghostwalk/schemas";

/** Writable output + terminal dimensions, injectable for tests. */
export interface StatusBarWriter {
  write(data: string): void;
  getSize(): { rows: number; cols: number };
}

export class RealStatusBarWriter implements StatusBarWriter {
  write(data: string): void {
    process.stdout.write(data);
  }
  getSize(): { rows: number; cols: number } {
    return {
      rows: process.stdout.rows ?? 0,
      cols: process.stdout.columns ?? 80,
    };
  }
}

export type ConnectionState = "connecting" | "connected" | "disconnected";

export interface StatusBarData {
  connection: ConnectionState;
  relay: string;
  playerId: number | null;
  phase: SessionPhase;
  peersOnline: number;
  peersNearby: number;
  fast: boolean;
}

export function formatPeers(online: number, nearby: number): string {
  if (online === 0) return "alone";
  return `${online} online, ${nearby} nearby`;
}

// ─── ANSI Helpers ────────────────────────────────────────────────

const ESC = "\x1b";
const SAVE = `${ESC}7`;
const RESTORE = `${ESC}8`;
function setScrollRegion(top: number, bottom: number): string {
  return `${ESC}[${top};${bottom}r`;
}
const RESET_SCROLL = `${ESC}[r`;
/** 1-indexed. */
function moveTo(row: number, col: number): string {
  return `${ESC}[${row};${col}H`;
}
const CLEAR_EOL = `${ESC}[K`;

const MIN_ROWS = 5;
const STATUS_LINES = 2;

export interface StatusBarLike {
  setup(): void;
  teardown(): void;
  update(patch: Partial<StatusBarData>): void;
}

export class StatusBar implements StatusBarLike {
  private _writer: StatusBarWriter;
  private _data: StatusBarData;
  private _active = false;

  constructor(writer: StatusBarWriter, initial?: Partial<StatusBarData>) {
    this._writer = writer;
    this._data = {
      connection: "connecting",
      relay: "",
      playerId: null,
      phase: "normal",
      peersOnline: 0,
      peersNearby: 0,
      fast: false,
      ...initial,
    };
  }

  get isActive(): boolean {
    return this._active;
  }

  get data(): Readonly<StatusBarData> {
    return this._data;
  }

  setup(): void {
    const { rows } = this._writer.getSize();
    if (rows < MIN_ROWS) return;

    this._active = true;
    // Push existing content up so it does not overlap the status area
    this._writer.write("\n".repeat(STATUS_LINES));
    this._writer.write(setScrollRegion(1, rows - STATUS_LINES));
    this._writer.write(moveTo(1, 1));
    this.repaint();
  }

  teardown(): void {
    if (!this._active) return;
    this._active = false;
    const { rows } = this._writer.getSize();
    this._writer.write(RESET_SCROLL);
    this._writer.write(moveTo(rows - 1, 1) + CLEAR_EOL);
    this._writer.write(moveTo(rows, 1) + CLEAR_EOL);
    this._writer.write(moveTo(rows - STATUS_LINES, 1));
  }

  /** Merges `patch`; repaints only when something actually changed. */
  update(patch: Partial<StatusBarData>): void {
    let changed = false;
    for (const key of Object.keys(patch)) {
      if (isDataKey(key) && patch[key] !== undefined && patch[key] !== this._data[key]) {
        changed = true;
        break;
      }
    }
    if (!changed) return;
    this._data = { ...this._data, ...patch };
    if (this._active) this.repaint();
  }

  onResize(): void {
    if (!this._active) return;
    const { rows } = this._writer.getSize();
    if (rows < MIN_ROWS) {
      this._writer.write(RESET_SCROLL);
      this._active = false;
      return;
    }
    this._writer.write(setScrollRegion(1, rows - STATUS_LINES));
    this.repaint();
  }

  repaint(): void {
    if (!this._active) return;
    const { rows, cols } = this._writer.getSize();
    this._writer.write(SAVE);
    this._writer.write(moveTo(rows - 1, 1) + CLEAR_EOL + this.formatLine1(cols));
    this._writer.write(moveTo(rows, 1) + CLEAR_EOL + this.formatLine2(cols));
    this._writer.write(RESTORE);
  }

  formatLine1(cols: number): string {
    const { connection, playerId, phase } = this._data;
    const who = playerId === null ? "unassigned" : `player ${playerId}`;
    const state = phase === "waiting" ? "waiting for battle data" : "exploring";
    return inverse(pad(` ${connection} | ${who} | ${state} `, cols));
  }

  formatLine2(cols: number): string {
    const { relay, peersOnline, peersNearby, fast } = this._data;
    const parts = [relay, formatPeers(peersOnline, peersNearby)];
    if (fast) parts.push("fast");
    return inverse(pad(` ${parts.join(" | ")} `, cols));
  }
}

const DATA_KEYS: readonly (keyof StatusBarData)[] = [
  "connection", "relay", "playerId", "phase", "peersOnline", "peersNearby", "fast",
];

function isDataKey(key: string): key is keyof StatusBarData {
  return DATA_KEYS.some((k) => k === key);
}

function inverse(text: string): string {
  return `${ESC}[7m${ESC}[2m${text}${ESC}[0m`;
}

function pad(text: string, width: number): string {
  if (text.length >= width) return text.slice(0, width);
  return text + " ".repeat(width - text.length);
}
