import { performance } from "node:perf_hooks";
import type { ChatLine, CheckpointTable, Logger, PlayerData, SessionPhase } from "@ghostwalk/schemas";
import type { Engine, FrameSelection, Point } from "@ghostwalk/engine";
import { CHECKPOINTS, extractPlayerData, frameIndex, isVisibleTo, relativeDrawPosition } from "@ghostwalk/engine";
import type { SyncClient } from "@ghostwalk/protocol";
import { FrameTimer } from "./frame-timer.js";

export const FRAME_SECONDS = 1 / 60;

export type InputEvent =
  | { kind: "chat"; text: string }
  | { kind: "toggle_fast" };

export interface InputSource {
  drain(): InputEvent[];
}

export interface PeerSprite {
  player: PlayerData;
  position: Point;
  frame: FrameSelection;
}

export interface RenderView {
  /** Set only when the engine produced a frame since the last render. */
  screen: Uint8Array | null;
  self: PlayerData | null;
  /** Peers currently drawn on screen. */
  peers: PeerSprite[];
  /** Every peer the relay has told us about, on any map. */
  online: number;
  chat: readonly ChatLine[];
  phase: SessionPhase;
  fast: boolean;
}

export interface RenderSink {
  render(view: RenderView): void;
}

export interface SessionDriverOptions {
  engine: Engine;
  client: SyncClient;
  input?: InputSource;
  renderer?: RenderSink;
  fast?: boolean;
  table?: Readonly<CheckpointTable>;
  /** Millisecond clock used by {@link SessionDriver.start}. */
  clock?: () => number;
  logger?: Logger;
}

const noInput: InputSource = { drain: () => [] };
const noRender: RenderSink = { render: () => {} };

/**
 * The per-iteration loop: input, emulation, network reconciliation, render. Emulation
 * and networking each run on their own 1/60 s budget; emulation pauses entirely while
 * a battle request is waiting on the peer.
 */
export class SessionDriver {
  private readonly engine: Engine;
  private readonly client: SyncClient;
  private readonly input: InputSource;
  private readonly renderer: RenderSink;
  private readonly table: Readonly<CheckpointTable>;
  private readonly clock: () => number;
  private readonly logger: Logger | undefined;
  private readonly emulationTimer = new FrameTimer();
  private readonly networkTimer = new FrameTimer();
  private interval: ReturnType<typeof setInterval> | null = null;
  private fastMode: boolean;
  private frames = 0;

  constructor(options: SessionDriverOptions) {
    this.engine = options.engine;
    this.client = options.client;
    this.input = options.input ?? noInput;
    this.renderer = options.renderer ?? noRender;
    this.table = options.table ?? CHECKPOINTS;
    this.clock = options.clock ?? (() => performance.now());
    this.logger = options.logger;
    this.fastMode = options.fast ?? false;
  }

  get fast(): boolean {
    return this.fastMode;
  }

  get framesStepped(): number {
    return this.frames;
  }

  get running(): boolean {
    return this.interval !== null;
  }

  tick(now: number): void {
    for (const event of this.input.drain()) this.handleInput(event);

    if (this.client.game.phase === "normal"
      && (this.fastMode || this.emulationTimer.elapsedSeconds(now) >= FRAME_SECONDS)) {
      this.emulationTimer.reset(now);
      this.engine.stepFrame();
      this.frames++;
      this.client.updatePlayerData(extractPlayerData(this.engine, this.client.localId, this.table));
    }

    if (this.networkTimer.elapsedSeconds(now) >= FRAME_SECONDS) {
      this.networkTimer.reset(now);
      this.client.sendUpdate();
      this.client.recvUpdate(this.engine);
    }

    this.renderer.render(this.view());
  }

  start(): void {
    if (this.interval) return;
    this.interval = setInterval(() => this.tick(this.clock()), 1);
  }

  stop(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
  }

  private handleInput(event: InputEvent): void {
    switch (event.kind) {
      case "chat":
        this.client.sendChat(event.text);
        break;
      case "toggle_fast":
        this.fastMode = !this.fastMode;
        this.logger?.info(`Fast mode ${this.fastMode ? "on" : "off"}`);
        break;
    }
  }

  private view(): RenderView {
    const self = this.client.localState;
    const peers: PeerSprite[] = [];
    if (self) {
      for (const peer of this.client.peers()) {
        if (!isVisibleTo(self, peer)) continue;
        peers.push({
          player: peer,
          position: relativeDrawPosition(self, peer),
          frame: frameIndex(peer.movement.direction, peer.movement.walk_counter),
        });
      }
    }
    return {
      screen: this.engine.pollScreen(),
      self,
      peers,
      online: this.client.players.size,
      chat: this.client.transcript.lines(),
      phase: this.client.game.phase,
      fast: this.fastMode,
    };
  }
}
