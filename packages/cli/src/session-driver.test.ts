import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Direction, emptyParty, type NetworkEvent, type PlayerData } from "@ghostwalk/schemas";
import { createSimulatedEngine, decode, encodeString, type ScriptedEngine } from "@ghostwalk/engine";
import { SyncClient, type EventChannel } from "@ghostwalk/protocol";
import { SessionDriver, type InputEvent, type RenderView } from "./session-driver.js";

class FakeChannel implements EventChannel {
  sent: NetworkEvent[] = [];
  inbox: NetworkEvent[] = [];
  send(event: NetworkEvent): void {
    this.sent.push(event);
  }
  drain(): NetworkEvent[] {
    return this.inbox.splice(0);
  }
}

class ScriptedInput {
  private pending: InputEvent[];
  constructor(events: InputEvent[]) {
    this.pending = events;
  }
  drain(): InputEvent[] {
    return this.pending.splice(0);
  }
}

function peer(id: number, x: number, y: number, mapId = 1): PlayerData {
  return {
    player_id: id,
    name: encodeString("BLUE"),
    movement: { map_id: mapId, map_x: x, map_y: y, direction: Direction.Down, walk_counter: 0 },
  };
}

describe("SessionDriver", () => {
  let engine: ScriptedEngine;
  let channel: FakeChannel;
  let client: SyncClient;
  let views: RenderView[];

  beforeEach(() => {
    engine = createSimulatedEngine({ name: "ASH" });
    channel = new FakeChannel();
    client = new SyncClient({ localId: 1, channel });
    views = [];
  });

  function driver(options: { fast?: boolean; input?: InputEvent[] } = {}): SessionDriver {
    return new SessionDriver({
      engine,
      client,
      renderer: { render: (view) => views.push(view) },
      ...(options.input ? { input: new ScriptedInput(options.input) } : {}),
      ...(options.fast !== undefined ? { fast: options.fast } : {}),
    });
  }

  it("steps a frame and broadcasts local state on the first tick", () => {
    const d = driver();
    d.tick(0);
    expect(d.framesStepped).toBe(1);
    expect(engine.frameCount).toBe(1);
    expect(channel.sent).toHaveLength(1);
    const first = channel.sent[0];
    expect(first?.type).toBe("full_update");
    if (first?.type !== "full_update") return;
    expect(first.player_id).toBe(1);
    expect(decode(first.data.name)).toBe("ASH");
    expect(first.data.movement.map_x).toBe(4);
  });

  it("throttles emulation to one frame per 1/60 s", () => {
    const d = driver();
    d.tick(0);
    d.tick(10);
    expect(d.framesStepped).toBe(1);
    d.tick(17);
    expect(d.framesStepped).toBe(2);
  });

  it("runs unthrottled in fast mode while the network stays on its budget", () => {
    const d = driver({ fast: true });
    d.tick(0);
    d.tick(1);
    d.tick(2);
    expect(d.framesStepped).toBe(3);
    expect(channel.sent.filter((e) => e.type === "full_update")).toHaveLength(1);
  });

  it("pauses emulation while waiting for battle data", () => {
    const loadBattle = vi.fn();
    client = new SyncClient({ localId: 1, channel, loadBattle });
    client.game.phase = "waiting";
    const party = emptyParty();
    party.num_pokemon = 1;
    party.pokemon[0] = { species: 0x24, level: 9 };
    channel.inbox.push({ type: "battle_data_response", target_id: 1, party });

    const d = driver();
    d.tick(0);
    expect(d.framesStepped).toBe(0);
    expect(loadBattle).toHaveBeenCalledTimes(1);
    expect(client.game.phase).toBe("normal");

    d.tick(100);
    expect(d.framesStepped).toBe(1);
  });

  it("sends chat and toggles fast mode from input", () => {
    const d = driver({ input: [{ kind: "chat", text: "hi" }, { kind: "toggle_fast" }] });
    d.tick(0);
    expect(channel.sent[0]).toEqual({ type: "chat", player_id: 1, text: encodeString("hi") });
    expect(d.fast).toBe(true);
    expect(client.transcript.length).toBe(1);
    expect(decode(client.transcript.lines()[0]?.sender ?? [])).toBe("UNKNOWN");
  });

  it("renders peers on the local map relative to the player", () => {
    channel.inbox.push(
      { type: "full_update", player_id: 2, data: peer(2, 5, 4) },
      { type: "full_update", player_id: 3, data: peer(3, 5, 4, 2) },
    );
    const d = driver();
    d.tick(0);

    const view = views[0];
    expect(view).toBeDefined();
    if (!view) return;
    expect(view.screen).toBeInstanceOf(Uint8Array);
    expect(view.self?.player_id).toBe(1);
    expect(view.online).toBe(2);
    expect(view.peers).toHaveLength(1);
    expect(view.peers[0]?.player.player_id).toBe(2);
    expect(view.peers[0]?.position).toEqual({ x: 80, y: 60 });
    expect(view.peers[0]?.frame).toEqual({ index: 0, flip: false });
    expect(view.phase).toBe("normal");
  });

  it("reports no screen when no frame was stepped", () => {
    const d = driver();
    d.tick(0);
    d.tick(5);
    expect(views[1]?.screen).toBeNull();
  });

  describe("start/stop", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("ticks on an interval until stopped", () => {
      let now = 0;
      const d = new SessionDriver({ engine, client, clock: () => (now += 20) });
      d.start();
      expect(d.running).toBe(true);
      vi.advanceTimersByTime(5);
      expect(d.framesStepped).toBe(5);

      d.stop();
      expect(d.running).toBe(false);
      vi.advanceTimersByTime(5);
      expect(d.framesStepped).toBe(5);
    });
  });
});
