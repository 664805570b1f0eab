import { describe, it, expect, beforeEach } from "vitest";
import { Direction, type PlayerData, type PlayerId } from "@ghostwalk/schemas";
import { CHECKPOINTS as C, SPRITE_SENTINEL, TEXT_DELAY_FRAMES } from "./checkpoints.js";
import { GameData } from "./game-data.js";
import { GHOST_DIALOGUE, displayTextHook, installHooks, spriteCheckHook } from "./hooks.js";
import { ScriptedEngine } from "./scripted-engine.js";
import { TERMINATOR, decode, messageBox } from "./text-codec.js";

function peer(id: PlayerId, mapId: number, x: number, y: number): PlayerData {
  return {
    player_id: id,
    name: [0x80],
    movement: { map_id: mapId, map_x: x, map_y: y, direction: Direction.Down, walk_counter: 0 },
  };
}

describe("spriteCheckHook", () => {
  let engine: ScriptedEngine;
  let game: GameData;
  let players: Map<PlayerId, PlayerData>;

  beforeEach(() => {
    engine = new ScriptedEngine();
    game = new GameData();
    players = new Map();
    // Local player on map 3 at (5, 5) facing up, so the facing tile is (5, 4)
    engine.writeByte(C.MAP_ID, 3);
    engine.writeByte(C.MAP_X, 5);
    engine.writeByte(C.MAP_Y, 5);
    engine.writeByte(C.PLAYER_DIR, Direction.Up);
    engine.writeByte(C.NUM_SPRITES, 2);
  });

  it("blocks movement into a peer at the second exit", () => {
    players.set(7, peer(7, 3, 5, 4));
    engine.setProgramCounter(C.SPRITE_CHECK_EXIT_2);
    spriteCheckHook(engine, game, players);
    expect(engine.readByte(C.SPRITE_INDEX)).toBe(SPRITE_SENTINEL);
    expect(game.interception.sprite).toBe("hacked");
    expect(game.interception.lastInteraction).toBe(7);
  });

  it("checks the tile to the left when the facing byte is unknown", () => {
    engine.writeByte(C.PLAYER_DIR, 0x02);
    players.set(4, peer(4, 3, 5, 6));
    players.set(7, peer(7, 3, 4, 5));
    engine.setProgramCounter(C.SPRITE_CHECK_EXIT_2);
    spriteCheckHook(engine, game, players);
    expect(game.interception.sprite).toBe("hacked");
    expect(game.interception.lastInteraction).toBe(7);
  });

  it("ignores the first exit while the map has sprites", () => {
    players.set(7, peer(7, 3, 5, 4));
    engine.setProgramCounter(C.SPRITE_CHECK_EXIT_1);
    spriteCheckHook(engine, game, players);
    expect(engine.readByte(C.SPRITE_INDEX)).toBe(0);
    expect(game.interception.sprite).toBe("normal");
  });

  it("uses the first exit when the map has no sprites", () => {
    engine.writeByte(C.NUM_SPRITES, 0);
    players.set(7, peer(7, 3, 5, 4));
    engine.setProgramCounter(C.SPRITE_CHECK_EXIT_1);
    spriteCheckHook(engine, game, players);
    expect(game.interception.sprite).toBe("hacked");
  });

  it("ignores peers on another map", () => {
    players.set(7, peer(7, 4, 5, 4));
    engine.setProgramCounter(C.SPRITE_CHECK_EXIT_2);
    spriteCheckHook(engine, game, players);
    expect(game.interception.sprite).toBe("normal");
    expect(engine.readByte(C.SPRITE_INDEX)).toBe(0);
  });

  it("ignores peers beside the facing tile", () => {
    players.set(7, peer(7, 3, 4, 5));
    engine.setProgramCounter(C.SPRITE_CHECK_EXIT_2);
    spriteCheckHook(engine, game, players);
    expect(game.interception.sprite).toBe("normal");
  });

  it("takes the first occupant in iteration order", () => {
    players.set(2, peer(2, 3, 5, 4));
    players.set(9, peer(9, 3, 5, 4));
    engine.setProgramCounter(C.SPRITE_CHECK_EXIT_2);
    spriteCheckHook(engine, game, players);
    expect(game.interception.lastInteraction).toBe(2);
  });

  it("resets at the start of the overworld loop", () => {
    game.interception.sprite = "hacked";
    engine.setProgramCounter(C.OVERWORLD_LOOP_START);
    spriteCheckHook(engine, game, players);
    expect(game.interception.sprite).toBe("normal");
  });

  it("does nothing at unrelated addresses", () => {
    players.set(7, peer(7, 3, 5, 4));
    engine.setProgramCounter(0x1234);
    spriteCheckHook(engine, game, players);
    expect(game.interception.sprite).toBe("normal");
  });
});

describe("displayTextHook", () => {
  let engine: ScriptedEngine;
  let game: GameData;

  beforeEach(() => {
    engine = new ScriptedEngine();
    game = new GameData();
  });

  it("fabricates dialogue and requests a battle after a blocked interaction", () => {
    game.interception.sprite = "hacked";
    game.interception.lastInteraction = 7;
    engine.setProgramCounter(C.DISPLAY_TEXT_ID_AFTER_INIT);

    displayTextHook(engine, game);

    expect(engine.getProgramCounter()).toBe(C.DISPLAY_TEXT_SETUP_DONE);
    expect(engine.readByte(C.FRAME_COUNTER)).toBe(TEXT_DELAY_FRAMES);
    expect(game.interception.text).toBe("hacked");
    expect(game.interception.pendingLength).toBe(messageBox(GHOST_DIALOGUE).length);
    expect(game.networkRequest).toEqual({ kind: "battle", target: 7 });
    expect(game.phase).toBe("waiting");
  });

  it("leaves ordinary dialogue alone", () => {
    engine.setProgramCounter(C.DISPLAY_TEXT_ID_AFTER_INIT);
    displayTextHook(engine, game);
    expect(engine.getProgramCounter()).toBe(C.DISPLAY_TEXT_ID_AFTER_INIT);
    expect(game.interception.text).toBe("normal");
    expect(game.networkRequest).toEqual({ kind: "none" });
    expect(game.phase).toBe("normal");
  });

  it("feeds queued bytes to the text processor and skips the load", () => {
    game.interception.text = "hacked";
    game.interception.createMessageBox("A");

    engine.setProgramCounter(C.TEXT_PROCESSOR_NEXT_CHAR_1);
    displayTextHook(engine, game);
    expect(engine.readRegister("a")).toBe(0x00);
    expect(engine.getProgramCounter()).toBe(C.TEXT_PROCESSOR_NEXT_CHAR_1 + 1);

    engine.setProgramCounter(C.TEXT_PROCESSOR_NEXT_CHAR_2);
    displayTextHook(engine, game);
    expect(engine.readRegister("a")).toBe(0x80);
    expect(engine.getProgramCounter()).toBe(C.TEXT_PROCESSOR_NEXT_CHAR_2 + 1);
  });

  it("feeds the terminator once the message is used up", () => {
    game.interception.text = "hacked";
    engine.setProgramCounter(C.TEXT_PROCESSOR_NEXT_CHAR_1);
    displayTextHook(engine, game);
    expect(engine.readRegister("a")).toBe(TERMINATOR);
  });

  it("lets the engine read its own text while not intercepting", () => {
    engine.writeRegister("a", 0x42);
    engine.setProgramCounter(C.TEXT_PROCESSOR_NEXT_CHAR_1);
    displayTextHook(engine, game);
    expect(engine.readRegister("a")).toBe(0x42);
    expect(engine.getProgramCounter()).toBe(C.TEXT_PROCESSOR_NEXT_CHAR_1);
  });

  it("resets when the text processor exits", () => {
    game.interception.text = "hacked";
    engine.setProgramCounter(C.TEXT_PROCESSOR_END);
    displayTextHook(engine, game);
    expect(game.interception.text).toBe("normal");
  });
});

describe("installHooks", () => {
  it("walks into a peer, shows the fabricated dialogue and asks for a battle", () => {
    const engine = new ScriptedEngine({ program: [C.OVERWORLD_LOOP_START, C.SPRITE_CHECK_EXIT_2] });
    const game = new GameData();
    const players = new Map<PlayerId, PlayerData>([[7, peer(7, 3, 5, 4)]]);
    engine.writeByte(C.MAP_ID, 3);
    engine.writeByte(C.MAP_X, 5);
    engine.writeByte(C.MAP_Y, 5);
    engine.writeByte(C.PLAYER_DIR, Direction.Up);

    const printed: number[] = [];
    engine.onInstruction(C.TEXT_PROCESSOR_NEXT_CHAR_1 + 1, (e) => printed.push(e.readRegister("a")));
    installHooks(engine, game, players);

    engine.stepFrame();
    expect(game.interception.sprite).toBe("hacked");

    const reads = messageBox(GHOST_DIALOGUE).length;
    engine.clearTrace();
    engine.queueFrame([
      C.DISPLAY_TEXT_ID_AFTER_INIT,
      C.DISPLAY_TEXT_ID_AFTER_INIT + 1,
      C.DISPLAY_TEXT_SETUP_DONE,
      ...Array.from({ length: reads }, () => C.TEXT_PROCESSOR_NEXT_CHAR_1),
      C.TEXT_PROCESSOR_END,
    ]);
    engine.stepFrame();

    expect(engine.trace[0]).toBe(C.DISPLAY_TEXT_SETUP_DONE);
    expect(engine.trace).not.toContain(C.DISPLAY_TEXT_ID_AFTER_INIT + 1);
    expect(printed).toEqual(messageBox(GHOST_DIALOGUE));
    expect(decode(printed)).toBe("PLAYER has nothing\nto say.");
    expect(game.interception.text).toBe("normal");
    expect(game.phase).toBe("waiting");
    expect(game.takeNetworkRequest()).toEqual({ kind: "battle", target: 7 });
    expect(game.networkRequest).toEqual({ kind: "none" });

    engine.stepFrame();
    // The peer is still in the way, so the next frame blocks again
    expect(game.interception.sprite).toBe("hacked");
  });

  it("stops intercepting once uninstalled", () => {
    const engine = new ScriptedEngine({ program: [C.SPRITE_CHECK_EXIT_2] });
    const game = new GameData();
    engine.writeByte(C.MAP_ID, 3);
    engine.writeByte(C.MAP_X, 5);
    engine.writeByte(C.MAP_Y, 5);
    const uninstall = installHooks(engine, game, new Map([[7, peer(7, 3, 5, 6)]]));
    uninstall();
    engine.stepFrame();
    expect(game.interception.sprite).toBe("normal");
  });
});
