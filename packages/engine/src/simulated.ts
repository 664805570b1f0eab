import type { CheckpointTable, Party } from "@ghostwalk/schemas";
import { Direction } from "@ghostwalk/schemas";
import { ActiveBattle, CHECKPOINTS, PARTY_MON_STRIDE, SPRITE_SENTINEL } from "./checkpoints.js";
import { facingTile } from "./movement.js";
import { ScriptedEngine } from "./scripted-engine.js";
import { TERMINATOR, encodeString } from "./text-codec.js";

export interface SimulatedEngineOptions {
  name?: string;
  mapId?: number;
  x?: number;
  y?: number;
  /** Tiles walked in one direction before turning around. */
  stride?: number;
  /** Frames spent standing between steps. */
  idleFrames?: number;
  party?: Party;
  table?: Readonly<CheckpointTable>;
}

const TEXT_READS = 48;

/**
 * A scripted overworld: the player paces left and right along one row. Walking into
 * something the sprite check reports as blocking opens a dialogue frame instead of
 * moving. Armed battles are resolved on the next overworld frame.
 */
export function createSimulatedEngine(options: SimulatedEngineOptions = {}): ScriptedEngine {
  const table = options.table ?? CHECKPOINTS;
  const stride = options.stride ?? 3;
  const idleFrames = options.idleFrames ?? 16;

  const engine = new ScriptedEngine({
    program: [table.OVERWORLD_LOOP_START, table.SPRITE_CHECK_EXIT_2],
  });

  const name = [...encodeString(options.name ?? "SIM"), TERMINATOR];
  name.forEach((byte, i) => engine.writeByte(table.PLAYER_NAME + i, byte));
  engine.writeByte(table.MAP_ID, options.mapId ?? 1);
  engine.writeByte(table.MAP_X, options.x ?? 4);
  engine.writeByte(table.MAP_Y, options.y ?? 4);
  engine.writeByte(table.PLAYER_DIR, Direction.Right);
  engine.writeByte(table.NUM_SPRITES, 0);

  const party = options.party ?? { num_pokemon: 1, pokemon: [{ species: 0x99, level: 5 }] };
  engine.writeByte(table.PARTY_COUNT, party.num_pokemon);
  party.pokemon.slice(0, party.num_pokemon).forEach((mon, i) => {
    engine.writeByte(table.PARTY_SPECIES + i, mon.species);
    engine.writeByte(table.PARTY_MON_LEVEL + i * PARTY_MON_STRIDE, mon.level);
  });

  const dialogueFrame = [
    table.DISPLAY_TEXT_ID_AFTER_INIT,
    table.DISPLAY_TEXT_ID_AFTER_INIT + 1,
    table.DISPLAY_TEXT_SETUP_DONE,
    ...Array.from({ length: TEXT_READS }, () => table.TEXT_PROCESSOR_NEXT_CHAR_1),
    table.TEXT_PROCESSOR_END,
  ];

  let idle = idleFrames;
  let steps = 0;

  engine.onInstruction(table.OVERWORLD_LOOP_START, (e) => {
    e.writeByte(table.SPRITE_INDEX, 0);
    if (e.readByte(table.ACTIVE_BATTLE) !== ActiveBattle.None) {
      e.writeByte(table.ACTIVE_BATTLE, ActiveBattle.None);
    }
    const counter = e.readByte(table.WALK_COUNTER);
    if (counter === 0) return;
    e.writeByte(table.WALK_COUNTER, counter - 1);
    if (counter - 1 > 0) return;
    const next = facingTile({
      map_x: e.readByte(table.MAP_X),
      map_y: e.readByte(table.MAP_Y),
      direction: e.readByte(table.PLAYER_DIR) === Direction.Left ? Direction.Left : Direction.Right,
    });
    e.writeByte(table.MAP_X, next.x);
    e.writeByte(table.MAP_Y, next.y);
    idle = idleFrames;
  });

  engine.onInstruction(table.SPRITE_CHECK_EXIT_2, (e) => {
    if (e.readByte(table.WALK_COUNTER) !== 0) return;
    if (idle > 0) {
      idle--;
      return;
    }
    if (e.readByte(table.SPRITE_INDEX) === SPRITE_SENTINEL) {
      e.queueFrame(dialogueFrame);
      idle = idleFrames;
      return;
    }
    if (steps > 0 && steps % stride === 0) {
      const dir = e.readByte(table.PLAYER_DIR) === Direction.Left ? Direction.Right : Direction.Left;
      e.writeByte(table.PLAYER_DIR, dir);
    }
    steps++;
    e.writeByte(table.WALK_COUNTER, 8);
  });

  return engine;
}
