import type { CheckpointTable, Party, PlayerData, PlayerId } from "@ghostwalk/schemas";
import { MAX_WALK_COUNTER, PARTY_SIZE, emptyParty } from "@ghostwalk/schemas";
import type { Engine } from "./engine.js";
import { CHECKPOINTS, PARTY_MON_STRIDE, PLAYER_NAME_LENGTH } from "./checkpoints.js";
import { toDirection } from "./movement.js";
import { TERMINATOR } from "./text-codec.js";

// Snapshots of engine memory in the shapes the protocol ships around.

export function readName(engine: Engine, table: Readonly<CheckpointTable> = CHECKPOINTS): number[] {
  const name: number[] = [];
  for (let i = 0; i < PLAYER_NAME_LENGTH; i++) {
    const byte = engine.readByte(table.PLAYER_NAME + i);
    if (byte === TERMINATOR) break;
    name.push(byte);
  }
  return name;
}

export function extractPlayerData(
  engine: Engine,
  playerId: PlayerId,
  table: Readonly<CheckpointTable> = CHECKPOINTS,
): PlayerData {
  return {
    player_id: playerId,
    name: readName(engine, table),
    movement: {
      map_id: engine.readByte(table.MAP_ID),
      map_x: engine.readByte(table.MAP_X),
      map_y: engine.readByte(table.MAP_Y),
      direction: toDirection(engine.readByte(table.PLAYER_DIR)),
      walk_counter: Math.min(engine.readByte(table.WALK_COUNTER), MAX_WALK_COUNTER),
    },
  };
}

export function extractParty(engine: Engine, table: Readonly<CheckpointTable> = CHECKPOINTS): Party {
  const party = emptyParty();
  party.num_pokemon = Math.min(engine.readByte(table.PARTY_COUNT), PARTY_SIZE);
  for (let i = 0; i < party.num_pokemon; i++) {
    party.pokemon[i] = {
      species: engine.readByte(table.PARTY_SPECIES + i),
      level: engine.readByte(table.PARTY_MON_LEVEL + i * PARTY_MON_STRIDE),
    };
  }
  return party;
}
