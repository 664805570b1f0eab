import { Direction, type CheckpointTable, type PlayerData, type PlayerId } from "@ghostwalk/schemas";
import type { Engine } from "./engine.js";
import type { GameData } from "./game-data.js";
import { CHECKPOINTS, NEXT_CHAR_INSTRUCTION_SIZE, SPRITE_SENTINEL, TEXT_DELAY_FRAMES } from "./checkpoints.js";
import { facingTile, occupies, toDirection } from "./movement.js";

/** Read-only view of the remote players; the hooks never mutate it. */
export interface PlayerLookup {
  entries(): Iterable<[PlayerId, PlayerData]>;
}

export const GHOST_DIALOGUE = "PLAYER has nothing\nto say.";

/**
 * Makes a remote player block movement. The overworld loop clears the flag every
 * frame; the sprite check exits set it when the tile the local player faces is
 * occupied by a peer on the same map.
 */
export function spriteCheckHook(
  engine: Engine,
  game: GameData,
  players: PlayerLookup,
  table: Readonly<CheckpointTable> = CHECKPOINTS,
): void {
  if (engine.getProgramCounter() === table.OVERWORLD_LOOP_START) {
    game.interception.sprite = "normal";
  }

  const pc = engine.getProgramCounter();
  const atExit = (pc === table.SPRITE_CHECK_EXIT_1 && engine.readByte(table.NUM_SPRITES) === 0)
    || pc === table.SPRITE_CHECK_EXIT_2;
  if (!atExit) return;

  const mapId = engine.readByte(table.MAP_ID);
  const target = facingTile({
    map_x: engine.readByte(table.MAP_X),
    map_y: engine.readByte(table.MAP_Y),
    // The sprite check treats an unknown facing as Left
    direction: toDirection(engine.readByte(table.PLAYER_DIR), Direction.Left),
  });

  for (const [id, player] of players.entries()) {
    if (occupies(player, mapId, target.x, target.y)) {
      engine.writeByte(table.SPRITE_INDEX, SPRITE_SENTINEL);
      game.interception.sprite = "hacked";
      game.interception.lastInteraction = id;
      break;
    }
  }
}

/**
 * Replaces the dialogue of a blocked peer with a fabricated message box and asks the
 * network for that peer's party. While the text state is hacked the text processor
 * reads its characters from the pending message instead of engine memory.
 */
export function displayTextHook(
  engine: Engine,
  game: GameData,
  table: Readonly<CheckpointTable> = CHECKPOINTS,
): void {
  const state = game.interception;

  if (state.sprite === "hacked" && engine.getProgramCounter() === table.DISPLAY_TEXT_ID_AFTER_INIT) {
    // Skip the text-pointer lookup; the letter delay normally set there is written by hand
    engine.setProgramCounter(table.DISPLAY_TEXT_SETUP_DONE);
    engine.writeByte(table.FRAME_COUNTER, TEXT_DELAY_FRAMES);

    state.text = "hacked";
    state.createMessageBox(GHOST_DIALOGUE);

    game.networkRequest = { kind: "battle", target: state.lastInteraction };
    game.phase = "waiting";
  }

  const pc = engine.getProgramCounter();
  if (state.text === "hacked"
    && (pc === table.TEXT_PROCESSOR_NEXT_CHAR_1 || pc === table.TEXT_PROCESSOR_NEXT_CHAR_2)) {
    engine.writeRegister("a", state.nextMessageByte());
    engine.setProgramCounter(pc + NEXT_CHAR_INSTRUCTION_SIZE);
  }

  if (engine.getProgramCounter() === table.TEXT_PROCESSOR_END) {
    state.text = "normal";
  }
}

export function runHooks(
  engine: Engine,
  game: GameData,
  players: PlayerLookup,
  table: Readonly<CheckpointTable> = CHECKPOINTS,
): void {
  spriteCheckHook(engine, game, players, table);
  displayTextHook(engine, game, table);
}

/** Registers {@link runHooks} as the engine's per-instruction hook. Returns an uninstaller. */
export function installHooks(
  engine: Engine,
  game: GameData,
  players: PlayerLookup,
  table: Readonly<CheckpointTable> = CHECKPOINTS,
): () => void {
  engine.setStepHook((e) => runHooks(e, game, players, table));
  return () => engine.setStepHook(null);
}
