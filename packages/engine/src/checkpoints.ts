import { readFile } from "node:fs/promises";
import type { CheckpointTable } from "@ghostwalk/schemas";
import { isValidCheckpointOverride, validateCheckpointTableData } from "@ghostwalk/schemas";

/**
 * Fixed addresses for the shipped program image (English "Red", rev 0). Porting to
 * another revision means overriding entries here, never touching the hooks.
 */
export const CHECKPOINTS: Readonly<CheckpointTable> = Object.freeze({
  // Program counters
  OVERWORLD_LOOP_START: 0x03ff,
  SPRITE_CHECK_EXIT_1: 0x0b61,
  SPRITE_CHECK_EXIT_2: 0x0ba2,
  DISPLAY_TEXT_ID_AFTER_INIT: 0x292b,
  DISPLAY_TEXT_SETUP_DONE: 0x29a4,
  TEXT_PROCESSOR_NEXT_CHAR_1: 0x1b55,
  TEXT_PROCESSOR_NEXT_CHAR_2: 0x1b5e,
  TEXT_PROCESSOR_END: 0x1b8a,

  // HRAM / WRAM
  NUM_SPRITES: 0xd4e1,
  SPRITE_INDEX: 0xff8c,
  FRAME_COUNTER: 0xffd5,
  MAP_ID: 0xd35e,
  MAP_Y: 0xd361,
  MAP_X: 0xd362,
  PLAYER_DIR: 0xc109,
  WALK_COUNTER: 0xcfc5,
  PLAYER_NAME: 0xd158,
  PARTY_COUNT: 0xd163,
  PARTY_SPECIES: 0xd164,
  PARTY_MON_LEVEL: 0xd18c,
  BATTLE_TYPE: 0xd05a,
  ACTIVE_BATTLE: 0xd057,
  TRAINER_NUM: 0xd05d,
  CURRENT_OPPONENT: 0xd059,

  // ROM
  OPPONENT_PARTY_DATA: Object.freeze({ bank: 0x0e, address: 0x621d }),
});

// ─── Engine values ──────────────────────────────────────────────────

/** Written to the sprite index so the engine sees "something inanimate in the way". */
export const SPRITE_SENTINEL = 0xff;
/** Letter delay normally set by the code the text hook jumps over. */
export const TEXT_DELAY_FRAMES = 30;
/** Width of the `ld a, [hl]` instruction replaced at the next-char checkpoints. */
export const NEXT_CHAR_INSTRUCTION_SIZE = 1;
export const PLAYER_NAME_LENGTH = 11;
export const PARTY_MON_STRIDE = 0x2c;

export enum BattleType {
  Normal = 0,
  OldMan = 1,
  Safari = 2,
}

export enum ActiveBattle {
  None = 0,
  Wild = 1,
  Trainer = 2,
}

export enum TrainerClass {
  ProfOak = 0x1a,
}

/** Opponent ids at or above this value are trainer classes rather than species. */
export const TRAINER_TAG = 0xc8;

/** Reads a JSON override file and merges it over `base`. Throws listing every schema error. */
export async function loadCheckpointTable(
  filePath: string,
  base: Readonly<CheckpointTable> = CHECKPOINTS,
): Promise<CheckpointTable> {
  const raw: unknown = JSON.parse(await readFile(filePath, "utf-8"));
  if (!isValidCheckpointOverride(raw)) {
    const { errors } = validateCheckpointTableData(raw);
    throw new Error(`Invalid checkpoint table ${filePath}: ${errors.join(", ")}`);
  }
  return { ...base, ...raw };
}
