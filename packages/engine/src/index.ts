export {
  TEXT_START, SPACE, LINE_DOWN, BOTTOM_LINE, TERMINATOR, PARAGRAPH, SCROLL_LINE, END_MSG, END_PROMPT,
  QUESTION_MARK, encodeChar, encode, encodeString, messageBox, decode,
} from "./text-codec.js";
export {
  SCREEN_WIDTH, SCREEN_HEIGHT, TILE_SIZE, SCREEN_ANCHOR, toDirection, drawOffset, frameIndex, pixelPosition,
  relativeDrawPosition, isVisibleTo, occupies, facingTile,
} from "./movement.js";
export type { Point, Offset, FrameSelection } from "./movement.js";
export {
  CHECKPOINTS, SPRITE_SENTINEL, TEXT_DELAY_FRAMES, NEXT_CHAR_INSTRUCTION_SIZE, PLAYER_NAME_LENGTH,
  PARTY_MON_STRIDE, BattleType, ActiveBattle, TrainerClass, TRAINER_TAG, loadCheckpointTable,
} from "./checkpoints.js";
export type { Engine, Register, StepHook, EngineFactoryOptions, EngineModule } from "./engine.js";
export { GameData, InterceptionState } from "./game-data.js";
export type { InterceptionMode } from "./game-data.js";
export { GHOST_DIALOGUE, spriteCheckHook, displayTextHook, runHooks, installHooks } from "./hooks.js";
export type { PlayerLookup } from "./hooks.js";
export { readName, extractPlayerData, extractParty } from "./extract.js";
export { loadParty, setBattle } from "./battle.js";
export { ScriptedEngine, MEMORY_SIZE, ROM_BANK_SIZE } from "./scripted-engine.js";
export type { ScriptedEngineOptions, InstructionEffect } from "./scripted-engine.js";
export { createSimulatedEngine } from "./simulated.js";
export type { SimulatedEngineOptions } from "./simulated.js";
