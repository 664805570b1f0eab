import type { CheckpointTable, Party } from "@ghostwalk/schemas";
import type { Engine } from "./engine.js";
import { ActiveBattle, BattleType, CHECKPOINTS, TRAINER_TAG, TrainerClass } from "./checkpoints.js";

const PARTY_HEADER = 0xff;
const PARTY_END = 0x00;

/**
 * Overwrites the opponent trainer's party in ROM with `party`, in the
 * "level, species" list form the engine uses for mixed-level trainers.
 */
export function loadParty(engine: Engine, party: Party, table: Readonly<CheckpointTable> = CHECKPOINTS): void {
  const { bank } = table.OPPONENT_PARTY_DATA;
  let address = table.OPPONENT_PARTY_DATA.address;

  engine.patchRom(bank, address++, PARTY_HEADER);
  for (const mon of party.pokemon.slice(0, party.num_pokemon)) {
    engine.patchRom(bank, address++, mon.level);
    engine.patchRom(bank, address++, mon.species);
  }
  engine.patchRom(bank, address, PARTY_END);
}

/** Arms a trainer battle against the given party; the engine starts it on its next overworld pass. */
export function setBattle(engine: Engine, party: Party, table: Readonly<CheckpointTable> = CHECKPOINTS): void {
  engine.writeByte(table.BATTLE_TYPE, BattleType.Normal);
  engine.writeByte(table.ACTIVE_BATTLE, ActiveBattle.Trainer);
  engine.writeByte(table.TRAINER_NUM, 1);
  engine.writeByte(table.CURRENT_OPPONENT, TrainerClass.ProfOak + TRAINER_TAG);
  loadParty(engine, party, table);
}
