const AddressSchema = { type: "integer", minimum: 0, maximum: 0xffff } as const;

const RomLocationSchema = {
  type: "object",
  required: ["bank", "address"],
  properties: {
    bank: { type: "integer", minimum: 0, maximum: 0xff },
    address: AddressSchema,
  },
  additionalProperties: false,
} as const;

/**
 * Override file for the checkpoint table. Every key is optional so a port to another
 * program revision only lists what moved; unknown keys are rejected.
 */
export const CheckpointTableSchema = {
  type: "object",
  properties: {
    OVERWORLD_LOOP_START: AddressSchema,
    SPRITE_CHECK_EXIT_1: AddressSchema,
    SPRITE_CHECK_EXIT_2: AddressSchema,
    DISPLAY_TEXT_ID_AFTER_INIT: AddressSchema,
    DISPLAY_TEXT_SETUP_DONE: AddressSchema,
    TEXT_PROCESSOR_NEXT_CHAR_1: AddressSchema,
    TEXT_PROCESSOR_NEXT_CHAR_2: AddressSchema,
    TEXT_PROCESSOR_END: AddressSchema,
    NUM_SPRITES: AddressSchema,
    SPRITE_INDEX: AddressSchema,
    FRAME_COUNTER: AddressSchema,
    MAP_ID: AddressSchema,
    MAP_X: AddressSchema,
    MAP_Y: AddressSchema,
    PLAYER_DIR: AddressSchema,
    WALK_COUNTER: AddressSchema,
    PLAYER_NAME: AddressSchema,
    PARTY_COUNT: AddressSchema,
    PARTY_SPECIES: AddressSchema,
    PARTY_MON_LEVEL: AddressSchema,
    BATTLE_TYPE: AddressSchema,
    ACTIVE_BATTLE: AddressSchema,
    TRAINER_NUM: AddressSchema,
    CURRENT_OPPONENT: AddressSchema,
    OPPONENT_PARTY_DATA: RomLocationSchema,
  },
  additionalProperties: false,
} as const;
