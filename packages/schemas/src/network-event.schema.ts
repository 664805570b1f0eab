import type { SchemaObject } from "ajv";
import type { NetworkEventType } from "./types.js";

const PlayerIdSchema = { type: "integer", minimum: 0 } as const;

const ByteArraySchema = {
  type: "array",
  items: { type: "integer", minimum: 0, maximum: 255 },
} as const;

export const MovementDataSchema = {
  type: "object",
  required: ["map_id", "map_x", "map_y", "direction", "walk_counter"],
  properties: {
    map_id: { type: "integer", minimum: 0, maximum: 255 },
    map_x: { type: "integer", minimum: 0, maximum: 255 },
    map_y: { type: "integer", minimum: 0, maximum: 255 },
    direction: { type: "integer", enum: [0x00, 0x04, 0x08, 0x0c] },
    walk_counter: { type: "integer", minimum: 0, maximum: 8 },
  },
  additionalProperties: false,
} as const;

export const PlayerDataSchema = {
  type: "object",
  required: ["player_id", "name", "movement"],
  properties: {
    player_id: PlayerIdSchema,
    name: { ...ByteArraySchema, maxItems: 11 },
    movement: MovementDataSchema,
  },
  additionalProperties: false,
} as const;

export const PartySchema = {
  type: "object",
  required: ["num_pokemon", "pokemon"],
  properties: {
    num_pokemon: { type: "integer", minimum: 0, maximum: 6 },
    pokemon: {
      type: "array",
      minItems: 6,
      maxItems: 6,
      items: {
        type: "object",
        required: ["species", "level"],
        properties: {
          species: { type: "integer", minimum: 0, maximum: 255 },
          level: { type: "integer", minimum: 0, maximum: 255 },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
} as const;

function variant(type: NetworkEventType, properties: Record<string, unknown>): SchemaObject {
  return {
    type: "object",
    required: ["type", ...Object.keys(properties)],
    properties: { type: { const: type }, ...properties },
    additionalProperties: false,
  };
}

/** One schema per event tag; the decoder picks the schema by `type` before validating. */
export const NetworkEventSchemas: Record<NetworkEventType, SchemaObject> = {
  player_join: variant("player_join", { player_id: PlayerIdSchema }),
  full_update: variant("full_update", { player_id: PlayerIdSchema, data: PlayerDataSchema }),
  movement_update: variant("movement_update", { player_id: PlayerIdSchema, movement: MovementDataSchema }),
  player_quit: variant("player_quit", { player_id: PlayerIdSchema }),
  chat: variant("chat", { player_id: PlayerIdSchema, text: { ...ByteArraySchema, maxItems: 256 } }),
  battle_data_request: variant("battle_data_request", { target_id: PlayerIdSchema, requester_id: PlayerIdSchema }),
  battle_data_response: variant("battle_data_response", { target_id: PlayerIdSchema, party: PartySchema }),
  update_request: variant("update_request", {}),
};
