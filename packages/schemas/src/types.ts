/**
 * ghostwalk core types
 *
 * Canonical data model shared by the engine hooks, the sync protocol and the relay.
 * Wire-facing shapes use snake_case field names because they are serialized as-is.
 */

// ─── Players ────────────────────────────────────────────────────────

/** Assigned by the relay at join time; immutable for the lifetime of a connection. */
export type PlayerId = number;

/** Facing direction, in the engine's own encoding. */
export enum Direction {
  Down = 0x00,
  Up = 0x04,
  Left = 0x08,
  Right = 0x0c,
}

export interface MovementData {
  map_id: number;
  map_x: number;
  map_y: number;
  direction: Direction;
  /** Counts down 8 → 0 while crossing one tile; 0 means standing on (map_x, map_y). */
  walk_counter: number;
}

export interface PlayerData {
  player_id: PlayerId;
  /** Engine-encoded name bytes. */
  name: number[];
  movement: MovementData;
}

export const MAX_WALK_COUNTER = 8;

export function emptyPlayerData(playerId: PlayerId = 0): PlayerData {
  return {
    player_id: playerId,
    name: [],
    movement: { map_id: 0, map_x: 0, map_y: 0, direction: Direction.Down, walk_counter: 0 },
  };
}

export function movementEquals(a: MovementData, b: MovementData): boolean {
  return a.map_id === b.map_id
    && a.map_x === b.map_x
    && a.map_y === b.map_y
    && a.direction === b.direction
    && a.walk_counter === b.walk_counter;
}

/** Structural equality, used to decide whether local state is worth broadcasting. */
export function playerDataEquals(a: PlayerData, b: PlayerData): boolean {
  if (a.player_id !== b.player_id) return false;
  if (a.name.length !== b.name.length) return false;
  for (let i = 0; i < a.name.length; i++) {
    if (a.name[i] !== b.name[i]) return false;
  }
  return movementEquals(a.movement, b.movement);
}

export function clonePlayerData(data: PlayerData): PlayerData {
  return { player_id: data.player_id, name: [...data.name], movement: { ...data.movement } };
}

// ─── Party ──────────────────────────────────────────────────────────

export const PARTY_SIZE = 6;

export interface PokemonSlot {
  species: number;
  level: number;
}

/** Battle payload only; the slots beyond `num_pokemon` are zeroed. */
export interface Party {
  num_pokemon: number;
  pokemon: PokemonSlot[];
}

export function emptyParty(): Party {
  return {
    num_pokemon: 0,
    pokemon: Array.from({ length: PARTY_SIZE }, () => ({ species: 0, level: 0 })),
  };
}

// ─── Network events ─────────────────────────────────────────────────

export interface PlayerJoinEvent {
  type: "player_join";
  player_id: PlayerId;
}

export interface FullUpdateEvent {
  type: "full_update";
  player_id: PlayerId;
  data: PlayerData;
}

export interface MovementUpdateEvent {
  type: "movement_update";
  player_id: PlayerId;
  movement: MovementData;
}

export interface PlayerQuitEvent {
  type: "player_quit";
  player_id: PlayerId;
}

export interface ChatEvent {
  type: "chat";
  player_id: PlayerId;
  /** Engine-encoded message bytes. */
  text: number[];
}

export interface BattleDataRequestEvent {
  type: "battle_data_request";
  target_id: PlayerId;
  requester_id: PlayerId;
}

export interface BattleDataResponseEvent {
  type: "battle_data_response";
  target_id: PlayerId;
  party: Party;
}

export interface UpdateRequestEvent {
  type: "update_request";
}

export type NetworkEvent =
  | PlayerJoinEvent
  | FullUpdateEvent
  | MovementUpdateEvent
  | PlayerQuitEvent
  | ChatEvent
  | BattleDataRequestEvent
  | BattleDataResponseEvent
  | UpdateRequestEvent;

export type NetworkEventType = NetworkEvent["type"];

export const NETWORK_EVENT_TYPES: readonly NetworkEventType[] = [
  "player_join",
  "full_update",
  "movement_update",
  "player_quit",
  "chat",
  "battle_data_request",
  "battle_data_response",
  "update_request",
] as const;

export function isNetworkEventType(value: unknown): value is NetworkEventType {
  return NETWORK_EVENT_TYPES.some((t) => t === value);
}

// ─── Session ────────────────────────────────────────────────────────

export type SessionPhase = "normal" | "waiting";

export type NetworkRequest =
  | { kind: "none" }
  | { kind: "battle"; target: PlayerId };

export interface ChatLine {
  sender: number[];
  message: number[];
}

// ─── Journal ────────────────────────────────────────────────────────

export type SessionEventType =
  | "session.connected"
  | "session.closed"
  | "player.joined"
  | "player.quit"
  | "battle.requested"
  | "battle.request_received"
  | "battle.loaded"
  | "chat.sent"
  | "chat.received"
  | "stream.closed"
  | "protocol.violation";

export interface SessionEvent {
  event_id: string;
  timestamp: string;
  session_id: string;
  type: SessionEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

/** Where components report durable session events; the Journal is the real sink. */
export interface SessionEventSink {
  record(type: SessionEventType, payload: Record<string, unknown>): void;
}

export const nullEventSink: SessionEventSink = {
  record: () => {},
};

// ─── Logging ────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

// ─── Checkpoint table ───────────────────────────────────────────────

/** A location inside a switchable ROM bank (address is the CPU-visible 0x4000-0x7FFF form). */
export interface RomLocation {
  bank: number;
  address: number;
}

/**
 * Every fixed address the hooks depend on, for one program image. Program-counter
 * checkpoints, RAM offsets and the ROM location of the opponent party data.
 */
export interface CheckpointTable {
  OVERWORLD_LOOP_START: number;
  SPRITE_CHECK_EXIT_1: number;
  SPRITE_CHECK_EXIT_2: number;
  DISPLAY_TEXT_ID_AFTER_INIT: number;
  DISPLAY_TEXT_SETUP_DONE: number;
  TEXT_PROCESSOR_NEXT_CHAR_1: number;
  TEXT_PROCESSOR_NEXT_CHAR_2: number;
  TEXT_PROCESSOR_END: number;
  NUM_SPRITES: number;
  SPRITE_INDEX: number;
  FRAME_COUNTER: number;
  MAP_ID: number;
  MAP_X: number;
  MAP_Y: number;
  PLAYER_DIR: number;
  WALK_COUNTER: number;
  PLAYER_NAME: number;
  PARTY_COUNT: number;
  PARTY_SPECIES: number;
  PARTY_MON_LEVEL: number;
  BATTLE_TYPE: number;
  ACTIVE_BATTLE: number;
  TRAINER_NUM: number;
  CURRENT_OPPONENT: number;
  OPPONENT_PARTY_DATA: RomLocation;
}

export type CheckpointOverride = Partial<CheckpointTable>;
