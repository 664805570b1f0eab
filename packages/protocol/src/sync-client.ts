import type {
  CheckpointTable,
  Logger,
  NetworkEvent,
  Party,
  PlayerData,
  PlayerId,
  SessionEventSink,
} from "@ghostwalk/schemas";
import { ProtocolViolation, clonePlayerData, nullEventSink, playerDataEquals } from "@ghostwalk/schemas";
import type { Engine } from "@ghostwalk/engine";
import { CHECKPOINTS, GameData, decode, encodeString, extractParty, setBattle } from "@ghostwalk/engine";
import { ChatTranscript } from "./chat.js";
import { PlayerTable } from "./player-table.js";
import type { EventChannel } from "./stream-link.js";
import { assertNever, encodeEvent } from "./wire.js";

export type BattleLoader = (engine: Engine, party: Party) => void;

export const MAX_CHAT_BYTES = 256;

export interface SyncClientOptions {
  localId: PlayerId;
  channel: EventChannel;
  game?: GameData;
  players?: PlayerTable;
  transcript?: ChatTranscript;
  /** Loads a peer's party into the engine. Defaults to arming a trainer battle. */
  loadBattle?: BattleLoader;
  table?: Readonly<CheckpointTable>;
  logger?: Logger;
  events?: SessionEventSink;
}

const UNKNOWN_SENDER = encodeString("UNKNOWN");
const noopLogger: Logger = { info() {}, warn() {}, error() {}, debug() {} };

/**
 * The single place where network state meets game state. The outbound pass turns
 * local changes into events; the inbound pass applies received events one at a time.
 * Both run on the driver's loop, never from the network tasks.
 */
export class SyncClient {
  readonly localId: PlayerId;
  readonly game: GameData;
  readonly players: PlayerTable;
  readonly transcript: ChatTranscript;
  private readonly channel: EventChannel;
  private readonly loadBattle: BattleLoader;
  private readonly table: Readonly<CheckpointTable>;
  private readonly logger: Logger;
  private readonly events: SessionEventSink;
  private current: PlayerData | null = null;
  private lastSent: PlayerData | null = null;

  constructor(options: SyncClientOptions) {
    this.localId = options.localId;
    this.channel = options.channel;
    this.game = options.game ?? new GameData();
    this.players = options.players ?? new PlayerTable();
    this.transcript = options.transcript ?? new ChatTranscript();
    this.table = options.table ?? CHECKPOINTS;
    this.loadBattle = options.loadBattle ?? ((engine, party) => setBattle(engine, party, this.table));
    this.logger = options.logger ?? noopLogger;
    this.events = options.events ?? nullEventSink;
  }

  /** Latest local state as last extracted from the engine. */
  get localState(): PlayerData | null {
    return this.current;
  }

  updatePlayerData(state: PlayerData): void {
    const next = clonePlayerData(state);
    next.player_id = this.localId;
    this.current = next;
  }

  /** Outbound pass: broadcast local state if it changed, then any pending battle request. */
  sendUpdate(): void {
    if (this.current !== null && (this.lastSent === null || !playerDataEquals(this.current, this.lastSent))) {
      this.broadcastState(this.current);
    }

    const request = this.game.takeNetworkRequest();
    if (request.kind === "battle") {
      this.channel.send({ type: "battle_data_request", target_id: request.target, requester_id: this.localId });
      this.logger.info(`Requested battle data from player ${request.target}`);
      this.events.record("battle.requested", { target_id: request.target });
    }
  }

  sendChat(text: string): void {
    const bytes = encodeString(text).slice(0, MAX_CHAT_BYTES);
    this.channel.send({ type: "chat", player_id: this.localId, text: bytes });
    this.transcript.append({ sender: this.current?.name ?? UNKNOWN_SENDER, message: bytes });
    this.events.record("chat.sent", { text: decode(bytes) });
  }

  /** Inbound pass: applies every event received since the last pass, in arrival order. */
  recvUpdate(engine: Engine): number {
    const events = this.channel.drain();
    for (const event of events) this.apply(event, engine);
    return events.length;
  }

  peers(): IterableIterator<PlayerData> {
    return this.players.values();
  }

  private apply(event: NetworkEvent, engine: Engine): void {
    switch (event.type) {
      case "full_update": {
        if (event.player_id === this.localId) return;
        const isNew = !this.players.has(event.player_id);
        this.players.upsert({ ...event.data, player_id: event.player_id });
        if (isNew) {
          this.logger.info(`Player ${event.player_id} joined (${decode(event.data.name)})`);
          this.events.record("player.joined", { player_id: event.player_id, name: decode(event.data.name) });
        }
        return;
      }
      case "movement_update":
        this.players.updateMovement(event.player_id, event.movement);
        return;
      case "player_quit":
        if (this.players.remove(event.player_id)) {
          this.logger.info(`Player ${event.player_id} left`);
          this.events.record("player.quit", { player_id: event.player_id });
        }
        return;
      case "chat": {
        const sender = this.players.get(event.player_id)?.name ?? UNKNOWN_SENDER;
        this.transcript.append({ sender: [...sender], message: [...event.text] });
        this.events.record("chat.received", { player_id: event.player_id, text: decode(event.text) });
        return;
      }
      case "battle_data_request": {
        const party = extractParty(engine, this.table);
        this.channel.send({ type: "battle_data_response", target_id: event.requester_id, party });
        this.events.record("battle.request_received", { requester_id: event.requester_id });
        return;
      }
      case "battle_data_response":
        this.game.phase = "normal";
        this.loadBattle(engine, event.party);
        this.logger.info(`Loaded opponent party (${event.party.num_pokemon} pokemon)`);
        this.events.record("battle.loaded", { num_pokemon: event.party.num_pokemon });
        return;
      case "update_request":
        if (this.current !== null) this.broadcastState(this.current);
        return;
      case "player_join": {
        const violation = new ProtocolViolation(
          "player_join is only valid as the first message",
          encodeEvent(event),
          event.type,
        );
        this.logger.warn(violation.message, { player_id: event.player_id });
        this.events.record("protocol.violation", { error: violation.name, message: violation.message });
        return;
      }
      default:
        assertNever(event);
    }
  }

  private broadcastState(state: PlayerData): void {
    this.channel.send({ type: "full_update", player_id: this.localId, data: clonePlayerData(state) });
    this.lastSent = clonePlayerData(state);
  }
}
