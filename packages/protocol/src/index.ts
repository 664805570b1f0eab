export { encodeEvent, encodeLine, decodeEvent, assertNever } from "./wire.js";
export { LineSplitter } from "./line-splitter.js";
export { AsyncQueue } from "./async-queue.js";
export { StreamLineReader } from "./line-reader.js";
export { performHandshake } from "./handshake.js";
export type { LineSource } from "./handshake.js";
export { StreamLink, openLink, connect } from "./stream-link.js";
export type { EventChannel, StreamLinkOptions, Connection } from "./stream-link.js";
export { MemorySocket } from "./memory-socket.js";
export { PlayerTable } from "./player-table.js";
export { ChatTranscript, DEFAULT_TRANSCRIPT_LIMIT } from "./chat.js";
export { SyncClient, MAX_CHAT_BYTES } from "./sync-client.js";
export type { SyncClientOptions, BattleLoader } from "./sync-client.js";
