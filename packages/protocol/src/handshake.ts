import type { PlayerId } from "@ghostwalk/schemas";
import { IoError, ProtocolViolation } from "@ghostwalk/schemas";
import { decodeEvent } from "./wire.js";

export interface LineSource {
  nextLine(): Promise<string | null>;
}

/**
 * Reads the relay's greeting and returns the id it assigned. Anything but a
 * well-formed `player_join` as the first line is a `DecodeError` (or its
 * `ProtocolViolation` subclass); the stream ending first is an `IoError`.
 */
export async function performHandshake(source: LineSource): Promise<PlayerId> {
  const line = await source.nextLine();
  if (line === null) {
    throw new IoError("Connection closed before the relay assigned a player id");
  }
  const event = decodeEvent(line);
  if (event.type !== "player_join") {
    throw new ProtocolViolation(`Expected player_join as the first message, got ${event.type}`, line, event.type);
  }
  return event.player_id;
}
