import type { NetworkEvent } from "@ghostwalk/schemas";
import {
  DecodeError,
  ProtocolViolation,
  isNetworkEventType,
  isValidNetworkEvent,
  validateNetworkEventData,
} from "@ghostwalk/schemas";

// Line-delimited JSON: one event per line, tagged by `type`.

export function encodeEvent(event: NetworkEvent): string {
  return JSON.stringify(event);
}

export function encodeLine(event: NetworkEvent): string {
  return `${encodeEvent(event)}\n`;
}

/**
 * Parses one line into a validated event. Malformed JSON and schema failures throw
 * `DecodeError`; an object carrying a tag this protocol does not define throws
 * `ProtocolViolation`.
 */
export function decodeEvent(line: string): NetworkEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new DecodeError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`, line);
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new DecodeError("Expected a JSON object", line);
  }

  const type: unknown = "type" in raw ? raw.type : undefined;
  if (typeof type !== "string") {
    throw new DecodeError("Missing event type", line, ["/type: must be string"]);
  }
  if (!isNetworkEventType(type)) {
    throw new ProtocolViolation(`Unknown event type "${type}"`, line, type);
  }
  if (!isValidNetworkEvent(type, raw)) {
    const { errors } = validateNetworkEventData(type, raw);
    throw new DecodeError(`Invalid ${type} event: ${errors.join(", ")}`, line, errors);
  }
  return raw;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled event: ${JSON.stringify(value)}`);
}
