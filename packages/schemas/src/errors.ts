/**
 * Error taxonomy for the sync protocol and its collaborators. Every class sets
 * `name` so the kind survives logging and serialization.
 */

/** A line that is not valid JSON or does not match any event schema. */
export class DecodeError extends Error {
  readonly line: string;
  readonly details: string[];

  constructor(message: string, line: string, details: string[] = []) {
    super(message);
    this.name = "DecodeError";
    this.line = line;
    this.details = details;
  }
}

/**
 * A well-formed event that is not valid where it arrived: an unknown `type` tag, or
 * anything other than `player_join` as the first line of a connection.
 */
export class ProtocolViolation extends DecodeError {
  readonly eventType: string;

  constructor(message: string, line: string, eventType: string) {
    super(message, line);
    this.name = "ProtocolViolation";
    this.eventType = eventType;
  }
}

/** Stream read/write failure, or the stream ending before it was expected to. */
export class IoError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "IoError";
  }
}

export class EngineLoadError extends Error {
  readonly modulePath: string;

  constructor(message: string, modulePath: string) {
    super(message);
    this.name = "EngineLoadError";
    this.modulePath = modulePath;
  }
}
