import { createConnection, type Socket } from "node:net";
import type { Duplex } from "node:stream";
import type { Logger, NetworkEvent, PlayerId, SessionEventSink } from "@ghostwalk/schemas";
import { IoError, ProtocolViolation, nullEventSink } from "@ghostwalk/schemas";
import { AsyncQueue } from "./async-queue.js";
import { performHandshake } from "./handshake.js";
import { StreamLineReader } from "./line-reader.js";
import { encodeLine, decodeEvent } from "./wire.js";

/** The two ends the reconciliation client sees: a send queue and a drainable receive queue. */
export interface EventChannel {
  send(event: NetworkEvent): void;
  drain(): NetworkEvent[];
}

export interface StreamLinkOptions {
  logger?: Logger;
  events?: SessionEventSink;
}

const noopLogger: Logger = { info() {}, warn() {}, error() {}, debug() {} };

/**
 * Owns one connection to the relay. An inbound task decodes lines into a queue that
 * only the reconciliation client drains; an outbound task writes queued events one
 * line at a time. Either task can end without stopping the other.
 */
export class StreamLink implements EventChannel {
  private readonly incoming = new AsyncQueue<NetworkEvent>();
  private readonly outgoing = new AsyncQueue<NetworkEvent>();
  private readonly logger: Logger;
  private readonly events: SessionEventSink;
  private inboundTask: Promise<void> = Promise.resolve();
  private outboundTask: Promise<void> = Promise.resolve();
  private started = false;
  private closedInbound = false;

  constructor(
    private readonly stream: Duplex,
    private readonly reader: StreamLineReader,
    options: StreamLinkOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
    this.events = options.events ?? nullEventSink;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.inboundTask = this.runInbound();
    this.outboundTask = this.runOutbound();
  }

  send(event: NetworkEvent): void {
    if (!this.outgoing.push(event)) {
      this.logger.debug("Dropped event on a closed link", { type: event.type });
    }
  }

  drain(): NetworkEvent[] {
    return this.incoming.drain();
  }

  get inboundClosed(): boolean {
    return this.closedInbound;
  }

  get pendingOutbound(): number {
    return this.outgoing.length;
  }

  /** Flushes what is already queued for sending, then tears the connection down. */
  async close(): Promise<void> {
    this.outgoing.close();
    await this.outboundTask;
    this.stream.destroy();
    await this.inboundTask;
  }

  private async runInbound(): Promise<void> {
    try {
      for (;;) {
        const line = await this.reader.nextLine();
        if (line === null) break;
        if (line.trim() === "") continue;
        try {
          this.incoming.push(decodeEvent(line));
        } catch (err) {
          // Only an unknown tag is skippable; a malformed line ends the inbound side
          if (!(err instanceof ProtocolViolation)) throw err;
          this.logger.warn(`Skipping unknown event: ${err.message}`);
          this.events.record("protocol.violation", { error: err.name, message: err.message });
        }
      }
      this.logger.info("Relay closed the connection");
      this.events.record("stream.closed", { reason: "eof" });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn("Inbound stream failed", { error: message });
      this.events.record("stream.closed", { reason: "error", error: message });
    } finally {
      this.closedInbound = true;
      this.incoming.close();
    }
  }

  private async runOutbound(): Promise<void> {
    for (;;) {
      const event = await this.outgoing.shift();
      if (event === undefined) return;
      try {
        await writeLine(this.stream, encodeLine(event));
      } catch (err) {
        // At-most-once: a failed write is not retried
        this.logger.debug("Outbound write failed", {
          type: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}

function writeLine(stream: Duplex, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed || stream.writableEnded) {
      reject(new IoError("Stream is no longer writable"));
      return;
    }
    stream.write(line, (err) => (err ? reject(err) : resolve()));
  });
}

export interface Connection {
  playerId: PlayerId;
  link: StreamLink;
}

/** Handshakes on an already-open stream and starts both link tasks. */
export async function openLink(stream: Duplex, options: StreamLinkOptions = {}): Promise<Connection> {
  const reader = new StreamLineReader(stream);
  let playerId: PlayerId;
  try {
    playerId = await performHandshake(reader);
  } catch (err) {
    stream.destroy();
    throw err;
  }
  const link = new StreamLink(stream, reader, options);
  link.start();
  options.events?.record("session.connected", { player_id: playerId });
  return { playerId, link };
}

export async function connect(host: string, port: number, options: StreamLinkOptions = {}): Promise<Connection> {
  const socket = await new Promise<Socket>((resolve, reject) => {
    const s = createConnection({ host, port });
    const onError = (err: Error) => reject(new IoError(`Could not reach relay at ${host}:${port}: ${err.message}`, err));
    s.once("error", onError);
    s.once("connect", () => {
      s.off("error", onError);
      resolve(s);
    });
  });
  socket.setNoDelay(true);
  return openLink(socket, options);
}
