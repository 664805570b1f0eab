import { createServer, type AddressInfo, type Server } from "node:net";
import type { Duplex } from "node:stream";
import type { Logger, NetworkEvent, PlayerId } from "@ghostwalk/schemas";
import { DecodeError } from "@ghostwalk/schemas";
import { LineSplitter, assertNever, decodeEvent, encodeLine } from "@ghostwalk/protocol";
import type { RelayMetrics } from "./relay-metrics.js";

export interface RelayServerOptions {
  logger?: Logger;
  metrics?: RelayMetrics;
}

interface RelayClient {
  id: PlayerId;
  stream: Duplex;
}

const noopLogger: Logger = { info() {}, warn() {}, error() {}, debug() {} };

/**
 * Hub every client connects to. Assigns player ids, fans state out to everyone else
 * and routes battle traffic point to point. It keeps no game state of its own; a
 * newcomer learns about existing players by asking them to rebroadcast.
 */
export class RelayServer {
  private clients = new Map<PlayerId, RelayClient>();
  private nextId = 1;
  private server: Server | null = null;
  private readonly logger: Logger;
  private readonly metrics: RelayMetrics | undefined;

  constructor(options: RelayServerOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.metrics = options.metrics;
  }

  get playerCount(): number {
    return this.clients.size;
  }

  playerIds(): PlayerId[] {
    return [...this.clients.keys()];
  }

  /** Takes ownership of a client stream. Returns the id the client was given. */
  attach(stream: Duplex): PlayerId {
    const client: RelayClient = { id: this.nextId++, stream };
    this.clients.set(client.id, client);
    this.metrics?.recordConnection(this.clients.size);
    this.logger.info(`Player ${client.id} connected (${this.clients.size} online)`);

    this.sendTo(client, { type: "player_join", player_id: client.id });
    this.broadcast({ type: "update_request" }, client.id);

    const splitter = new LineSplitter();
    stream.on("data", (chunk: Buffer | string) => {
      for (const line of splitter.push(chunk)) this.handleLine(client, line);
    });
    stream.on("error", (err: Error) => {
      this.logger.debug(`Player ${client.id} stream error`, { error: err.message });
    });
    stream.once("end", () => {
      this.detach(client.id);
      stream.end();
    });
    stream.once("close", () => this.detach(client.id));
    return client.id;
  }

  async listen(port: number, host = "0.0.0.0"): Promise<AddressInfo> {
    const server = createServer((socket) => {
      socket.setNoDelay(true);
      this.attach(socket);
    });
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Relay is not listening on a TCP port");
    }
    this.logger.info(`Relay listening on ${address.address}:${address.port}`);
    return address;
  }

  async close(): Promise<void> {
    for (const client of [...this.clients.values()]) client.stream.destroy();
    this.clients.clear();
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  }

  private detach(id: PlayerId): void {
    if (!this.clients.delete(id)) return;
    this.metrics?.recordDisconnection(this.clients.size);
    this.logger.info(`Player ${id} disconnected (${this.clients.size} online)`);
    this.broadcast({ type: "player_quit", player_id: id }, id);
  }

  private handleLine(client: RelayClient, line: string): void {
    if (line.trim() === "") return;
    let event: NetworkEvent;
    try {
      event = decodeEvent(line);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.logger.warn(`Dropped line from player ${client.id}: ${err.message}`);
      this.metrics?.recordDecodeError();
      return;
    }
    this.route(client, event);
  }

  private route(from: RelayClient, event: NetworkEvent): void {
    switch (event.type) {
      case "full_update":
        this.forward({ ...event, player_id: from.id, data: { ...event.data, player_id: from.id } }, from.id);
        return;
      case "movement_update":
      case "chat":
        this.forward({ ...event, player_id: from.id }, from.id);
        return;
      case "update_request":
        this.forward(event, from.id);
        return;
      case "battle_data_request":
        this.deliver(event.target_id, { ...event, requester_id: from.id });
        return;
      case "battle_data_response":
        this.deliver(event.target_id, event);
        return;
      case "player_join":
      case "player_quit":
        // Only the relay speaks for player identity
        this.logger.warn(`Player ${from.id} sent ${event.type}; ignored`);
        this.metrics?.recordDropped("violation");
        return;
      default:
        assertNever(event);
    }
  }

  private forward(event: NetworkEvent, except: PlayerId): void {
    if (this.broadcast(event, except) > 0) this.metrics?.recordRouted(event.type);
  }

  private deliver(target: PlayerId, event: NetworkEvent): void {
    const client = this.clients.get(target);
    if (!client) {
      this.logger.debug(`No player ${target} for ${event.type}; dropped`);
      this.metrics?.recordDropped("unknown_target");
      return;
    }
    this.sendTo(client, event);
    this.metrics?.recordRouted(event.type);
  }

  private broadcast(event: NetworkEvent, except: PlayerId): number {
    let sent = 0;
    for (const client of this.clients.values()) {
      if (client.id === except) continue;
      this.sendTo(client, event);
      sent++;
    }
    return sent;
  }

  private sendTo(client: RelayClient, event: NetworkEvent): void {
    if (client.stream.destroyed || client.stream.writableEnded) return;
    client.stream.write(encodeLine(event));
  }
}
