import { Registry, Counter, Gauge, collectDefaultMetrics } from "prom-client";
import type { NetworkEventType } from "@ghostwalk/schemas";

export interface RelayMetricsConfig {
  registry?: Registry;
  prefix?: string;
  collectDefault?: boolean;
}

export type DropReason = "unknown_target" | "violation" | "decode_error";

export class RelayMetrics {
  private readonly registry: Registry;
  private readonly prefix: string;

  private readonly playersConnected: Gauge;
  private readonly connectionsTotal: Counter;
  private readonly messagesRoutedTotal: Counter<"type">;
  private readonly messagesDroppedTotal: Counter<"reason">;
  private readonly decodeErrorsTotal: Counter;

  constructor(config?: RelayMetricsConfig) {
    this.registry = config?.registry ?? new Registry();
    this.prefix = config?.prefix ?? "ghostwalk_";

    if (config?.collectDefault !== false) {
      collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
    }

    this.playersConnected = new Gauge({
      name: `${this.prefix}relay_players_connected`,
      help: "Number of players currently connected to the relay",
      registers: [this.registry],
    });

    this.connectionsTotal = new Counter({
      name: `${this.prefix}relay_connections_total`,
      help: "Total number of accepted connections",
      registers: [this.registry],
    });

    this.messagesRoutedTotal = new Counter({
      name: `${this.prefix}relay_messages_routed_total`,
      help: "Messages delivered to at least one peer, by event type",
      labelNames: ["type"] as const,
      registers: [this.registry],
    });

    this.messagesDroppedTotal = new Counter({
      name: `${this.prefix}relay_messages_dropped_total`,
      help: "Messages the relay did not deliver, by reason",
      labelNames: ["reason"] as const,
      registers: [this.registry],
    });

    this.decodeErrorsTotal = new Counter({
      name: `${this.prefix}relay_decode_errors_total`,
      help: "Lines from clients that failed to decode",
      registers: [this.registry],
    });
  }

  recordConnection(playerCount: number): void {
    this.connectionsTotal.inc();
    this.playersConnected.set(playerCount);
  }

  recordDisconnection(playerCount: number): void {
    this.playersConnected.set(playerCount);
  }

  recordRouted(type: NetworkEventType): void {
    this.messagesRoutedTotal.inc({ type });
  }

  recordDropped(reason: DropReason): void {
    this.messagesDroppedTotal.inc({ reason });
  }

  recordDecodeError(): void {
    this.decodeErrorsTotal.inc();
    this.messagesDroppedTotal.inc({ reason: "decode_error" });
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  getRegistry(): Registry {
    return this.registry;
  }
}
