// Pure formatting functions for the play CLI. No side effects.

import type { ChatLine } from "@ghostwalk/schemas";
import { decode } from "@ghostwalk/engine";

// ANSI color helpers
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export function chatPrompt(fast: boolean): string {
  return fast ? `${dim("[fast]")} ghostwalk> ` : "ghostwalk> ";
}

/** One transcript line as `SENDER: message`, line breaks flattened to spaces. */
export function formatChatLine(line: ChatLine): string {
  const sender = decode(line.sender);
  const message = decode(line.message).replace(/\n/g, " ");
  return `${bold(cyan(sender))}: ${message}`;
}

export function formatPeerArrival(name: string, id: number): string {
  return green(`${name} (player ${id}) is nearby`);
}

export function formatPeerDeparture(name: string, id: number): string {
  return dim(`${name} (player ${id}) wandered off`);
}

export function helpText(): string {
  return [
    bold("Commands:"),
    `  ${cyan("/fast")}   Toggle unthrottled emulation`,
    `  ${cyan("/help")}   Show this help`,
    `  ${cyan("/quit")}   Save and leave the session`,
    "",
    dim("Anything else is sent as chat to every connected player."),
  ].join("\n");
}
