import type { ChatLine, PlayerId } from "@ghostwalk/schemas";
import { decode } from "@ghostwalk/engine";
import { formatChatLine, formatPeerArrival, formatPeerDeparture } from "./chat-formatter.js";
import type { RenderSink, RenderView } from "./session-driver.js";
import type { StatusBarLike } from "./status-bar.js";
import type { TerminalIO } from "./terminal-input.js";

export interface TerminalRendererOptions {
  terminal: TerminalIO;
  statusBar?: StatusBarLike;
}

/**
 * Text rendering for the play loop: new chat lines and peer arrivals scroll above
 * the prompt, everything else goes to the status bar. The engine's own screen
 * buffer is left to whatever front end the engine adapter provides.
 */
export class TerminalRenderer implements RenderSink {
  private readonly terminal: TerminalIO;
  private readonly statusBar: StatusBarLike | null;
  private lastChat: ChatLine | null = null;
  private nearby = new Map<PlayerId, string>();

  constructor(options: TerminalRendererOptions) {
    this.terminal = options.terminal;
    this.statusBar = options.statusBar ?? null;
  }

  render(view: RenderView): void {
    this.printNewChat(view.chat);
    this.printPeerChanges(view);
    this.statusBar?.update({
      phase: view.phase,
      fast: view.fast,
      peersOnline: view.online,
      peersNearby: view.peers.length,
    });
  }

  private printNewChat(chat: readonly ChatLine[]): void {
    if (chat.length === 0) return;
    const last = chat[chat.length - 1];
    if (last === this.lastChat) return;
    // When the marker has been evicted from the transcript every line is new
    const start = this.lastChat === null ? 0 : chat.lastIndexOf(this.lastChat) + 1;
    for (const line of chat.slice(start)) this.printAbove(formatChatLine(line));
    this.lastChat = last ?? null;
  }

  private printPeerChanges(view: RenderView): void {
    const seen = new Set<PlayerId>();
    for (const { player } of view.peers) {
      seen.add(player.player_id);
      if (this.nearby.has(player.player_id)) continue;
      const name = decode(player.name);
      this.nearby.set(player.player_id, name);
      this.printAbove(formatPeerArrival(name, player.player_id));
    }
    for (const [id, name] of this.nearby) {
      if (seen.has(id)) continue;
      this.nearby.delete(id);
      this.printAbove(formatPeerDeparture(name, id));
    }
  }

  private printAbove(text: string): void {
    this.terminal.clearLine();
    this.terminal.writeLine(text);
    this.terminal.prompt();
  }
}
