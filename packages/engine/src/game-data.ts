import type { NetworkRequest, PlayerId, SessionPhase } from "@ghostwalk/schemas";
import { messageBox, TERMINATOR } from "./text-codec.js";

/**
 * Whether a hook is currently substituting its own data for what the engine would
 * read. The sprite and text machines are separate on purpose: the sprite state is
 * reset every overworld frame while the text state only resets when the text
 * processor exits.
 */
export type InterceptionMode = "normal" | "hacked";

export class InterceptionState {
  /** normal → hacked at a sprite-check checkpoint with a peer in the way; → normal at every overworld loop start. */
  sprite: InterceptionMode = "normal";
  /** normal → hacked after dialogue init while sprite is hacked; → normal at text processor end. */
  text: InterceptionMode = "normal";
  lastInteraction: PlayerId = 0;
  private readonly pendingMessage: number[] = [];

  createMessageBox(text: string): void {
    this.pendingMessage.push(...messageBox(text));
  }

  /** Next byte the text processor should see; TERMINATOR once the message is used up. */
  nextMessageByte(): number {
    return this.pendingMessage.shift() ?? TERMINATOR;
  }

  get pendingLength(): number {
    return this.pendingMessage.length;
  }
}

/** Per-session state shared by the hooks, the sync client and the driver. Never persisted. */
export class GameData {
  phase: SessionPhase = "normal";
  networkRequest: NetworkRequest = { kind: "none" };
  readonly interception = new InterceptionState();

  takeNetworkRequest(): NetworkRequest {
    const request = this.networkRequest;
    this.networkRequest = { kind: "none" };
    return request;
  }
}
