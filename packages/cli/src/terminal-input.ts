import * as readline from "node:readline";
import { chatPrompt, helpText, yellow } from "./chat-formatter.js";
import type { InputEvent, InputSource } from "./session-driver.js";

/** Terminal I/O abstraction (wraps readline + stdout). */
export interface TerminalIO {
  createReadline(): void;
  closeReadline(): void;
  setPrompt(prompt: string): void;
  prompt(): void;
  onLine(handler: (line: string) => void): void;
  onClose(handler: () => void): void;
  clearLine(): void;
  writeLine(text: string): void;
}

export const COMMANDS = ["/fast", "/help", "/quit", "/exit"] as const;

/**
 * readline-compatible completer function.
 * Returns [completions, line] for slash commands.
 */
export function completer(line: string): [string[], string] {
  if (!line.startsWith("/")) return [[], line];
  const hits = COMMANDS.filter((c) => c.startsWith(line));
  return [hits, line];
}

/**
 * Collects typed lines between driver ticks. Commands are handled here; everything
 * else is queued as chat for the driver to send on its next iteration.
 */
export class ChatInput implements InputSource {
  private readonly terminal: TerminalIO;
  private queue: InputEvent[] = [];
  private fast: boolean;
  private open = false;
  private resolveClosed: () => void = () => {};
  readonly closed: Promise<void>;

  constructor(terminal: TerminalIO, options?: { fast?: boolean }) {
    this.terminal = terminal;
    this.fast = options?.fast ?? false;
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get isOpen(): boolean {
    return this.open;
  }

  start(): void {
    if (this.open) return;
    this.open = true;
    this.terminal.createReadline();
    this.terminal.setPrompt(chatPrompt(this.fast));
    this.terminal.prompt();
    this.terminal.onLine((line) => this.handleLine(line));
    this.terminal.onClose(() => this.close());
  }

  drain(): InputEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  close(): void {
    if (!this.open) return;
    this.open = false;
    this.terminal.closeReadline();
    this.resolveClosed();
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) {
      this.terminal.prompt();
      return;
    }

    switch (trimmed) {
      case "/quit":
      case "/exit":
        this.close();
        return;
      case "/fast":
        this.fast = !this.fast;
        this.queue.push({ kind: "toggle_fast" });
        this.terminal.setPrompt(chatPrompt(this.fast));
        break;
      case "/help":
        this.terminal.writeLine(helpText());
        break;
      default:
        if (trimmed.startsWith("/")) {
          this.terminal.writeLine(yellow(`Unknown command: ${trimmed}`));
        } else {
          this.queue.push({ kind: "chat", text: trimmed });
        }
        break;
    }
    this.terminal.prompt();
  }
}

// ─── RealTerminalIO ───────────────────────────────────────────────

export class RealTerminalIO implements TerminalIO {
  private _rl: readline.Interface | null = null;

  createReadline(): void {
    // Close existing readline to prevent listener stacking on process.stdin
    if (this._rl) {
      this._rl.removeAllListeners();
      this._rl.close();
    }
    this._rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      completer,
    });
  }

  closeReadline(): void {
    if (this._rl) {
      this._rl.removeAllListeners();
      this._rl.close();
      this._rl = null;
    }
  }

  setPrompt(prompt: string): void {
    if (this._rl) this._rl.setPrompt(prompt);
  }

  prompt(): void {
    if (this._rl) this._rl.prompt(true);
  }

  onLine(handler: (line: string) => void): void {
    if (this._rl) this._rl.on("line", handler);
  }

  onClose(handler: () => void): void {
    if (this._rl) this._rl.on("close", handler);
  }

  clearLine(): void {
    process.stdout.write("\r\x1b[K");
  }

  writeLine(text: string): void {
    console.log(text);
  }
}
