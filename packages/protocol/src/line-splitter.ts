import { StringDecoder } from "node:string_decoder";

/**
 * Reassembles newline-terminated lines from arbitrary chunks. A multi-byte UTF-8
 * character split across chunks is held back until it is complete; a trailing
 * `\r` is stripped.
 */
export class LineSplitter {
  private decoder = new StringDecoder("utf8");
  private buffer = "";

  push(chunk: Buffer | string): string[] {
    this.buffer += typeof chunk === "string" ? chunk : this.decoder.write(chunk);
    const lines: string[] = [];
    let newline = this.buffer.indexOf("\n");
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline);
      lines.push(line.endsWith("\r") ? line.slice(0, -1) : line);
      this.buffer = this.buffer.slice(newline + 1);
      newline = this.buffer.indexOf("\n");
    }
    return lines;
  }

  /** Characters received since the last complete line. */
  get pending(): number {
    return this.buffer.length;
  }
}
