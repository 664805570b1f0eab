import type { Readable } from "node:stream";
import { IoError } from "@ghostwalk/schemas";
import { AsyncQueue } from "./async-queue.js";
import { LineSplitter } from "./line-splitter.js";

/** Pull-style line reader over a readable stream, shared by the handshake and the inbound task. */
export class StreamLineReader {
  private lines = new AsyncQueue<string>();
  private failure: Error | null = null;

  constructor(stream: Readable) {
    const splitter = new LineSplitter();
    stream.on("data", (chunk: Buffer | string) => {
      for (const line of splitter.push(chunk)) this.lines.push(line);
    });
    stream.once("end", () => this.lines.close());
    stream.once("close", () => this.lines.close());
    stream.on("error", (err: Error) => {
      this.failure = err;
      this.lines.close();
    });
  }

  /** Next complete line, or null once the stream has ended cleanly. Throws `IoError` if it failed. */
  async nextLine(): Promise<string | null> {
    const line = await this.lines.shift();
    if (line !== undefined) return line;
    if (this.failure) throw new IoError(`Stream read failed: ${this.failure.message}`, this.failure);
    return null;
  }
}
