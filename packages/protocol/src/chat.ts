import type { ChatLine } from "@ghostwalk/schemas";

export const DEFAULT_TRANSCRIPT_LIMIT = 200;

/** Most recent chat lines, oldest first. */
export class ChatTranscript {
  private entries: ChatLine[] = [];

  constructor(private readonly limit = DEFAULT_TRANSCRIPT_LIMIT) {}

  append(line: ChatLine): void {
    this.entries.push(line);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
  }

  lines(): readonly ChatLine[] {
    return this.entries;
  }

  latest(count: number): ChatLine[] {
    return count <= 0 ? [] : this.entries.slice(-count);
  }

  get length(): number {
    return this.entries.length;
  }
}
