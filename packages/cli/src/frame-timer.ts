/** Elapsed-time budget measured in milliseconds from a caller-supplied clock. */
export class FrameTimer {
  private last: number | null = null;

  /** Seconds since the last reset; infinite before the first one. */
  elapsedSeconds(now: number): number {
    return this.last === null ? Number.POSITIVE_INFINITY : (now - this.last) / 1000;
  }

  reset(now: number): void {
    this.last = now;
  }
}
