/**
 * Unbounded FIFO with an awaitable `shift`. Closing wakes every waiter with
 * `undefined`; items pushed before the close are still handed out first.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: ((item: T | undefined) => void)[] = [];
  private closed = false;

  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) waiter(item);
    else this.items.push(item);
    return true;
  }

  shift(): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Removes and returns everything queued right now, without waiting. */
  drain(): T[] {
    return this.items.splice(0);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(undefined);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get length(): number {
    return this.items.length;
  }
}
