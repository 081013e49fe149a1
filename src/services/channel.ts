/**
 * Unbounded FIFO queue between producers and an async consumer.
 *
 * `send` and `tryReceive` never wait; `receive` waits for the next value and
 * resolves to `undefined` once the channel is closed and drained.
 */
export class Channel<T> {
  private buffer: T[] = [];
  private waiters: Array<(value: T | undefined) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  /**
   * Returns false (and drops the value) when the channel is closed.
   */
  send(value: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  tryReceive(): T | undefined {
    return this.buffer.shift();
  }

  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Values already buffered stay receivable.
   */
  close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }
}
