interface Waiter<T> {
  resolve: (value: ChannelReceive<T>) => void;
  timer?: ReturnType<typeof setTimeout>;
}

export type ChannelReceive<T> =
  | { kind: 'item'; item: T }
  | { kind: 'tick' }
  | { kind: 'closed' };

/**
 * Ordered multi-producer, single-consumer channel. Items are delivered in
 * send order. `receive` also resolves with a tick when nothing arrives within
 * the given interval, so the consumer can interleave periodic work. The tick
 * timer is unref'd.
 */
export class EventChannel<T> {
  private readonly buffer: T[] = [];
  private waiter?: Waiter<T>;
  private closed = false;

  public get size(): number {
    return this.buffer.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public send(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter !== undefined) {
      this.waiter = undefined;
      if (waiter.timer !== undefined) clearTimeout(waiter.timer);
      waiter.resolve({ kind: 'item', item });
      return true;
    }
    this.buffer.push(item);
    return true;
  }

  public receive(tickMs?: number): Promise<ChannelReceive<T>> {
    if (this.waiter !== undefined) {
      return Promise.reject(new Error('EventChannel supports a single consumer'));
    }
    const next = this.buffer.shift();
    if (next !== undefined) return Promise.resolve({ kind: 'item', item: next });
    if (this.closed) return Promise.resolve({ kind: 'closed' });
    return new Promise<ChannelReceive<T>>((resolve) => {
      const waiter: Waiter<T> = { resolve };
      if (tickMs !== undefined) {
        waiter.timer = setTimeout(() => {
          if (this.waiter !== waiter) return;
          this.waiter = undefined;
          resolve({ kind: 'tick' });
        }, tickMs);
        // An idle consumer alone must not keep the process running
        waiter.timer.unref();
      }
      this.waiter = waiter;
    });
  }

  /** Buffered items stay receivable; afterwards receive reports closed. */
  public close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    if (waiter !== undefined) {
      this.waiter = undefined;
      if (waiter.timer !== undefined) clearTimeout(waiter.timer);
      waiter.resolve({ kind: 'closed' });
    }
  }
}
