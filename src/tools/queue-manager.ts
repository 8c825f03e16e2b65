interface Waiter {
  resolve: (info: AcquireResult) => void;
  reject: (err: unknown) => void;
  startTs: number;
  signal?: AbortSignal;
  abortListener?: () => void;
}

export interface AcquireResult {
  queued: boolean;
  waitMs: number;
}

export interface QueueStatus {
  capacity: number;
  inUse: number;
  waiting: number;
}

/**
 * Slot queue bounding how many tool tasks call the executor at once.
 * Without a capacity every acquire succeeds immediately.
 */
export class ToolQueue {
  private inUse = 0;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly capacity?: number) {}

  async acquire(signal?: AbortSignal): Promise<AcquireResult> {
    if (signal?.aborted === true) throw abortError();
    if (this.capacity === undefined || this.inUse < this.capacity) {
      this.inUse += 1;
      return { queued: false, waitMs: 0 };
    }
    return await new Promise<AcquireResult>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, startTs: Date.now() };
      if (signal !== undefined) {
        const listener = () => {
          this.removeWaiter(waiter);
          reject(abortError());
        };
        signal.addEventListener('abort', listener, { once: true });
        waiter.signal = signal;
        waiter.abortListener = listener;
      }
      this.waiters.push(waiter);
    });
  }

  release(): void {
    if (this.inUse > 0) this.inUse -= 1;
    this.runNext();
  }

  getStatus(): QueueStatus {
    return { capacity: this.capacity ?? Number.POSITIVE_INFINITY, inUse: this.inUse, waiting: this.waiters.length };
  }

  private runNext(): void {
    // eslint-disable-next-line functional/no-loop-statements
    while (this.waiters.length > 0) {
      if (this.capacity !== undefined && this.inUse >= this.capacity) return;
      const waiter = this.waiters.shift();
      if (waiter === undefined) return;
      this.clearAbort(waiter);
      if (waiter.signal?.aborted === true) {
        waiter.reject(abortError());
        continue;
      }
      this.inUse += 1;
      waiter.resolve({ queued: true, waitMs: Date.now() - waiter.startTs });
    }
  }

  private removeWaiter(waiter: Waiter): void {
    const idx = this.waiters.indexOf(waiter);
    if (idx >= 0) this.waiters.splice(idx, 1);
    this.clearAbort(waiter);
  }

  private clearAbort(waiter: Waiter): void {
    if (waiter.signal !== undefined && waiter.abortListener !== undefined) {
      waiter.signal.removeEventListener('abort', waiter.abortListener);
      waiter.abortListener = undefined;
    }
  }
}

function abortError(): DOMException {
  return new DOMException('Queue wait aborted', 'AbortError');
}
