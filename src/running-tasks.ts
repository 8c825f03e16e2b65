import { errorMessage } from './utils.js';

export type TaskStatus = 'running' | 'completed' | 'panicked' | 'cancelled';

export class TaskCancelledError extends Error {
  constructor() {
    super('task cancelled');
    this.name = 'TaskCancelledError';
  }
}

/**
 * Handle for one background tool task. The body starts on a microtask, so the
 * handle is registered before any of its events can be sent.
 *
 * A body that resolves is `completed` (its terminal event is already on the
 * channel). A body that throws is `panicked`, or `cancelled` when it throws
 * after `cancel()`. `join()` never rejects.
 */
export class TaskHandle {
  readonly callId: string;
  readonly toolName: string;
  readonly startedAt: number;
  private readonly abortController = new AbortController();
  private readonly completion: Promise<void>;
  private currentStatus: TaskStatus = 'running';
  private failureMessage?: string;
  // Set once a terminal event for this call has been processed or synthesized
  reported = false;

  constructor(callId: string, toolName: string, body: (signal: AbortSignal) => Promise<void>) {
    this.callId = callId;
    this.toolName = toolName;
    this.startedAt = Date.now();
    this.completion = Promise.resolve()
      .then(() => body(this.abortController.signal))
      .then(
        () => {
          this.currentStatus = 'completed';
        },
        (error: unknown) => {
          if (this.abortController.signal.aborted || error instanceof TaskCancelledError) {
            this.currentStatus = 'cancelled';
            return;
          }
          this.currentStatus = 'panicked';
          this.failureMessage = errorMessage(error);
        },
      );
  }

  public get status(): TaskStatus {
    return this.currentStatus;
  }

  public get isFinished(): boolean {
    return this.currentStatus !== 'running';
  }

  public get panicMessage(): string | undefined {
    return this.failureMessage;
  }

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public cancel(): void {
    if (!this.abortController.signal.aborted) this.abortController.abort();
  }

  public join(): Promise<TaskStatus> {
    return this.completion.then(() => this.currentStatus);
  }
}

/**
 * call-id -> task handle. Entries are added at spawn time and removed exactly
 * once, either when the terminal event is processed or when the crash
 * sentinel synthesizes one.
 */
export class RunningTaskTable {
  private readonly tasks = new Map<string, TaskHandle>();

  public add(handle: TaskHandle): void {
    if (this.tasks.has(handle.callId)) {
      throw new Error(`duplicate running task for call ${handle.callId}`);
    }
    this.tasks.set(handle.callId, handle);
  }

  public get(callId: string): TaskHandle | undefined {
    return this.tasks.get(callId);
  }

  public has(callId: string): boolean {
    return this.tasks.has(callId);
  }

  /** Returns the removed handle, or undefined when it was already removed. */
  public remove(callId: string): TaskHandle | undefined {
    const handle = this.tasks.get(callId);
    if (handle === undefined) return undefined;
    this.tasks.delete(callId);
    handle.reported = true;
    return handle;
  }

  public get size(): number {
    return this.tasks.size;
  }

  public get isEmpty(): boolean {
    return this.tasks.size === 0;
  }

  public ids(): string[] {
    return Array.from(this.tasks.keys());
  }

  public handles(): TaskHandle[] {
    return Array.from(this.tasks.values());
  }

  public cancelAll(): void {
    this.tasks.forEach((handle) => {
      handle.cancel();
    });
  }
}
