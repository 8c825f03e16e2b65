/**
 * Shared cancellation flag for one turn. Checked at loop-iteration start,
 * around every model-stream element and before each tool dispatch.
 * The signal is handed to the model client so a blocked stream read ends too.
 */
export class CancellationFlag {
  private controller = new AbortController();

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Idempotent; returns true only for the call that flipped the flag. */
  public cancel(): boolean {
    if (this.controller.signal.aborted) return false;
    this.controller.abort();
    return true;
  }

  // A fresh flag per turn; listeners on the old signal are left behind
  public reset(): void {
    if (!this.controller.signal.aborted) return;
    this.controller = new AbortController();
  }
}
