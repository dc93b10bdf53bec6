/**
 * Cooperative control primitives for one fill session. The worker checks
 * the token and the gate between units of work; nothing is interrupted
 * mid-write.
 */

export class CancellationToken {
  private _cancelled = false;

  get isCancelled(): boolean {
    return this._cancelled;
  }

  cancel(): void {
    this._cancelled = true;
  }
}

/** Waitable pause gate. Closing it asks the worker to stop; opening it lets the same worker go on. */
export class PauseGate {
  private _closed = false;
  private gate: Promise<void> | null = null;
  private release: (() => void) | null = null;

  get isClosed(): boolean {
    return this._closed;
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.gate = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  open(): void {
    if (!this._closed) return;
    this._closed = false;
    if (this.release) {
      this.release();
      this.release = null;
      this.gate = null;
    }
  }

  /** Resolves immediately when open, otherwise once the gate is opened. */
  async wait(): Promise<void> {
    if (this._closed && this.gate) {
      await this.gate;
    }
  }
}
