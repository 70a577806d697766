type CancelListener = () => void;

/** Cooperative stop signal for one generation; checked at each emission point. */
export class CancellationToken {
  private cancelRequested = false;
  private readonly listeners = new Set<CancelListener>();

  get cancelled(): boolean {
    return this.cancelRequested;
  }

  /** Idempotent. */
  cancel(): void {
    if (this.cancelRequested) {
      return;
    }
    this.cancelRequested = true;
    for (const listener of [...this.listeners]) {
      listener();
    }
    this.listeners.clear();
  }

  onCancel(listener: CancelListener): () => void {
    if (this.cancelRequested) {
      listener();
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
