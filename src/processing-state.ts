export type ProcessingListener = (isProcessing: boolean) => void;

/**
 * Observable "at least one batch is in flight" flag. Concurrent batches share
 * it, so it is backed by a counter rather than a boolean.
 */
export class ProcessingState {
  private inFlight = 0;
  private listeners = new Set<ProcessingListener>();

  get isProcessing(): boolean {
    return this.inFlight > 0;
  }

  get activeBatches(): number {
    return this.inFlight;
  }

  subscribe(listener: ProcessingListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  begin(): void {
    this.inFlight++;
    if (this.inFlight === 1) this.emit(true);
  }

  end(): void {
    if (this.inFlight === 0) return;
    this.inFlight--;
    if (this.inFlight === 0) this.emit(false);
  }

  /** Runs `work` with the flag raised, lowering it on every exit path. */
  async track<T>(work: () => Promise<T>): Promise<T> {
    this.begin();
    try {
      return await work();
    } finally {
      this.end();
    }
  }

  private emit(value: boolean): void {
    for (const listener of this.listeners) {
      try {
        listener(value);
      } catch (error) {
        console.error('Processing listener failed:', error);
      }
    }
  }
}
