type ShutdownListener = (reason: string) => void;

/**
 * Shared running flag for every task in the pipeline.
 *
 * `trigger` only flips state and notifies listeners, so it is safe to call from a
 * signal handler. Sleeping tasks wake up immediately once it fires.
 */
export class ShutdownSignal {
  private stopped = false;
  private stopReason: string | null = null;
  private readonly listeners = new Set<ShutdownListener>();

  get running(): boolean {
    return !this.stopped;
  }

  get reason(): string | null {
    return this.stopReason;
  }

  trigger(reason = "shutdown requested"): boolean {
    if (this.stopped) return false;
    this.stopped = true;
    this.stopReason = reason;
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(reason);
      } catch (err) {
        console.warn("Shutdown listener failed:", err);
      }
    }
    this.listeners.clear();
    return true;
  }

  onShutdown(listener: ShutdownListener): () => void {
    if (this.stopped) {
      listener(this.stopReason ?? "shutdown requested");
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves after `ms`, or as soon as the signal fires. */
  sleep(ms: number): Promise<void> {
    if (this.stopped) return Promise.resolve();
    return new Promise<void>((resolve) => {
      let off: () => void = () => undefined;
      const timer = setTimeout(() => {
        off();
        resolve();
      }, Math.max(0, ms));
      off = this.onShutdown(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }
}
