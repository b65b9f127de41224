// Pause signal the worker awaits at row boundaries. No polling: resume() releases the waiter.
export class PauseGate {
  private waiter: Promise<void> | undefined;
  private release: (() => void) | undefined;

  isPaused(): boolean {
    return this.waiter !== undefined;
  }

  pause() {
    if (this.waiter) return;
    this.waiter = new Promise<void>((r) => {
      this.release = r;
    });
  }

  resume() {
    const release = this.release;
    this.waiter = undefined;
    this.release = undefined;
    release?.();
  }

  wait(): Promise<void> {
    return this.waiter ?? Promise.resolve();
  }
}
