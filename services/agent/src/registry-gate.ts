// RegistryGate: shared/exclusive gate guarding the registry's backend map.
// Tool calls hold it shared; reload and closeAll hold it exclusively.
// Waiting exclusive holders block new shared acquisitions so a reload is not
// starved by a steady stream of calls.

export class RegistryGate {
  private sharedHolders = 0;
  private exclusiveHeld = false;
  private exclusiveWaiting = 0;
  private waiters: Array<() => void> = [];

  /**
   * Acquire a shared hold. Returns a release function.
   * Waits while an exclusive hold is active or queued.
   */
  async acquireShared(): Promise<() => void> {
    while (this.exclusiveHeld || this.exclusiveWaiting > 0) {
      await this.nextChange();
    }
    this.sharedHolders++;
    return this.once(() => {
      this.sharedHolders--;
      this.notify();
    });
  }

  /** Acquire an exclusive hold once every shared holder has released. */
  async acquireExclusive(): Promise<() => void> {
    this.exclusiveWaiting++;
    try {
      while (this.exclusiveHeld || this.sharedHolders > 0) {
        await this.nextChange();
      }
    } finally {
      this.exclusiveWaiting--;
    }
    this.exclusiveHeld = true;
    return this.once(() => {
      this.exclusiveHeld = false;
      this.notify();
    });
  }

  async shared<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquireShared();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquireExclusive();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Number of shared holds currently active. */
  get inFlight(): number {
    return this.sharedHolders;
  }

  get isExclusive(): boolean {
    return this.exclusiveHeld;
  }

  private nextChange(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }

  private once(release: () => void): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
    };
  }
}
