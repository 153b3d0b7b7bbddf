export type DrainWaitResult = 'drained' | 'timed-out';

/**
 * Tracks the backlog that existed when consumers subscribed and opens once
 * that many deliveries have been acknowledged. Opening happens at most once;
 * later waits resolve immediately.
 */
export class StartupDrainGate {
  private pending = 0;
  private draining = true;
  private sealed = false;
  private openGate: () => void = () => undefined;
  private readonly opened = new Promise<void>((resolve) => {
    this.openGate = resolve;
  });

  get isDraining(): boolean {
    return this.draining;
  }

  get pendingCount(): number {
    return this.pending;
  }

  addPending(count: number): void {
    if (!this.draining || count <= 0) {
      return;
    }
    this.pending += count;
  }

  /**
   * Called once every queue has been counted. With nothing pending the gate
   * opens immediately.
   */
  seal(): boolean {
    this.sealed = true;
    return this.openIfEmpty();
  }

  /** Returns true when this acknowledgment opened the gate. */
  recordAcknowledged(): boolean {
    if (!this.draining) {
      return false;
    }

    this.pending = Math.max(0, this.pending - 1);
    return this.openIfEmpty();
  }

  async wait(timeoutMs = 0): Promise<DrainWaitResult> {
    if (!this.draining) {
      return 'drained';
    }

    if (timeoutMs <= 0) {
      await this.opened;
      return 'drained';
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<DrainWaitResult>((resolve) => {
      timer = setTimeout(() => resolve('timed-out'), timeoutMs);
    });

    try {
      return await Promise.race([this.opened.then((): DrainWaitResult => 'drained'), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private openIfEmpty(): boolean {
    if (!this.draining || !this.sealed || this.pending > 0) {
      return false;
    }

    this.draining = false;
    this.openGate();
    return true;
  }
}
