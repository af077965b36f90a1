/**
 * Call Queue
 *
 * Runs async operations one at a time in arrival order.
 * The engine answers one request at a time, and page state such as the
 * current frame is shared per process, so calls must not interleave.
 */
export class CallQueue {
  private running = false;
  private readonly waiting: (() => void)[] = [];

  /**
   * Run an operation once every earlier operation has settled.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.running) {
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }

    this.running = true;
    try {
      return await fn();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.running = false;
      }
    }
  }

  /**
   * Number of operations waiting behind the running one
   */
  get pending(): number {
    return this.waiting.length;
  }

  get isBusy(): boolean {
    return this.running;
  }
}
