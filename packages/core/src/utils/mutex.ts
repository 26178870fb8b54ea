/**
 * @fileoverview Async Mutex
 *
 * Single-writer lock around the task collection. Foreground operations and
 * the expiry sweep both go through it. Each caller chains onto the previous
 * holder's completion, so sections run one at a time in call order.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  /** Holder plus waiters */
  private entered = 0;

  /**
   * Run `fn` once every earlier section has finished; the lock passes on
   * even if `fn` throws.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    let leave: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      leave = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => done);
    this.entered += 1;

    await previous;
    try {
      return await fn();
    } finally {
      this.entered -= 1;
      leave();
    }
  }

  isLocked(): boolean {
    return this.entered > 0;
  }

  /** Sections waiting behind the current holder */
  getQueueLength(): number {
    return Math.max(0, this.entered - 1);
  }
}
