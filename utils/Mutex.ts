/**
 * @brief FIFO async mutex
 * @description Waiters acquire in call order. Used for the fleet lock and for each unit's movement lock.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /**
   * @description Run `work` once every earlier caller has released the lock
   * @returns Whatever `work` resolves to; the lock is released even if it throws
   */
  async runExclusive<T>(work: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => {};
    const previous = this.tail;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.holders++;

    await previous;
    try {
      return await work();
    } finally {
      this.holders--;
      release();
    }
  }

  /**
   * @description True while a holder is running or waiting
   */
  isLocked(): boolean {
    return this.holders > 0;
  }
}
