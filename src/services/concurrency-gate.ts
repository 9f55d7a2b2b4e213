import { validateConcurrency } from '../config/batch';

/**
 * Counting gate that caps how many jobs hold a permit at once.
 * Waiters are admitted in FIFO order.
 */
export class ConcurrencyGate {
  readonly limit: number;
  private holders = 0;
  private maxHolders = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(limit: number) {
    this.limit = validateConcurrency(limit);
  }

  get active(): number {
    return this.holders;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /** Highest number of simultaneous holders seen so far. */
  get peak(): number {
    return this.maxHolders;
  }

  acquire(): Promise<void> {
    if (this.holders < this.limit) {
      this.take();
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.take();
        resolve();
      });
    });
  }

  release(): void {
    if (this.holders === 0) {
      throw new Error('ConcurrencyGate.release() called without a held permit');
    }
    this.holders--;
    const next = this.waiters.shift();
    if (next) next();
  }

  /**
   * Run `task` while holding a permit. The permit is released on every exit
   * path, including a rejected task.
   */
  async withPermit<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private take(): void {
    this.holders++;
    if (this.holders > this.maxHolders) this.maxHolders = this.holders;
  }
}
