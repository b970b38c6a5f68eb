type Waiter = () => void;

/**
 * Queue-based cap on the number of concurrently running operations.
 * `maxConcurrent <= 0` means no cap.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private queue: Waiter[] = [];
  private readonly maxConcurrent: number;
  private stats = { started: 0, queued: 0, peak: 0 };

  constructor(maxConcurrent: number) {
    this.maxConcurrent = maxConcurrent > 0 ? maxConcurrent : Number.POSITIVE_INFINITY;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.take();
      return Promise.resolve();
    }
    this.stats.queued++;
    return new Promise<void>((resolve) => {
      this.queue.push(() => {
        this.take();
        resolve();
      });
    });
  }

  private take(): void {
    this.active++;
    this.stats.started++;
    this.stats.peak = Math.max(this.stats.peak, this.active);
  }

  private release(): void {
    this.active--;
    const next = this.queue.shift();
    if (next) next();
  }

  get pending(): number {
    return this.queue.length;
  }

  get running(): number {
    return this.active;
  }

  getStats(): { started: number; queued: number; peak: number; running: number; pending: number } {
    return { ...this.stats, running: this.active, pending: this.queue.length };
  }
}
