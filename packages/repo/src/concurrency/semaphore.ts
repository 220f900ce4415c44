/**
 * Counting semaphore bounding the number of concurrent inspections.
 */
export class Semaphore {
  private current = 0;
  private readonly queue: (() => void)[] = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  async acquire(): Promise<() => void> {
    if (this.current < this.limit) {
      this.current++;
      return this.releaser();
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        this.current++;
        resolve(this.releaser());
      });
    });
  }

  /**
   * Runs `task` once a permit is available and releases it afterwards.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    this.current--;
    const next = this.queue.shift();
    if (next) next();
  }
}
