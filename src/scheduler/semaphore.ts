/**
 * Async counting semaphore used as the scheduler's admission gate.
 * Usage: const gate = new Semaphore(4); await gate.acquire(); try { ... } finally { gate.release(); }
 */
export class Semaphore {
  private count: number;
  private readonly waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.count = Math.max(1, Math.floor(permits));
  }

  async acquire(): Promise<void> {
    if (this.count > 0) {
      this.count--;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.count++;
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.count;
  }

  get pending(): number {
    return this.waiting.length;
  }
}
