export type Task = () => Promise<void>;

/**
 * Runs at most `concurrency` tasks at a time. `join()` is the phase barrier:
 * it resolves once every submitted task has settled, including tasks
 * submitted while waiting.
 */
export class WorkerPool {
  private active = 0;
  private readonly waiting: (() => void)[] = [];
  private readonly pending = new Set<Promise<void>>();

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get size(): number {
    return this.pending.size;
  }

  submit(task: Task, onError: (err: unknown) => void): void {
    const settled: Promise<void> = this.acquire()
      .then(task)
      .catch(onError)
      .finally(() => {
        this.release();
        this.pending.delete(settled);
      });
    this.pending.add(settled);
  }

  async join(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}
