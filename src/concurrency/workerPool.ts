import { log } from '../log';

/**
 * Caps the number of in-flight calls to slow collaborators (completion,
 * synthesis, transcription). Work beyond the limit waits in FIFO order.
 */
export class WorkerPool {
  private readonly maxConcurrent: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(maxConcurrent: number) {
    this.maxConcurrent = Math.max(Math.floor(maxConcurrent), 1);
  }

  public get size(): number {
    return this.maxConcurrent;
  }

  public get activeCount(): number {
    return this.active;
  }

  public get waitingCount(): number {
    return this.waiting.length;
  }

  public async run<T>(label: string, task: () => Promise<T>): Promise<T> {
    await this.acquire(label);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(label: string): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active += 1;
      return Promise.resolve();
    }

    log.debug(
      { event: 'worker_pool_wait', label, active: this.active, waiting: this.waiting.length + 1 },
      'worker pool saturated',
    );
    return new Promise<void>((resolve) => {
      this.waiting.push(() => {
        this.active += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.active -= 1;
    const next = this.waiting.shift();
    if (next) {
      next();
    }
  }
}
