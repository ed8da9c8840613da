import { log } from '../log';

interface WorkItem {
  name: string;
  run: () => Promise<void>;
}

interface QueueState {
  items: WorkItem[];
  running: boolean;
}

/**
 * FIFO task queue per key. Tasks sharing a key run one at a time in arrival
 * order; different keys proceed independently.
 */
export class SessionQueue {
  private readonly queues = new Map<string, QueueState>();

  public run<T>(key: string, name: string, task: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.enqueue(key, {
        name,
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
      });
    });
  }

  public pendingCount(key: string): number {
    return this.queues.get(key)?.items.length ?? 0;
  }

  private enqueue(key: string, item: WorkItem): void {
    const queue = this.queues.get(key) ?? { items: [], running: false };
    queue.items.push(item);
    this.queues.set(key, queue);

    if (!queue.running) {
      queue.running = true;
      setImmediate(() => {
        void this.runQueue(key, queue);
      });
    }
  }

  private async runQueue(key: string, queue: QueueState): Promise<void> {
    while (queue.items.length > 0) {
      const item = queue.items.shift();
      if (!item) {
        continue;
      }

      try {
        await item.run();
      } catch (error) {
        log.error({ err: error, session_key: key, task: item.name, event: 'session_task_failed' }, 'session task failed');
      }
    }

    queue.running = false;
    if (queue.items.length === 0) {
      this.queues.delete(key);
    }
  }
}
